/**
 * Types for splitting a PDF into chapter files.
 */

// ── Configuration ────────────────────────────────────────────

/** Validated split input. Built once by `buildSplitConfig`, read-only after. */
export interface SplitConfig {
  readonly sourcePath: string;
  /** Created on demand when the split runs. */
  readonly outputDir: string;
  /** 1-based chapter start pages, ascending. Duplicates are kept. */
  readonly breakPages: readonly number[];
}

// ── Range planning ───────────────────────────────────────────

/** A chapter to write: pages `start`..`end` (1-based, inclusive). */
export interface ChapterRange {
  kind: 'chapter';
  /** 1-based position of the break page in the sorted list. */
  index: number;
  start: number;
  /** May be `start - 1` when two break pages are equal (zero-page chapter). */
  end: number;
}

/** A break page outside `[1, pageCount]`; no file is written for it. */
export interface SkippedRange {
  kind: 'skip';
  index: number;
  page: number;
}

export type RangePlan = ChapterRange | SkippedRange;

// ── Split result ─────────────────────────────────────────────

/** A chapter file written (or, on dry run, planned) by the splitter. */
export interface SplitFile {
  index: number;
  start: number;
  end: number;
  /** Number of pages copied into the file. */
  pageCount: number;
  /** e.g. "book_chapter01_p1-9.pdf" */
  fileName: string;
  path: string;
}

export interface SplitResult {
  sourcePath: string;
  outputDir: string;
  /** Page count of the source document. */
  pageCount: number;
  files: SplitFile[];
  skipped: SkippedRange[];
}

export interface SplitOptions {
  /** Plan and report only; nothing is created on disk. */
  dryRun?: boolean;
  onFile?: (file: SplitFile) => void;
  onSkip?: (skipped: SkippedRange) => void;
}
