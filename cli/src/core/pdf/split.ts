/**
 * Chapter extraction: split a PDF at a sorted list of start pages.
 *
 * Chapters are written one at a time, in page order, each fully saved before
 * the next begins. A failure aborts the run; files already written stay.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join, parse } from 'node:path';
import { extractPages, openPdf } from './document.js';
import type {
  RangePlan,
  SplitConfig,
  SplitFile,
  SplitOptions,
  SplitResult,
  SkippedRange,
} from './types.js';

/**
 * Compute one plan entry per break page.
 *
 * A chapter runs from its break page to the page before the next break (or
 * to the last page), clamped to `pageCount`. Break pages outside
 * `[1, pageCount]` become skips.
 */
export function planRanges(breakPages: readonly number[], pageCount: number): RangePlan[] {
  const plan: RangePlan[] = [];

  for (let i = 0; i < breakPages.length; i++) {
    const start = breakPages[i];
    const index = i + 1;

    if (start < 1 || start > pageCount) {
      plan.push({ kind: 'skip', index, page: start });
      continue;
    }

    const end = i + 1 < breakPages.length
      ? breakPages[i + 1] - 1
      : pageCount;

    plan.push({ kind: 'chapter', index, start, end: Math.min(end, pageCount) });
  }

  return plan;
}

/** `{base}_chapter{NN}_p{start}-{end}.pdf`, NN zero-padded to at least 2 digits. */
export function chapterFileName(baseName: string, index: number, start: number, end: number): string {
  return `${baseName}_chapter${String(index).padStart(2, '0')}_p${start}-${end}.pdf`;
}

/**
 * Split the source PDF into chapter files under `config.outputDir`.
 *
 * Existing files with the same name are overwritten. Out-of-range break
 * pages are reported through `onSkip` and produce no file.
 *
 * @throws CorruptDocumentError if the source cannot be parsed.
 */
export async function splitPdf(config: SplitConfig, options: SplitOptions = {}): Promise<SplitResult> {
  const source = await openPdf(config.sourcePath);
  const pageCount = source.getPageCount();

  if (!options.dryRun) {
    mkdirSync(config.outputDir, { recursive: true });
  }

  const baseName = parse(config.sourcePath).name;
  const files: SplitFile[] = [];
  const skipped: SkippedRange[] = [];

  for (const range of planRanges(config.breakPages, pageCount)) {
    if (range.kind === 'skip') {
      skipped.push(range);
      options.onSkip?.(range);
      continue;
    }

    const fileName = chapterFileName(baseName, range.index, range.start, range.end);
    const outputPath = join(config.outputDir, fileName);

    if (!options.dryRun) {
      const bytes = await extractPages(source, range.start, range.end);
      writeFileSync(outputPath, bytes);
    }

    const file: SplitFile = {
      index: range.index,
      start: range.start,
      end: range.end,
      pageCount: Math.max(0, range.end - range.start + 1),
      fileName,
      path: outputPath,
    };
    files.push(file);
    options.onFile?.(file);
  }

  return {
    sourcePath: config.sourcePath,
    outputDir: config.outputDir,
    pageCount,
    files,
    skipped,
  };
}
