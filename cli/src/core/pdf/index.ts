/**
 * PDF chapter splitting.
 *
 * Usage:
 *   import { buildSplitConfig, splitPdf, ... } from '../core/pdf/index.js';
 */

export { buildSplitConfig } from './config.js';
export { getPageCount, openPdf, extractPages, pageIndices } from './document.js';
export { planRanges, chapterFileName, splitPdf } from './split.js';
export {
  NotFoundError,
  InvalidInputError,
  CorruptDocumentError,
  isSplitError,
} from './errors.js';
export type { SplitError, SplitErrorKind } from './errors.js';
export type {
  SplitConfig,
  ChapterRange,
  SkippedRange,
  RangePlan,
  SplitFile,
  SplitResult,
  SplitOptions,
} from './types.js';
