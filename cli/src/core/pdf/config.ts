import { existsSync, statSync } from 'node:fs';
import { InvalidInputError, NotFoundError } from './errors.js';
import type { SplitConfig } from './types.js';

/**
 * Validate split input and normalize the break pages.
 *
 * Break pages are sorted ascending; duplicates are kept (equal neighbours
 * produce a zero-page chapter downstream). The caller's array is not touched.
 *
 * @throws NotFoundError if `sourcePath` is not an existing file.
 * @throws InvalidInputError if `breakPages` is empty.
 */
export function buildSplitConfig(
  sourcePath: string,
  outputDir: string,
  breakPages: readonly number[],
): SplitConfig {
  if (!existsSync(sourcePath) || !statSync(sourcePath).isFile()) {
    throw new NotFoundError(`Input file '${sourcePath}' not found`);
  }

  if (breakPages.length === 0) {
    throw new InvalidInputError('Page list is empty');
  }

  return Object.freeze({
    sourcePath,
    outputDir,
    breakPages: Object.freeze([...breakPages].sort((a, b) => a - b)),
  });
}
