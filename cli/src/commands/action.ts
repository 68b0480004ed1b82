import chalk from 'chalk';
import { isSplitError } from '../core/pdf/errors.js';
import type { SplitError } from '../core/pdf/errors.js';

/** Label shown in front of a known error kind. */
export function errorLabel(err: SplitError): string {
  switch (err.kind) {
    case 'not-found':
      return 'File not found';
    case 'invalid-input':
      return 'Invalid input';
    case 'corrupt-document':
      return 'Unreadable PDF';
  }
}

/** One-line message for any thrown value. */
export function formatError(err: unknown): string {
  if (isSplitError(err)) return `${errorLabel(err)}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a command action: any error is printed to stderr and exits with 1.
 */
export function commandAction<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(chalk.red(`Error: ${formatError(err)}`));
      process.exit(1);
    }
  };
}
