/**
 * Error kinds surfaced by the splitter. The CLI matches on `kind` to render them.
 */

export type SplitErrorKind = 'not-found' | 'invalid-input' | 'corrupt-document';

/** Source path does not reference an existing file. */
export class NotFoundError extends Error {
  readonly kind = 'not-found' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Empty break-page list, or a non-integer token in the page list. */
export class InvalidInputError extends Error {
  readonly kind = 'invalid-input' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Source exists but cannot be parsed as a PDF we can read. */
export class CorruptDocumentError extends Error {
  readonly kind = 'corrupt-document' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorruptDocumentError';
  }
}

export type SplitError = NotFoundError | InvalidInputError | CorruptDocumentError;

export function isSplitError(err: unknown): err is SplitError {
  return err instanceof NotFoundError
    || err instanceof InvalidInputError
    || err instanceof CorruptDocumentError;
}
