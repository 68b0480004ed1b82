import { InvalidInputError } from '../core/pdf/errors.js';

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Parse a comma-separated page list, e.g. "1,10,20,30" → [1, 10, 20, 30].
 *
 * Tokens are trimmed; a sign is allowed. Order is preserved.
 * @throws InvalidInputError if any token is not an integer (including empty tokens).
 */
export function parsePageList(value: string): number[] {
  return value.split(',').map((token) => {
    const trimmed = token.trim();
    if (!INTEGER_TOKEN.test(trimmed)) {
      throw new InvalidInputError('Page list must be comma-separated numbers');
    }
    return parseInt(trimmed, 10);
  });
}
