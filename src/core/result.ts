/**
 * Result type for parse steps
 *
 * Every step of the reader returns a ParseResult instead of throwing, and the
 * caller forwards a failure unchanged. The first failure ends the parse.
 *
 * @example
 * ```typescript
 * const result = parseChannels(line, 1);
 * if (!result.success) {
 *   return result;
 * }
 * const channels = result.value;
 * ```
 */

import type { BvhParseError } from '../errors';

export type ParseResult<T, E = BvhParseError> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(value: T): ParseResult<T, never> {
  return { success: true, value };
}

export function fail<E>(error: E): ParseResult<never, E> {
  return { success: false, error };
}

/**
 * Unwrap a result, throwing the carried error on failure.
 */
export function unwrap<T, E>(result: ParseResult<T, E>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}
