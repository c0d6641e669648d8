/**
 * tryFnSync - run a parser and get its outcome as data instead of a throw
 *
 * @returns A tuple containing:
 *   - [0] ok: whether the call succeeded
 *   - [1] err: the error if it failed, null otherwise
 *   - [2] data: the result if it succeeded, undefined otherwise
 *
 * @example
 * const [ok, err, contentType] = tryFnSync(() => parseContentType(value));
 * if (ok) console.log(contentType.mediaType);
 */
import { HeaderParseError } from '../core/errors.js';

export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

export function tryFnSync<T>(fn: () => T): TryResult<T> {
  try {
    return [true, null, fn()];
  } catch (err) {
    return [false, wrapUnknownError(err, 'Synchronous function threw an error'), undefined];
  }
}

/**
 * Tagged outcome used between the grammar readers and the header parsers
 */
export type Outcome<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E };

function wrapUnknownError(err: unknown, context: string): Error {
  if (err instanceof Error) return err;
  return new HeaderParseError(`${context}: ${String(err)}`, [
    'Inspect the original value being thrown.',
    'Ensure errors are instances of Error or HeaderParseError.'
  ]);
}
