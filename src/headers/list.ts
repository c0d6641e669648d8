import type { ParseOptions, ParseResult } from '../types/index.js';
import { dequote, formatParameterValue, splitElements } from '../utils/tokenizer.js';
import { complete, createContext } from './context.js';

/**
 * Split a comma-separated header value (RFC 9110 section 5.6.1)
 *
 * Commas inside quoted strings do not split; fully quoted elements lose
 * their quotes and empty elements are dropped.
 *
 * @example
 * ```typescript
 * parseList('gzip, "quoted, value", , br'); // ['gzip', 'quoted, value', 'br']
 * ```
 */
export function parseList(value: string, options: ParseOptions = {}): string[] {
  return parseListDetailed(value, options).value;
}

export function parseListDetailed(value: string, options: ParseOptions = {}): ParseResult<string[]> {
  const ctx = createContext('list', value, options);
  return complete(ctx, splitElements(value, ',', { headerName: ctx.header }).map(dequote));
}

/**
 * Join elements into a list value, quoting those that are not tokens
 *
 * @example
 * ```typescript
 * formatList(['gzip', 'quoted, value']); // 'gzip, "quoted, value"'
 * ```
 */
export function formatList(elements: readonly string[]): string {
  return elements.map(formatParameterValue).join(', ');
}
