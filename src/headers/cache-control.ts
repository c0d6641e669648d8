/**
 * Cache-Control directives (RFC 9111 section 5.2)
 */

import { MAX_DELTA_SECONDS } from '../constants.js';
import type { CacheControlDirectives, ParseOptions, ParseResult } from '../types/index.js';
import { dequote, findDelimiter, formatParameterValue, isToken, splitElements } from '../utils/tokenizer.js';
import { complete, createContext, report } from './context.js';

const DELTA_SECONDS = /^\d+$/;

/**
 * Parse a Cache-Control header value
 *
 * Directive names are lower-cased. A directive without a value maps to
 * `true` and delta-seconds map to numbers, capped at 2147483648. A repeated
 * directive keeps its last value.
 *
 * @example
 * ```typescript
 * parseCacheControl('public, max-age=2592000');
 * // { public: true, 'max-age': 2592000 }
 * ```
 */
export function parseCacheControl(value: string, options: ParseOptions = {}): CacheControlDirectives {
  return parseCacheControlDetailed(value, options).value;
}

export function parseCacheControlDetailed(
  value: string,
  options: ParseOptions = {}
): ParseResult<CacheControlDirectives> {
  const ctx = createContext('cache-control', value, options);
  const directives = new Map<string, string | number | true>();

  for (const element of splitElements(value, ',', { headerName: ctx.header })) {
    const equals = findDelimiter(element, '=', { headerName: ctx.header });
    const name = (equals < 0 ? element : element.slice(0, equals)).trim().toLowerCase();
    if (!isToken(name)) {
      report(ctx, element, `invalid directive name ${JSON.stringify(name)}`);
      continue;
    }
    if (equals < 0) {
      directives.set(name, true);
      continue;
    }

    const raw = element.slice(equals + 1).trim();
    const quoted = raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"');
    if (!quoted && !isToken(raw)) {
      report(ctx, element, raw ? `invalid value for directive "${name}"` : `directive "${name}" has an empty value`);
      continue;
    }

    const directive = dequote(raw);
    directives.set(name, DELTA_SECONDS.test(directive) ? Math.min(Number(directive), MAX_DELTA_SECONDS) : directive);
  }

  return complete(ctx, Object.fromEntries(directives));
}

/**
 * Write directives back as a Cache-Control value
 *
 * @example
 * ```typescript
 * formatCacheControl({ 'no-cache': 'set-cookie', 'max-age': 60, public: true });
 * // 'no-cache=set-cookie, max-age=60, public'
 * ```
 */
export function formatCacheControl(directives: Readonly<CacheControlDirectives>): string {
  return Object.entries(directives)
    .map(([name, directive]) => {
      if (directive === true) return name;
      if (typeof directive === 'number') return `${name}=${directive}`;
      return `${name}=${formatParameterValue(directive)}`;
    })
    .join(', ');
}
