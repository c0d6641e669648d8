import type { ContentType } from '../core/content-type.js';
import { MalformedValueError, UnsupportedHeaderError } from '../core/errors.js';
import type { LinkHeader } from '../core/link.js';
import type { CacheControlDirectives, ForwardedElement } from '../types/index.js';
import { silentLogger } from '../types/logger.js';
import { tryFnSync } from '../utils/try-fn.js';
import { parseAccept, parseAcceptCharset, parseAcceptEncoding, parseAcceptLanguage } from './accept.js';
import { parseCacheControl } from './cache-control.js';
import { parseContentType, type ContentTypeOptions } from './content-type.js';
import { parseForwarded, type ForwardedOptions } from './forwarded.js';
import { parseLink, type LinkOptions } from './link.js';

export type HeaderOptions = ContentTypeOptions & ForwardedOptions & LinkOptions;

/**
 * Result type of each header field `parseHeader` understands
 */
export interface ParsedHeaders {
  accept: ContentType[];
  'accept-charset': string[];
  'accept-encoding': string[];
  'accept-language': string[];
  'cache-control': CacheControlDirectives;
  'content-type': ContentType;
  forwarded: ForwardedElement[];
  link: LinkHeader[];
}

export type SupportedHeader = keyof ParsedHeaders;
export type ParsedHeader = ParsedHeaders[SupportedHeader];

type HeaderParsers = {
  [K in SupportedHeader]: (value: string, options: HeaderOptions) => ParsedHeaders[K];
};

const PARSERS: HeaderParsers = {
  accept: parseAccept,
  'accept-charset': parseAcceptCharset,
  'accept-encoding': parseAcceptEncoding,
  'accept-language': parseAcceptLanguage,
  'cache-control': parseCacheControl,
  'content-type': parseContentType,
  forwarded: parseForwarded,
  link: parseLink,
};

export const SUPPORTED_HEADERS = Object.freeze(Object.keys(PARSERS));

export function isSupportedHeader(name: string): name is SupportedHeader {
  return Object.hasOwn(PARSERS, name);
}

/**
 * Parse `value` with the parser registered for header field `name`
 *
 * Names compare case-insensitively. When the value cannot be parsed the raw
 * string is returned, unless `strict` is set, in which case the error
 * propagates.
 *
 * @throws {UnsupportedHeaderError} when no parser handles `name`
 *
 * @example
 * ```typescript
 * parseHeader('Cache-Control', 'no-cache, max-age=0'); // { 'no-cache': true, 'max-age': 0 }
 * parseHeader('Content-Type', '*');                    // '*'
 * ```
 */
export function parseHeader<K extends SupportedHeader>(
  name: K,
  value: string,
  options?: HeaderOptions
): ParsedHeaders[K] | string;
export function parseHeader(name: string, value: string, options?: HeaderOptions): ParsedHeader | string;
export function parseHeader(name: string, value: string, options: HeaderOptions = {}): ParsedHeader | string {
  const key = name.trim().toLowerCase();
  if (!isSupportedHeader(key)) {
    throw new UnsupportedHeaderError(name, SUPPORTED_HEADERS);
  }

  const parser = PARSERS[key];
  const [ok, err, parsed] = tryFnSync((): ParsedHeader => parser(value, options));
  if (ok) return parsed;

  if (options.strict || !(err instanceof MalformedValueError)) throw err;
  (options.logger ?? silentLogger).debug(
    { header: key, reason: err.reason },
    'unparseable header value returned as is'
  );
  return value;
}
