/**
 * Accept, Accept-Charset, Accept-Encoding and Accept-Language
 *
 * @see https://www.rfc-editor.org/rfc/rfc9110.html#section-12.5
 */

import { ContentType } from '../core/content-type.js';
import { HeaderParseError, MalformedValueError } from '../core/errors.js';
import type { ParseOptions, ParseResult } from '../types/index.js';
import { parseQuality, sortByPreference, type QualityRanked } from '../utils/quality.js';
import { findDelimiter, isToken, scanParameters, splitElements } from '../utils/tokenizer.js';
import { tryFnSync } from '../utils/try-fn.js';
import { readContentType } from './content-type.js';
import { complete, createContext, report, reportSkipped, type ParseContext } from './context.js';

/**
 * Parse an Accept header into media ranges, most preferred first
 *
 * Elements are ordered by quality, an explicit `q=1` ahead of an implied one,
 * then specificity and finally their position in the header. An explicit `q`
 * stays in `parameters`; use `quality` for the numeric value. Unparseable
 * media ranges are skipped (thrown in strict mode); an invalid quality counts
 * as `q=0`.
 *
 * @example
 * ```typescript
 * parseAccept('text/*, text/plain, text/plain;format=flowed, *\/*').map(String);
 * // ['text/plain; format=flowed', 'text/plain', 'text/*', '*\/*']
 * ```
 */
export function parseAccept(value: string, options: ParseOptions = {}): ContentType[] {
  return parseAcceptDetailed(value, options).value;
}

export function parseAcceptDetailed(value: string, options: ParseOptions = {}): ParseResult<ContentType[]> {
  const ctx = createContext('accept', value, options);
  const ranked: QualityRanked<ContentType>[] = [];

  splitElements(value, ',', { commentAware: true, headerName: ctx.header }).forEach((element, position) => {
    const [ok, err, reading] = tryFnSync(() => readContentType(element, { headerName: ctx.header }));
    if (!ok) {
      if (!(err instanceof MalformedValueError)) throw err;
      report(ctx, element, err.reason, err);
      return;
    }
    reportSkipped(ctx, reading.skipped);

    let contentType = reading.contentType;
    if (contentType.hasExplicitQuality && parseQuality(contentType.parameters.q) === null) {
      report(ctx, element, `invalid quality value ${JSON.stringify(contentType.parameters.q)}`);
      contentType = contentType.withParameters({ q: '0' });
    }

    ranked.push({
      value: contentType,
      quality: contentType.quality,
      explicit: contentType.hasExplicitQuality,
      specificity: contentType.specificity,
      position,
    });
  });

  return complete(ctx, sortByPreference(ranked));
}

function readQualifiedToken(ctx: ParseContext, element: string, position: number): QualityRanked<string> | null {
  const separator = findDelimiter(element, ';', { headerName: ctx.header });
  const token = (separator < 0 ? element : element.slice(0, separator)).trim();
  if (!isToken(token)) {
    report(ctx, element, `invalid token ${JSON.stringify(token)}`);
    return null;
  }

  const scan = scanParameters(separator < 0 ? '' : element.slice(separator + 1), { headerName: ctx.header });
  if (!scan.ok) {
    report(ctx, element, scan.error.reason, scan.error);
    return null;
  }
  reportSkipped(ctx, scan.skipped);

  let rawQuality: string | undefined;
  for (const [name, parameterValue] of scan.parameters) {
    if (name === 'q') rawQuality = parameterValue;
  }

  let quality = 1;
  if (rawQuality !== undefined) {
    const parsed = parseQuality(rawQuality);
    if (parsed === null) {
      report(ctx, element, `invalid quality value ${JSON.stringify(rawQuality)}`);
      quality = 0;
    } else {
      quality = parsed;
    }
  }

  return {
    value: token,
    quality,
    explicit: rawQuality !== undefined,
    specificity: token === '*' ? 0 : 1,
    position,
  };
}

function parseQualifiedList(header: string, value: string, options: ParseOptions): ParseResult<string[]> {
  const ctx = createContext(header, value, options);
  const ranked: QualityRanked<string>[] = [];
  splitElements(value, ',', { headerName: header }).forEach((element, position) => {
    const entry = readQualifiedToken(ctx, element, position);
    if (entry) ranked.push(entry);
  });
  return complete(ctx, sortByPreference(ranked));
}

/**
 * Parse an Accept-Charset header into charset names, most preferred first
 *
 * @example
 * ```typescript
 * parseAcceptCharset('acceptable, rejected;q=0, *');
 * // ['acceptable', '*', 'rejected']
 * ```
 */
export function parseAcceptCharset(value: string, options: ParseOptions = {}): string[] {
  return parseQualifiedList('accept-charset', value, options).value;
}

export function parseAcceptCharsetDetailed(value: string, options: ParseOptions = {}): ParseResult<string[]> {
  return parseQualifiedList('accept-charset', value, options);
}

export function parseAcceptEncoding(value: string, options: ParseOptions = {}): string[] {
  return parseQualifiedList('accept-encoding', value, options).value;
}

export function parseAcceptEncodingDetailed(value: string, options: ParseOptions = {}): ParseResult<string[]> {
  return parseQualifiedList('accept-encoding', value, options);
}

export function parseAcceptLanguage(value: string, options: ParseOptions = {}): string[] {
  return parseQualifiedList('accept-language', value, options).value;
}

export function parseAcceptLanguageDetailed(value: string, options: ParseOptions = {}): ParseResult<string[]> {
  return parseQualifiedList('accept-language', value, options);
}

/**
 * A token with an optional quality, as written in Accept-Charset and friends
 */
export interface QualifiedValue {
  value: string;
  quality?: number;
}

export type AcceptEntry = ContentType | QualifiedValue | string;

/**
 * Write a quality with at most three decimals, without trailing zeros
 */
export function formatQuality(quality: number): string {
  if (!Number.isFinite(quality) || quality < 0 || quality > 1) {
    throw new HeaderParseError(`Quality ${quality} is outside [0, 1]`, [
      'Use a number between 0 and 1 with at most three decimals.',
    ]);
  }
  return String(Number(quality.toFixed(3)));
}

/**
 * Write an Accept style header from content types, tokens or qualified tokens
 *
 * @example
 * ```typescript
 * formatAccept(['gzip', { value: 'br', quality: 0.5 }]); // 'gzip, br;q=0.5'
 * ```
 */
export function formatAccept(entries: readonly AcceptEntry[]): string {
  return entries
    .map((entry) => {
      if (typeof entry === 'string' || entry instanceof ContentType) return entry.toString();
      return entry.quality === undefined ? entry.value : `${entry.value};q=${formatQuality(entry.quality)}`;
    })
    .join(', ');
}
