/**
 * Content-Type parsing (RFC 9110 section 8.3, RFC 2045 section 5.1)
 */

import { ContentType } from '../core/content-type.js';
import { MalformedContentTypeError } from '../core/errors.js';
import type { ParseOptions, ParseResult } from '../types/index.js';
import { findDelimiter, isToken, scanParameters, stripComments, type SkippedSegment } from '../utils/tokenizer.js';
import { complete, createContext, reportSkipped } from './context.js';

export interface ContentTypeOptions extends ParseOptions {
  /**
   * Lower-case parameter values (`charset=UTF-8` becomes `charset=utf-8`)
   * @default false
   */
  normalizeParameterValues?: boolean;
}

export interface ContentTypeReading {
  contentType: ContentType;
  skipped: readonly SkippedSegment[];
}

interface ReadOptions {
  normalizeParameterValues?: boolean;
  headerName?: string;
}

/**
 * Read one media type with its parameters. Malformed parameters are returned
 * in `skipped`; a malformed `type/subtype` or parameter list throws.
 *
 * Shared by the Content-Type and Accept parsers.
 */
export function readContentType(value: string, options: ReadOptions = {}): ContentTypeReading {
  const headerName = options.headerName ?? 'content-type';
  const trimmed = value.trim();
  if (!trimmed) {
    throw new MalformedContentTypeError(value, 'empty value');
  }

  const separator = findDelimiter(trimmed, ';', { commentAware: true, headerName });
  const typeSpec = stripComments(separator < 0 ? trimmed : trimmed.slice(0, separator), headerName).trim();
  const parameterText = separator < 0 ? '' : trimmed.slice(separator + 1);

  const slash = typeSpec.indexOf('/');
  if (slash < 0) {
    throw new MalformedContentTypeError(value, 'expected type/subtype');
  }

  const type = typeSpec.slice(0, slash).trim();
  let subtype = typeSpec.slice(slash + 1).trim();
  let suffix: string | undefined;
  const plus = subtype.lastIndexOf('+');
  if (plus >= 0) {
    suffix = subtype.slice(plus + 1);
    subtype = subtype.slice(0, plus);
    if (!suffix) throw new MalformedContentTypeError(value, 'empty suffix');
  }

  if (!type) throw new MalformedContentTypeError(value, 'empty type');
  if (!subtype) throw new MalformedContentTypeError(value, 'empty subtype');
  for (const part of [type, subtype, suffix]) {
    if (part !== undefined && !isToken(part)) {
      throw new MalformedContentTypeError(value, `illegal characters in ${JSON.stringify(part)}`);
    }
  }

  const scan = scanParameters(parameterText, {
    commentAware: true,
    lowercaseValues: options.normalizeParameterValues === true,
    headerName,
  });
  if (!scan.ok) throw scan.error;

  // duplicates: the last occurrence wins
  const parameters = new Map<string, string>(scan.parameters);

  return {
    contentType: new ContentType(type, subtype, Object.fromEntries(parameters), suffix),
    skipped: scan.skipped,
  };
}

/**
 * Parse a Content-Type header value
 *
 * Comments are discarded and `*` is accepted for the type and subtype.
 * Malformed parameters are skipped (thrown in strict mode); a missing `/`
 * always throws `MalformedContentTypeError`.
 *
 * @example
 * ```typescript
 * const ct = parseContentType('application/vnd.example+json; Version=2');
 * ct.subtype;    // 'vnd.example'
 * ct.suffix;     // 'json'
 * ct.parameters; // { version: '2' }
 * ```
 */
export function parseContentType(value: string, options: ContentTypeOptions = {}): ContentType {
  return parseContentTypeDetailed(value, options).value;
}

export function parseContentTypeDetailed(value: string, options: ContentTypeOptions = {}): ParseResult<ContentType> {
  const ctx = createContext('content-type', value, options);
  const { contentType, skipped } = readContentType(value, {
    normalizeParameterValues: options.normalizeParameterValues,
  });
  reportSkipped(ctx, skipped);
  return complete(ctx, contentType);
}
