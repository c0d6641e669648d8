/**
 * Header parser bound to one configuration
 *
 * @example
 * ```typescript
 * const headers = createHeaderParser({ strict: true, logger: pino() });
 *
 * const preferred = headers.accept(req.headers.accept ?? '');
 * const { available } = headers.negotiate(preferred, [APPLICATION_JSON, TEXT_HTML]);
 * ```
 */

import { resolveConfig, type HeaderParserConfig, type ResolvedHeaderParserConfig } from '../config.js';
import {
  parseAccept,
  parseAcceptCharset,
  parseAcceptEncoding,
  parseAcceptLanguage,
} from '../headers/accept.js';
import { parseCacheControl } from '../headers/cache-control.js';
import { parseContentType } from '../headers/content-type.js';
import { parseForwarded } from '../headers/forwarded.js';
import { parseHeader, type ParsedHeader } from '../headers/index.js';
import { parseLink } from '../headers/link.js';
import { parseList } from '../headers/list.js';
import {
  selectContentType,
  type ContentTypeLike,
  type ContentTypeSelection,
  type RequestedContentTypes,
} from '../negotiation/select-content-type.js';
import type { CacheControlDirectives, ForwardedElement } from '../types/index.js';
import type { ContentType } from './content-type.js';
import type { LinkHeader } from './link.js';

export class HeaderParser {
  readonly config: Readonly<ResolvedHeaderParserConfig>;

  constructor(config: HeaderParserConfig = {}) {
    this.config = Object.freeze(resolveConfig(config));
  }

  private get options(): { strict: boolean; logger: ResolvedHeaderParserConfig['logger'] } {
    return { strict: this.config.strict, logger: this.config.logger };
  }

  contentType(value: string): ContentType {
    return parseContentType(value, {
      ...this.options,
      normalizeParameterValues: this.config.normalizeParameterValues,
    });
  }

  accept(value: string): ContentType[] {
    return parseAccept(value, this.options);
  }

  acceptCharset(value: string): string[] {
    return parseAcceptCharset(value, this.options);
  }

  acceptEncoding(value: string): string[] {
    return parseAcceptEncoding(value, this.options);
  }

  acceptLanguage(value: string): string[] {
    return parseAcceptLanguage(value, this.options);
  }

  cacheControl(value: string): CacheControlDirectives {
    return parseCacheControl(value, this.options);
  }

  forwarded(value: string): ForwardedElement[] {
    return parseForwarded(value, {
      ...this.options,
      onlyStandardParameters: this.config.onlyStandardForwardedParameters,
    });
  }

  link(value: string): LinkHeader[] {
    return parseLink(value, { ...this.options, parameterPolicy: this.config.linkParameterPolicy });
  }

  list(value: string): string[] {
    return parseList(value, this.options);
  }

  /**
   * Negotiate against an Accept value or an already parsed list; an Accept
   * string is parsed with this parser's configuration
   */
  negotiate(
    requested: RequestedContentTypes,
    available: readonly ContentTypeLike[],
    defaultType?: ContentTypeLike
  ): ContentTypeSelection {
    const ranges = typeof requested === 'string' ? this.accept(requested) : requested;
    return selectContentType(ranges, available, { default: defaultType, logger: this.config.logger });
  }

  /**
   * Dispatch on the header field name (see {@link parseHeader})
   */
  parse(name: string, value: string): ParsedHeader | string {
    return parseHeader(name, value, {
      ...this.options,
      normalizeParameterValues: this.config.normalizeParameterValues,
      onlyStandardParameters: this.config.onlyStandardForwardedParameters,
      parameterPolicy: this.config.linkParameterPolicy,
    });
  }
}

export function createHeaderParser(config: HeaderParserConfig = {}): HeaderParser {
  return new HeaderParser(config);
}
