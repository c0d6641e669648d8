// Data model
export { ContentType, type ContentTypeParameters } from './core/content-type.js';
export {
  LinkHeader,
  LinkRel,
  findLink,
  findLinks,
  paginationLinks,
  type LinkParameter,
  type PaginationLinks,
} from './core/link.js';

// Parsers and formatters
export {
  formatAccept,
  formatQuality,
  parseAccept,
  parseAcceptCharset,
  parseAcceptCharsetDetailed,
  parseAcceptDetailed,
  parseAcceptEncoding,
  parseAcceptEncodingDetailed,
  parseAcceptLanguage,
  parseAcceptLanguageDetailed,
  type AcceptEntry,
  type QualifiedValue,
} from './headers/accept.js';
export { formatCacheControl, parseCacheControl, parseCacheControlDetailed } from './headers/cache-control.js';
export { parseContentType, parseContentTypeDetailed, type ContentTypeOptions } from './headers/content-type.js';
export { formatForwarded, parseForwarded, parseForwardedDetailed, type ForwardedOptions } from './headers/forwarded.js';
export { collectLinkParameters, formatLink, parseLink, parseLinkDetailed, type LinkOptions } from './headers/link.js';
export { formatList, parseList, parseListDetailed } from './headers/list.js';
export {
  SUPPORTED_HEADERS,
  isSupportedHeader,
  parseHeader,
  type HeaderOptions,
  type ParsedHeader,
  type ParsedHeaders,
  type SupportedHeader,
} from './headers/index.js';

// Negotiation
export {
  contentTypeMatches,
  selectContentType,
  type ContentTypeLike,
  type ContentTypeSelection,
  type RequestedContentTypes,
  type SelectContentTypeOptions,
} from './negotiation/select-content-type.js';

// URLs
export {
  IDNA_SCHEMES,
  removeUrlAuth,
  rewriteUrl,
  type QueryParameters,
  type QueryValue,
  type UrlAuth,
  type UrlChanges,
} from './url/rewrite-url.js';

// Tokenizer
export {
  dequote,
  formatParameterValue,
  isToken,
  parseParameters,
  quoteString,
  scanParameters,
  splitElements,
  type Parameter,
  type ScanOptions,
  type ScanResult,
  type SkippedSegment,
  type SplitOptions,
} from './utils/tokenizer.js';
export { tryFnSync, type Outcome, type TryResult } from './utils/try-fn.js';

// Configuration
export {
  headerParserConfigSchema,
  resolveConfig,
  type HeaderParserConfig,
  type ResolvedHeaderParserConfig,
} from './config.js';
export { HeaderParser, createHeaderParser } from './core/parser.js';

// Errors
export {
  HeaderParseError,
  InvalidUrlError,
  MalformedContentTypeError,
  MalformedLinkValueError,
  MalformedParameterListError,
  MalformedValueError,
  NoMatchError,
  StrictModeViolationError,
  UnsupportedHeaderError,
} from './core/errors.js';

// Logging and shared types
export { consoleLogger, silentLogger, isLogger, type Logger } from './types/logger.js';
export type {
  CacheControlDirectives,
  ForwardedElement,
  LinkParameterPolicy,
  ParseOptions,
  ParseResult,
  ParseWarning,
} from './types/index.js';

export * from './constants.js';
