/**
 * Proactive content negotiation (RFC 9110 section 12.1)
 */

import { SMALLEST_QUALITY } from '../constants.js';
import { ContentType } from '../core/content-type.js';
import { HeaderParseError, NoMatchError } from '../core/errors.js';
import { parseAccept } from '../headers/accept.js';
import { parseContentType } from '../headers/content-type.js';
import { silentLogger, type Logger } from '../types/logger.js';

/**
 * A parsed content type or its header form
 */
export type ContentTypeLike = ContentType | string;

/**
 * An Accept value, a list of media ranges, or nothing when the request
 * carried no Accept header
 */
export type RequestedContentTypes = string | readonly ContentTypeLike[] | null | undefined;

export interface SelectContentTypeOptions {
  /**
   * Returned, paired with itself, when nothing matches; must be one of the
   * available content types
   */
  default?: ContentTypeLike;
  logger?: Logger;
}

export interface ContentTypeSelection {
  /** Entry of the requested list that matched */
  requested: ContentType;
  /** Entry of the available list that was chosen */
  available: ContentType;
}

const ANYTHING = new ContentType('*', '*');

function toContentType(value: ContentTypeLike): ContentType {
  return typeof value === 'string' ? parseContentType(value) : value;
}

function toRequested(requested: RequestedContentTypes, logger: Logger): readonly ContentType[] {
  if (requested === null || requested === undefined) return [];
  if (typeof requested === 'string') return parseAccept(requested, { logger });
  return requested.map(toContentType);
}

/**
 * Whether a requested media range accepts an available content type
 *
 * Type and subtype match when equal or when either side is `*`. Suffixes
 * must be equal unless a subtype wildcard is involved. For a concrete
 * requested type every parameter of the available type other than `q` must
 * appear with the same value on the requested side; extra requested
 * parameters do not matter. Wildcard ranges accept any parameters.
 */
export function contentTypeMatches(requested: ContentType, available: ContentType): boolean {
  if (requested.type !== '*' && available.type !== '*' && requested.type !== available.type) {
    return false;
  }

  const subtypeWildcard = requested.subtype === '*' || available.subtype === '*';
  if (!subtypeWildcard) {
    if (requested.subtype !== available.subtype || requested.suffix !== available.suffix) return false;
  }
  if (requested.subtype === '*') return true;

  return Object.entries(available.parameters).every(
    ([name, value]) =>
      name === 'q' || (Object.hasOwn(requested.parameters, name) && requested.parameters[name] === value)
  );
}

/**
 * Pick the available content type the requester prefers most
 *
 * `requested` is walked in order (the output of `parseAccept` is already
 * sorted, and an Accept string is parsed that way) and, for each entry,
 * `available` is scanned in server preference order; the first match wins.
 * Entries with a quality below 0.001 are rejections and never match. An
 * empty, `null` or `undefined` `requested` accepts anything.
 *
 * @throws {NoMatchError} when nothing matches and no default is given
 * @throws {HeaderParseError} when the default is not one of `available`
 *
 * @example
 * ```typescript
 * const { available } = selectContentType(request.headers.accept, [
 *   APPLICATION_JSON,
 *   TEXT_HTML,
 * ]);
 * ```
 */
export function selectContentType(
  requested: RequestedContentTypes,
  available: readonly ContentTypeLike[],
  options: SelectContentTypeOptions = {}
): ContentTypeSelection {
  const logger = options.logger ?? silentLogger;
  const offers = available.map(toContentType);
  const fallback = options.default === undefined ? undefined : toContentType(options.default);
  if (fallback && !offers.some((offered) => offered.equals(fallback))) {
    throw new HeaderParseError(
      `Default content type ${fallback.toString()} is not one of the available content types [${offers.join(', ')}]`,
      ['Add the default to the available content types.']
    );
  }

  const ranges = toRequested(requested, logger);
  const candidates = ranges.length > 0 ? ranges : [ANYTHING];

  for (const pattern of candidates) {
    if (pattern.quality < SMALLEST_QUALITY) continue;

    const match = offers.find((offered) => contentTypeMatches(pattern, offered));
    if (match) {
      logger.debug(
        { requested: pattern.toString(), available: match.toString() },
        'selected content type'
      );
      return { requested: pattern, available: match };
    }
  }

  if (fallback) {
    logger.debug(
      { requested: candidates.map(String), default: fallback.toString() },
      'no acceptable content type, using default'
    );
    return { requested: fallback, available: fallback };
  }

  logger.debug(
    { requested: candidates.map(String), available: offers.map(String) },
    'no acceptable content type'
  );
  throw new NoMatchError(candidates, offers);
}
