import type { Logger } from './logger.js';

export type { Logger } from './logger.js';

/**
 * Options understood by every header parser
 */
export interface ParseOptions {
  /**
   * Fail on the first malformed element instead of skipping it
   * @default false
   */
  strict?: boolean;

  /**
   * Receives a debug entry for every skipped element
   * @default silentLogger
   */
  logger?: Logger;
}

/**
 * An element that lenient parsing skipped or repaired
 */
export interface ParseWarning {
  /** Header field the element belongs to (lower-case) */
  header: string;
  /** The offending text */
  segment: string;
  /** Human readable reason */
  reason: string;
}

/**
 * Parsed value together with everything lenient mode had to skip
 */
export interface ParseResult<T> {
  value: T;
  warnings: ParseWarning[];
}

/**
 * Cache-Control directive values: valueless directives are `true`,
 * delta-seconds become numbers
 */
export type CacheControlDirectives = Record<string, string | number | true>;

/**
 * One Forwarded element (RFC 7239), parameter names lower-cased
 */
export type ForwardedElement = Record<string, string>;

/**
 * How repeated Link parameters are treated
 * - `rfc`: the first `rel`, `media`, `type`, `title` and `title*` win and
 *   `title*` is preferred over `title` (RFC 8288 section 3)
 * - `keep`: every value is kept, `rel` values are combined
 */
export type LinkParameterPolicy = 'rfc' | 'keep';
