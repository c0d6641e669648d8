/**
 * Header value tokenizer
 *
 * Scans `name=value *(";" name=value)` runs and comma or semicolon
 * delimited element lists. Quoted strings (RFC 9110 section 5.6.4) and, where
 * a grammar allows them, parenthesized comments (RFC 2045 / RFC 822) are
 * understood so that delimiters inside them never split anything.
 *
 * @see https://www.rfc-editor.org/rfc/rfc9110.html#section-5.6
 */

import { MalformedParameterListError, MalformedValueError, StrictModeViolationError } from '../core/errors.js';

export interface ScanOptions {
  /**
   * Treat `"..."` as quoted strings with `\` escapes
   * @default true
   */
  quoteAware?: boolean;

  /**
   * Recognize and discard `( ... )` comments outside quoted strings
   * @default false
   */
  commentAware?: boolean;

  /**
   * Case-fold parameter values (names are always case-folded)
   * @default false
   */
  lowercaseValues?: boolean;

  /**
   * Accept whitespace on either side of `=` (RFC 8288 errata 5318)
   * @default false
   */
  tolerateBadWhitespace?: boolean;

  /**
   * Accept a parameter without `=` and give it an empty value
   * (RFC 8288 section 3 `link-param`)
   * @default false
   */
  allowValueless?: boolean;

  /**
   * Fail on unparseable segments instead of skipping them
   * @default false
   */
  strict?: boolean;

  /**
   * Header field named in strict mode errors
   * @default 'parameter list'
   */
  headerName?: string;
}

export type Parameter = readonly [name: string, value: string];

export interface SkippedSegment {
  segment: string;
  reason: string;
  offset: number;
}

export type ScanResult =
  | { ok: true; parameters: readonly Parameter[]; skipped: readonly SkippedSegment[] }
  | { ok: false; error: MalformedParameterListError | StrictModeViolationError };

type ScanState =
  | 'outside'
  | 'name'
  | 'before-equals'
  | 'before-value'
  | 'bare'
  | 'quoted'
  | 'after-value'
  | 'comment'
  | 'skip';

interface ScanCursor {
  state: ScanState;
  /** state to return to when the current comment closes */
  resume: ScanState;
  depth: number;
  /** offset of the current segment */
  start: number;
  name: string;
  value: string;
  /** set once the current segment is known to be unparseable */
  problem: string | null;
  /** inside a quoted string while skipping */
  skipQuoted: boolean;
}

const TOKEN_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const WHITESPACE = /\s/;

function isTokenChar(char: string): boolean {
  return TOKEN_PATTERN.test(char);
}

function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

/**
 * RFC 9110 token: one or more tchar
 */
export function isToken(value: string): boolean {
  return TOKEN_PATTERN.test(value);
}

/**
 * Write `value` as a quoted-string, escaping `"` and `\`
 */
export function quoteString(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

/**
 * Write a parameter value as a bare token when possible, quoted otherwise
 */
export function formatParameterValue(value: string): string {
  return isToken(value) ? value : quoteString(value);
}

/**
 * Remove surrounding quotes (and quoted-pair escapes) when the whole value
 * is a quoted string; anything else is returned unchanged
 *
 * @example
 * dequote('"value"') // 'value'
 * dequote('not="quoted"') // 'not="quoted"'
 */
export function dequote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}

function openSegment(cursor: ScanCursor, offset: number): void {
  cursor.state = 'name';
  cursor.start = offset;
  cursor.name = '';
  cursor.value = '';
  cursor.problem = null;
  cursor.skipQuoted = false;
}

function markProblem(cursor: ScanCursor, reason: string): void {
  cursor.problem = reason;
  cursor.state = 'skip';
}

function enterComment(cursor: ScanCursor, resume: ScanState): void {
  cursor.resume = resume;
  cursor.depth = 1;
  cursor.state = 'comment';
}

/**
 * Scan a parameter list into name/value pairs
 *
 * Single left-to-right pass over `input`. Fatal problems (unterminated quoted
 * string or comment, a name without `=` unless `allowValueless` is set)
 * produce `{ ok: false }`. Segments
 * that cannot be parsed are listed in `skipped`, or produce `{ ok: false }`
 * with a `StrictModeViolationError` when `strict` is set.
 *
 * @example
 * scanParameters('charset="UTF-8"; format=flowed')
 * // { ok: true, parameters: [['charset', 'UTF-8'], ['format', 'flowed']], skipped: [] }
 */
export function scanParameters(input: string, options: ScanOptions = {}): ScanResult {
  const quoteAware = options.quoteAware !== false;
  const commentAware = options.commentAware === true;
  const tolerant = options.tolerateBadWhitespace === true;
  const valueless = options.allowValueless === true;

  const parameters: Parameter[] = [];
  const skipped: SkippedSegment[] = [];
  const cursor: ScanCursor = {
    state: 'outside',
    resume: 'outside',
    depth: 0,
    start: 0,
    name: '',
    value: '',
    problem: null,
    skipQuoted: false,
  };

  const fail = (reason: string, offset: number): ScanResult => ({
    ok: false,
    error: new MalformedParameterListError(input, reason, offset),
  });

  // Closes the current segment; returns a strict mode failure if any
  const close = (end: number): ScanResult | null => {
    const segment = input.slice(cursor.start, end).trim();
    cursor.state = 'outside';
    if (cursor.problem !== null) {
      if (options.strict) {
        return {
          ok: false,
          error: new StrictModeViolationError(options.headerName ?? 'parameter list', input, segment, cursor.problem),
        };
      }
      skipped.push({ segment, reason: cursor.problem, offset: cursor.start });
      return null;
    }
    const value = options.lowercaseValues ? cursor.value.toLowerCase() : cursor.value;
    parameters.push(Object.freeze([cursor.name.toLowerCase(), value] as const));
    return null;
  };

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i);

    switch (cursor.state) {
      case 'outside':
        if (isWhitespace(char) || char === ';') break;
        if (char === '(' && commentAware) {
          enterComment(cursor, 'outside');
          break;
        }
        openSegment(cursor, i);
        i--;
        break;

      case 'name':
        if (char === '=') {
          if (cursor.name === '') markProblem(cursor, 'empty parameter name');
          else cursor.state = 'before-value';
        } else if (isTokenChar(char)) {
          cursor.name += char;
        } else if (char === ';') {
          if (!valueless) return fail(`parameter "${cursor.name}" has no value`, i);
          const failure = close(i);
          if (failure) return failure;
        } else if (char === '(' && commentAware) {
          enterComment(cursor, 'before-equals');
        } else if (isWhitespace(char)) {
          if (tolerant) cursor.state = 'before-equals';
          else markProblem(cursor, 'whitespace before "="');
        } else if (char === '"' && quoteAware) {
          markProblem(cursor, 'quote in parameter name');
          cursor.skipQuoted = true;
        } else {
          markProblem(cursor, `illegal character ${JSON.stringify(char)} in parameter name`);
        }
        break;

      case 'before-equals':
        if (char === '=') {
          cursor.state = 'before-value';
        } else if (char === ';') {
          if (!valueless) return fail(`parameter "${cursor.name}" has no value`, i);
          const failure = close(i);
          if (failure) return failure;
        } else if (char === '(' && commentAware) {
          enterComment(cursor, 'before-equals');
        } else if (!isWhitespace(char)) {
          markProblem(cursor, 'whitespace inside parameter name');
        }
        break;

      case 'before-value':
        if (char === '"' && quoteAware) {
          cursor.state = 'quoted';
        } else if (char === ';') {
          cursor.problem = 'empty parameter value';
          const failure = close(i);
          if (failure) return failure;
        } else if (char === '(' && commentAware) {
          enterComment(cursor, 'before-value');
        } else if (isWhitespace(char)) {
          if (!tolerant) markProblem(cursor, 'whitespace after "="');
        } else {
          cursor.value += char;
          cursor.state = 'bare';
        }
        break;

      case 'bare':
        if (char === ';') {
          const failure = close(i);
          if (failure) return failure;
        } else if (isWhitespace(char)) {
          cursor.state = 'after-value';
        } else if (char === '(' && commentAware) {
          enterComment(cursor, 'after-value');
        } else if (char === '"' && quoteAware) {
          markProblem(cursor, 'quote inside unquoted value');
          cursor.skipQuoted = true;
        } else {
          cursor.value += char;
        }
        break;

      case 'quoted':
        if (char === '\\') {
          if (i + 1 >= input.length) return fail('unterminated quoted string', cursor.start);
          i++;
          cursor.value += input.charAt(i);
        } else if (char === '"') {
          cursor.state = 'after-value';
        } else {
          cursor.value += char;
        }
        break;

      case 'after-value':
        if (char === ';') {
          const failure = close(i);
          if (failure) return failure;
        } else if (char === '(' && commentAware) {
          enterComment(cursor, 'after-value');
        } else if (!isWhitespace(char)) {
          markProblem(cursor, 'unexpected text after value');
          if (char === '"' && quoteAware) cursor.skipQuoted = true;
        }
        break;

      case 'comment':
        if (char === '\\') i++;
        else if (char === '(') cursor.depth++;
        else if (char === ')') {
          cursor.depth--;
          if (cursor.depth === 0) cursor.state = cursor.resume;
        }
        break;

      case 'skip':
        if (cursor.skipQuoted) {
          if (char === '\\') i++;
          else if (char === '"') cursor.skipQuoted = false;
        } else if (char === '"' && quoteAware) {
          cursor.skipQuoted = true;
        } else if (char === '(' && commentAware) {
          enterComment(cursor, 'skip');
        } else if (char === ';') {
          const failure = close(i);
          if (failure) return failure;
        }
        break;
    }
  }

  switch (cursor.state) {
    case 'quoted':
      return fail('unterminated quoted string', cursor.start);
    case 'comment':
      return fail('unterminated comment', input.length);
    case 'name':
    case 'before-equals':
      if (!valueless) return fail(`parameter "${cursor.name}" has no value`, input.length);
      break;
    case 'skip':
      if (cursor.skipQuoted) return fail('unterminated quoted string', cursor.start);
      break;
    case 'before-value':
      cursor.problem = 'empty parameter value';
      break;
    default:
      break;
  }

  if (cursor.state !== 'outside') {
    const failure = close(input.length);
    if (failure) return failure;
  }

  return { ok: true, parameters: Object.freeze(parameters), skipped: Object.freeze(skipped) };
}

/**
 * Throwing form of {@link scanParameters}
 */
export function parseParameters(input: string, options: ScanOptions = {}): readonly Parameter[] {
  const result = scanParameters(input, options);
  if (!result.ok) throw result.error;
  return result.parameters;
}

export interface SplitOptions {
  quoteAware?: boolean;
  commentAware?: boolean;
  /**
   * Treat `<...>` as opaque (Link targets may contain commas)
   * @default false
   */
  angleAware?: boolean;
  /**
   * Header field named in errors
   * @default 'list'
   */
  headerName?: string;
}

function delimiterOffsets(value: string, delimiter: string, options: SplitOptions, limit: number): number[] {
  const quoteAware = options.quoteAware !== false;
  const offsets: number[] = [];
  let quoted = false;
  let angled = false;
  let depth = 0;

  for (let i = 0; i < value.length && offsets.length < limit; i++) {
    const char = value.charAt(i);

    if (quoted) {
      if (char === '\\') i++;
      else if (char === '"') quoted = false;
    } else if (depth > 0) {
      if (char === '\\') i++;
      else if (char === '(') depth++;
      else if (char === ')') depth--;
    } else if (angled) {
      if (char === '>') angled = false;
    } else if (char === '"' && quoteAware) {
      quoted = true;
    } else if (char === '(' && options.commentAware) {
      depth = 1;
    } else if (char === '<' && options.angleAware) {
      angled = true;
    } else if (char === delimiter) {
      offsets.push(i);
    }
  }

  if (offsets.length < limit) {
    const header = options.headerName ?? 'list';
    if (quoted) throw new MalformedValueError(header, value, 'unterminated quoted string');
    if (depth > 0) throw new MalformedValueError(header, value, 'unterminated comment');
  }

  return offsets;
}

/**
 * Split `value` at every top-level `delimiter`, trimming each element and
 * dropping empty ones (RFC 9110 section 5.6.1)
 *
 * @example
 * splitElements('first, "comma ->,<- here", last', ',')
 * // ['first', '"comma ->,<- here"', 'last']
 */
export function splitElements(value: string, delimiter: string, options: SplitOptions = {}): string[] {
  const offsets = delimiterOffsets(value, delimiter, options, Infinity);
  const elements: string[] = [];
  let start = 0;
  for (const offset of [...offsets, value.length]) {
    const element = value.slice(start, offset).trim();
    if (element) elements.push(element);
    start = offset + 1;
  }
  return elements;
}

/**
 * Offset of the first top-level `delimiter`, or -1
 */
export function findDelimiter(value: string, delimiter: string, options: SplitOptions = {}): number {
  const [offset] = delimiterOffsets(value, delimiter, options, 1);
  return offset ?? -1;
}

/**
 * Remove every parenthesized comment that is outside a quoted string
 *
 * @example
 * stripComments('text/plain (plain text)') // 'text/plain '
 */
export function stripComments(value: string, headerName = 'content-type'): string {
  let result = '';
  let quoted = false;
  let depth = 0;

  for (let i = 0; i < value.length; i++) {
    const char = value.charAt(i);

    if (depth > 0) {
      if (char === '\\') i++;
      else if (char === '(') depth++;
      else if (char === ')') depth--;
      continue;
    }

    if (quoted) {
      if (char === '\\' && i + 1 < value.length) {
        result += char + value.charAt(i + 1);
        i++;
        continue;
      }
      if (char === '"') quoted = false;
    } else if (char === '"') {
      quoted = true;
    } else if (char === '(') {
      depth = 1;
      continue;
    }
    result += char;
  }

  if (quoted) throw new MalformedValueError(headerName, value, 'unterminated quoted string');
  if (depth > 0) throw new MalformedValueError(headerName, value, 'unterminated comment');
  return result;
}
