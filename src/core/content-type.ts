/**
 * MIME media type value (RFC 2045 section 5, RFC 9110 section 8.3.1)
 * with the structured syntax suffix of RFC 6839
 *
 * @example
 * ```typescript
 * const json = new ContentType('application', 'vnd.example', { version: 2 }, 'json');
 * json.toString(); // 'application/vnd.example+json; version=2'
 * ```
 */

import { parseContentType } from '../headers/content-type.js';
import { formatParameterValue, isToken } from '../utils/tokenizer.js';
import { parseQuality } from '../utils/quality.js';
import { tryFnSync } from '../utils/try-fn.js';
import { MalformedContentTypeError } from './errors.js';

export type ContentTypeParameters = Readonly<Record<string, string>>;

function normalizePart(value: string, label: string, original: string): string {
  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    throw new MalformedContentTypeError(original, `empty ${label}`);
  }
  if (!isToken(normalized)) {
    throw new MalformedContentTypeError(original, `illegal characters in ${JSON.stringify(normalized)}`);
  }
  return normalized;
}

export class ContentType {
  readonly type: string;
  readonly subtype: string;
  readonly suffix: string | undefined;
  readonly parameters: ContentTypeParameters;

  constructor(
    type: string,
    subtype: string,
    parameters: Readonly<Record<string, string | number>> = {},
    suffix?: string
  ) {
    const original = `${type}/${subtype}${suffix !== undefined ? `+${suffix}` : ''}`;
    this.type = normalizePart(type, 'type', original);
    this.subtype = normalizePart(subtype, 'subtype', original);
    this.suffix = suffix === undefined ? undefined : normalizePart(suffix, 'suffix', original);

    const normalized = new Map<string, string>();
    for (const [name, value] of Object.entries(parameters)) {
      const parameterName = name.trim().toLowerCase();
      if (!isToken(parameterName)) {
        throw new MalformedContentTypeError(original, `invalid parameter name ${JSON.stringify(parameterName)}`);
      }
      normalized.set(parameterName, String(value));
    }
    this.parameters = Object.freeze(Object.fromEntries(normalized));
    Object.freeze(this);
  }

  /**
   * Parse a Content-Type value (see {@link parseContentType})
   */
  static parse(value: string): ContentType {
    return parseContentType(value);
  }

  /**
   * `type/subtype[+suffix]` without parameters
   */
  get mediaType(): string {
    return `${this.type}/${this.subtype}${this.suffix ? `+${this.suffix}` : ''}`;
  }

  get hasExplicitQuality(): boolean {
    return Object.hasOwn(this.parameters, 'q');
  }

  /**
   * Value of the `q` parameter: 1 when absent, 0 when not a valid qvalue
   */
  get quality(): number {
    if (!this.hasExplicitQuality) return 1;
    return parseQuality(this.parameters.q) ?? 0;
  }

  /**
   * Rank used to order media ranges: `*\/*` is 0, `type/*` is 1 and a
   * concrete type is 2 plus its parameter count (`q` excluded)
   */
  get specificity(): number {
    if (this.type === '*') return 0;
    if (this.subtype === '*') return 1;
    return 2 + Object.keys(this.parameters).filter((name) => name !== 'q').length;
  }

  withParameters(parameters: Readonly<Record<string, string | number>>): ContentType {
    return new ContentType(this.type, this.subtype, { ...this.parameters, ...lowercaseKeys(parameters) }, this.suffix);
  }

  withoutParameters(...names: string[]): ContentType {
    const removed = new Set(names.map((name) => name.toLowerCase()));
    const kept = Object.entries(this.parameters).filter(([name]) => !removed.has(name));
    return new ContentType(this.type, this.subtype, Object.fromEntries(kept), this.suffix);
  }

  withSuffix(suffix: string | undefined): ContentType {
    return new ContentType(this.type, this.subtype, this.parameters, suffix);
  }

  /**
   * Same type, subtype, suffix and parameters; strings are parsed first and
   * are unequal when they cannot be parsed
   */
  equals(other: ContentType | string): boolean {
    let target: ContentType;
    if (typeof other === 'string') {
      const [ok, , parsed] = tryFnSync(() => parseContentType(other));
      if (!ok) return false;
      target = parsed;
    } else {
      target = other;
    }

    if (
      this.type !== target.type ||
      this.subtype !== target.subtype ||
      this.suffix !== target.suffix
    ) {
      return false;
    }

    const names = Object.keys(this.parameters);
    if (names.length !== Object.keys(target.parameters).length) return false;
    return names.every(
      (name) => Object.hasOwn(target.parameters, name) && target.parameters[name] === this.parameters[name]
    );
  }

  /**
   * Canonical form: parameters sorted by name, values quoted when they are
   * not tokens
   */
  toString(): string {
    const parameters = Object.keys(this.parameters)
      .sort()
      .map((name) => `; ${name}=${formatParameterValue(this.parameters[name])}`)
      .join('');
    return `${this.mediaType}${parameters}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

function lowercaseKeys(parameters: Readonly<Record<string, string | number>>): Record<string, string | number> {
  return Object.fromEntries(Object.entries(parameters).map(([name, value]) => [name.trim().toLowerCase(), value]));
}
