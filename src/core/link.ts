/**
 * RFC 8288 web link
 * One `<target>; name=value` element of a Link header
 *
 * @see https://www.rfc-editor.org/rfc/rfc8288.html
 */

import { formatParameterValue, quoteString } from '../utils/tokenizer.js';
import { MalformedLinkValueError } from './errors.js';

export type LinkParameter = readonly [name: string, value: string];

export class LinkHeader {
  /** URI reference, possibly relative to the request URI */
  readonly target: string;
  /** Parameters in header order; a name may repeat */
  readonly parameters: readonly LinkParameter[];

  constructor(target: string, parameters: Iterable<readonly [string, string]> = []) {
    const trimmed = target.trim();
    if (!trimmed) {
      throw new MalformedLinkValueError(target, 'empty link target');
    }
    this.target = trimmed;

    const normalized: LinkParameter[] = [];
    for (const [name, value] of parameters) {
      normalized.push(Object.freeze([name.trim().toLowerCase(), value] as const));
    }
    this.parameters = Object.freeze(normalized);
    Object.freeze(this);
  }

  /**
   * Space separated relation types, `''` without a `rel` parameter
   */
  get rel(): string {
    return this.get('rel').join(' ').trim();
  }

  /**
   * Every value of `name`, empty when the parameter is absent
   */
  get(name: string): readonly string[] {
    const wanted = name.toLowerCase();
    return Object.freeze(this.parameters.filter(([parameter]) => parameter === wanted).map(([, value]) => value));
  }

  has(name: string): boolean {
    const wanted = name.toLowerCase();
    return this.parameters.some(([parameter]) => parameter === wanted);
  }

  /**
   * `<target>`, then `rel`, then the other parameters sorted. Values are
   * quoted except extended values (`title*`, RFC 8187), which are written
   * bare when they are tokens, and empty values, which are written as the
   * name alone.
   *
   * @example
   * ```typescript
   * new LinkHeader('/chapter/2', [['title', 'Chapter 2'], ['rel', 'next']]).toString();
   * // '</chapter/2>; rel="next"; title="Chapter 2"'
   * ```
   */
  toString(): string {
    const formatted = [`<${this.target}>`];
    const rel = this.rel;
    if (rel) formatted.push(`rel=${quoteString(rel)}`);
    formatted.push(
      ...this.parameters
        .filter(([name]) => name !== 'rel')
        .map(([name, value]) => formatLinkParameter(name, value))
        .sort()
    );
    return formatted.join('; ');
  }

  toJSON(): { target: string; parameters: LinkParameter[] } {
    return { target: this.target, parameters: [...this.parameters] };
  }
}

function formatLinkParameter(name: string, value: string): string {
  if (value === '') return name;
  if (name.endsWith('*')) return `${name}=${formatParameterValue(value)}`;
  return `${name}=${quoteString(value)}`;
}

/**
 * Common link relation types from RFC 8288 and web standards
 */
export const LinkRel = {
  // Navigation
  NEXT: 'next',
  PREV: 'prev',
  PREVIOUS: 'previous',
  FIRST: 'first',
  LAST: 'last',

  // Resource relationships
  ALTERNATE: 'alternate',
  CANONICAL: 'canonical',
  AUTHOR: 'author',
  LICENSE: 'license',
  STYLESHEET: 'stylesheet',
  ICON: 'icon',

  // Resource hints
  PRELOAD: 'preload',
  PREFETCH: 'prefetch',
  PRECONNECT: 'preconnect',
  DNS_PREFETCH: 'dns-prefetch',

  // HATEOAS
  SELF: 'self',
  EDIT: 'edit',
  COLLECTION: 'collection',
  ITEM: 'item',

  DESCRIBEDBY: 'describedby',
  UP: 'up',
  RELATED: 'related',
  VIA: 'via',
} as const;

/**
 * Links whose relation types include `rel` (relation types compare
 * case-insensitively)
 */
export function findLinks(links: readonly LinkHeader[], rel: string): LinkHeader[] {
  const wanted = rel.toLowerCase();
  return links.filter((link) =>
    link.rel
      .toLowerCase()
      .split(/\s+/)
      .some((type) => type === wanted)
  );
}

export function findLink(links: readonly LinkHeader[], rel: string): LinkHeader | undefined {
  return findLinks(links, rel)[0];
}

export interface PaginationLinks {
  next?: string;
  prev?: string;
  first?: string;
  last?: string;
}

/**
 * Pagination targets; `prev` falls back to a `previous` relation
 *
 * @example
 * ```typescript
 * paginationLinks(parseLink('</items?page=3>; rel="next", </items?page=1>; rel="prev"'));
 * // { next: '/items?page=3', prev: '/items?page=1', first: undefined, last: undefined }
 * ```
 */
export function paginationLinks(links: readonly LinkHeader[]): PaginationLinks {
  return {
    next: findLink(links, LinkRel.NEXT)?.target,
    prev: findLink(links, LinkRel.PREV)?.target ?? findLink(links, LinkRel.PREVIOUS)?.target,
    first: findLink(links, LinkRel.FIRST)?.target,
    last: findLink(links, LinkRel.LAST)?.target,
  };
}
