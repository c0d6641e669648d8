/**
 * RFC 8288 Link header parser
 * Parses Link headers for pagination, relationships, and resource hints
 *
 * @see https://www.rfc-editor.org/rfc/rfc8288.html
 */

import { SINGULAR_LINK_PARAMETERS } from '../constants.js';
import { MalformedLinkValueError } from '../core/errors.js';
import { LinkHeader, type LinkParameter } from '../core/link.js';
import type { LinkParameterPolicy, ParseOptions, ParseResult } from '../types/index.js';
import { scanParameters, splitElements, type Parameter } from '../utils/tokenizer.js';
import type { Outcome } from '../utils/try-fn.js';
import { complete, createContext, report, reportSkipped } from './context.js';

export interface LinkOptions extends ParseOptions {
  /**
   * Treatment of repeated parameters
   * @default 'rfc'
   */
  parameterPolicy?: LinkParameterPolicy;
}

interface LinkElement {
  target: string;
  parameterText: string;
}

const SINGULAR = new Set<string>(SINGULAR_LINK_PARAMETERS);

/**
 * Split one element into its target and the text after the `;`
 */
function readLink(element: string): Outcome<LinkElement, MalformedLinkValueError> {
  const fail = (reason: string): Outcome<LinkElement, MalformedLinkValueError> => ({
    ok: false,
    error: new MalformedLinkValueError(element, reason),
  });

  if (!element.startsWith('<')) return fail('link target must start with "<"');
  const close = element.indexOf('>');
  if (close < 0) return fail('link target is missing its closing ">"');

  const target = element.slice(1, close).trim();
  if (!target) return fail('empty link target');

  const rest = element.slice(close + 1).trim();
  if (rest && !rest.startsWith(';')) return fail('parameter list must start with ";"');

  return { ok: true, value: { target, parameterText: rest.slice(1) } };
}

/**
 * Apply the parameter policy to one link's parameters
 *
 * Under `rfc` only the first `rel`, `media`, `type`, `title` and `title*`
 * count. When both titles are present `title*` wins and `title` repeats its
 * value.
 */
export function collectLinkParameters(
  parameters: readonly Parameter[],
  policy: LinkParameterPolicy = 'rfc'
): LinkParameter[] {
  if (policy === 'keep') return [...parameters];

  const singular = new Map<string, string>();
  const collected: LinkParameter[] = [];
  for (const [name, value] of parameters) {
    if (SINGULAR.has(name)) {
      if (singular.has(name)) continue;
      singular.set(name, value);
      if (name === 'title' || name === 'title*') continue;
    }
    collected.push([name, value]);
  }

  const preferredTitle = singular.get('title*');
  const fallbackTitle = singular.get('title');
  if (preferredTitle !== undefined) {
    collected.push(['title*', preferredTitle]);
    if (fallbackTitle !== undefined) collected.push(['title', preferredTitle]);
  } else if (fallbackTitle !== undefined) {
    collected.push(['title', fallbackTitle]);
  }
  return collected;
}

/**
 * Parse a Link header value
 *
 * A malformed first element throws. Later malformed elements are skipped,
 * or rejected in strict mode. Whitespace around `=` is accepted and a
 * parameter without a value reads as `''`.
 *
 * @example
 * ```typescript
 * const [link] = parseLink('<https://api.example.com/items?page=2>; rel="next"');
 * link.target; // 'https://api.example.com/items?page=2'
 * link.rel;    // 'next'
 * ```
 */
export function parseLink(value: string, options: LinkOptions = {}): LinkHeader[] {
  return parseLinkDetailed(value, options).value;
}

export function parseLinkDetailed(value: string, options: LinkOptions = {}): ParseResult<LinkHeader[]> {
  const ctx = createContext('link', value, options);
  const links: LinkHeader[] = [];

  splitElements(value, ',', { angleAware: true, headerName: ctx.header }).forEach((element, index) => {
    const reading = readLink(element);
    if (!reading.ok) {
      if (index === 0) throw reading.error;
      report(ctx, element, reading.error.reason, reading.error);
      return;
    }

    const scan = scanParameters(reading.value.parameterText, {
      tolerateBadWhitespace: true,
      allowValueless: true,
      headerName: ctx.header,
    });
    if (!scan.ok) {
      if (index === 0) throw scan.error;
      report(ctx, element, scan.error.reason, scan.error);
      return;
    }
    reportSkipped(ctx, scan.skipped);

    links.push(new LinkHeader(reading.value.target, collectLinkParameters(scan.parameters, options.parameterPolicy)));
  });

  return complete(ctx, links);
}

/**
 * Write links as one Link header value
 */
export function formatLink(links: readonly LinkHeader[]): string {
  return links.map(String).join(', ');
}
