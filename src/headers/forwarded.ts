/**
 * Forwarded header (RFC 7239)
 */

import { STANDARD_FORWARDED_PARAMETERS } from '../constants.js';
import type { ForwardedElement, ParseOptions, ParseResult } from '../types/index.js';
import { formatParameterValue, scanParameters, splitElements } from '../utils/tokenizer.js';
import { complete, createContext, report, reportSkipped } from './context.js';

export interface ForwardedOptions extends ParseOptions {
  /**
   * Drop parameters other than `by`, `for`, `host` and `proto`
   * (rejected in strict mode)
   * @default false
   */
  onlyStandardParameters?: boolean;
}

const STANDARD = new Set<string>(STANDARD_FORWARDED_PARAMETERS);

/**
 * Parse a Forwarded header into one record per proxy hop, in the order they
 * were appended
 *
 * Names are lower-cased, values keep their case and lose their quotes. A
 * parameter repeated within one element keeps its last value; strict mode
 * rejects the repeat instead.
 *
 * @example
 * ```typescript
 * parseForwarded('for=192.0.2.60;proto=http;by=203.0.113.43, for="[2001:db8::17]"');
 * // [
 * //   { for: '192.0.2.60', proto: 'http', by: '203.0.113.43' },
 * //   { for: '[2001:db8::17]' },
 * // ]
 * ```
 */
export function parseForwarded(value: string, options: ForwardedOptions = {}): ForwardedElement[] {
  return parseForwardedDetailed(value, options).value;
}

export function parseForwardedDetailed(value: string, options: ForwardedOptions = {}): ParseResult<ForwardedElement[]> {
  const ctx = createContext('forwarded', value, options);
  const elements: ForwardedElement[] = [];

  for (const element of splitElements(value, ',', { headerName: ctx.header })) {
    const scan = scanParameters(element, { headerName: ctx.header });
    if (!scan.ok) {
      report(ctx, element, scan.error.reason, scan.error);
      continue;
    }
    reportSkipped(ctx, scan.skipped);

    const parameters = new Map<string, string>();
    for (const [name, parameterValue] of scan.parameters) {
      if (options.onlyStandardParameters && !STANDARD.has(name)) {
        report(ctx, element, `non-standard parameter "${name}"`);
        continue;
      }
      if (parameters.has(name)) {
        report(ctx, element, `duplicate parameter "${name}"`);
      }
      parameters.set(name, parameterValue);
    }
    elements.push(Object.fromEntries(parameters));
  }

  return complete(ctx, elements);
}

/**
 * Write Forwarded elements, quoting values that are not tokens
 *
 * @example
 * ```typescript
 * formatForwarded([{ for: '[2001:db8::17]', proto: 'https' }]);
 * // 'for="[2001:db8::17]";proto=https'
 * ```
 */
export function formatForwarded(elements: readonly Readonly<ForwardedElement>[]): string {
  return elements
    .map((element) =>
      Object.entries(element)
        .map(([name, parameterValue]) => `${name}=${formatParameterValue(parameterValue)}`)
        .join(';')
    )
    .join(', ');
}
