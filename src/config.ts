/**
 * Parser configuration
 * Validated with Zod so a bad option fails once, at construction
 */

import { z } from 'zod';
import { HeaderParseError } from './core/errors.js';
import { isLogger, silentLogger, type Logger } from './types/logger.js';

export const headerParserConfigSchema = z
  .object({
    /** Fail on the first malformed element instead of skipping it */
    strict: z.boolean().default(false),
    /** Lower-case Content-Type parameter values */
    normalizeParameterValues: z.boolean().default(false),
    linkParameterPolicy: z.enum(['rfc', 'keep']).default('rfc'),
    /** Keep only `by`, `for`, `host` and `proto` in Forwarded elements */
    onlyStandardForwardedParameters: z.boolean().default(false),
    logger: z
      .custom<Logger>(isLogger, { message: 'Expected an object with debug, info, warn and error methods' })
      .default(silentLogger),
  })
  .strict();

/** Options as written by the caller */
export type HeaderParserConfig = z.input<typeof headerParserConfigSchema>;

/** Options with every default filled in */
export type ResolvedHeaderParserConfig = z.output<typeof headerParserConfigSchema>;

export function resolveConfig(config: HeaderParserConfig = {}): ResolvedHeaderParserConfig {
  const result = headerParserConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new HeaderParseError(`Invalid header parser configuration: ${issues.join('; ')}`, issues, {
      cause: result.error,
    });
  }
  return result.data;
}
