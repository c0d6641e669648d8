import { StrictModeViolationError } from '../core/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import type { ParseOptions, ParseResult, ParseWarning } from '../types/index.js';
import type { SkippedSegment } from '../utils/tokenizer.js';

/**
 * Per-call state shared by the header parsers: the strict switch, the logger
 * and the warnings collected while skipping elements
 */
export interface ParseContext {
  header: string;
  value: string;
  strict: boolean;
  logger: Logger;
  warnings: ParseWarning[];
}

export function createContext(header: string, value: string, options: ParseOptions = {}): ParseContext {
  return {
    header,
    value,
    strict: options.strict === true,
    logger: options.logger ?? silentLogger,
    warnings: [],
  };
}

/**
 * Record an element that lenient parsing leaves out. Throws
 * `StrictModeViolationError` instead when strict mode is on.
 */
export function report(ctx: ParseContext, segment: string, reason: string, cause?: unknown): void {
  if (ctx.strict) {
    throw new StrictModeViolationError(ctx.header, ctx.value, segment, reason, { cause });
  }
  const warning: ParseWarning = { header: ctx.header, segment, reason };
  ctx.warnings.push(warning);
  ctx.logger.debug({ ...warning }, `skipped malformed ${ctx.header} element`);
}

export function reportSkipped(ctx: ParseContext, skipped: readonly SkippedSegment[]): void {
  for (const entry of skipped) {
    report(ctx, entry.segment, entry.reason);
  }
}

export function complete<T>(ctx: ParseContext, value: T): ParseResult<T> {
  return { value, warnings: ctx.warnings };
}
