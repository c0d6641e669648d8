import { describe, it, expect } from 'vitest';
import { headerParserConfigSchema, resolveConfig, type HeaderParserConfig } from '../src/config.js';
import { HeaderParseError } from '../src/core/errors.js';
import { consoleLogger, silentLogger } from '../src/types/logger.js';

// Untyped input, as read from a JSON settings file
function fromJson(text: string): HeaderParserConfig {
  return JSON.parse(text);
}

describe('Configuration', () => {
  it('should fill in defaults', () => {
    const config = resolveConfig();

    expect(config.strict).toBe(false);
    expect(config.normalizeParameterValues).toBe(false);
    expect(config.linkParameterPolicy).toBe('rfc');
    expect(config.onlyStandardForwardedParameters).toBe(false);
    expect(config.logger).toBe(silentLogger);
  });

  it('should keep given values', () => {
    const config = resolveConfig({ strict: true, linkParameterPolicy: 'keep', logger: consoleLogger });

    expect(config.strict).toBe(true);
    expect(config.linkParameterPolicy).toBe('keep');
    expect(config.logger).toBe(consoleLogger);
  });

  it('should reject values of the wrong type', () => {
    expect(() => resolveConfig(fromJson('{"strict":"yes"}'))).toThrow(HeaderParseError);
    expect(() => resolveConfig(fromJson('{"strict":"yes"}'))).toThrow(
      'Invalid header parser configuration: strict: Expected boolean, received string'
    );
  });

  it('should reject an unknown link policy', () => {
    expect(() => resolveConfig(fromJson('{"linkParameterPolicy":"merge"}'))).toThrow(/linkParameterPolicy/);
  });

  it('should reject unknown keys', () => {
    expect(() => resolveConfig(fromJson('{"strictMode":true}'))).toThrow(/strictMode/);
  });

  it('should reject a logger without the logging methods', () => {
    expect(() => resolveConfig(fromJson('{"logger":{}}'))).toThrow(
      'logger: Expected an object with debug, info, warn and error methods'
    );
  });

  it('should list each issue as a suggestion', () => {
    let caught: unknown;
    try {
      resolveConfig(fromJson('{"strict":1,"normalizeParameterValues":"no"}'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(HeaderParseError);
    if (!(caught instanceof HeaderParseError)) return;
    expect(caught.suggestions).toEqual([
      'strict: Expected boolean, received number',
      'normalizeParameterValues: Expected boolean, received string',
    ]);
  });

  it('should expose the schema', () => {
    expect(headerParserConfigSchema.safeParse({ strict: true }).success).toBe(true);
  });
});
