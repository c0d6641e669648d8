import { describe, it, expect } from 'vitest';
import {
  formatCacheControl,
  parseCacheControl,
  parseCacheControlDetailed,
} from '../../src/headers/cache-control.js';
import { StrictModeViolationError } from '../../src/core/errors.js';

describe('parseCacheControl', () => {
  it('should map valueless directives to true and delta-seconds to numbers', () => {
    expect(parseCacheControl('public, max-age=2592000')).toEqual({ public: true, 'max-age': 2592000 });
  });

  it('should lower-case names and dequote values', () => {
    expect(parseCacheControl('No-Cache="Set-Cookie, X-Test", Private')).toEqual({
      'no-cache': 'Set-Cookie, X-Test',
      private: true,
    });
  });

  it('should convert quoted delta-seconds', () => {
    expect(parseCacheControl('max-age="60"')).toEqual({ 'max-age': 60 });
  });

  it('should cap delta-seconds that overflow', () => {
    const directives = parseCacheControl('max-age=99999999999999999999, s-maxage=2147483649, stale-if-error=2147483647');

    expect(directives).toEqual({ 'max-age': 2147483648, 's-maxage': 2147483648, 'stale-if-error': 2147483647 });
    expect(formatCacheControl(directives)).toBe('max-age=2147483648, s-maxage=2147483648, stale-if-error=2147483647');
  });

  it('should keep token values as strings', () => {
    expect(parseCacheControl('community=UCI')).toEqual({ community: 'UCI' });
  });

  it('should keep the last repeated directive', () => {
    expect(parseCacheControl('max-age=60, max-age=120')).toEqual({ 'max-age': 120 });
  });

  it('should return an empty record for an empty header', () => {
    expect(parseCacheControl('')).toEqual({});
  });

  describe('malformed directives', () => {
    it('should skip them in lenient mode', () => {
      const result = parseCacheControlDetailed('public, max-age=, =5, private="a"b, no-store');

      expect(result.value).toEqual({ public: true, 'no-store': true });
      expect(result.warnings).toEqual([
        { header: 'cache-control', segment: 'max-age=', reason: 'directive "max-age" has an empty value' },
        { header: 'cache-control', segment: '=5', reason: 'invalid directive name ""' },
        { header: 'cache-control', segment: 'private="a"b', reason: 'invalid value for directive "private"' },
      ]);
    });

    it('should reject them in strict mode', () => {
      expect(() => parseCacheControl('public, max-age=', { strict: true })).toThrow(StrictModeViolationError);
    });
  });
});

describe('formatCacheControl', () => {
  it('should write directives in order', () => {
    expect(formatCacheControl({ 'no-cache': 'set-cookie', 'max-age': 60, public: true })).toBe(
      'no-cache=set-cookie, max-age=60, public'
    );
  });

  it('should quote values that are not tokens', () => {
    expect(formatCacheControl({ 'no-cache': 'Set-Cookie, X-Test' })).toBe('no-cache="Set-Cookie, X-Test"');
  });

  it('should produce a value that parses back', () => {
    const directives = { private: 'Authorization', 's-maxage': 300, 'must-revalidate': true } as const;

    expect(parseCacheControl(formatCacheControl(directives))).toEqual(directives);
  });
});
