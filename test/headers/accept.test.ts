import { describe, it, expect } from 'vitest';
import {
  formatAccept,
  formatQuality,
  parseAccept,
  parseAcceptCharset,
  parseAcceptDetailed,
  parseAcceptEncoding,
  parseAcceptLanguage,
  parseAcceptLanguageDetailed,
} from '../../src/headers/accept.js';
import { ContentType } from '../../src/core/content-type.js';
import {
  HeaderParseError,
  MalformedContentTypeError,
  MalformedValueError,
  StrictModeViolationError,
} from '../../src/core/errors.js';

describe('parseAccept', () => {
  it('should default the quality to 1', () => {
    const [ct, ...rest] = parseAccept('text/html');

    expect(rest).toEqual([]);
    expect(ct.mediaType).toBe('text/html');
    expect(ct.quality).toBe(1);
    expect(ct.hasExplicitQuality).toBe(false);
    expect(ct.parameters).toEqual({});
  });

  it('should order equal qualities by specificity', () => {
    const accepted = parseAccept('text/*, text/plain, text/plain;format=flowed, */*');

    expect(accepted.map(String)).toEqual(['text/plain; format=flowed', 'text/plain', 'text/*', '*/*']);
  });

  it('should order by quality first', () => {
    const accepted = parseAccept('audio/*;q=0.2, audio/basic');

    expect(accepted.map((ct) => ct.mediaType)).toEqual(['audio/basic', 'audio/*']);
    expect(accepted[1].quality).toBe(0.2);
  });

  it('should put an explicit q=1.0 ahead of an inferred quality', () => {
    const accepted = parseAccept('text/plain, text/html;q=1.0');

    expect(accepted.map((ct) => ct.mediaType)).toEqual(['text/html', 'text/plain']);
    expect(accepted[0].parameters).toEqual({ q: '1.0' });
  });

  it('should keep input order for ties', () => {
    const accepted = parseAccept('application/xml;q=0.9, application/json;q=0.9');

    expect(accepted.map((ct) => ct.mediaType)).toEqual(['application/xml', 'application/json']);
  });

  it('should not split on commas inside quoted parameters', () => {
    const accepted = parseAccept('text/plain; title="a, b", text/html');

    expect(accepted).toHaveLength(2);
    expect(accepted[0].parameters).toEqual({ title: 'a, b' });
  });

  it('should return an empty list for an empty header', () => {
    expect(parseAccept('')).toEqual([]);
  });

  it('should fail on an unterminated quoted string', () => {
    expect(() => parseAccept('text/plain; a="x')).toThrow(MalformedValueError);
  });

  describe('invalid quality values', () => {
    it('should treat them as q=0 in lenient mode', () => {
      const result = parseAcceptDetailed('text/html;q=2, text/plain;q=0.5');

      expect(result.value.map((ct) => ct.mediaType)).toEqual(['text/plain', 'text/html']);
      expect(result.value[1].parameters).toEqual({ q: '0' });
      expect(result.value[1].quality).toBe(0);
      expect(result.warnings).toEqual([
        { header: 'accept', segment: 'text/html;q=2', reason: 'invalid quality value "2"' },
      ]);
    });

    it('should reject them in strict mode', () => {
      expect(() => parseAccept('text/html;q=2', { strict: true })).toThrow(StrictModeViolationError);
    });
  });

  describe('malformed media ranges', () => {
    it('should skip them in lenient mode', () => {
      const result = parseAcceptDetailed('text/html, *, application/json');

      expect(result.value.map((ct) => ct.mediaType)).toEqual(['text/html', 'application/json']);
      expect(result.warnings).toEqual([{ header: 'accept', segment: '*', reason: 'expected type/subtype' }]);
    });

    it('should reject them in strict mode', () => {
      let caught: unknown;
      try {
        parseAccept('text/html, *, application/json', { strict: true });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(StrictModeViolationError);
      if (!(caught instanceof StrictModeViolationError)) return;
      expect(caught.segment).toBe('*');
      expect(caught.cause).toBeInstanceOf(MalformedContentTypeError);
    });
  });
});

describe('qualified token lists', () => {
  it('should place a wildcard ahead of rejected values', () => {
    expect(parseAcceptCharset('acceptable, rejected;q=0, *')).toEqual(['acceptable', '*', 'rejected']);
  });

  it('should sort encodings by quality', () => {
    expect(parseAcceptEncoding('gzip;q=0.5, br, identity;q=0, *;q=0.1')).toEqual(['br', 'gzip', '*', 'identity']);
  });

  it('should preserve token case', () => {
    expect(parseAcceptLanguage('en-US, en;q=0.9, de;q=0.8')).toEqual(['en-US', 'en', 'de']);
  });

  it('should put an explicit q=1 ahead of an inferred one', () => {
    expect(parseAcceptCharset('latin1, utf-8;q=1')).toEqual(['utf-8', 'latin1']);
  });

  it('should tolerate whitespace around the separator', () => {
    expect(parseAcceptCharset('latin1;q=0.2, utf-8 ; q=0.5')).toEqual(['utf-8', 'latin1']);
  });

  it('should skip elements that are not tokens', () => {
    const result = parseAcceptLanguageDetailed('en, "fr", de;q=0.5');

    expect(result.value).toEqual(['en', 'de']);
    expect(result.warnings).toEqual([
      { header: 'accept-language', segment: '"fr"', reason: 'invalid token "\\"fr\\""' },
    ]);
  });

  it('should rank an invalid quality last in lenient mode', () => {
    expect(parseAcceptEncoding('gzip;q=5, br;q=0.1')).toEqual(['br', 'gzip']);
  });

  it('should reject an invalid quality in strict mode', () => {
    expect(() => parseAcceptEncoding('gzip;q=5', { strict: true })).toThrow(StrictModeViolationError);
  });
});

describe('formatAccept', () => {
  it('should write tokens with optional qualities', () => {
    expect(formatAccept(['gzip', { value: 'br', quality: 0.5 }, { value: 'identity' }])).toBe(
      'gzip, br;q=0.5, identity'
    );
  });

  it('should write content types', () => {
    expect(formatAccept([new ContentType('text', 'html'), new ContentType('*', '*', { q: '0.1' })])).toBe(
      'text/html, */*; q=0.1'
    );
  });

  it('should round qualities to three decimals', () => {
    expect(formatQuality(0.12345)).toBe('0.123');
    expect(formatQuality(1)).toBe('1');
    expect(formatQuality(0)).toBe('0');
  });

  it('should reject qualities outside [0, 1]', () => {
    expect(() => formatQuality(1.5)).toThrow(HeaderParseError);
  });
});
