import { describe, it, expect } from 'vitest';
import { collectLinkParameters, formatLink, parseLink, parseLinkDetailed } from '../../src/headers/link.js';
import { LinkHeader, paginationLinks } from '../../src/core/link.js';
import { MalformedLinkValueError, MalformedValueError, StrictModeViolationError } from '../../src/core/errors.js';

describe('Link Header Parser (RFC 8288)', () => {
  describe('parseLink', () => {
    it('should parse a single link', () => {
      const [link, ...rest] = parseLink('<https://api.example.com/items?page=2>; rel="next"');

      expect(rest).toEqual([]);
      expect(link.target).toBe('https://api.example.com/items?page=2');
      expect(link.rel).toBe('next');
    });

    it('should parse multiple links', () => {
      const links = parseLink(
        '<https://api.example.com/items?page=2>; rel="next", <https://api.example.com/items?page=1>; rel="prev"'
      );

      expect(links.map((link) => link.target)).toEqual([
        'https://api.example.com/items?page=2',
        'https://api.example.com/items?page=1',
      ]);
      expect(paginationLinks(links)).toEqual({
        next: 'https://api.example.com/items?page=2',
        prev: 'https://api.example.com/items?page=1',
        first: undefined,
        last: undefined,
      });
    });

    it('should reproduce a canonical header exactly', () => {
      const header = '<http://x/y>; rel="previous"; title="previous chapter"';

      expect(formatLink(parseLink(header))).toBe(header);
    });

    it('should keep commas inside the target', () => {
      expect(parseLink('<http://x/a,b>; rel=next')[0].target).toBe('http://x/a,b');
    });

    it('should keep commas and semicolons inside quoted values', () => {
      const [link] = parseLink('<http://x/>; rel=next; title="one, two; three"');

      expect(link.get('title')).toEqual(['one, two; three']);
    });

    it('should tolerate whitespace around "="', () => {
      expect(parseLink('<http://x>; rel = "next"')[0].rel).toBe('next');
    });

    it('should accept parameters without a value', () => {
      const result = parseLinkDetailed('<http://x/>; rel=next; crossorigin, <http://y/>; rel=prev');

      expect(result.warnings).toEqual([]);
      expect(result.value.map((link) => link.target)).toEqual(['http://x/', 'http://y/']);
      expect(result.value[0].parameters).toEqual([
        ['rel', 'next'],
        ['crossorigin', ''],
      ]);
      expect(formatLink(result.value)).toBe('<http://x/>; rel="next"; crossorigin, <http://y/>; rel="prev"');
    });

    it('should read a lone valueless parameter', () => {
      expect(parseLink('<http://x/>; rel')[0].parameters).toEqual([['rel', '']]);
    });

    it('should parse a link without parameters', () => {
      expect(parseLink('<http://x>')[0].parameters).toEqual([]);
    });

    describe('malformed first element', () => {
      it('should require angle brackets', () => {
        expect(() => parseLink('http://x; rel=next')).toThrow(MalformedLinkValueError);
        expect(() => parseLink('http://x; rel=next')).toThrow('link target must start with "<"');
        expect(() => parseLink('<http://x')).toThrow('link target is missing its closing ">"');
      });

      it('should require a semicolon before the parameters', () => {
        expect(() => parseLink('<http://x> rel=next')).toThrow('parameter list must start with ";"');
      });

      it('should reject an empty target', () => {
        expect(() => parseLink('<>; rel=next')).toThrow('empty link target');
      });

      it('should throw on an unterminated quoted string', () => {
        expect(() => parseLinkDetailed('<http://x/>; title="open')).toThrow('unterminated quoted string');
        expect(() => parseLink('<http://x/>; title="open, <http://y/>; rel=prev')).toThrow(MalformedValueError);
      });

      it('should throw even in lenient mode', () => {
        expect(() => parseLink('http://x/a, <http://x/b>', { strict: false })).toThrow(MalformedLinkValueError);
      });
    });

    describe('malformed later elements', () => {
      const header = '<http://x/a>; rel=next, http://x/b; rel=prev, <http://x/c>';

      it('should skip them in lenient mode', () => {
        const result = parseLinkDetailed(header);

        expect(result.value.map((link) => link.target)).toEqual(['http://x/a', 'http://x/c']);
        expect(result.warnings).toEqual([
          { header: 'link', segment: 'http://x/b; rel=prev', reason: 'link target must start with "<"' },
        ]);
      });

      it('should reject them in strict mode', () => {
        expect(() => parseLink(header, { strict: true })).toThrow(StrictModeViolationError);
      });
    });

    it('should skip malformed parameters', () => {
      const result = parseLinkDetailed('<http://x/a>; =x; rel=next');

      expect(result.value[0].parameters).toEqual([['rel', 'next']]);
      expect(result.warnings).toEqual([{ header: 'link', segment: '=x', reason: 'empty parameter name' }]);
    });
  });

  describe('parameter policy', () => {
    it('should keep the first singular parameter under rfc', () => {
      const [link] = parseLink('<http://x>; rel=next; rel=prev; hreflang=en; hreflang=de');

      expect(link.parameters).toEqual([
        ['rel', 'next'],
        ['hreflang', 'en'],
        ['hreflang', 'de'],
      ]);
    });

    it("should prefer title* and copy it into title under rfc", () => {
      const [link] = parseLink("<http://x>; title=\"fallback\"; title*=UTF-8'de'n%c3%a4chstes");

      expect(link.parameters).toEqual([
        ['title*', "UTF-8'de'n%c3%a4chstes"],
        ['title', "UTF-8'de'n%c3%a4chstes"],
      ]);
    });

    it('should keep every value under keep', () => {
      const [link] = parseLink('<http://x>; rel=next; rel=prev; title=a; title=b', { parameterPolicy: 'keep' });

      expect(link.rel).toBe('next prev');
      expect(link.get('title')).toEqual(['a', 'b']);
    });

    it('should apply the policy to raw parameters', () => {
      expect(
        collectLinkParameters([
          ['type', 'text/html'],
          ['title', 'first'],
          ['type', 'text/plain'],
          ['title', 'second'],
        ])
      ).toEqual([
        ['type', 'text/html'],
        ['title', 'first'],
      ]);
    });
  });

  describe('formatLink', () => {
    it('should join links with commas', () => {
      const links = [
        new LinkHeader('/items?page=2', [['rel', 'next']]),
        new LinkHeader('/items?page=9', [['rel', 'last']]),
      ];

      expect(formatLink(links)).toBe('</items?page=2>; rel="next", </items?page=9>; rel="last"');
    });
  });
});
