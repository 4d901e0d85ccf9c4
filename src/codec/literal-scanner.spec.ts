import { isWhitespace, parseArrayLiteral, parseCompositeLiteral, scan } from './literal-scanner';

describe('literal-scanner', () => {
  describe('parseCompositeLiteral', () => {
    it('should split unquoted fields', () => {
      expect(parseCompositeLiteral('(1,2,3)')).toEqual(['1', '2', '3']);
    });

    it('should return null for empty field regions', () => {
      expect(parseCompositeLiteral('(1,,3)')).toEqual(['1', null, '3']);
      expect(parseCompositeLiteral('(a,)')).toEqual(['a', null]);
      expect(parseCompositeLiteral('(,)')).toEqual([null, null]);
    });

    it('should treat an empty composite as a single null field', () => {
      expect(parseCompositeLiteral('()')).toEqual([null]);
    });

    it('should keep a quoted empty string distinct from null', () => {
      expect(parseCompositeLiteral('("",1)')).toEqual(['', '1']);
      expect(parseCompositeLiteral('(1,"")')).toEqual(['1', '']);
    });

    it('should keep delimiters and whitespace inside quotes', () => {
      expect(parseCompositeLiteral('("a,b",2)')).toEqual(['a,b', '2']);
      expect(parseCompositeLiteral('("a b",c)')).toEqual(['a b', 'c']);
      expect(parseCompositeLiteral('(1,"(2,3)")')).toEqual(['1', '(2,3)']);
    });

    it('should collapse doubled quotes inside a quoted field', () => {
      expect(parseCompositeLiteral('("a""b")')).toEqual(['a"b']);
    });

    it('should take the character after a backslash literally', () => {
      expect(parseCompositeLiteral('("a\\"b")')).toEqual(['a"b']);
      expect(parseCompositeLiteral('("back\\\\slash")')).toEqual(['back\\slash']);
    });

    it('should discard unquoted text before a quote', () => {
      expect(parseCompositeLiteral('(ab"cd")')).toEqual(['cd']);
    });

    it('should append unquoted text after a quote', () => {
      expect(parseCompositeLiteral('("ab"cd)')).toEqual(['abcd']);
    });

    it('should stop at unquoted whitespace', () => {
      expect(parseCompositeLiteral('(1, 2)')).toEqual(['1']);
      expect(parseCompositeLiteral('(a b,c)')).toEqual([]);
    });

    it('should return what was collected when the literal is cut short', () => {
      expect(parseCompositeLiteral('(1,"abc')).toEqual(['1']);
      expect(parseCompositeLiteral('(1,2')).toEqual(['1']);
    });

    it('should ignore text after the closing parenthesis', () => {
      expect(parseCompositeLiteral('(1)garbage,2')).toEqual(['1']);
    });
  });

  describe('parseArrayLiteral', () => {
    it('should split array elements', () => {
      expect(parseArrayLiteral('{1,2,3}')).toEqual(['1', '2', '3']);
    });

    it('should return element text as written', () => {
      expect(parseArrayLiteral('{a,NULL,"x y"}')).toEqual(['a', 'NULL', 'x y']);
    });

    it('should return null for empty elements', () => {
      expect(parseArrayLiteral('{,b}')).toEqual([null, 'b']);
    });

    it('should treat parentheses as ordinary characters', () => {
      expect(parseArrayLiteral('{(1),2}')).toEqual(['(1)', '2']);
    });
  });

  describe('scan', () => {
    it('should accept custom delimiters', () => {
      expect(scan('[x,y]', '[', ']')).toEqual(['x', 'y']);
    });

    it('should split text without an opening delimiter', () => {
      expect(scan('a,b)', '(', ')')).toEqual(['a', 'b']);
    });
  });

  describe('isWhitespace', () => {
    it('should accept ASCII whitespace and Unicode space separators', () => {
      expect(isWhitespace(' ')).toBe(true);
      expect(isWhitespace('\t')).toBe(true);
      expect(isWhitespace('\n')).toBe(true);
      expect(isWhitespace('\u2003')).toBe(true);
      expect(isWhitespace('\u2028')).toBe(true);
    });

    it('should reject non-breaking spaces', () => {
      expect(isWhitespace('\u00A0')).toBe(false);
      expect(isWhitespace('\u2007')).toBe(false);
      expect(isWhitespace('\u202F')).toBe(false);
    });

    it('should reject ordinary characters', () => {
      expect(isWhitespace('a')).toBe(false);
      expect(isWhitespace(',')).toBe(false);
    });
  });
});
