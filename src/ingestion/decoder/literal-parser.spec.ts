import {
  isLiteralMapping,
  LiteralSyntaxError,
  parseLiteral,
} from './literal-parser';

describe('parseLiteral', () => {
  describe('scalars', () => {
    it('should parse single- and double-quoted strings', () => {
      expect(parseLiteral("'abc'")).toBe('abc');
      expect(parseLiteral('"abc"')).toBe('abc');
    });

    it('should decode escapes inside strings', () => {
      expect(parseLiteral("'it\\'s'")).toBe("it's");
      expect(parseLiteral("'a\\nb'")).toBe('a\nb');
      expect(parseLiteral("'\\x41\\u0042'")).toBe('AB');
    });

    it('should keep unknown escapes verbatim', () => {
      expect(parseLiteral("'C:\\path'")).toBe('C:\\path');
    });

    it('should concatenate adjacent string literals', () => {
      expect(parseLiteral("'ab' \"cd\"")).toBe('abcd');
    });

    it('should parse integers, floats and exponents', () => {
      expect(parseLiteral('42')).toBe(42);
      expect(parseLiteral('-3.5')).toBe(-3.5);
      expect(parseLiteral('.25')).toBe(0.25);
      expect(parseLiteral('1e3')).toBe(1000);
    });

    it('should parse True, False and None', () => {
      expect(parseLiteral('True')).toBe(true);
      expect(parseLiteral('False')).toBe(false);
      expect(parseLiteral('None')).toBeNull();
    });
  });

  describe('containers', () => {
    it('should parse a list of mappings in order', () => {
      const value = parseLiteral("[{'a': 1, 'b': 'x'}, {}]");

      expect(Array.isArray(value)).toBe(true);
      const items = Array.isArray(value) ? value : [];
      expect(items).toHaveLength(2);
      expect(items[0]).toEqual({
        kind: 'mapping',
        entries: [
          ['a', 1],
          ['b', 'x'],
        ],
      });
      expect(items[1]).toEqual({ kind: 'mapping', entries: [] });
    });

    it('should accept trailing commas', () => {
      expect(parseLiteral('[1, 2,]')).toEqual([1, 2]);
      expect(parseLiteral("{'a': 1,}")).toEqual({
        kind: 'mapping',
        entries: [['a', 1]],
      });
    });

    it('should keep non-string keys for the caller to judge', () => {
      expect(parseLiteral('{1: 2}')).toEqual({
        kind: 'mapping',
        entries: [[1, 2]],
      });
    });

    it('should tell mappings apart from lists and scalars', () => {
      expect(isLiteralMapping(parseLiteral("{'a': 1}"))).toBe(true);
      expect(isLiteralMapping(parseLiteral('[1]'))).toBe(false);
      expect(isLiteralMapping(parseLiteral('None'))).toBe(false);
    });
  });

  describe('syntax errors', () => {
    it('should reject empty input', () => {
      expect(() => parseLiteral('   ')).toThrow('Empty input at position 3');
    });

    it('should reject bare words', () => {
      expect(() => parseLiteral('not a list')).toThrow(
        "Unexpected token 'not' at position 0",
      );
    });

    it('should reject JSON keywords', () => {
      expect(() => parseLiteral('[true]')).toThrow(LiteralSyntaxError);
      expect(() => parseLiteral('[null]')).toThrow(LiteralSyntaxError);
    });

    it('should reject trailing input', () => {
      expect(() => parseLiteral('[1] [2]')).toThrow(
        "Unexpected trailing input '[2]' at position 4",
      );
    });

    it('should reject unterminated strings and containers', () => {
      expect(() => parseLiteral("['abc")).toThrow(
        'Unterminated string at position 1',
      );
      expect(() => parseLiteral('[1, 2')).toThrow(
        "Expected ',' or ']' but found 'end of input' at position 5",
      );
    });

    it('should report the position of a missing colon', () => {
      const error = (() => {
        try {
          parseLiteral("{'a' 1}");
        } catch (e) {
          return e;
        }
        return null;
      })();

      expect(error).toBeInstanceOf(LiteralSyntaxError);
      expect(error).toHaveProperty('position', 5);
    });
  });
});
