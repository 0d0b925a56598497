/**
 * Parser for the literal notation the furnace API serializes its records in:
 * single- or double-quoted strings, numbers, True/False/None, lists and
 * mappings. It is deliberately stricter than JSON-with-quirks: anything that
 * is not a literal (names, calls, JSON's true/null) is a syntax error.
 */

export interface LiteralMapping {
  kind: 'mapping';
  entries: [LiteralValue, LiteralValue][];
}

export type LiteralScalar = string | number | boolean | null;
export type LiteralValue = LiteralScalar | LiteralValue[] | LiteralMapping;

export class LiteralSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number,
  ) {
    super(`${message} at position ${position}`);
    this.name = 'LiteralSyntaxError';
  }
}

const NUMBER_PATTERN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const WORD_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;
const KEYWORDS: Record<string, LiteralScalar> = {
  True: true,
  False: false,
  None: null,
};
const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  a: '\x07',
  '0': '\0',
};

export function isLiteralMapping(value: LiteralValue): value is LiteralMapping {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    value.kind === 'mapping'
  );
}

/**
 * Parse one complete literal. Trailing non-whitespace input is an error.
 */
export function parseLiteral(text: string): LiteralValue {
  const parser = new LiteralParser(text);
  return parser.parseDocument();
}

class LiteralParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseDocument(): LiteralValue {
    this.skipWhitespace();
    if (this.pos >= this.text.length) {
      throw new LiteralSyntaxError('Empty input', this.pos);
    }
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw new LiteralSyntaxError(
        `Unexpected trailing input '${this.text.slice(this.pos, this.pos + 16)}'`,
        this.pos,
      );
    }
    return value;
  }

  private parseValue(): LiteralValue {
    this.skipWhitespace();
    const ch = this.text[this.pos];

    if (ch === '[') return this.parseList();
    if (ch === '{') return this.parseMapping();
    if (ch === "'" || ch === '"') return this.parseStrings();

    const number = this.matchSticky(NUMBER_PATTERN);
    if (number !== null) {
      return Number(number);
    }

    const word = this.matchSticky(WORD_PATTERN);
    if (word !== null && Object.hasOwn(KEYWORDS, word)) {
      return KEYWORDS[word];
    }

    const start = word !== null ? this.pos - word.length : this.pos;
    const found = word ?? ch ?? 'end of input';
    throw new LiteralSyntaxError(`Unexpected token '${found}'`, start);
  }

  private parseList(): LiteralValue[] {
    this.expect('[');
    const items: LiteralValue[] = [];
    this.skipWhitespace();
    while (this.peek() !== ']') {
      items.push(this.parseValue());
      if (!this.consumeSeparator(']')) break;
    }
    this.expect(']');
    return items;
  }

  private parseMapping(): LiteralMapping {
    this.expect('{');
    const entries: [LiteralValue, LiteralValue][] = [];
    this.skipWhitespace();
    while (this.peek() !== '}') {
      const key = this.parseValue();
      this.skipWhitespace();
      this.expect(':');
      const value = this.parseValue();
      entries.push([key, value]);
      if (!this.consumeSeparator('}')) break;
    }
    this.expect('}');
    return { kind: 'mapping', entries };
  }

  /**
   * Adjacent string literals concatenate ('a' 'b' == 'ab').
   */
  private parseStrings(): string {
    let result = this.parseString();
    this.skipWhitespace();
    while (this.peek() === "'" || this.peek() === '"') {
      result += this.parseString();
      this.skipWhitespace();
    }
    return result;
  }

  private parseString(): string {
    const quote = this.text[this.pos];
    const start = this.pos;
    this.pos++;
    let out = '';

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch === '\n') {
        throw new LiteralSyntaxError('Unterminated string', start);
      }
      if (ch === '\\') {
        out += this.parseEscape();
        continue;
      }
      out += ch;
      this.pos++;
    }
    throw new LiteralSyntaxError('Unterminated string', start);
  }

  private parseEscape(): string {
    const next = this.text[this.pos + 1];
    if (next === undefined) {
      throw new LiteralSyntaxError('Dangling escape', this.pos);
    }
    if (next === '\n') {
      this.pos += 2;
      return '';
    }
    if (Object.hasOwn(SIMPLE_ESCAPES, next)) {
      this.pos += 2;
      return SIMPLE_ESCAPES[next];
    }
    if (next === 'x' || next === 'u') {
      const width = next === 'x' ? 2 : 4;
      const hex = this.text.slice(this.pos + 2, this.pos + 2 + width);
      if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) {
        throw new LiteralSyntaxError(`Invalid \\${next} escape`, this.pos);
      }
      this.pos += 2 + width;
      return String.fromCharCode(Number.parseInt(hex, 16));
    }
    // Unknown escapes keep the backslash
    this.pos += 2;
    return `\\${next}`;
  }

  /**
   * After an item: ',' continues (a trailing comma before `close` is fine),
   * `close` ends the container. Returns false when the container ends.
   */
  private consumeSeparator(close: string): boolean {
    this.skipWhitespace();
    if (this.peek() === ',') {
      this.pos++;
      this.skipWhitespace();
      return this.peek() !== close;
    }
    if (this.peek() === close) return false;
    throw new LiteralSyntaxError(
      `Expected ',' or '${close}' but found '${this.peek() ?? 'end of input'}'`,
      this.pos,
    );
  }

  private expect(ch: string): void {
    this.skipWhitespace();
    if (this.text[this.pos] !== ch) {
      throw new LiteralSyntaxError(
        `Expected '${ch}' but found '${this.text[this.pos] ?? 'end of input'}'`,
        this.pos,
      );
    }
    this.pos++;
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private matchSticky(pattern: RegExp): string | null {
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.text);
    if (!match) return null;
    this.pos += match[0].length;
    return match[0];
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }
}
