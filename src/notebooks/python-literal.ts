/**
 * Python literal reader
 *
 * Reads the subset of Python literal syntax used for notebook parameter
 * cells and converts it to JSON values:
 * - dict, list and tuple displays (tuples become arrays), trailing commas
 * - single, double and triple-quoted strings, r/b/u prefixes, implicit
 *   concatenation of adjacent strings
 * - int and float literals with optional sign, underscores and exponent
 * - True, False, None
 * - comments and line continuations
 *
 * Number and constant dict keys become their JSON text (1 -> "1", True -> "true").
 */

import type { JsonObject, JsonValue } from '../types/index.js';

export class LiteralSyntaxError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'LiteralSyntaxError';
  }
}

type Punct = '{' | '}' | '[' | ']' | '(' | ')' | ':' | ',' | '-' | '+';

type Token =
  | { kind: 'punct'; value: Punct; pos: number }
  | { kind: 'string'; value: string; pos: number }
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'name'; value: string; pos: number }
  | { kind: 'eof'; pos: number };

const PUNCT = new Set<string>(['{', '}', '[', ']', '(', ')', ':', ',', '-', '+']);
const NUMBER_RE = /(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][-+]?\d[\d_]*)?/y;
const HEX_RE = /0[xX][0-9a-fA-F_]+/y;
const NAME_RE = /[A-Za-z_][A-Za-z0-9_]*/y;
const STRING_PREFIX_RE = /([rRbBuU]{0,2})(['"])/y;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '0': '\0',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
};

function isPunct(value: string): value is Punct {
  return PUNCT.has(value);
}

// ============================================
// Tokenizer
// ============================================

class Tokenizer {
  private pos = 0;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.kind === 'eof') return tokens;
    }
  }

  private next(): Token {
    this.skipTrivia();
    const { source } = this;
    const start = this.pos;

    if (start >= source.length) return { kind: 'eof', pos: start };

    const string = this.readString();
    if (string !== null) return { kind: 'string', value: string, pos: start };

    const char = source[start];
    if (isPunct(char)) {
      this.pos++;
      return { kind: 'punct', value: char, pos: start };
    }

    HEX_RE.lastIndex = start;
    const hex = HEX_RE.exec(source);
    if (hex) {
      this.pos = HEX_RE.lastIndex;
      return { kind: 'number', value: parseInt(hex[0].slice(2).replace(/_/g, ''), 16), pos: start };
    }

    NUMBER_RE.lastIndex = start;
    const number = NUMBER_RE.exec(source);
    if (number) {
      this.pos = NUMBER_RE.lastIndex;
      return { kind: 'number', value: Number(number[0].replace(/_/g, '')), pos: start };
    }

    NAME_RE.lastIndex = start;
    const name = NAME_RE.exec(source);
    if (name) {
      this.pos = NAME_RE.lastIndex;
      return { kind: 'name', value: name[0], pos: start };
    }

    throw new LiteralSyntaxError(`Unexpected character '${char}'`, start);
  }

  private skipTrivia(): void {
    const { source } = this;
    while (this.pos < source.length) {
      const char = source[this.pos];
      if (char === '#') {
        while (this.pos < source.length && source[this.pos] !== '\n') this.pos++;
      } else if (char === '\\' && (source[this.pos + 1] === '\n' || source[this.pos + 1] === '\r')) {
        this.pos += 2;
      } else if (/\s/.test(char)) {
        this.pos++;
      } else {
        return;
      }
    }
  }

  /**
   * Read a string literal at the current position, or return null when
   * there is none.
   */
  private readString(): string | null {
    const { source } = this;
    STRING_PREFIX_RE.lastIndex = this.pos;
    const prefix = STRING_PREFIX_RE.exec(source);
    if (!prefix) return null;

    const start = this.pos;
    const raw = /[rR]/.test(prefix[1]);
    const quote = prefix[2];
    const triple = source.startsWith(quote.repeat(3), start + prefix[1].length);
    const delimiter = triple ? quote.repeat(3) : quote;

    let i = start + prefix[1].length + delimiter.length;
    let value = '';

    while (i < source.length) {
      if (source.startsWith(delimiter, i)) {
        this.pos = i + delimiter.length;
        return value;
      }

      const char = source[i];
      if (!triple && char === '\n') break;

      if (char !== '\\') {
        value += char;
        i++;
        continue;
      }

      const escaped = source[i + 1];
      if (escaped === undefined) break;

      if (raw) {
        value += char + escaped;
        i += 2;
      } else if (escaped === '\n') {
        i += 2;
      } else if (escaped === 'x' || escaped === 'u' || escaped === 'U') {
        const length = escaped === 'x' ? 2 : escaped === 'u' ? 4 : 8;
        const hex = source.slice(i + 2, i + 2 + length);
        if (!new RegExp(`^[0-9a-fA-F]{${length}}$`).test(hex)) {
          throw new LiteralSyntaxError(`Invalid \\${escaped} escape`, i);
        }
        value += String.fromCodePoint(parseInt(hex, 16));
        i += 2 + length;
      } else {
        value += SIMPLE_ESCAPES[escaped] ?? char + escaped;
        i += 2;
      }
    }

    throw new LiteralSyntaxError('Unterminated string', start);
  }
}

// ============================================
// Parser
// ============================================

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parseDocument(): JsonValue {
    const value = this.parseValue();
    const rest = this.peek();
    if (rest.kind !== 'eof') {
      throw new LiteralSyntaxError('Unexpected trailing content', rest.pos);
    }
    return value;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private isPunct(value: Punct): boolean {
    const token = this.peek();
    return token.kind === 'punct' && token.value === value;
  }

  private expect(value: Punct): void {
    const token = this.advance();
    if (token.kind !== 'punct' || token.value !== value) {
      throw new LiteralSyntaxError(`Expected '${value}'`, token.pos);
    }
  }

  private parseValue(): JsonValue {
    const token = this.advance();

    switch (token.kind) {
      case 'string': {
        let value = token.value;
        for (let next = this.peek(); next.kind === 'string'; next = this.peek()) {
          value += next.value;
          this.advance();
        }
        return value;
      }

      case 'number':
        return token.value;

      case 'name':
        if (token.value === 'True') return true;
        if (token.value === 'False') return false;
        if (token.value === 'None') return null;
        throw new LiteralSyntaxError(`Unsupported name '${token.value}'`, token.pos);

      case 'punct':
        switch (token.value) {
          case '{':
            return this.parseDict();
          case '[':
            return this.parseSequence(']');
          case '(':
            return this.parseParenthesized();
          case '-':
          case '+': {
            const operand = this.advance();
            if (operand.kind !== 'number') {
              throw new LiteralSyntaxError(`Expected a number after '${token.value}'`, operand.pos);
            }
            return token.value === '-' ? -operand.value : operand.value;
          }
          default:
            throw new LiteralSyntaxError(`Unexpected '${token.value}'`, token.pos);
        }

      case 'eof':
        throw new LiteralSyntaxError('Unexpected end of input', token.pos);
    }
  }

  private parseDict(): JsonObject {
    const result: JsonObject = {};
    while (!this.isPunct('}')) {
      const keyToken = this.peek();
      const key = this.parseValue();
      if (typeof key === 'object' && key !== null) {
        throw new LiteralSyntaxError('Unsupported dict key', keyToken.pos);
      }
      this.expect(':');
      result[String(key)] = this.parseValue();
      if (!this.isPunct('}')) this.expect(',');
    }
    this.expect('}');
    return result;
  }

  private parseSequence(close: ']' | ')'): JsonValue[] {
    const items: JsonValue[] = [];
    while (!this.isPunct(close)) {
      items.push(this.parseValue());
      if (!this.isPunct(close)) this.expect(',');
    }
    this.expect(close);
    return items;
  }

  /** `(x)` is just x; `()` and `(x,)` are tuples */
  private parseParenthesized(): JsonValue {
    if (this.isPunct(')')) {
      this.advance();
      return [];
    }
    const first = this.parseValue();
    if (this.isPunct(')')) {
      this.advance();
      return first;
    }
    this.expect(',');
    return [first, ...this.parseSequence(')')];
  }
}

/**
 * Parse a Python literal expression into a JSON value.
 *
 * @throws LiteralSyntaxError on anything outside the supported subset
 */
export function parsePythonLiteral(source: string): JsonValue {
  return new Parser(new Tokenizer(source).tokenize()).parseDocument();
}
