import { ParseError } from '../errors.js';
import type { LiteralKind, Token } from './tokens.js';

const IDENT_START = /[\p{XID_Start}_]/u;
const IDENT_CONTINUE = /\p{XID_Continue}/u;
const WHITESPACE = /\s/u;
const DIGIT = /[0-9]/;
const NUMBER_BODY = /[0-9A-Za-z_]/;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n', r: '\r', t: '\t', '\\': '\\', '0': '\0', "'": "'", '"': '"',
};

/**
 * Scanner for Rust source text.
 *
 * Produces the flat token stream used to find module declarations. Comments
 * (doc comments included) and whitespace are skipped. String-like literals
 * carry their decoded value so attribute arguments can be read directly.
 *
 * Offsets are 0-based UTF-16 code units; lines and columns are 1-based.
 */
export class Scanner {
  private readonly source: string;
  private readonly filePath: string;
  private readonly lineStarts: number[] = [0];
  private index = 0;

  constructor(source: string, filePath: string) {
    this.source = source;
    this.filePath = filePath;

    for (let i = 0; i < source.length; i++) {
      if (source[i] === '\n') this.lineStarts.push(i + 1);
    }

    if (source.startsWith('\uFEFF')) this.index = 1;
    this.skipShebang();
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (let token = this.next(); token !== null; token = this.next()) {
      tokens.push(token);
    }
    return tokens;
  }

  next(): Token | null {
    this.skipTrivia();
    if (this.index >= this.source.length) return null;

    const start = this.index;
    const ch = this.source[start];
    const ahead = this.source[start + 1] ?? '';

    if (ch === 'r' && ahead === '#' && IDENT_START.test(this.charAt(start + 2))) {
      this.index = start + 2;
      this.consumeIdentifier();
      return this.identToken(start, true);
    }
    if (ch === 'r' && (ahead === '"' || ahead === '#')) {
      return this.readRawString(start, start + 1, 'raw-str');
    }
    if ((ch === 'b' || ch === 'c') && ahead === 'r' && (this.source[start + 2] === '"' || this.source[start + 2] === '#')) {
      return this.readRawString(start, start + 2, ch === 'b' ? 'byte-str' : 'c-str');
    }
    if ((ch === 'b' || ch === 'c') && ahead === '"') {
      this.index = start + 1;
      return this.readQuoted(start, '"', ch === 'b' ? 'byte-str' : 'c-str');
    }
    if (ch === 'b' && ahead === "'") {
      this.index = start + 1;
      return this.readQuoted(start, "'", 'byte');
    }
    if (IDENT_START.test(this.charAt(start))) {
      this.consumeIdentifier();
      return this.identToken(start, false);
    }
    if (DIGIT.test(ch)) {
      return this.readNumber(start);
    }
    if (ch === '"') {
      return this.readQuoted(start, '"', 'str');
    }
    if (ch === "'") {
      return this.readCharOrLifetime(start);
    }

    this.index = start + this.charAt(start).length;
    return { kind: 'punct', text: this.source.slice(start, this.index), ...this.span(start) };
  }

  /** 1-based line and column of an offset. */
  locate(offset: number): { line: number; column: number } {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }

  private span(start: number): { start: number; end: number; line: number; column: number } {
    return { start, end: this.index, ...this.locate(start) };
  }

  private fail(message: string, offset: number): never {
    throw new ParseError(message, { filePath: this.filePath, ...this.locate(offset) });
  }

  /** Full code point at an offset, as a string. */
  private charAt(offset: number): string {
    const cp = this.source.codePointAt(offset);
    return cp === undefined ? '' : String.fromCodePoint(cp);
  }

  private skipShebang(): void {
    if (!this.source.startsWith('#!', this.index)) return;
    const rest = this.source.slice(this.index + 2).trimStart();
    if (rest.startsWith('[')) return;
    const newline = this.source.indexOf('\n', this.index);
    this.index = newline === -1 ? this.source.length : newline;
  }

  private skipTrivia(): void {
    while (this.index < this.source.length) {
      const ch = this.source[this.index];
      if (WHITESPACE.test(ch)) {
        this.index++;
      } else if (this.source.startsWith('//', this.index)) {
        const newline = this.source.indexOf('\n', this.index);
        this.index = newline === -1 ? this.source.length : newline;
      } else if (this.source.startsWith('/*', this.index)) {
        this.skipBlockComment();
      } else {
        return;
      }
    }
  }

  private skipBlockComment(): void {
    const start = this.index;
    let depth = 0;
    while (this.index < this.source.length) {
      if (this.source.startsWith('/*', this.index)) {
        depth++;
        this.index += 2;
      } else if (this.source.startsWith('*/', this.index)) {
        depth--;
        this.index += 2;
        if (depth === 0) return;
      } else {
        this.index++;
      }
    }
    this.fail('unterminated block comment', start);
  }

  private consumeIdentifier(): void {
    this.index += this.charAt(this.index).length;
    while (this.index < this.source.length) {
      const ch = this.charAt(this.index);
      if (!IDENT_CONTINUE.test(ch)) break;
      this.index += ch.length;
    }
  }

  private identToken(start: number, raw: boolean): Token {
    const text = this.source.slice(start, this.index);
    return { kind: 'ident', text, name: raw ? text.slice(2) : text, raw, ...this.span(start) };
  }

  private readNumber(start: number): Token {
    const isHex = this.source.startsWith('0x', start) || this.source.startsWith('0X', start);
    let seenDot = false;
    let i = start;
    while (i < this.source.length) {
      const ch = this.source[i];
      if (NUMBER_BODY.test(ch)) {
        i++;
      } else if (ch === '.' && !seenDot && !isHex && DIGIT.test(this.source[i + 1] ?? '')) {
        seenDot = true;
        i++;
      } else if ((ch === '+' || ch === '-') && !isHex && /[eE]/.test(this.source[i - 1])) {
        i++;
      } else {
        break;
      }
    }
    this.index = i;
    return { kind: 'literal', literal: 'number', text: this.source.slice(start, i), ...this.span(start) };
  }

  /** Reads from the opening quote at `this.index` through the closing one. */
  private readQuoted(start: number, quote: '"' | "'", literal: LiteralKind): Token {
    this.index++;
    let value = '';
    for (;;) {
      if (this.index >= this.source.length) {
        this.fail(quote === '"' ? 'unterminated string literal' : 'unterminated character literal', start);
      }
      const ch = this.source[this.index];
      if (ch === quote) {
        this.index++;
        break;
      }
      if (ch === '\\') {
        value += this.readEscape(start);
        continue;
      }
      value += ch;
      this.index++;
    }
    this.skipSuffix();
    return { kind: 'literal', literal, value, text: this.source.slice(start, this.index), ...this.span(start) };
  }

  private readEscape(literalStart: number): string {
    const kind = this.source[this.index + 1];
    if (kind === undefined) this.fail('unterminated string literal', literalStart);

    const simple = SIMPLE_ESCAPES[kind];
    if (simple !== undefined) {
      this.index += 2;
      return simple;
    }
    if (kind === 'x') {
      const hex = this.source.slice(this.index + 2, this.index + 4);
      this.index += 4;
      return String.fromCharCode(parseInt(hex, 16));
    }
    if (kind === 'u' && this.source[this.index + 2] === '{') {
      const close = this.source.indexOf('}', this.index);
      if (close === -1) this.fail('unterminated unicode escape', this.index);
      const codePoint = parseInt(this.source.slice(this.index + 3, close).replace(/_/g, ''), 16);
      this.index = close + 1;
      return Number.isNaN(codePoint) ? '' : String.fromCodePoint(codePoint);
    }
    if (kind === '\n' || kind === '\r') {
      // Line continuation: the newline and leading whitespace are dropped.
      this.index += 1;
      while (this.index < this.source.length && WHITESPACE.test(this.source[this.index])) this.index++;
      return '';
    }
    this.index += 2;
    return kind;
  }

  /** `quoteAt` points at the first `#` or the opening quote after the prefix. */
  private readRawString(start: number, quoteAt: number, literal: LiteralKind): Token {
    let hashes = 0;
    let i = quoteAt;
    while (this.source[i] === '#') {
      hashes++;
      i++;
    }
    if (this.source[i] !== '"') {
      this.index = start + 1;
      return { kind: 'ident', text: this.source[start], name: this.source[start], raw: false, ...this.span(start) };
    }
    const terminator = '"' + '#'.repeat(hashes);
    const close = this.source.indexOf(terminator, i + 1);
    if (close === -1) this.fail('unterminated raw string literal', start);

    const value = this.source.slice(i + 1, close);
    this.index = close + terminator.length;
    this.skipSuffix();
    return { kind: 'literal', literal, value, text: this.source.slice(start, this.index), ...this.span(start) };
  }

  private readCharOrLifetime(start: number): Token {
    if (this.source[start + 1] === '\\') {
      this.index = start;
      return this.readQuoted(start, "'", 'char');
    }

    const ch = this.charAt(start + 1);
    if (ch !== '' && this.source[start + 1 + ch.length] === "'") {
      this.index = start + 2 + ch.length;
      return { kind: 'literal', literal: 'char', value: ch, text: this.source.slice(start, this.index), ...this.span(start) };
    }
    if (IDENT_START.test(ch)) {
      this.index = start + 1;
      this.consumeIdentifier();
      return { kind: 'lifetime', text: this.source.slice(start, this.index), ...this.span(start) };
    }
    return this.fail('unterminated character literal', start);
  }

  private skipSuffix(): void {
    if (this.index < this.source.length && IDENT_START.test(this.charAt(this.index))) {
      this.consumeIdentifier();
    }
  }
}

export function tokenize(source: string, filePath: string): Token[] {
  return new Scanner(source, filePath).tokenize();
}
