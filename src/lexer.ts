/**
 * JSON lexer. Pulls characters from a tracked stream and produces one token
 * per call, consuming exactly the characters of that token.
 */

import type { PositionTracker } from './context.js';
import { JsonParseError, type JsonContext, type JsonErrorDesc } from './errors.js';

export const enum TokenKind {
  LBrace = '{',
  RBrace = '}',
  LBracket = '[',
  RBracket = ']',
  Colon = ':',
  Comma = ',',
  String = 'string',
  Number = 'number',
  True = 'true',
  False = 'false',
  Null = 'null',
  Eof = 'end-of-file',
}

type SimpleTokenKind = Exclude<TokenKind, TokenKind.String | TokenKind.Number>;

export type Token =
  | { readonly kind: TokenKind.String; readonly value: string; readonly context: JsonContext }
  | {
      readonly kind: TokenKind.Number;
      readonly value: number;
      /** Literal as written, for diagnostics. */
      readonly text: string;
      readonly context: JsonContext;
    }
  | { readonly kind: SimpleTokenKind; readonly context: JsonContext };

/** Token as it would appear in the source, for syntax error messages. */
export function tokenText(token: Token): string {
  switch (token.kind) {
    case TokenKind.String:
      return JSON.stringify(token.value);
    case TokenKind.Number:
      return token.text;
    default:
      return token.kind;
  }
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isHexDigit(c: string): boolean {
  return /^[0-9a-fA-F]$/.test(c);
}

function isWordStart(c: string): boolean {
  return /^[A-Za-z_]$/.test(c);
}

function isWordChar(c: string): boolean {
  return /^[A-Za-z0-9_]$/.test(c);
}

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

function hex4(unit: number): string {
  return unit.toString(16).toUpperCase().padStart(4, '0');
}

export class Lexer {
  constructor(
    private readonly input: PositionTracker,
    private readonly allowComments: boolean
  ) {}

  next(): Token {
    const c = this.skipWhitespaceAndComments();
    const context = this.input.context();
    if (c === undefined) return { kind: TokenKind.Eof, context };
    switch (c) {
      case '{':
        return { kind: TokenKind.LBrace, context };
      case '}':
        return { kind: TokenKind.RBrace, context };
      case '[':
        return { kind: TokenKind.LBracket, context };
      case ']':
        return { kind: TokenKind.RBracket, context };
      case ':':
        return { kind: TokenKind.Colon, context };
      case ',':
        return { kind: TokenKind.Comma, context };
      case '"':
        return { kind: TokenKind.String, value: this.readString(), context };
    }
    if (c === '-' || isDigit(c)) return this.readNumber(c, context);
    if (isWordStart(c)) return this.readWord(c, context);
    this.fail({ kind: 'syntax_error', where: c }, context);
  }

  private fail(desc: JsonErrorDesc, context: JsonContext = this.input.context()): never {
    throw new JsonParseError(context, desc);
  }

  /** Returns the first significant character, already consumed. */
  private skipWhitespaceAndComments(): string | undefined {
    for (;;) {
      const c = this.input.get();
      if (c === undefined) return undefined;
      if (c === ' ' || c === '\t' || c === '\r' || c === '\n') continue;
      if (c !== '/') return c;

      const start = this.input.context();
      if (!this.allowComments) this.fail({ kind: 'syntax_error', where: '/' }, start);
      const next = this.input.get();
      if (next === '/') {
        this.skipLineComment();
      } else if (next === '*') {
        this.skipBlockComment(start);
      } else {
        this.fail({ kind: 'syntax_error', where: '/' }, start);
      }
    }
  }

  private skipLineComment(): void {
    for (;;) {
      const c = this.input.get();
      if (c === undefined || c === '\n') return;
    }
  }

  private skipBlockComment(start: JsonContext): void {
    let prev = '';
    for (;;) {
      const c = this.input.get();
      if (c === undefined) this.fail({ kind: 'unterminated_multiline_comment' }, start);
      if (prev === '*' && c === '/') return;
      prev = c;
    }
  }

  /** Next character inside a string literal; end of input there is an error. */
  private stringChar(): string {
    const c = this.input.get();
    if (c === undefined) this.fail({ kind: 'unexpected_eof', message: 'unterminated string' });
    return c;
  }

  private readString(): string {
    const buf: string[] = [];
    for (;;) {
      const c = this.stringChar();
      if (c === '"') return buf.join('');
      if (c === '\\') {
        buf.push(this.readEscape());
      } else if (c < ' ') {
        this.fail({
          kind: 'syntax_error',
          where: `\\u${hex4(c.charCodeAt(0))}`,
          message: 'control character in string',
        });
      } else {
        buf.push(c);
      }
    }
  }

  private readEscape(): string {
    const c = this.stringChar();
    switch (c) {
      case '"':
      case '\\':
      case '/':
        return c;
      case 'b':
        return '\b';
      case 'f':
        return '\f';
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      case 'u':
        return this.readUnicodeEscape();
      default:
        this.fail({ kind: 'invalid_character_escape', char: c });
    }
  }

  /** Decode the digits of a `\uXXXX` escape, pairing surrogates. */
  private readUnicodeEscape(): string {
    const hex = this.readHex4();
    const unit = parseInt(hex, 16);
    if (isHighSurrogate(unit)) {
      if (this.stringChar() !== '\\' || this.stringChar() !== 'u') {
        this.fail({ kind: 'unpaired_utf16_surrogate' });
      }
      const low = parseInt(this.readHex4(), 16);
      if (!isLowSurrogate(low)) this.fail({ kind: 'unpaired_utf16_surrogate' });
      return String.fromCodePoint(0x10000 + ((unit - 0xd800) << 10) + (low - 0xdc00));
    }
    if (isLowSurrogate(unit)) this.fail({ kind: 'unpaired_utf16_surrogate' });
    // U+0000 is never accepted in decoded text.
    if (unit === 0) this.fail({ kind: 'invalid_unicode_character', hex });
    return String.fromCharCode(unit);
  }

  private readHex4(): string {
    let hex = '';
    for (let i = 0; i < 4; i++) {
      const h = this.stringChar();
      if (!isHexDigit(h)) {
        this.fail({
          kind: 'syntax_error',
          where: `\\u${hex}${h}`,
          message: 'expected four hexadecimal digits',
        });
      }
      hex += h;
    }
    return hex;
  }

  private readNumber(first: string, context: JsonContext): Token {
    let text = first;
    let c: string | undefined = first;
    if (c === '-') {
      c = this.input.get();
      if (c === undefined || !isDigit(c)) {
        this.fail({ kind: 'syntax_error', where: text, message: 'expected digit' }, context);
      }
      text += c;
    }
    const leadingZero = c === '0';
    c = this.input.get();
    if (leadingZero) {
      if (c !== undefined && isDigit(c)) {
        this.fail(
          { kind: 'syntax_error', where: text + c, message: 'leading zeros are not allowed' },
          context
        );
      }
    } else {
      while (c !== undefined && isDigit(c)) {
        text += c;
        c = this.input.get();
      }
    }
    if (c === '.') {
      text += c;
      c = this.input.get();
      if (c === undefined || !isDigit(c)) {
        this.fail({ kind: 'syntax_error', where: text, message: 'expected digit' }, context);
      }
      while (c !== undefined && isDigit(c)) {
        text += c;
        c = this.input.get();
      }
    }
    if (c === 'e' || c === 'E') {
      text += c;
      c = this.input.get();
      if (c === '+' || c === '-') {
        text += c;
        c = this.input.get();
      }
      if (c === undefined || !isDigit(c)) {
        this.fail({ kind: 'syntax_error', where: text, message: 'expected digit' }, context);
      }
      while (c !== undefined && isDigit(c)) {
        text += c;
        c = this.input.get();
      }
    }
    if (c !== undefined) this.input.putback(c);

    const value = Number(text);
    if (!Number.isFinite(value)) {
      this.fail({ kind: 'syntax_error', where: text, message: 'number out of range' }, context);
    }
    return { kind: TokenKind.Number, value, text, context };
  }

  private readWord(first: string, context: JsonContext): Token {
    let word = first;
    let c = this.input.get();
    while (c !== undefined && isWordChar(c)) {
      word += c;
      c = this.input.get();
    }
    if (c !== undefined) this.input.putback(c);
    switch (word) {
      case 'true':
        return { kind: TokenKind.True, context };
      case 'false':
        return { kind: TokenKind.False, context };
      case 'null':
        return { kind: TokenKind.Null, context };
      default:
        this.fail({ kind: 'syntax_error', where: word }, context);
    }
  }
}
