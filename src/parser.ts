/**
 * Recursive-descent JSON parser. Builds values from lexer tokens, applying
 * the repeated-member policy and the trailing-comma extension.
 */

import { JsonParseError, type JsonContext, type JsonErrorDesc } from './errors.js';
import { Lexer, TokenKind, tokenText, type Token } from './lexer.js';
import type { ReaderParams } from './options.js';
import { setMember, valueKind, type JsonArray, type JsonObject, type JsonValue } from './value.js';

export type MemberCallback = (name: string, value: JsonValue) => void;
export type ElementCallback = (value: JsonValue) => void;

export class Parser {
  constructor(
    private readonly lexer: Lexer,
    private readonly params: ReaderParams
  ) {}

  nextToken(): Token {
    return this.lexer.next();
  }

  /** A single value that must be followed by end of input. */
  parseDocument(): JsonValue {
    const value = this.parseValue(this.nextToken());
    const rest = this.nextToken();
    if (rest.kind !== TokenKind.Eof) this.unexpected(rest, 'expected end of input');
    return value;
  }

  /** Parse the value that starts with `token`. */
  parseValue(token: Token, depth = 0): JsonValue {
    if (depth > this.params.maxDepth) {
      this.fail(token.context, {
        kind: 'other',
        message: `maximum nesting depth exceeded (${this.params.maxDepth})`,
      });
    }

    switch (token.kind) {
      case TokenKind.LBrace: {
        const obj: JsonObject = {};
        this.parseMembers((name, value) => setMember(obj, name, value), depth);
        return obj;
      }
      case TokenKind.LBracket: {
        const arr: JsonArray = [];
        this.parseElements((value) => arr.push(value), depth);
        return arr;
      }
      case TokenKind.String:
        return token.value;
      case TokenKind.Number:
        return token.value;
      case TokenKind.True:
        return true;
      case TokenKind.False:
        return false;
      case TokenKind.Null:
        return null;
      case TokenKind.Eof:
        this.fail(token.context, { kind: 'unexpected_eof', message: 'expected value' });
      default:
        this.fail(token.context, {
          kind: 'unexpected_value',
          valueKind: `'${tokenText(token)}'`,
          message: 'expected value',
        });
    }
  }

  /**
   * Parse object members after the opening `{` up to and including the
   * closing `}`. `onMember` runs as soon as each member value is complete,
   * before the following delimiter is read; repeated names it should not
   * see (keep-first) are parsed and dropped.
   */
  parseMembers(onMember: MemberCallback, depth = 0): void {
    const seen = new Set<string>();
    let token = this.nextToken();
    if (token.kind === TokenKind.RBrace) return;
    for (;;) {
      if (token.kind !== TokenKind.String) this.unexpected(token, 'expected member name');
      const name = token.value;
      const repeated = seen.has(name);
      if (repeated && this.params.repeatedMembers === 'reject') {
        this.fail(token.context, { kind: 'duplicate_object_member', name });
      }
      seen.add(name);

      const colon = this.nextToken();
      if (colon.kind !== TokenKind.Colon) this.unexpected(colon, "expected ':'");
      const value = this.parseValue(this.nextToken(), depth + 1);
      if (!repeated || this.params.repeatedMembers === 'keep-last') onMember(name, value);

      token = this.nextToken();
      if (token.kind === TokenKind.RBrace) return;
      if (token.kind !== TokenKind.Comma) this.unexpected(token, "expected ',' or '}'");
      token = this.nextToken();
      if (token.kind === TokenKind.RBrace && this.params.allowTrailingCommas) return;
    }
  }

  /** As parseMembers, for array elements after the opening `[`. */
  parseElements(onElement: ElementCallback, depth = 0): void {
    let token = this.nextToken();
    if (token.kind === TokenKind.RBracket) return;
    for (;;) {
      onElement(this.parseValue(token, depth + 1));

      token = this.nextToken();
      if (token.kind === TokenKind.RBracket) return;
      if (token.kind !== TokenKind.Comma) this.unexpected(token, "expected ',' or ']'");
      token = this.nextToken();
      if (token.kind === TokenKind.RBracket) {
        if (this.params.allowTrailingCommas) return;
        this.unexpected(token, 'expected value');
      }
    }
  }

  /** Error for a complete value of the wrong shape, located at its first token. */
  shapeError(value: JsonValue, start: Token, message: string): JsonParseError {
    return new JsonParseError(start.context, {
      kind: 'unexpected_value',
      valueKind: valueKind(value),
      message,
    });
  }

  private unexpected(token: Token, expected: string): never {
    if (token.kind === TokenKind.Eof) {
      this.fail(token.context, { kind: 'unexpected_eof', message: expected });
    }
    this.fail(token.context, { kind: 'syntax_error', where: tokenText(token), message: expected });
  }

  private fail(context: JsonContext, desc: JsonErrorDesc): never {
    throw new JsonParseError(context, desc);
  }
}
