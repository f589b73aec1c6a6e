/**
 * Folding over the members of an object or the elements of an array as they
 * are read, without building the container itself. Nested values are still
 * fully materialized before being handed to the visitor.
 */

import { isJsonReadError, type FoldResult } from './errors.js';
import { TokenKind } from './lexer.js';
import type { Parser } from './parser.js';
import type { JsonValue } from './value.js';

export type ObjectVisitor<A> = (name: string, value: JsonValue, acc: A) => A;
export type ArrayVisitor<A> = (value: JsonValue, acc: A) => A;

/**
 * On a read error the result carries the accumulator as of the last visitor
 * call that completed. Errors thrown by the visitor are not read errors and
 * propagate unchanged, even when they are JsonParseErrors of their own.
 */
export function foldObject<A>(parser: Parser, visitor: ObjectVisitor<A>, initial: A): FoldResult<A> {
  let acc = initial;
  let visitorFailed = false;
  try {
    const open = parser.nextToken();
    if (open.kind === TokenKind.Eof) return { status: 'eof' };
    if (open.kind !== TokenKind.LBrace) {
      const value = parser.parseValue(open);
      throw parser.shapeError(value, open, 'value must be an object');
    }
    parser.parseMembers((name, value) => {
      try {
        acc = visitor(name, value, acc);
      } catch (err) {
        visitorFailed = true;
        throw err;
      }
    });
    return { status: 'ok', value: acc };
  } catch (err) {
    if (!visitorFailed && isJsonReadError(err)) {
      return { status: 'error', partial: acc, error: err };
    }
    throw err;
  }
}

export function foldArray<A>(parser: Parser, visitor: ArrayVisitor<A>, initial: A): FoldResult<A> {
  let acc = initial;
  let visitorFailed = false;
  try {
    const open = parser.nextToken();
    if (open.kind === TokenKind.Eof) return { status: 'eof' };
    if (open.kind !== TokenKind.LBracket) {
      const value = parser.parseValue(open);
      throw parser.shapeError(value, open, 'value must be an array');
    }
    parser.parseElements((value) => {
      try {
        acc = visitor(value, acc);
      } catch (err) {
        visitorFailed = true;
        throw err;
      }
    });
    return { status: 'ok', value: acc };
  } catch (err) {
    if (!visitorFailed && isJsonReadError(err)) {
      return { status: 'error', partial: acc, error: err };
    }
    throw err;
  }
}
