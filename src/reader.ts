/**
 * JSON reader: reads values from a character stream. Each call continues
 * where the previous one stopped, so one stream may hold a sequence of
 * JSON texts.
 */

import { PositionTracker } from './context.js';
import { isJsonReadError, type FoldResult, type ReadResult } from './errors.js';
import { foldArray, foldObject, type ArrayVisitor, type ObjectVisitor } from './fold.js';
import { Lexer, TokenKind, type Token } from './lexer.js';
import { resolveReaderOptions, type ReaderOptions, type ReaderParams } from './options.js';
import { Parser } from './parser.js';
import { StringStream, type CharStream } from './stream.js';
import { isArray, isObject, type JsonArray, type JsonObject, type JsonValue } from './value.js';

export class JsonReader {
  readonly params: ReaderParams;
  private readonly parser: Parser;

  /** Throws JsonConfigError when `options` is invalid. */
  constructor(
    readonly stream: CharStream,
    options: ReaderOptions = {}
  ) {
    this.params = resolveReaderOptions(options);
    const lexer = new Lexer(new PositionTracker(stream), this.params.allowComments);
    this.parser = new Parser(lexer, this.params);
  }

  getValue(): ReadResult<JsonValue> {
    return this.read((value) => value);
  }

  /** The value is consumed even when it turns out not to be an object. */
  getObject(): ReadResult<JsonObject> {
    return this.read((value, start) => {
      if (isObject(value)) return value;
      throw this.parser.shapeError(value, start, 'value must be an object');
    });
  }

  getArray(): ReadResult<JsonArray> {
    return this.read((value, start) => {
      if (isArray(value)) return value;
      throw this.parser.shapeError(value, start, 'value must be an array');
    });
  }

  /** Visit each member of the next object as soon as its value is read. */
  objectFold<A>(visitor: ObjectVisitor<A>, initial: A): FoldResult<A> {
    return foldObject(this.parser, visitor, initial);
  }

  /** Visit each element of the next array as soon as it is read. */
  arrayFold<A>(visitor: ArrayVisitor<A>, initial: A): FoldResult<A> {
    return foldArray(this.parser, visitor, initial);
  }

  /** Every remaining value in the stream; a read error is thrown. */
  *values(): Generator<JsonValue, void, undefined> {
    for (;;) {
      const result = this.getValue();
      if (result.status === 'eof') return;
      if (result.status === 'error') throw result.error;
      yield result.value;
    }
  }

  private read<T>(check: (value: JsonValue, start: Token) => T): ReadResult<T> {
    try {
      const start = this.parser.nextToken();
      if (start.kind === TokenKind.Eof) return { status: 'eof' };
      return { status: 'ok', value: check(this.parser.parseValue(start), start) };
    } catch (err) {
      if (isJsonReadError(err)) return { status: 'error', error: err };
      throw err;
    }
  }
}

/**
 * Parse a complete JSON text. Throws JsonParseError on malformed input,
 * including anything but whitespace (or comments, when enabled) after the value.
 */
export function parse(text: string, options: ReaderOptions = {}, streamName = '<string>'): JsonValue {
  const params = resolveReaderOptions(options);
  const lexer = new Lexer(new PositionTracker(new StringStream(text, streamName)), params.allowComments);
  return new Parser(lexer, params).parseDocument();
}
