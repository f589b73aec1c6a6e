/**
 * Reader, pointer, codec and writer errors. Parse errors carry the stream
 * context (name, line, column) where they were detected.
 */

/** Location of a token or value in a named character stream. */
export interface JsonContext {
  readonly streamName: string;
  /** 1-based line number, as reported by the stream. */
  readonly line: number;
  /** Characters consumed on the current line when the context was taken. */
  readonly column: number;
}

export type JsonErrorDesc =
  | { readonly kind: 'unexpected_eof'; readonly message?: string }
  | { readonly kind: 'syntax_error'; readonly where: string; readonly message?: string }
  | { readonly kind: 'invalid_character_escape'; readonly char: string }
  | { readonly kind: 'unexpected_value'; readonly valueKind: string; readonly message?: string }
  | { readonly kind: 'duplicate_object_member'; readonly name: string }
  | { readonly kind: 'unterminated_multiline_comment' }
  | { readonly kind: 'invalid_unicode_character'; readonly hex: string }
  | { readonly kind: 'unpaired_utf16_surrogate' }
  | { readonly kind: 'other'; readonly message: string };

export type JsonErrorKind = JsonErrorDesc['kind'];

/** Message text for an error description, without the location prefix. */
export function describeError(desc: JsonErrorDesc): string {
  switch (desc.kind) {
    case 'unexpected_eof':
      return withDetail('unexpected end-of-file', desc.message);
    case 'syntax_error':
      return withDetail(`syntax error at '${desc.where}'`, desc.message);
    case 'invalid_character_escape':
      return `invalid character escape: '\\${desc.char}'`;
    case 'unexpected_value':
      return withDetail(`unexpected ${desc.valueKind} value`, desc.message);
    case 'duplicate_object_member':
      return `object member "${desc.name}" is not unique`;
    case 'unterminated_multiline_comment':
      return 'unterminated multiline comment';
    case 'invalid_unicode_character':
      return `invalid Unicode character: \\u${desc.hex}`;
    case 'unpaired_utf16_surrogate':
      return 'unpaired UTF-16 surrogate';
    case 'other':
      return desc.message;
  }
}

function withDetail(head: string, detail: string | undefined): string {
  return detail === undefined ? head : `${head}: ${detail}`;
}

type ConstructorOptions = { cause?: unknown };

export class JsonError extends Error {
  override readonly name: string = 'JsonError';

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, JsonError.prototype);
  }
}

/** Lexical or structural error found while reading a stream. */
export class JsonParseError extends JsonError {
  override readonly name = 'JsonParseError';
  readonly context: JsonContext;
  readonly desc: JsonErrorDesc;

  constructor(context: JsonContext, desc: JsonErrorDesc) {
    super(describeError(desc));
    this.context = context;
    this.desc = desc;
    Object.setPrototypeOf(this, JsonParseError.prototype);
  }

  get kind(): JsonErrorKind {
    return this.desc.kind;
  }

  /** Human-readable location string */
  get location(): string {
    const { streamName, line, column } = this.context;
    return `${streamName}:${line}:${column}`;
  }

  override toString(): string {
    return `${this.location}: error: ${this.message}`;
  }
}

/** Failure of the underlying character stream; the original error is the cause. */
export class JsonStreamError extends JsonError {
  override readonly name = 'JsonStreamError';
  readonly streamName: string;

  constructor(streamName: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.streamName = streamName;
    Object.setPrototypeOf(this, JsonStreamError.prototype);
  }
}

export type JsonReadError = JsonParseError | JsonStreamError;

export function isJsonReadError(err: unknown): err is JsonReadError {
  return err instanceof JsonParseError || err instanceof JsonStreamError;
}

/** A JSON Pointer did not identify a value. There is deliberately one kind. */
export class JsonPointerError extends JsonError {
  override readonly name = 'JsonPointerError';
  readonly kind = 'cannot_resolve';
  readonly pointer: string;

  constructor(pointer: string, message: string) {
    super(message);
    this.pointer = pointer;
    Object.setPrototypeOf(this, JsonPointerError.prototype);
  }
}

/** Raised by the det* and lookup* operations when their precondition does not hold. */
export class JsonFatalError extends JsonError {
  override readonly name = 'JsonFatalError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, JsonFatalError.prototype);
  }
}

export class JsonConfigError extends JsonError {
  override readonly name = 'JsonConfigError';
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(message);
    this.issues = issues;
    Object.setPrototypeOf(this, JsonConfigError.prototype);
  }
}

export class JsonEncodeError extends JsonError {
  override readonly name = 'JsonEncodeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, JsonEncodeError.prototype);
  }
}

/** A value that does not fit a codec's mapping; `path` is a JSON Pointer to it. */
export class JsonCodecError extends JsonError {
  override readonly name = 'JsonCodecError';
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(path === '' ? reason : `${path}: ${reason}`);
    this.path = path;
    this.reason = reason;
    Object.setPrototypeOf(this, JsonCodecError.prototype);
  }
}

export type ReadResult<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'eof' }
  | { readonly status: 'error'; readonly error: JsonReadError };

export type FoldResult<A> =
  | { readonly status: 'ok'; readonly value: A }
  | { readonly status: 'eof' }
  | { readonly status: 'error'; readonly partial: A; readonly error: JsonReadError };
