/**
 * JSON value to text. Compact output has no whitespace; pretty output puts
 * each member or element on its own line. Object members are written in
 * key order.
 */

import { JsonEncodeError } from './errors.js';
import { StringSink, type TextSink } from './stream.js';
import type { JsonValue } from './value.js';

export type OutputStyle = 'compact' | 'pretty';

export interface WriterOptions {
  /** Default 'compact'. */
  style?: OutputStyle;
  /** Indent for pretty output (default two spaces) */
  indent?: string;
}

export type JsonComment =
  | { kind: 'eol'; text: string }
  | { kind: 'multiline'; text: string };

const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

export function quoteString(s: string): string {
  const escaped = s.replace(/["\\\u0000-\u001f]/g, (c) => {
    return ESCAPES[c] ?? `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`;
  });
  return `"${escaped}"`;
}

function writeNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new JsonEncodeError(`Cannot write non-finite number ${n}`);
  }
  // String() gives the shortest text that reads back as the same double.
  return Object.is(n, -0) ? '-0' : String(n);
}

function sortedKeys(obj: Record<string, JsonValue>): string[] {
  return Object.keys(obj).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function writeCompact(sink: TextSink, value: JsonValue): void {
  if (value === null) return sink.write('null');
  if (value === true) return sink.write('true');
  if (value === false) return sink.write('false');
  if (typeof value === 'number') return sink.write(writeNumber(value));
  if (typeof value === 'string') return sink.write(quoteString(value));
  if (Array.isArray(value)) {
    sink.write('[');
    for (let i = 0; i < value.length; i++) {
      if (i > 0) sink.write(',');
      writeCompact(sink, value[i] ?? null);
    }
    sink.write(']');
    return;
  }
  sink.write('{');
  let first = true;
  for (const k of sortedKeys(value)) {
    if (!first) sink.write(',');
    first = false;
    sink.write(quoteString(k));
    sink.write(':');
    writeCompact(sink, value[k] ?? null);
  }
  sink.write('}');
}

function writePretty(sink: TextSink, value: JsonValue, indent: string, level: number): void {
  if (value === null || typeof value !== 'object') {
    writeCompact(sink, value);
    return;
  }
  const inner = indent.repeat(level + 1);
  const closing = indent.repeat(level);
  if (Array.isArray(value)) {
    if (value.length === 0) return sink.write('[]');
    sink.write('[\n');
    for (let i = 0; i < value.length; i++) {
      if (i > 0) sink.write(',\n');
      sink.write(inner);
      writePretty(sink, value[i] ?? null, indent, level + 1);
    }
    sink.write(`\n${closing}]`);
    return;
  }
  const keys = sortedKeys(value);
  if (keys.length === 0) return sink.write('{}');
  sink.write('{\n');
  for (let i = 0; i < keys.length; i++) {
    const k = keys[i] ?? '';
    if (i > 0) sink.write(',\n');
    sink.write(`${inner}${quoteString(k)}: `);
    writePretty(sink, value[k] ?? null, indent, level + 1);
  }
  sink.write(`\n${closing}}`);
}

/** Write a value to `sink`. Throws JsonEncodeError for non-finite numbers. */
export function writeJson(sink: TextSink, value: JsonValue, options: WriterOptions = {}): void {
  if (options.style === 'pretty') {
    writePretty(sink, value, options.indent ?? '  ', 0);
  } else {
    writeCompact(sink, value);
  }
}

export function stringify(value: JsonValue, options: WriterOptions = {}): string {
  const sink = new StringSink();
  writeJson(sink, value, options);
  return sink.toString();
}

/** Comments are only readable back with the comment extension enabled. */
export function writeComment(sink: TextSink, comment: JsonComment): void {
  if (comment.kind === 'eol') {
    if (/[\r\n]/.test(comment.text)) {
      throw new JsonEncodeError('End-of-line comment cannot contain a line break');
    }
    sink.write(`//${comment.text}\n`);
    return;
  }
  if (comment.text.includes('*/')) {
    throw new JsonEncodeError("Multiline comment cannot contain '*/'");
  }
  sink.write(`/*${comment.text}*/`);
}
