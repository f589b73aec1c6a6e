/**
 * Character stream capabilities used by the reader and writer, plus
 * string- and file-backed implementations.
 */

import { readFileSync } from 'node:fs';

export interface NamedStream {
  /** Name used in diagnostics, e.g. a file path or "<stdin>". */
  readonly name: string;
}

export interface LineOriented {
  /** 1-based number of the line the next character comes from. */
  readonly lineNumber: number;
}

export interface PutbackStream {
  /** Next character (a whole code point), or undefined at end of input. */
  get(): string | undefined;
  /** Return the last character read. At most one character may be pending. */
  putback(c: string): void;
}

export interface TextSink {
  write(text: string): void;
}

/** Everything the reader needs from its input. */
export type CharStream = NamedStream & LineOriented & PutbackStream;

export class StringStream implements CharStream {
  private offset = 0;
  private line = 1;
  private pending: string | undefined;

  constructor(
    private readonly text: string,
    readonly name: string = '<string>'
  ) {}

  get lineNumber(): number {
    return this.line;
  }

  get(): string | undefined {
    let c = this.pending;
    if (c !== undefined) {
      this.pending = undefined;
    } else {
      const cp = this.text.codePointAt(this.offset);
      if (cp === undefined) return undefined;
      c = String.fromCodePoint(cp);
      this.offset += c.length;
    }
    if (c === '\n') this.line++;
    return c;
  }

  putback(c: string): void {
    if (this.pending !== undefined) {
      throw new Error(`${this.name}: putback buffer is full`);
    }
    this.pending = c;
    if (c === '\n') this.line--;
  }
}

/** Read a whole UTF-8 file into a stream named after its path. */
export function openFileStream(path: string): StringStream {
  return new StringStream(readFileSync(path, 'utf8'), path);
}

export class StringSink implements TextSink {
  private readonly parts: string[] = [];

  write(text: string): void {
    this.parts.push(text);
  }

  toString(): string {
    return this.parts.join('');
  }
}
