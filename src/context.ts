/**
 * Running column counter for a reader. The line number belongs to the
 * stream; the column is tracked here as characters are read and put back.
 */

import { JsonStreamError, type JsonContext } from './errors.js';
import type { CharStream } from './stream.js';

export class PositionTracker {
  private column = 0;
  /** Column before the last get, restored by putback. */
  private previousColumn = 0;

  constructor(private readonly stream: CharStream) {}

  get(): string | undefined {
    let c: string | undefined;
    try {
      c = this.stream.get();
    } catch (err) {
      throw new JsonStreamError(this.stream.name, err);
    }
    if (c === undefined) return undefined;
    this.previousColumn = this.column;
    this.column = c === '\n' ? 0 : this.column + 1;
    return c;
  }

  putback(c: string): void {
    try {
      this.stream.putback(c);
    } catch (err) {
      throw new JsonStreamError(this.stream.name, err);
    }
    this.column = this.previousColumn;
  }

  context(): JsonContext {
    return {
      streamName: this.stream.name,
      line: this.stream.lineNumber,
      column: this.column,
    };
  }
}
