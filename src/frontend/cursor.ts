import type { Position } from './position.js';

/** Returned by every lookahead past the end of the input. */
export const END_OF_FILE = '\0';

/**
 * Character-level scanner over an immutable source string.
 *
 * Lookahead (`first`, `second`, `nthChar`) never consumes; `peek` consumes exactly one character
 * and keeps the line/column bookkeeping current.
 */
export class Cursor {
  private readonly source: string;
  private index = 0;
  private line = 1;
  private column = 0;
  private prev: string = END_OF_FILE;

  constructor(source: string) {
    this.source = source;
  }

  first(): string {
    return this.nthChar(0);
  }

  second(): string {
    return this.nthChar(1);
  }

  nthChar(k: number): string {
    return this.source[this.index + k] ?? END_OF_FILE;
  }

  isEof(): boolean {
    return this.index >= this.source.length;
  }

  /** Number of characters consumed so far (the current offset). */
  eaten(): number {
    return this.index;
  }

  getPos(): Position {
    return { line: this.line, column: this.column, offset: this.index };
  }

  /** Last consumed character, or the EOF sentinel before anything was consumed. */
  getPrev(): string {
    return this.prev;
  }

  /** Consume one character. At the end of input nothing moves and `END_OF_FILE` is returned. */
  peek(): string {
    const ch = this.source[this.index];
    if (ch === undefined) return END_OF_FILE;
    this.index += 1;
    if (ch === '\n') {
      this.line += 1;
      this.column = 0;
    } else {
      this.column += 1;
    }
    this.prev = ch;
    return ch;
  }

  peekInc(n: number): string {
    let out = '';
    for (let i = 0; i < n; i++) {
      if (this.isEof()) break;
      out += this.peek();
    }
    return out;
  }

  eatWhile(predicate: (ch: string) => boolean): string {
    const start = this.index;
    while (!this.isEof() && predicate(this.first())) {
      this.peek();
    }
    return this.source.slice(start, this.index);
  }

  /**
   * Like {@link eatWhile}, but the predicate receives the cursor and may consume extra characters.
   * The returned segment is everything consumed, including what the predicate took.
   */
  eatWhileCursor(predicate: (cursor: Cursor) => boolean): string {
    const start = this.index;
    while (!this.isEof() && predicate(this)) {
      this.peek();
    }
    return this.source.slice(start, this.index);
  }

  slice(start: number, end: number): string {
    return this.source.slice(start, end);
  }
}
