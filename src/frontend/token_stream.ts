import type { Token } from './token.js';

export type TokenPredicate = (token: Token) => boolean;

export interface FoundToken {
  /** Tokens between the stream head and the match; `peekInc(distance + 1)` consumes through it. */
  distance: number;
  token: Token;
}

/**
 * Buffered lookahead over a token sequence.
 *
 * `first`, `second` and `nth` never consume. `peek` consumes exactly one token and remembers it
 * as the previous token.
 */
export class TokenStream {
  private readonly tokens: readonly Token[];
  private index = 0;
  private last: Token | undefined;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
  }

  isEof(): boolean {
    return this.index >= this.tokens.length;
  }

  /** Number of tokens consumed so far. */
  eaten(): number {
    return this.index;
  }

  /** The most recently consumed token. */
  prev(): Token | undefined {
    return this.last;
  }

  /** Remaining (unconsumed) tokens. */
  items(): readonly Token[] {
    return this.tokens.slice(this.index);
  }

  first(): Token | undefined {
    return this.nth(0);
  }

  second(): Token | undefined {
    return this.nth(1);
  }

  nth(k: number): Token | undefined {
    return this.tokens[this.index + k];
  }

  firstIf(pred: TokenPredicate): Token | undefined {
    return this.nthIf(0, pred);
  }

  secondIf(pred: TokenPredicate): Token | undefined {
    return this.nthIf(1, pred);
  }

  nthIf(k: number, pred: TokenPredicate): Token | undefined {
    const token = this.nth(k);
    return token !== undefined && pred(token) ? token : undefined;
  }

  peek(): Token | undefined {
    const token = this.tokens[this.index];
    if (token === undefined) return undefined;
    this.index += 1;
    this.last = token;
    return token;
  }

  peekIf(pred: TokenPredicate): Token | undefined {
    return this.firstIf(pred) ? this.peek() : undefined;
  }

  /**
   * Consume tokens while `pred` is false and return the first one for which it holds, left
   * unconsumed. Returns `undefined` when the stream runs out first.
   */
  peekUntil(pred: TokenPredicate): Token | undefined {
    for (let token = this.first(); token !== undefined; token = this.first()) {
      if (pred(token)) return token;
      this.peek();
    }
    return undefined;
  }

  /** Consume `n` tokens and return the last one consumed. */
  peekInc(n: number): Token | undefined {
    let token: Token | undefined;
    for (let i = 0; i < n && !this.isEof(); i++) {
      token = this.peek();
    }
    return token;
  }

  eatWhile(pred: TokenPredicate): Token[] {
    const out: Token[] = [];
    for (let token = this.firstIf(pred); token !== undefined; token = this.firstIf(pred)) {
      this.peek();
      out.push(token);
    }
    return out;
  }

  /**
   * Scan ahead without consuming: skip tokens matching `after`, and return the first token
   * matching `find` with its distance. Any other token ends the search.
   */
  findAfter(find: TokenPredicate, after: TokenPredicate): FoundToken | undefined {
    return this.findAfterNth(0, find, after);
  }

  /** Like {@link findAfter}, starting `n` tokens past the head. */
  findAfterNth(n: number, find: TokenPredicate, after: TokenPredicate): FoundToken | undefined {
    for (let distance = n; ; distance++) {
      const token = this.nth(distance);
      if (token === undefined) return undefined;
      if (find(token)) return { distance, token };
      if (!after(token)) return undefined;
    }
  }
}
