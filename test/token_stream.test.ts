import { describe, expect, it } from 'vitest';

import { isTrivia } from '../src/frontend/token.js';
import type { Token } from '../src/frontend/token.js';
import { TokenStream } from '../src/frontend/token_stream.js';
import { tokenize } from '../src/frontend/tokenizer.js';

const isIdent = (t: Token) => t.kind === 'Identifier';
const isSemi = (t: Token) => t.kind === 'Semicolon';

describe('token stream', () => {
  it('peeks ahead without consuming', () => {
    const s = new TokenStream(tokenize('a b;'));
    expect(s.first()?.value).toBe('a');
    expect(s.second()?.kind).toBe('Whitespace');
    expect(s.nth(3)?.kind).toBe('Semicolon');
    expect(s.nth(4)).toBeUndefined();
    expect(s.eaten()).toBe(0);
    expect(s.firstIf(isSemi)).toBeUndefined();
    expect(s.nthIf(2, isIdent)?.value).toBe('b');
  });

  it('consumes exactly one token per peek and remembers it', () => {
    const s = new TokenStream(tokenize('a b;'));
    expect(s.prev()).toBeUndefined();
    expect(s.peek()?.value).toBe('a');
    expect(s.prev()?.value).toBe('a');
    expect(s.eaten()).toBe(1);
    expect(s.items()).toHaveLength(3);
  });

  it('leaves the stream untouched when peekIf does not match', () => {
    const s = new TokenStream(tokenize('a b;'));
    s.peek();
    expect(s.peekIf(isIdent)).toBeUndefined();
    expect(s.eaten()).toBe(1);
    expect(s.peekIf(isTrivia)?.kind).toBe('Whitespace');
  });

  it('stops peekUntil at the first matching token without consuming it', () => {
    const s = new TokenStream(tokenize('a b;'));
    expect(s.peekUntil(isSemi)?.kind).toBe('Semicolon');
    expect(s.first()?.kind).toBe('Semicolon');
    expect(s.eaten()).toBe(3);

    const t = new TokenStream(tokenize('  a'));
    expect(t.peekUntil((tok) => !isTrivia(tok))?.value).toBe('a');
    expect(t.first()?.value).toBe('a');
  });

  it('returns nothing from peekUntil when the stream runs out', () => {
    const s = new TokenStream(tokenize('a b'));
    expect(s.peekUntil(isSemi)).toBeUndefined();
    expect(s.isEof()).toBe(true);
  });

  it('finds a token past trivia without consuming', () => {
    const s = new TokenStream(tokenize('a  /* c */ {'));
    s.peek();
    const found = s.findAfter((t) => t.kind === 'LeftBrace', isTrivia);
    expect(found?.distance).toBe(3);
    expect(found?.token.range).toEqual({ start: 11, end: 12 });
    expect(s.eaten()).toBe(1);
    s.peekInc((found?.distance ?? 0) + 1);
    expect(s.isEof()).toBe(true);
  });

  it('stops searching at a token that is neither wanted nor skippable', () => {
    const s = new TokenStream(tokenize('a b;'));
    expect(s.findAfter(isSemi, isTrivia)).toBeUndefined();
    expect(s.findAfterNth(2, isSemi, isIdent)).toEqual({ distance: 3, token: expect.objectContaining({ kind: 'Semicolon' }) });
  });

  it('eats while a predicate holds', () => {
    const s = new TokenStream(tokenize('a b;'));
    expect(s.eatWhile((t) => !isSemi(t))).toHaveLength(3);
    expect(s.first()?.kind).toBe('Semicolon');
  });
});
