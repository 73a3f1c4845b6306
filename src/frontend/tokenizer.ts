import { Cursor } from './cursor.js';
import { makeRegion } from './position.js';
import type { Region, TextRange } from './position.js';
import {
  isKeyword,
  MAX_KEYWORD_LENGTH,
  OPERATOR_CHARS,
  PUNCTUATION,
  STRING_DELIMITERS,
  WORD_OPERATORS,
} from './token.js';
import type { Token, TokenKind } from './token.js';

export type LexErrorKind = 'UnknownChar' | 'UnterminatedString' | 'UnterminatedComment';

export interface LexError {
  kind: LexErrorKind;
  message: string;
  range: TextRange;
  region: Region;
}

export interface LexResult {
  tokens: Token[];
  errors: LexError[];
}

type Lexeme = { kind: TokenKind; value?: string };

/**
 * One lexical rule. A rule either consumes a whole lexeme and describes it, or consumes nothing
 * and returns `undefined`.
 */
type LexRule = (cursor: Cursor, report: (kind: LexErrorKind, message: string) => void) => Lexeme | undefined;

const WHITESPACE_RE = /\s/u;

function isWhitespace(ch: string): boolean {
  return ch !== '' && WHITESPACE_RE.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isIdentChar(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

/** Identifier-char run at the cursor without consuming it. */
function lookWord(cursor: Cursor, limit: number): string {
  let word = '';
  for (let i = 0; i <= limit; i++) {
    const ch = cursor.nthChar(i);
    if (!isIdentChar(ch)) break;
    word += ch;
  }
  return word;
}

function matchesWord(cursor: Cursor, word: string): boolean {
  for (let i = 0; i < word.length; i++) {
    if (cursor.nthChar(i) !== word[i]) return false;
  }
  return !isIdentChar(cursor.nthChar(word.length));
}

const lexWhitespace: LexRule = (cursor) => {
  if (!isWhitespace(cursor.first())) return undefined;
  return { kind: 'Whitespace', value: cursor.eatWhile(isWhitespace) };
};

const lexComment: LexRule = (cursor, report) => {
  if (cursor.first() !== '/') return undefined;
  const start = cursor.eaten();
  if (cursor.second() === '/') {
    cursor.eatWhile((ch) => ch !== '\n');
    return { kind: 'Comment', value: cursor.slice(start, cursor.eaten()) };
  }
  if (cursor.second() !== '*') return undefined;

  cursor.peekInc(2);
  let depth = 1;
  cursor.eatWhileCursor((c) => {
    if (c.first() === '/' && c.second() === '*') {
      c.peek();
      depth += 1;
      return true;
    }
    if (c.first() === '*' && c.second() === '/') {
      depth -= 1;
      if (depth === 0) {
        c.peekInc(2);
        return false;
      }
      c.peek();
    }
    return true;
  });
  if (depth > 0) report('UnterminatedComment', 'Block comment is never closed.');
  return { kind: 'Comment', value: cursor.slice(start, cursor.eaten()) };
};

const lexOperator: LexRule = (cursor) => {
  const ch = cursor.first();
  if (ch !== '\0' && OPERATOR_CHARS.includes(ch)) {
    cursor.peek();
    return { kind: 'Operator', value: ch };
  }
  for (const word of WORD_OPERATORS) {
    if (matchesWord(cursor, word)) {
      cursor.peekInc(word.length);
      return { kind: 'Operator', value: word };
    }
  }
  return undefined;
};

const lexKeyword: LexRule = (cursor) => {
  const word = lookWord(cursor, MAX_KEYWORD_LENGTH);
  if (word.length > MAX_KEYWORD_LENGTH || !isKeyword(word)) return undefined;
  if (!isWhitespace(cursor.nthChar(word.length))) return undefined;
  cursor.peekInc(word.length);
  return { kind: 'Keyword', value: word };
};

const lexBoolean: LexRule = (cursor) => {
  for (const word of ['true', 'false']) {
    if (matchesWord(cursor, word)) {
      cursor.peekInc(word.length);
      return { kind: 'Boolean', value: word };
    }
  }
  return undefined;
};

const lexIdentifier: LexRule = (cursor) => {
  if (!isIdentStart(cursor.first())) return undefined;
  return { kind: 'Identifier', value: cursor.eatWhile(isIdentChar) };
};

// A `.` belongs to the number only when a digit follows it and the number has no `.` yet, so
// `1..5` lexes as a range and `3.foo` as a member access.
const lexNumber: LexRule = (cursor) => {
  if (!isDigit(cursor.first())) return undefined;
  let value = cursor.eatWhile(isDigit);
  if (cursor.first() === '.' && isDigit(cursor.second())) {
    value += cursor.peekInc(1);
    value += cursor.eatWhile(isDigit);
  }
  return { kind: 'Number', value };
};

const lexString: LexRule = (cursor, report) => {
  const delimiter = cursor.first();
  if (delimiter === '\0' || !STRING_DELIMITERS.includes(delimiter)) return undefined;
  cursor.peek();
  const value = cursor.eatWhile((ch) => ch !== delimiter);
  if (cursor.isEof()) {
    report('UnterminatedString', `String literal is missing its closing ${delimiter}.`);
  } else {
    cursor.peek();
  }
  return { kind: 'String', value };
};

const lexValueReserved: LexRule = (cursor) => {
  const ch = cursor.first();
  if (ch === ':') {
    if (cursor.second() === ':') {
      cursor.peekInc(2);
      return { kind: 'Accessor', value: '::' };
    }
    cursor.peek();
    return { kind: 'Colon' };
  }
  if (ch === '.') {
    if (cursor.second() === '.') {
      cursor.peekInc(2);
      return { kind: 'Range' };
    }
    cursor.peek();
    return { kind: 'Accessor', value: '.' };
  }
  return undefined;
};

const lexPunctuation: LexRule = (cursor) => {
  const kind = PUNCTUATION[cursor.first()];
  if (kind === undefined) return undefined;
  cursor.peek();
  return { kind };
};

const RULES: readonly LexRule[] = [
  lexWhitespace,
  lexComment,
  lexOperator,
  lexKeyword,
  lexBoolean,
  lexIdentifier,
  lexNumber,
  lexString,
  lexValueReserved,
  lexPunctuation,
];

function skipUnknown(cursor: Cursor): string {
  const ch = cursor.first();
  cursor.peek();
  const code = ch.charCodeAt(0);
  if (code >= 0xd800 && code <= 0xdbff) {
    const low = cursor.first().charCodeAt(0);
    if (low >= 0xdc00 && low <= 0xdfff) {
      cursor.peek();
      return ch + String.fromCharCode(low);
    }
  }
  return ch;
}

/**
 * Split `source` into tokens, collecting lexical errors instead of dropping bad input silently.
 *
 * Whitespace and comments are kept as tokens; unknown characters are consumed and reported.
 */
export function lex(source: string): LexResult {
  const cursor = new Cursor(source);
  const tokens: Token[] = [];
  const errors: LexError[] = [];

  while (!cursor.isEof()) {
    const startPos = cursor.getPos();
    const pending: Array<{ kind: LexErrorKind; message: string }> = [];
    const report = (kind: LexErrorKind, message: string) => pending.push({ kind, message });

    let lexeme: Lexeme | undefined;
    for (const rule of RULES) {
      lexeme = rule(cursor, report);
      if (lexeme) break;
    }

    const endPos = cursor.getPos();
    const range = { start: startPos.offset, end: endPos.offset };
    const region = makeRegion(startPos, endPos);

    if (!lexeme) {
      const ch = skipUnknown(cursor);
      const end = cursor.getPos();
      errors.push({
        kind: 'UnknownChar',
        message: `Unknown character ${JSON.stringify(ch)}.`,
        range: { start: startPos.offset, end: end.offset },
        region: makeRegion(startPos, end),
      });
      continue;
    }

    for (const p of pending) errors.push({ ...p, range, region });
    tokens.push({
      kind: lexeme.kind,
      range,
      region,
      ...(lexeme.value !== undefined ? { value: lexeme.value } : {}),
    });
  }

  return { tokens, errors };
}

/**
 * Tokens only; lexical errors are discarded. Use {@link lex} to see them.
 */
export function tokenize(source: string): Token[] {
  return lex(source).tokens;
}
