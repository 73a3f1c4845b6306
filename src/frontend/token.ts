import type { Region, TextRange } from './position.js';

/**
 * Lexical classes produced by the tokenizer.
 *
 * `Accessor` covers both `.` and `::` (the spelling is kept in `value`).
 */
export type TokenKind =
  | 'Whitespace'
  | 'Comment'
  | 'Operator'
  | 'Keyword'
  | 'Boolean'
  | 'Identifier'
  | 'Number'
  | 'String'
  | 'Colon'
  | 'Accessor'
  | 'Range'
  | 'LeftBracket'
  | 'RightBracket'
  | 'LeftParen'
  | 'RightParen'
  | 'LeftBrace'
  | 'RightBrace'
  | 'Semicolon'
  | 'Comma'
  | 'Backslash';

export interface Token {
  kind: TokenKind;
  range: TextRange;
  region: Region;
  /**
   * Literal text for value-carrying kinds: identifier and keyword names, operator spelling, number
   * digits, string content without delimiters, comment and whitespace text, accessor spelling.
   */
  value?: string;
}

export const KEYWORDS = [
  'namespace',
  'const',
  'var',
  'class',
  'interface',
  'type',
  'function',
  'if',
  'else',
  'public',
  'private',
  'protected',
  'static',
  'return',
  'break',
  'continue',
  'for',
  'while',
  'do',
  'new',
  'drop',
  'use',
  'import',
  'extends',
  'implements',
  'await',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

/** Longest keyword spelling the tokenizer will try to match. */
export const MAX_KEYWORD_LENGTH = 10;

const keywordSet: ReadonlySet<string> = new Set(KEYWORDS);

export function isKeyword(text: string): text is Keyword {
  return keywordSet.has(text);
}

export const OPERATOR_CHARS = '+-*/%=<>&|^~';

export const WORD_OPERATORS = ['and', 'or'] as const;

export const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  '[': 'LeftBracket',
  ']': 'RightBracket',
  '(': 'LeftParen',
  ')': 'RightParen',
  '{': 'LeftBrace',
  '}': 'RightBrace',
  ';': 'Semicolon',
  ',': 'Comma',
  '\\': 'Backslash',
};

export const STRING_DELIMITERS = `"'\``;

export function isTrivia(token: Token): boolean {
  return token.kind === 'Whitespace' || token.kind === 'Comment';
}

export function isKeywordToken(token: Token | undefined, keyword: Keyword): boolean {
  return token?.kind === 'Keyword' && token.value === keyword;
}

export function isOperatorToken(token: Token | undefined, op?: string): boolean {
  if (token?.kind !== 'Operator') return false;
  return op === undefined || token.value === op;
}

/**
 * Human-readable spelling of a token for messages.
 */
export function describeToken(token: Token | undefined): string {
  if (token === undefined) return 'end of input';
  switch (token.kind) {
    case 'Whitespace':
      return 'whitespace';
    case 'Comment':
      return 'comment';
    case 'String':
      return `string "${token.value ?? ''}"`;
    case 'Identifier':
    case 'Keyword':
    case 'Number':
    case 'Boolean':
      return `${token.kind.toLowerCase()} "${token.value ?? ''}"`;
    default: {
      const spelling = token.value ?? punctuationSpelling(token.kind);
      return `"${spelling}"`;
    }
  }
}

function punctuationSpelling(kind: TokenKind): string {
  for (const [ch, k] of Object.entries(PUNCTUATION)) {
    if (k === kind) return ch;
  }
  if (kind === 'Colon') return ':';
  if (kind === 'Range') return '..';
  return kind;
}
