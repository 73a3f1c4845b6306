import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isTrivia } from './token.js';
import type { Token, TokenKind } from './token.js';

interface DelimiterPair {
  open: TokenKind;
  close: TokenKind;
  openText: string;
  closeText: string;
}

const PAIRS: readonly DelimiterPair[] = [
  { open: 'LeftParen', close: 'RightParen', openText: '(', closeText: ')' },
  { open: 'LeftBracket', close: 'RightBracket', openText: '[', closeText: ']' },
  { open: 'LeftBrace', close: 'RightBrace', openText: '{', closeText: '}' },
];

function pairOpenedBy(token: Token): DelimiterPair | undefined {
  return PAIRS.find((p) => p.open === token.kind);
}

function pairClosedBy(token: Token): DelimiterPair | undefined {
  return PAIRS.find((p) => p.close === token.kind);
}

function adjacentIdentifiers(tokens: readonly Token[], file: string): Diagnostic[] {
  const out: Diagnostic[] = [];
  let lastIdent: Token | undefined;
  for (const token of tokens) {
    if (isTrivia(token)) continue;
    if (token.kind === 'Identifier' && lastIdent !== undefined) {
      out.push({
        id: DiagnosticIds.AdjacentIdentifiers,
        severity: 'warning',
        message: `Identifiers "${lastIdent.value ?? ''}" and "${token.value ?? ''}" follow each other without an operator or separator.`,
        file,
        range: token.range,
        label: 'unexpected identifier',
      });
    }
    lastIdent = token.kind === 'Identifier' ? token : undefined;
  }
  return out;
}

function unbalancedDelimiters(tokens: readonly Token[], file: string): Diagnostic[] {
  const out: Diagnostic[] = [];
  const open: Token[] = [];
  const error = (token: Token, message: string, label: string): Diagnostic => ({
    id: DiagnosticIds.UnbalancedDelimiter,
    severity: 'error',
    message,
    file,
    range: token.range,
    label,
  });

  for (const token of tokens) {
    if (pairOpenedBy(token)) {
      open.push(token);
      continue;
    }
    const pair = pairClosedBy(token);
    if (pair === undefined) continue;

    const top = open[open.length - 1];
    if (top === undefined) {
      out.push(error(token, `Closing "${pair.closeText}" has no matching "${pair.openText}".`, 'nothing to close'));
      continue;
    }
    open.pop();
    const expected = pairOpenedBy(top);
    if (expected !== undefined && expected !== pair) {
      out.push(
        error(token, `Expected "${expected.closeText}" to close "${expected.openText}", found "${pair.closeText}".`, 'mismatched delimiter'),
      );
    }
  }

  for (const token of open) {
    const pair = pairOpenedBy(token);
    if (pair === undefined) continue;
    out.push(error(token, `"${pair.openText}" is never closed.`, 'unclosed delimiter'));
  }
  return out;
}

/**
 * Token-level checks run before parsing: adjacent identifiers and unbalanced delimiters.
 *
 * Diagnostics carry ranges only; callers add line/column.
 */
export function analyzeTokens(tokens: readonly Token[], file: string): Diagnostic[] {
  return [...adjacentIdentifiers(tokens, file), ...unbalancedDelimiters(tokens, file)].sort(
    (a, b) => (a.range?.start ?? 0) - (b.range?.start ?? 0),
  );
}
