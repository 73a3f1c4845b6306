import type { AstBody, Expression, Node, Statement } from '../../src/frontend/ast.js';
import { STANDARD_POLICY } from '../../src/frontend/ops.js';
import { parseSource } from '../../src/frontend/parser.js';
import type { ParseOptions, ParserError } from '../../src/frontend/parser.js';

export const standard: ParseOptions = { operators: STANDARD_POLICY };

export function parseOk(text: string, options: ParseOptions = {}): readonly Node[] {
  const res = parseSource({ kind: 'virtual', name: 'test.tern', text }, options);
  if (!res.ok) throw new Error(`unexpected parse error: ${res.error.message}`);
  return res.body.getProgram();
}

export function parseErr(text: string, options: ParseOptions = {}): { error: ParserError; partial: AstBody } {
  const res = parseSource({ kind: 'virtual', name: 'test.tern', text }, options);
  if (res.ok) throw new Error('expected a parse error');
  return { error: res.error, partial: res.partial };
}

export function firstStatement(text: string, options: ParseOptions = {}): Statement {
  const [node] = parseOk(text, options);
  if (node?.inner.kind !== 'Statement') throw new Error('expected a statement node');
  return node.inner.statement;
}

export function firstExpression(text: string, options: ParseOptions = {}): Expression {
  const [node] = parseOk(text, options);
  if (node?.inner.kind !== 'Expression') throw new Error('expected an expression node');
  return node.inner.expression;
}
