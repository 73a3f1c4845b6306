export const BINARY_OPERATORS = [
  '=',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '&=',
  '|=',
  '^=',
  '<<=',
  '>>=',
  '==',
  '<',
  '>',
  '<=',
  '>=',
  '<<',
  '>>',
  '&',
  '|',
  '^',
  '&&',
  '||',
  'and',
  'or',
  '+',
  '-',
  '*',
  '/',
  '%',
] as const;

export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

const operatorSet: ReadonlySet<string> = new Set(BINARY_OPERATORS);

export function isBinaryOperator(text: string): text is BinaryOperator {
  return operatorSet.has(text);
}

/** Longest spelling of a symbolic operator, in characters. */
export const MAX_OPERATOR_LENGTH = 3;

export interface PrecedenceEntry {
  /** Higher binds tighter. */
  priority: number;
  associativity: 'left' | 'right';
}

export type PrecedenceTable = Readonly<Record<BinaryOperator, PrecedenceEntry>>;

/**
 * How a chain `a OP b OP c` is grouped.
 *
 * `right-recursive` parses everything after an operator as one full expression, so
 * `2 * 3 + 1` groups as `2 * (3 + 1)`. `precedence` climbs the given table.
 */
export type OperatorPolicy =
  | { kind: 'right-recursive' }
  | { kind: 'precedence'; table: PrecedenceTable };

const left = (priority: number): PrecedenceEntry => ({ priority, associativity: 'left' });
const right = (priority: number): PrecedenceEntry => ({ priority, associativity: 'right' });

export const STANDARD_PRECEDENCE: PrecedenceTable = {
  '=': right(1),
  '+=': right(1),
  '-=': right(1),
  '*=': right(1),
  '/=': right(1),
  '%=': right(1),
  '&=': right(1),
  '|=': right(1),
  '^=': right(1),
  '<<=': right(1),
  '>>=': right(1),
  '||': left(2),
  or: left(2),
  '&&': left(3),
  and: left(3),
  '|': left(4),
  '^': left(5),
  '&': left(6),
  '==': left(7),
  '<': left(8),
  '>': left(8),
  '<=': left(8),
  '>=': left(8),
  '<<': left(9),
  '>>': left(9),
  '+': left(10),
  '-': left(10),
  '*': left(11),
  '/': left(11),
  '%': left(11),
};

export const LEGACY_POLICY: OperatorPolicy = { kind: 'right-recursive' };

export const STANDARD_POLICY: OperatorPolicy = { kind: 'precedence', table: STANDARD_PRECEDENCE };
