/**
 * Frontend AST contracts for Tern.
 *
 * This module defines types plus the append-only {@link AstBody}; it does no parsing.
 */
import type { BinaryOperator } from './ops.js';
import type { TextRange } from './position.js';
import type { TypeKind } from './types.js';

export type Visibility = 'public' | 'private' | 'protected';

/**
 * Backslash-separated module path: `a\b\c` is `{ name: 'a', parts: ['b', 'c'] }`.
 */
export interface Path {
  name: string;
  parts: string[];
}

export interface Variable {
  name: string;
  type?: TypeKind;
  visibility: Visibility;
  assignment?: Expression;
  nodeId: number;
}

export function isUninit(variable: Variable): boolean {
  return variable.assignment === undefined;
}

export interface FunctionInput {
  name: string;
  type: TypeKind;
  range: TextRange;
}

/**
 * A function or method declaration. `name` is absent for anonymous functions.
 */
export interface FunctionDecl {
  name?: string;
  inputs: FunctionInput[];
  returnType?: TypeKind;
  body: Statement;
  visibility: Visibility;
  nodeId: number;
}

/**
 * Class members, partitioned while parsing.
 *
 * `other` holds static-wrapped members and imports.
 */
export interface ClassBody {
  properties: Variable[];
  methods: FunctionDecl[];
  other: Statement[];
}

export interface ClassDecl {
  name: string;
  extends?: string;
  implements?: string[];
  body: ClassBody;
  nodeId: number;
}

export interface ObjectEntry {
  key: string;
  value: Expression;
}

export type LiteralKind = 'identifier' | 'number' | 'string' | 'boolean';

export type Accessor = '.' | '::';

export type Statement =
  | { kind: 'Var'; variable: Variable }
  | { kind: 'Const'; variable: Variable }
  | { kind: 'Static'; visibility: Visibility; statement: Statement }
  | { kind: 'Function'; func: FunctionDecl }
  | { kind: 'Class'; cls: ClassDecl }
  | { kind: 'Block'; body: Node[] }
  | { kind: 'Import'; path: Path }
  | { kind: 'Namespace'; path: Path; body?: Statement }
  | { kind: 'TypeDef'; name: string; params: string[]; type: TypeKind }
  | { kind: 'Return'; value?: Expression }
  /** Reserved for macro expansion; the parser never produces it. */
  | { kind: 'MacroInvocation'; name: string; args: Expression[] };

export type Expression =
  | { kind: 'Call'; name: string; args: Expression[] }
  /** Reserved for backends that fold member calls; the parser never produces it. */
  | { kind: 'MethodCall'; target: Expression; name: string; args: Expression[] }
  | { kind: 'New'; name: string; args: Expression[] }
  | { kind: 'Array'; items: Expression[] }
  | { kind: 'Object'; entries: ObjectEntry[] }
  | { kind: 'Operation'; left: Expression; operator: BinaryOperator; right: Expression }
  | { kind: 'Member'; name: string; accessor: Accessor; member: Expression }
  | { kind: 'Literal'; literal: LiteralKind; value: string }
  | { kind: 'Await'; value: Expression }
  | { kind: 'Statement'; statement: Statement }
  | { kind: 'EndOfLine' };

export type NodeKind =
  | { kind: 'Expression'; expression: Expression }
  | { kind: 'Statement'; statement: Statement };

/**
 * One parsed unit with the source range it covers.
 */
export interface Node {
  kind: 'Node';
  inner: NodeKind;
  range: TextRange;
}

export function expressionNode(expression: Expression, range: TextRange): Node {
  return { kind: 'Node', inner: { kind: 'Expression', expression }, range };
}

export function statementNode(statement: Statement, range: TextRange): Node {
  return { kind: 'Node', inner: { kind: 'Statement', statement }, range };
}

/**
 * Ordered, append-only list of the top-level nodes of one source file.
 */
export class AstBody {
  private readonly nodes: Node[] = [];

  pushNode(node: Node): void {
    this.nodes.push(node);
  }

  getProgram(): readonly Node[] {
    return this.nodes;
  }

  get length(): number {
    return this.nodes.length;
  }

  toJSON(): readonly Node[] {
    return this.nodes;
  }
}
