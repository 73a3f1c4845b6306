import { AstBody, expressionNode, statementNode } from './ast.js';
import type {
  Accessor,
  ClassBody,
  ClassDecl,
  Expression,
  FunctionDecl,
  FunctionInput,
  Node,
  ObjectEntry,
  Path,
  Statement,
  Variable,
  Visibility,
} from './ast.js';
import { ContextStore } from './context.js';
import type { Context, SourceOrigin } from './context.js';
import { isBinaryOperator, LEGACY_POLICY, MAX_OPERATOR_LENGTH } from './ops.js';
import type { BinaryOperator, OperatorPolicy } from './ops.js';
import type { TextRange } from './position.js';
import { describeToken, isKeywordToken, isOperatorToken, isTrivia } from './token.js';
import type { Keyword, Token, TokenKind } from './token.js';
import { TokenStream } from './token_stream.js';
import type { FoundToken, TokenPredicate } from './token_stream.js';
import { lex } from './tokenizer.js';
import type { LexError } from './tokenizer.js';
import { builtIn, isBuiltInType } from './types.js';
import type { TypeKind } from './types.js';

/**
 * - `structural`: a production committed and a required token was wrong.
 * - `exhaustion`: input ended inside a construct.
 * - `unexpected`: nothing at the top level accepts the token.
 */
export type ParseErrorReason = 'structural' | 'exhaustion' | 'unexpected';

export interface ParserError {
  reason: ParseErrorReason;
  message: string;
  /** Short label for the underlined span. */
  label: string;
  range: TextRange;
  inline?: string;
}

export type NoMatch = { kind: 'none' };
export type Matched<T> = { kind: 'match'; value: T };
export type Failed = { kind: 'error'; error: ParserError };

/** Result of one production: it did not apply, it built a value, or it committed and failed. */
export type Parsed<T> = NoMatch | Matched<T> | Failed;

export const NO_MATCH: NoMatch = { kind: 'none' };

function matched<T>(value: T): Matched<T> {
  return { kind: 'match', value };
}

function failed(error: ParserError): Failed {
  return { kind: 'error', error };
}

export type ParseOutcome =
  | { ok: true; body: AstBody }
  | { ok: false; error: ParserError; partial: AstBody };

export interface ParseOptions {
  /** Grouping of binary operator chains; defaults to the right-recursive legacy grammar. */
  operators?: OperatorPolicy;
}

interface OperatorMatch {
  operator: BinaryOperator;
  /** Tokens to consume, trivia included. */
  consume: number;
  range: TextRange;
}

const VISIBILITIES: readonly Visibility[] = ['public', 'private', 'protected'];

const kind =
  (k: TokenKind): TokenPredicate =>
  (t) =>
    t.kind === k;

const keyword =
  (k: Keyword): TokenPredicate =>
  (t) =>
    isKeywordToken(t, k);

const operator =
  (op: string): TokenPredicate =>
  (t) =>
    isOperatorToken(t, op);

function visibilityOf(token: Token | undefined): Visibility | undefined {
  if (token?.kind !== 'Keyword') return undefined;
  return VISIBILITIES.find((v) => v === token.value);
}

function isSymbolOperator(token: Token | undefined): boolean {
  return isOperatorToken(token) && token?.value !== 'and' && token?.value !== 'or';
}

/**
 * Recursive-descent parser over a token list.
 *
 * Each production peeks before committing. Once it has consumed a token, any failure is
 * returned as an error and no sibling production is tried.
 */
export class AstGenerator {
  private readonly stream: TokenStream;
  private readonly body = new AstBody();
  private readonly context: Context;
  private readonly sourceLength: number;
  private readonly policy: OperatorPolicy;

  private readonly statementProductions: ReadonlyArray<() => Parsed<Statement>> = [
    () => this.parseNamespace(),
    () => this.parseStatic(),
    () => this.parseVariable(),
    () => this.parseFunctionStatement(),
    () => this.parseClass(),
    () => this.parseImport(),
    () => this.parseTypeDef(),
  ];

  private readonly operandProductions: ReadonlyArray<() => Parsed<Expression>> = [
    () => this.parseStatementExpression(),
    () => this.parseCall(),
    () => this.parseMember(),
    () => this.parseNew(),
    () => this.parseAwait(),
    () => this.parseArray(),
    () => this.parseObject(),
    () => this.parseLiteral(),
  ];

  constructor(tokens: readonly Token[], context: Context, options: ParseOptions = {}) {
    this.stream = new TokenStream(tokens);
    this.context = context;
    this.sourceLength = context.origin.text.length;
    this.policy = options.operators ?? LEGACY_POLICY;
  }

  generate(): ParseOutcome {
    for (;;) {
      this.skipTrivia();
      const first = this.stream.first();
      if (first === undefined) break;
      const start = first.range.start;

      const statement = this.parseStatement();
      if (statement.kind === 'error') return this.fail(statement.error);
      if (statement.kind === 'match') {
        this.body.pushNode(statementNode(statement.value, this.rangeFrom(start)));
        continue;
      }

      const expression = this.parseExpression();
      if (expression.kind === 'error') return this.fail(expression.error);
      if (expression.kind === 'match') {
        this.body.pushNode(this.toNode(expression.value, this.rangeFrom(start)));
        continue;
      }

      if (first.kind === 'Semicolon') {
        this.stream.peek();
        this.body.pushNode(expressionNode({ kind: 'EndOfLine' }, first.range));
        continue;
      }

      return this.fail({
        reason: 'unexpected',
        message: 'Missing a valid statement or expression in global scope.',
        label: `unexpected ${describeToken(first)}`,
        range: first.range,
      });
    }
    return { ok: true, body: this.body };
  }

  parseStatement(): Parsed<Statement> {
    for (const production of this.statementProductions) {
      const result = production();
      if (result.kind !== 'none') return result;
    }
    return NO_MATCH;
  }

  parseExpression(): Parsed<Expression> {
    if (this.policy.kind === 'precedence') return this.parseClimbing(0);

    const left = this.parseOperand();
    if (left.kind !== 'match' || left.value.kind === 'Statement') return left;

    const op = this.lookOperator();
    if (op.kind !== 'match') return op.kind === 'error' ? op : left;
    this.stream.peekInc(op.value.consume);

    const right = this.requireExpression(op.value);
    if (right.kind === 'error') return right;
    return matched({
      kind: 'Operation',
      left: left.value,
      operator: op.value.operator,
      right: right.value,
    });
  }

  parseType(): Parsed<TypeKind> {
    const members: TypeKind[] = [];
    for (;;) {
      const member = this.parseTypeMember();
      if (member.kind === 'error') return member;
      if (member.kind === 'none') {
        if (members.length === 0) return NO_MATCH;
        return this.expected(this.stream.prev(), 'A type statement is expected here.', 'expected a type after "|"');
      }
      members.push(member.value);

      const bar = this.stream.findAfter(operator('|'), isTrivia);
      if (bar === undefined) break;
      this.stream.peekInc(bar.distance + 1);
      this.skipTrivia();
    }
    const [only] = members;
    if (members.length === 1 && only !== undefined) return matched(only);
    return matched({ kind: 'Union', members });
  }

  // Statements

  private parseNamespace(): Parsed<Statement> {
    const kw = this.stream.peekIf(keyword('namespace'));
    if (kw === undefined) return NO_MATCH;

    const path = this.parsePath(kw, 'Expected a namespace name.');
    if (path.kind === 'error') return path;

    const next = this.nextSignificant();
    if (next === undefined) {
      return this.exhausted(kw.range.start, 'A semi-colon was expected.', 'namespace is never terminated');
    }
    if (next.token.kind === 'Semicolon') {
      this.stream.peekInc(next.distance + 1);
      return matched({ kind: 'Namespace', path: path.value });
    }
    if (next.token.kind !== 'LeftBrace') {
      return this.structural(next.token, 'A semi-colon was expected.', 'expected ";" or "{"');
    }

    this.stream.peekInc(next.distance);
    const block = this.parseBlock();
    if (block.kind !== 'match') return block;
    const semi = this.expect(kind('Semicolon'), kw.range.start, 'A semi-colon was expected.', 'namespace bodies end with ";"');
    if (semi.kind === 'error') return semi;
    return matched({ kind: 'Namespace', path: path.value, body: block.value });
  }

  private parseImport(): Parsed<Statement> {
    const kw = this.stream.peekIf(keyword('import'));
    if (kw === undefined) return NO_MATCH;

    const path = this.parsePath(kw, 'Expected a module path after import.');
    if (path.kind === 'error') return path;
    const semi = this.expect(kind('Semicolon'), kw.range.start, 'A semicolon is expected here.', 'imports end with ";"');
    if (semi.kind === 'error') return semi;
    return matched({ kind: 'Import', path: path.value });
  }

  private parseTypeDef(): Parsed<Statement> {
    const kw = this.stream.peekIf(keyword('type'));
    if (kw === undefined) return NO_MATCH;
    const from = kw.range.start;

    const name = this.expect(kind('Identifier'), from, 'A name was expected here.', 'expected the alias name');
    if (name.kind === 'error') return name;

    const params: string[] = [];
    const open = this.stream.findAfter(operator('<'), isTrivia);
    if (open !== undefined) {
      this.stream.peekInc(open.distance + 1);
      for (;;) {
        const param = this.expect(
          kind('Identifier'),
          from,
          'Expected a type parameter to follow a typed parameter list.',
          'expected a parameter name',
        );
        if (param.kind === 'error') return param;
        params.push(param.value.value ?? '');
        const comma = this.stream.findAfter(kind('Comma'), isTrivia);
        if (comma === undefined) break;
        this.stream.peekInc(comma.distance + 1);
      }
      const close = this.expect(operator('>'), from, 'Type parameters must be closed.', 'expected ">"');
      if (close.kind === 'error') return close;
    }

    const eq = this.expect(operator('='), from, 'A type statement is expected here.', 'expected "="');
    if (eq.kind === 'error') return eq;
    const type = this.requireType(from);
    if (type.kind === 'error') return type;
    const semi = this.expect(kind('Semicolon'), from, 'A semicolon is expected here.', 'type aliases end with ";"');
    if (semi.kind === 'error') return semi;
    return matched({ kind: 'TypeDef', name: name.value.value ?? '', params, type: type.value });
  }

  private parseStatic(): Parsed<Statement> {
    const head = this.nextSignificant();
    const visibility = visibilityOf(head?.token);
    const at = visibility === undefined ? head : this.nextSignificant((head?.distance ?? 0) + 1);
    if (at === undefined || !isKeywordToken(at.token, 'static')) return NO_MATCH;

    this.stream.peekInc(at.distance + 1);
    this.skipTrivia();
    const inner = this.parseStatement();
    if (inner.kind === 'error') return inner;
    if (inner.kind === 'none') {
      return this.expected(at.token, 'A statement was expected here.', 'static needs a declaration');
    }
    return matched({ kind: 'Static', visibility: visibility ?? 'private', statement: inner.value });
  }

  private parseVariable(): Parsed<Statement> {
    const head = this.nextSignificant();
    const visibility = visibilityOf(head?.token);
    const at = visibility === undefined ? head : this.nextSignificant((head?.distance ?? 0) + 1);
    if (at === undefined) return NO_MATCH;
    const isConst = isKeywordToken(at.token, 'const');
    if (!isConst && !isKeywordToken(at.token, 'var')) return NO_MATCH;

    this.stream.peekInc(at.distance + 1);
    const variable = this.parseBinding(at.token, visibility ?? 'private', 'A variable name was expected but none was found.');
    if (variable.kind !== 'match') return variable;
    return matched({ kind: isConst ? 'Const' : 'Var', variable: variable.value });
  }

  /** `IDENT (":" type)? ("=" expr)? ";"` after the introducing token. */
  private parseBinding(intro: Token, visibility: Visibility, nameMessage: string): Parsed<Variable> {
    const from = intro.range.start;
    const nodeId = this.context.nextLocalId();
    const name = this.expect(kind('Identifier'), from, nameMessage, 'expected a name');
    if (name.kind === 'error') return name;

    let type: TypeKind | undefined;
    const colon = this.stream.findAfter(kind('Colon'), isTrivia);
    if (colon !== undefined) {
      this.stream.peekInc(colon.distance + 1);
      const parsed = this.requireType(from);
      if (parsed.kind === 'error') return parsed;
      type = parsed.value;
    }

    let assignment: Expression | undefined;
    const eq = this.lookOperator();
    if (eq.kind === 'error') return eq;
    if (eq.kind === 'match') {
      if (eq.value.operator !== '=') {
        return this.structural(this.stream.nth(eq.value.consume - 1), 'A semicolon is expected here.', `unexpected "${eq.value.operator}"`);
      }
      this.stream.peekInc(eq.value.consume);
      const value = this.requireExpression(eq.value);
      if (value.kind === 'error') return value;
      assignment = value.value;
    }

    const semi = this.expect(kind('Semicolon'), from, 'A semicolon is expected here.', 'declarations end with ";"');
    if (semi.kind === 'error') return semi;

    return matched({
      name: name.value.value ?? '',
      visibility,
      nodeId,
      ...(type !== undefined ? { type } : {}),
      ...(assignment !== undefined ? { assignment } : {}),
    });
  }

  private parseFunctionStatement(): Parsed<Statement> {
    const func = this.parseFunction();
    if (func.kind !== 'match') return func;
    return matched({ kind: 'Function', func: func.value });
  }

  private parseFunction(): Parsed<FunctionDecl> {
    const kw = this.stream.peekIf(keyword('function'));
    if (kw === undefined) return NO_MATCH;
    const from = kw.range.start;
    const nodeId = this.context.nextLocalId();

    let visibility: Visibility = 'private';
    const vis = this.nextSignificant();
    const declared = visibilityOf(vis?.token);
    if (vis !== undefined && declared !== undefined) {
      this.stream.peekInc(vis.distance + 1);
      visibility = declared;
    }

    let name: string | undefined;
    const ident = this.stream.findAfter(kind('Identifier'), isTrivia);
    if (ident !== undefined) {
      this.stream.peekInc(ident.distance + 1);
      name = ident.token.value;
    }

    const open = this.expect(kind('LeftParen'), from, 'A function input list is expected here.', 'expected "("');
    if (open.kind === 'error') return open;

    const inputs: FunctionInput[] = [];
    for (;;) {
      this.skipTrivia();
      const token = this.stream.first();
      if (token === undefined) {
        return this.exhausted(open.value.range.start, 'Function declaration arguments must be closed.', 'input list is never closed');
      }
      if (token.kind === 'RightParen') {
        this.stream.peek();
        break;
      }
      if (token.kind !== 'Identifier') {
        return this.structural(token, 'Function declaration arguments must be closed.', `unexpected ${describeToken(token)}`);
      }
      this.stream.peek();
      const colon = this.expect(kind('Colon'), from, 'A type statement is expected here.', 'inputs need a type');
      if (colon.kind === 'error') return colon;
      const type = this.requireType(from);
      if (type.kind === 'error') return type;
      inputs.push({
        name: token.value ?? '',
        type: type.value,
        range: { start: token.range.start, end: this.lastEnd(token.range.end) },
      });
      const comma = this.stream.findAfter(kind('Comma'), isTrivia);
      if (comma !== undefined) this.stream.peekInc(comma.distance + 1);
    }

    let returnType: TypeKind | undefined;
    const colon = this.stream.findAfter(kind('Colon'), isTrivia);
    if (colon !== undefined) {
      this.stream.peekInc(colon.distance + 1);
      const type = this.requireType(from);
      if (type.kind === 'error') return type;
      returnType = type.value;
    }

    this.skipTrivia();
    const body = this.parseBlock();
    if (body.kind === 'error') return body;
    if (body.kind === 'none') {
      return this.expected(this.stream.prev(), 'A function body is expected here.', 'expected "{"');
    }

    return matched({
      inputs,
      body: body.value,
      visibility,
      nodeId,
      ...(name !== undefined ? { name } : {}),
      ...(returnType !== undefined ? { returnType } : {}),
    });
  }

  private parseBlock(): Parsed<Statement> {
    const open = this.stream.peekIf(kind('LeftBrace'));
    if (open === undefined) return NO_MATCH;

    const nodes: Node[] = [];
    for (;;) {
      this.skipTrivia();
      const token = this.stream.first();
      if (token === undefined) {
        return this.exhausted(open.range.start, 'Expected a right brace to close the block, found none.', 'block is never closed');
      }
      if (token.kind === 'RightBrace') {
        this.stream.peek();
        break;
      }
      if (token.kind === 'Semicolon') {
        this.stream.peek();
        nodes.push(expressionNode({ kind: 'EndOfLine' }, token.range));
        continue;
      }
      if (isKeywordToken(token, 'return')) {
        const ret = this.parseReturn(token);
        if (ret.kind === 'error') return ret;
        nodes.push(statementNode(ret.value, this.rangeFrom(token.range.start)));
        continue;
      }

      const item = this.parseExpression();
      if (item.kind === 'error') return item;
      if (item.kind === 'none') {
        return this.structural(token, 'A statement was expected here.', `unexpected ${describeToken(token)}`);
      }
      nodes.push(this.toNode(item.value, this.rangeFrom(token.range.start)));
    }
    return matched({ kind: 'Block', body: nodes });
  }

  private parseReturn(kw: Token): Matched<Statement> | Failed {
    this.stream.peek();
    const semi = this.stream.findAfter(kind('Semicolon'), isTrivia);
    if (semi !== undefined) {
      this.stream.peekInc(semi.distance + 1);
      return matched({ kind: 'Return' });
    }
    this.skipTrivia();
    const value = this.parseExpression();
    if (value.kind === 'error') return value;
    if (value.kind === 'none') {
      return this.expected(kw, 'An expression or ";" was expected after return.', 'nothing to return');
    }
    const end = this.expect(kind('Semicolon'), kw.range.start, 'A semicolon is expected here.', 'return ends with ";"');
    if (end.kind === 'error') return end;
    return matched({ kind: 'Return', value: value.value });
  }

  private parseClass(): Parsed<Statement> {
    const kw = this.stream.peekIf(keyword('class'));
    if (kw === undefined) return NO_MATCH;
    const from = kw.range.start;
    const nodeId = this.context.nextLocalId();

    const name = this.expect(kind('Identifier'), from, 'A name was expected here.', 'expected the class name');
    if (name.kind === 'error') return name;

    let superclass: string | undefined;
    const ext = this.stream.findAfter(keyword('extends'), isTrivia);
    if (ext !== undefined) {
      this.stream.peekInc(ext.distance + 1);
      const parent = this.expect(kind('Identifier'), from, 'A name was expected here.', 'expected a class to extend');
      if (parent.kind === 'error') return parent;
      superclass = parent.value.value;
    }

    let interfaces: string[] | undefined;
    const impl = this.stream.findAfter(keyword('implements'), isTrivia);
    if (impl !== undefined) {
      this.stream.peekInc(impl.distance + 1);
      interfaces = [];
      for (;;) {
        const iface = this.expect(kind('Identifier'), from, 'A name was expected here.', 'expected an interface name');
        if (iface.kind === 'error') return iface;
        interfaces.push(iface.value.value ?? '');
        const comma = this.stream.findAfter(kind('Comma'), isTrivia);
        if (comma === undefined) break;
        this.stream.peekInc(comma.distance + 1);
      }
    }

    const open = this.expect(kind('LeftBrace'), from, 'A class body is expected here.', 'expected "{"');
    if (open.kind === 'error') return open;

    const body: ClassBody = { properties: [], methods: [], other: [] };
    for (;;) {
      this.skipTrivia();
      const token = this.stream.first();
      if (token === undefined) {
        return this.exhausted(from, 'Expected a right brace to close the class body, found none.', 'class body is never closed');
      }
      if (token.kind === 'RightBrace') {
        this.stream.peek();
        break;
      }
      if (token.kind === 'Semicolon') {
        this.stream.peek();
        continue;
      }
      const imported = this.parseImport();
      if (imported.kind === 'error') return imported;
      if (imported.kind === 'match') {
        body.other.push(imported.value);
        continue;
      }
      const member = this.parseClassMember(body);
      if (member.kind === 'error') return member;
    }

    const cls: ClassDecl = {
      name: name.value.value ?? '',
      body,
      nodeId,
      ...(superclass !== undefined ? { extends: superclass } : {}),
      ...(interfaces !== undefined ? { implements: interfaces } : {}),
    };
    return matched({ kind: 'Class', cls });
  }

  /** Property, method, or either wrapped in visibility and `static`; files it into `body`. */
  private parseClassMember(body: ClassBody): Matched<null> | Failed {
    const head = this.stream.first();
    const visibility = visibilityOf(head);
    if (visibility !== undefined) {
      this.stream.peek();
      this.skipTrivia();
    }
    const staticKw = this.stream.peekIf(keyword('static'));
    if (staticKw !== undefined) this.skipTrivia();

    const token = this.stream.first();
    let member: Statement;
    if (token?.kind === 'Identifier') {
      const property = this.parseBinding(token, visibility ?? 'private', 'A name was expected here.');
      if (property.kind !== 'match') return this.orFail(property, token);
      if (staticKw === undefined) {
        body.properties.push(property.value);
        return matched(null);
      }
      member = { kind: 'Var', variable: property.value };
    } else if (isKeywordToken(token, 'function')) {
      const method = this.parseFunction();
      if (method.kind !== 'match') return this.orFail(method, token);
      const func = visibility !== undefined ? { ...method.value, visibility } : method.value;
      if (staticKw === undefined) {
        body.methods.push(func);
        return matched(null);
      }
      member = { kind: 'Function', func };
    } else {
      return this.expected(token ?? this.stream.prev(), 'A class member was expected here.', `unexpected ${describeToken(token)}`);
    }

    body.other.push({ kind: 'Static', visibility: visibility ?? 'private', statement: member });
    return matched(null);
  }

  // Expressions

  private parseOperand(): Parsed<Expression> {
    for (const production of this.operandProductions) {
      const result = production();
      if (result.kind !== 'none') return result;
    }
    return NO_MATCH;
  }

  private parseClimbing(minPriority: number): Parsed<Expression> {
    if (this.policy.kind !== 'precedence') return this.parseExpression();
    const table = this.policy.table;

    const left = this.parseOperand();
    if (left.kind !== 'match' || left.value.kind === 'Statement') return left;

    let expression = left.value;
    for (;;) {
      const op = this.lookOperator();
      if (op.kind === 'error') return op;
      if (op.kind === 'none') break;
      const entry = table[op.value.operator];
      if (entry.priority < minPriority) break;

      this.stream.peekInc(op.value.consume);
      this.skipTrivia();
      const next = entry.associativity === 'left' ? entry.priority + 1 : entry.priority;
      const right = this.parseClimbing(next);
      if (right.kind === 'error') return right;
      if (right.kind === 'none') return this.missingOperand(op.value);
      expression = { kind: 'Operation', left: expression, operator: op.value.operator, right: right.value };
    }
    return matched(expression);
  }

  /** Operand on the right of an accessor, `await`, or an operator under the active policy. */
  private parseTail(): Parsed<Expression> {
    this.skipTrivia();
    return this.policy.kind === 'precedence' ? this.parseOperand() : this.parseExpression();
  }

  private requireExpression(op: OperatorMatch): Matched<Expression> | Failed {
    this.skipTrivia();
    const right = this.parseExpression();
    if (right.kind === 'none') return this.missingOperand(op);
    return right;
  }

  private missingOperand(op: OperatorMatch): Failed {
    const token = this.stream.first();
    if (token === undefined) {
      return this.exhausted(op.range.start, 'An expression was expected after this operator.', `"${op.operator}" needs a right-hand side`);
    }
    return this.structural(token, 'An expression was expected after this operator.', `"${op.operator}" needs a right-hand side`);
  }

  private parseStatementExpression(): Parsed<Expression> {
    const statement = this.parseStatement();
    if (statement.kind !== 'match') return statement;
    return matched({ kind: 'Statement', statement: statement.value });
  }

  private parseCall(): Parsed<Expression> {
    const name = this.stream.firstIf(kind('Identifier'));
    if (name === undefined || this.stream.second()?.kind !== 'LeftParen') return NO_MATCH;
    this.stream.peekInc(2);

    const args = this.parseList('RightParen', name.range.start, 'Function arguments must be closed.');
    if (args.kind === 'error') return args;
    return matched({ kind: 'Call', name: name.value ?? '', args: args.value });
  }

  private parseMember(): Parsed<Expression> {
    const name = this.stream.firstIf(kind('Identifier'));
    const accessor = this.stream.secondIf(kind('Accessor'));
    if (name === undefined || accessor === undefined) return NO_MATCH;
    this.stream.peekInc(2);

    const member = this.parseTail();
    if (member.kind === 'error') return member;
    if (member.kind === 'none') {
      return this.expected(accessor, 'An expression was expected after the accessor.', 'nothing to access');
    }
    const spelling: Accessor = accessor.value === '::' ? '::' : '.';
    return matched({ kind: 'Member', name: name.value ?? '', accessor: spelling, member: member.value });
  }

  private parseNew(): Parsed<Expression> {
    const kw = this.stream.peekIf(keyword('new'));
    if (kw === undefined) return NO_MATCH;
    const from = kw.range.start;

    const name = this.expect(kind('Identifier'), from, 'A class name was expected after new.', 'expected a class name');
    if (name.kind === 'error') return name;
    const open = this.expect(kind('LeftParen'), from, 'A left parenthesis is expected here.', 'expected "("');
    if (open.kind === 'error') return open;
    const args = this.parseList('RightParen', from, 'A right parenthesis is expected here.');
    if (args.kind === 'error') return args;
    return matched({ kind: 'New', name: name.value.value ?? '', args: args.value });
  }

  private parseAwait(): Parsed<Expression> {
    const kw = this.stream.peekIf(keyword('await'));
    if (kw === undefined) return NO_MATCH;
    const value = this.parseTail();
    if (value.kind === 'error') return value;
    if (value.kind === 'none') {
      return this.expected(kw, 'An expression was expected after await.', 'nothing to await');
    }
    return matched({ kind: 'Await', value: value.value });
  }

  private parseArray(): Parsed<Expression> {
    const open = this.stream.peekIf(kind('LeftBracket'));
    if (open === undefined) return NO_MATCH;
    const items = this.parseList('RightBracket', open.range.start, 'Array must be closed.');
    if (items.kind === 'error') return items;
    return matched({ kind: 'Array', items: items.value });
  }

  private parseObject(): Parsed<Expression> {
    const open = this.stream.peekIf(kind('LeftBrace'));
    if (open === undefined) return NO_MATCH;
    const from = open.range.start;

    const entries: ObjectEntry[] = [];
    for (;;) {
      this.skipTrivia();
      const token = this.stream.first();
      if (token === undefined) return this.exhausted(from, 'Object body must be closed.', 'object is never closed');
      if (token.kind === 'RightBrace') {
        this.stream.peek();
        break;
      }
      if (token.kind !== 'Identifier') {
        return this.structural(token, 'Object body must be closed.', 'expected a key or "}"');
      }
      this.stream.peek();
      const colon = this.expect(kind('Colon'), from, 'A colon is expected after an object key.', 'expected ":"');
      if (colon.kind === 'error') return colon;
      this.skipTrivia();
      const value = this.parseExpression();
      if (value.kind === 'error') return value;
      if (value.kind === 'none') {
        return this.expected(colon.value, 'An expression was expected here.', `no value for "${token.value ?? ''}"`);
      }
      entries.push({ key: token.value ?? '', value: value.value });
      const comma = this.stream.findAfter(kind('Comma'), isTrivia);
      if (comma !== undefined) this.stream.peekInc(comma.distance + 1);
    }
    return matched({ kind: 'Object', entries });
  }

  private parseLiteral(): Parsed<Expression> {
    const token = this.stream.first();
    if (token === undefined) return NO_MATCH;
    const value = token.value ?? '';
    switch (token.kind) {
      case 'Identifier':
        this.stream.peek();
        return matched({ kind: 'Literal', literal: 'identifier', value });
      case 'Number':
        this.stream.peek();
        return matched({ kind: 'Literal', literal: 'number', value });
      case 'String':
        this.stream.peek();
        return matched({ kind: 'Literal', literal: 'string', value });
      case 'Boolean':
        this.stream.peek();
        return matched({ kind: 'Literal', literal: 'boolean', value });
      default:
        return NO_MATCH;
    }
  }

  /** `(expr ","?)* closer`, with the opener already consumed. */
  private parseList(closer: TokenKind, from: number, message: string): Matched<Expression[]> | Failed {
    const items: Expression[] = [];
    for (;;) {
      this.skipTrivia();
      const token = this.stream.first();
      if (token === undefined) return this.exhausted(from, message, 'never closed');
      if (token.kind === closer) {
        this.stream.peek();
        return matched(items);
      }
      const item = this.parseExpression();
      if (item.kind === 'error') return item;
      if (item.kind === 'none') return this.structural(token, message, `unexpected ${describeToken(token)}`);
      items.push(item.value);
      const comma = this.stream.findAfter(kind('Comma'), isTrivia);
      if (comma !== undefined) this.stream.peekInc(comma.distance + 1);
    }
  }

  /**
   * Find the operator after the next trivia run without consuming. Adjacent symbol operators
   * join into the longest known spelling, so `<` `<` `=` reads as `<<=`.
   */
  private lookOperator(): Parsed<OperatorMatch> {
    const found = this.stream.findAfter((t) => isOperatorToken(t), isTrivia);
    if (found === undefined) return NO_MATCH;
    const first = found.token;

    const run: Token[] = [first];
    if (isSymbolOperator(first)) {
      for (let i = 1; i < MAX_OPERATOR_LENGTH; i++) {
        const prev = run[run.length - 1];
        const next = this.stream.nth(found.distance + i);
        if (prev === undefined || !isSymbolOperator(next) || next === undefined) break;
        if (next.range.start !== prev.range.end) break;
        run.push(next);
      }
    }

    for (let len = run.length; len > 0; len--) {
      const spelling = run
        .slice(0, len)
        .map((t) => t.value ?? '')
        .join('');
      if (isBinaryOperator(spelling)) {
        const last = run[len - 1] ?? first;
        return matched({
          operator: spelling,
          consume: found.distance + len,
          range: { start: first.range.start, end: last.range.end },
        });
      }
    }
    return this.structural(first, `Unknown operator "${first.value ?? ''}".`, 'not a binary operator');
  }

  // Types

  private parseTypeMember(): Parsed<TypeKind> {
    const name = this.stream.peekIf(kind('Identifier'));
    if (name === undefined) return NO_MATCH;
    const text = name.value ?? '';

    const generics: TypeKind[] = [];
    const open = this.stream.findAfter(operator('<'), isTrivia);
    if (open !== undefined) {
      this.stream.peekInc(open.distance + 1);
      for (;;) {
        const arg = this.requireType(name.range.start);
        if (arg.kind === 'error') return arg;
        generics.push(arg.value);
        const comma = this.stream.findAfter(kind('Comma'), isTrivia);
        if (comma === undefined) break;
        this.stream.peekInc(comma.distance + 1);
      }
      const close = this.expect(operator('>'), name.range.start, 'Generic arguments must be closed.', 'expected ">"');
      if (close.kind === 'error') return close;
    }

    if (!isBuiltInType(text)) return matched({ kind: 'Reference', name: text, generics });
    if (generics.length === 0) return matched(builtIn(text));
    const [element] = generics;
    if (text === 'array' && generics.length === 1 && element !== undefined) {
      return matched(builtIn('array', element));
    }
    return this.structural(name, `Built-in type "${text}" does not take type arguments.`, 'unexpected type arguments');
  }

  private requireType(from: number): Matched<TypeKind> | Failed {
    this.skipTrivia();
    const type = this.parseType();
    if (type.kind !== 'none') return type;
    const token = this.stream.first();
    if (token === undefined) return this.exhausted(from, 'A type statement is expected here.', 'expected a type');
    return this.structural(token, 'A type statement is expected here.', `unexpected ${describeToken(token)}`);
  }

  private parsePath(intro: Token, message: string): Matched<Path> | Failed {
    const from = intro.range.start;
    const head = this.expect(kind('Identifier'), from, message, 'expected a name');
    if (head.kind === 'error') return head;

    const parts: string[] = [];
    for (;;) {
      const slash = this.stream.findAfter(kind('Backslash'), isTrivia);
      if (slash === undefined) break;
      this.stream.peekInc(slash.distance + 1);
      const part = this.expect(kind('Identifier'), from, 'Expected identifier after backslash.', 'expected a name');
      if (part.kind === 'error') return part;
      parts.push(part.value.value ?? '');
    }
    return matched({ name: head.value.value ?? '', parts });
  }

  // Helpers

  private skipTrivia(): void {
    this.stream.eatWhile(isTrivia);
  }

  private nextSignificant(from = 0): FoundToken | undefined {
    return this.stream.findAfterNth(from, (t) => !isTrivia(t), isTrivia);
  }

  /** Skip trivia, then consume a token matching `pred` or fail. */
  private expect(pred: TokenPredicate, from: number, message: string, label: string): Matched<Token> | Failed {
    this.skipTrivia();
    const token = this.stream.first();
    if (token === undefined) return this.exhausted(from, message, label);
    if (!pred(token)) return this.structural(token, message, `${label}, found ${describeToken(token)}`);
    this.stream.peek();
    return matched(token);
  }

  /** Error at `token`, or an exhaustion error when the stream is already empty. */
  private expected(token: Token | undefined, message: string, label: string): Failed {
    const head = this.stream.first();
    if (head === undefined) return this.exhausted(token?.range.start ?? 0, message, label);
    return this.structural(token ?? head, message, label);
  }

  private orFail(result: NoMatch | Failed, token: Token | undefined): Failed {
    if (result.kind === 'error') return result;
    return this.structural(token, 'A class member was expected here.', `unexpected ${describeToken(token)}`);
  }

  private structural(token: Token | undefined, message: string, label: string): Failed {
    const range = token?.range ?? { start: this.sourceLength, end: this.sourceLength };
    return failed({ reason: 'structural', message, label, range });
  }

  private exhausted(from: number, message: string, label: string): Failed {
    return failed({
      reason: 'exhaustion',
      message,
      label,
      range: { start: from, end: this.sourceLength },
      inline: 'input ends here',
    });
  }

  private lastEnd(fallback: number): number {
    return this.stream.prev()?.range.end ?? fallback;
  }

  private rangeFrom(start: number): TextRange {
    return { start, end: this.lastEnd(start) };
  }

  private toNode(expression: Expression, range: TextRange): Node {
    return expression.kind === 'Statement'
      ? statementNode(expression.statement, range)
      : expressionNode(expression, range);
  }

  private fail(error: ParserError): ParseOutcome {
    return { ok: false, error, partial: this.body };
  }
}

export type SourceParse = ParseOutcome & { lexErrors: LexError[] };

/**
 * Lex and parse one source. A context is registered in `store` for the duration of the parse.
 */
export function parseSource(
  origin: SourceOrigin,
  options: ParseOptions = {},
  store: ContextStore = new ContextStore(),
): SourceParse {
  const context = store.add(origin);
  try {
    const { tokens, errors } = lex(origin.text);
    const outcome = new AstGenerator(tokens, context, options).generate();
    return { ...outcome, lexErrors: errors };
  } finally {
    store.remove(context.id);
  }
}
