import { describe, expect, it } from 'vitest';

import { parseSource } from '../src/frontend/parser.js';
import { printBody, printExpression, printStatement } from '../src/frontend/print.js';
import { builtIn, typeToString } from '../src/frontend/types.js';
import { firstStatement } from './helpers/parse.js';

describe('printStatement', () => {
  it.each([
    ['var x: int = 5;', 'var x: int = 5'],
    ['public static const K = 1;', 'public static const K = 1'],
    ['function f(x: int): int { return x; }', 'function f(x: int): int { 1 }'],
    ['function () { }', 'function <anonymous>() { 0 }'],
    [
      'class Point extends Shape implements A, B { x: int; }',
      'class Point extends Shape implements A, B { properties: 1, methods: 0, other: 0 }',
    ],
    ['import a\\b;', 'import a\\b'],
    ['namespace app;', 'namespace app'],
    ['namespace app { var x = 1; };', 'namespace app { 1 }'],
    ['type P<A> = array<A> | int;', 'type P<A> = array<A> | int'],
  ])('%s', (source, summary) => {
    expect(printStatement(firstStatement(source))).toBe(summary);
  });

  it('prints returns with and without a value', () => {
    expect(printStatement({ kind: 'Return' })).toBe('return');
    expect(
      printStatement({
        kind: 'Return',
        value: {
          kind: 'Operation',
          left: { kind: 'Literal', literal: 'identifier', value: 'a' },
          operator: '+',
          right: { kind: 'Literal', literal: 'number', value: '1' },
        },
      }),
    ).toBe('return (a + 1)');
  });

  it('prints nodes the parser never builds', () => {
    expect(
      printStatement({
        kind: 'MacroInvocation',
        name: 'assert',
        args: [{ kind: 'Literal', literal: 'boolean', value: 'true' }],
      }),
    ).toBe('assert!(true)');
    expect(
      printExpression({
        kind: 'MethodCall',
        target: { kind: 'Literal', literal: 'identifier', value: 'list' },
        name: 'push',
        args: [],
      }),
    ).toBe('list.push()');
  });
});

describe('printExpression', () => {
  it('quotes strings and keeps other literals as written', () => {
    expect(
      printExpression({
        kind: 'Object',
        entries: [
          { key: 'name', value: { kind: 'Literal', literal: 'string', value: 'a "b"' } },
          { key: 'ok', value: { kind: 'Literal', literal: 'boolean', value: 'false' } },
        ],
      }),
    ).toBe('{name: "a \\"b\\"", ok: false}');
    expect(printExpression({ kind: 'EndOfLine' })).toBe(';');
  });
});

describe('typeToString', () => {
  it('renders built-ins with an element type', () => {
    expect(typeToString(builtIn('array', builtIn('u8')))).toBe('array<u8>');
    expect(typeToString(builtIn('f64'))).toBe('f64');
  });

  it('renders references with generics and unions', () => {
    expect(
      typeToString({
        kind: 'Union',
        members: [{ kind: 'Reference', name: 'Map', generics: [builtIn('string'), builtIn('int')] }, builtIn('any')],
      }),
    ).toBe('Map<string, int> | any');
    expect(typeToString({ kind: 'Reference', name: 'Shape', generics: [] })).toBe('Shape');
  });

  it('renders runtime types', () => {
    expect(typeToString({ kind: 'RuntimeType', name: 'T' })).toBe('runtime T');
  });
});

describe('printBody', () => {
  it('prints one line per top-level node with its range', () => {
    const res = parseSource({ kind: 'virtual', name: 'hello.tern', text: 'var greeting = "hi";\nprint(greeting);\n' });
    if (!res.ok) throw new Error(res.error.message);
    expect(printBody(res.body)).toBe('0..20  var greeting = "hi"\n21..36  print(greeting)\n36..37  ;\n');
  });
});
