import { describe, expect, it } from 'vitest';

import { isUninit } from '../src/frontend/ast.js';
import { builtIn } from '../src/frontend/types.js';
import { firstStatement, parseOk } from './helpers/parse.js';

const int = builtIn('int');

describe('variables', () => {
  it('parses var with an initializer', () => {
    const nodes = parseOk('var x = 5;');
    expect(nodes).toHaveLength(1);
    expect(nodes[0]?.range).toEqual({ start: 0, end: 10 });
    expect(nodes[0]?.inner).toEqual({
      kind: 'Statement',
      statement: {
        kind: 'Var',
        variable: {
          name: 'x',
          visibility: 'private',
          nodeId: 1,
          assignment: { kind: 'Literal', literal: 'number', value: '5' },
        },
      },
    });
  });

  it('parses a const with a union type collapsed to built-ins', () => {
    expect(firstStatement('const y: int | string = "a";')).toEqual({
      kind: 'Const',
      variable: {
        name: 'y',
        type: { kind: 'Union', members: [int, builtIn('string')] },
        visibility: 'private',
        nodeId: 1,
        assignment: { kind: 'Literal', literal: 'string', value: 'a' },
      },
    });
  });

  it('keeps a declared visibility and leaves uninitialised bindings empty', () => {
    const statement = firstStatement('protected var z;');
    expect(statement.kind).toBe('Var');
    if (statement.kind !== 'Var') return;
    expect(statement.variable.visibility).toBe('protected');
    expect(isUninit(statement.variable)).toBe(true);
  });

  it('allocates node ids in source order', () => {
    const ids = parseOk('var a = 1; var b = 2;').flatMap((n) =>
      n.inner.kind === 'Statement' && n.inner.statement.kind === 'Var' ? [n.inner.statement.variable.nodeId] : [],
    );
    expect(ids).toEqual([1, 2]);
  });
});

describe('static', () => {
  it('wraps a declaration with its visibility', () => {
    expect(firstStatement('public static var counter = 1;')).toEqual({
      kind: 'Static',
      visibility: 'public',
      statement: {
        kind: 'Var',
        variable: {
          name: 'counter',
          visibility: 'private',
          nodeId: 1,
          assignment: { kind: 'Literal', literal: 'number', value: '1' },
        },
      },
    });
  });

  it('defaults to private', () => {
    const statement = firstStatement('static const LIMIT = 10;');
    expect(statement).toMatchObject({ kind: 'Static', visibility: 'private', statement: { kind: 'Const' } });
  });
});

describe('namespaces and imports', () => {
  it('parses a backslash path', () => {
    expect(firstStatement('namespace a\\b\\c;')).toEqual({
      kind: 'Namespace',
      path: { name: 'a', parts: ['b', 'c'] },
    });
  });

  it('parses a namespace body terminated by a semicolon', () => {
    const statement = firstStatement('namespace app { var x = 1; };');
    expect(statement.kind).toBe('Namespace');
    if (statement.kind !== 'Namespace') return;
    expect(statement.body?.kind).toBe('Block');
    if (statement.body?.kind !== 'Block') return;
    expect(statement.body.body).toHaveLength(1);
    expect(statement.body.body[0]?.inner).toMatchObject({
      kind: 'Statement',
      statement: { kind: 'Var', variable: { name: 'x' } },
    });
    expect(statement.body.body[0]?.range).toEqual({ start: 16, end: 26 });
  });

  it('parses an import', () => {
    expect(firstStatement('import std\\io;')).toEqual({ kind: 'Import', path: { name: 'std', parts: ['io'] } });
  });
});

describe('type aliases', () => {
  it('parses parameters and a union with generics', () => {
    expect(firstStatement('type Pair<A, B> = Map<A, B> | any;')).toEqual({
      kind: 'TypeDef',
      name: 'Pair',
      params: ['A', 'B'],
      type: {
        kind: 'Union',
        members: [
          {
            kind: 'Reference',
            name: 'Map',
            generics: [
              { kind: 'Reference', name: 'A', generics: [] },
              { kind: 'Reference', name: 'B', generics: [] },
            ],
          },
          builtIn('any'),
        ],
      },
    });
  });

  it('records the element type of array', () => {
    const statement = firstStatement('var xs: array<array<int>>;');
    expect(statement).toMatchObject({
      kind: 'Var',
      variable: { type: builtIn('array', builtIn('array', int)) },
    });
  });
});

describe('functions', () => {
  it('parses typed inputs, a return type and an empty body', () => {
    expect(firstStatement('function foo(x: int, y: int): int { }')).toEqual({
      kind: 'Function',
      func: {
        name: 'foo',
        inputs: [
          { name: 'x', type: int, range: { start: 13, end: 19 } },
          { name: 'y', type: int, range: { start: 21, end: 27 } },
        ],
        returnType: int,
        body: { kind: 'Block', body: [] },
        visibility: 'private',
        nodeId: 1,
      },
    });
  });

  it('allows anonymous functions with a visibility', () => {
    const statement = firstStatement('function public () { }');
    expect(statement).toMatchObject({ kind: 'Function', func: { visibility: 'public', inputs: [] } });
    if (statement.kind !== 'Function') return;
    expect(statement.func.name).toBeUndefined();
  });

  it('parses returns and expression items in a body', () => {
    const statement = firstStatement('function f(a: i32) { log(a); return a + 1; return ; }');
    if (statement.kind !== 'Function' || statement.func.body.kind !== 'Block') {
      throw new Error('expected a function with a block');
    }
    const items = statement.func.body.body.map((n) => n.inner);
    expect(items).toEqual([
      { kind: 'Expression', expression: { kind: 'Call', name: 'log', args: [{ kind: 'Literal', literal: 'identifier', value: 'a' }] } },
      { kind: 'Expression', expression: { kind: 'EndOfLine' } },
      {
        kind: 'Statement',
        statement: {
          kind: 'Return',
          value: {
            kind: 'Operation',
            left: { kind: 'Literal', literal: 'identifier', value: 'a' },
            operator: '+',
            right: { kind: 'Literal', literal: 'number', value: '1' },
          },
        },
      },
      { kind: 'Statement', statement: { kind: 'Return' } },
    ]);
  });
});

describe('classes', () => {
  const source = [
    'class Point extends Shape implements Drawable, Named {',
    '  x: int = 0;',
    '  public y: int;',
    '  function length(): float { return x; }',
    '  public static count = 0;',
    '  import geometry\\util;',
    '}',
  ].join('\n');

  it('partitions members while parsing', () => {
    const statement = firstStatement(source);
    if (statement.kind !== 'Class') throw new Error('expected a class');
    const { cls } = statement;
    expect(cls.name).toBe('Point');
    expect(cls.extends).toBe('Shape');
    expect(cls.implements).toEqual(['Drawable', 'Named']);
    expect(cls.nodeId).toBe(1);

    expect(cls.body.properties).toEqual([
      {
        name: 'x',
        type: int,
        visibility: 'private',
        nodeId: 2,
        assignment: { kind: 'Literal', literal: 'number', value: '0' },
      },
      { name: 'y', type: int, visibility: 'public', nodeId: 3 },
    ]);
    expect(cls.body.methods.map((m) => [m.name, m.returnType, m.nodeId])).toEqual([['length', builtIn('float'), 4]]);
    expect(cls.body.other).toEqual([
      {
        kind: 'Static',
        visibility: 'public',
        statement: {
          kind: 'Var',
          variable: {
            name: 'count',
            visibility: 'public',
            nodeId: 5,
            assignment: { kind: 'Literal', literal: 'number', value: '0' },
          },
        },
      },
      { kind: 'Import', path: { name: 'geometry', parts: ['util'] } },
    ]);
  });

  it('parses a class without heritage', () => {
    const statement = firstStatement('class Empty { }');
    expect(statement).toEqual({
      kind: 'Class',
      cls: { name: 'Empty', body: { properties: [], methods: [], other: [] }, nodeId: 1 },
    });
  });
});

describe('top level', () => {
  it('turns a stray semicolon into an end-of-line node', () => {
    const nodes = parseOk('foo();\n;');
    expect(nodes.map((n) => [n.inner.kind, n.range])).toEqual([
      ['Expression', { start: 0, end: 5 }],
      ['Expression', { start: 5, end: 6 }],
      ['Expression', { start: 7, end: 8 }],
    ]);
  });

  it('skips comments between nodes', () => {
    const nodes = parseOk('// header\nvar a = 1; /* note */ var b = 2;');
    expect(nodes).toHaveLength(2);
  });
});
