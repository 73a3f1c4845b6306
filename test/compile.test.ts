import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { compile, compileScript, compileSource } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { FormatWriters } from '../src/formats/types.js';
import { ContextStore } from '../src/frontend/context.js';
import { printNode } from '../src/frontend/print.js';

const deps = { formats: defaultFormatWriters };

describe('compileScript', () => {
  it('returns the AST and no diagnostics for valid input', () => {
    const res = compileScript('main.tern', 'var x = 1;\nprint(x);', {}, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts).toEqual([]);
    expect(res.body?.length).toBe(3);
    expect(res.source).toBe('var x = 1;\nprint(x);');
  });

  it('turns a structural parse error into a located diagnostic', () => {
    const res = compileScript('main.tern', 'var x = ;', {}, deps);
    expect(res.body).toBeUndefined();
    expect(res.partial?.length).toBe(0);
    expect(res.diagnostics).toEqual([
      {
        id: 'TRN100',
        severity: 'error',
        message: 'An expression was expected after this operator.',
        file: 'main.tern',
        range: { start: 8, end: 9 },
        label: '"=" needs a right-hand side',
        line: 1,
        column: 9,
      },
    ]);
  });

  it('reports running out of input with its own id and a hint', () => {
    const [d] = compileScript('main.tern', 'var x = 1', {}, deps).diagnostics;
    expect(d).toMatchObject({ id: 'TRN101', line: 1, column: 1, hint: 'input ends here' });
  });

  it('reports lexical errors and still parses the remaining tokens', () => {
    const res = compileScript('main.tern', 'var x = 1; @', {}, deps);
    expect(res.diagnostics).toEqual([
      {
        id: 'TRN110',
        severity: 'error',
        message: 'Unknown character "@".',
        file: 'main.tern',
        range: { start: 11, end: 12 },
        label: 'not part of the language',
        line: 1,
        column: 12,
      },
    ]);
    expect(res.body?.length).toBe(1);
  });

  it('maps unterminated strings and comments to their ids', () => {
    expect(compileScript('s.tern', 'var s = "open', {}, deps).diagnostics.map((d) => d.id)).toEqual([
      'TRN111',
      'TRN101',
    ]);
    expect(compileScript('c.tern', '/* open', {}, deps).diagnostics.map((d) => d.id)).toEqual(['TRN112']);
  });

  it('runs token checks unless they are turned off', () => {
    const checked = compileScript('main.tern', 'foo bar', {}, deps);
    expect(checked.diagnostics).toMatchObject([{ id: 'TRN200', severity: 'warning', line: 1, column: 5 }]);
    expect(checked.body?.length).toBe(2);

    expect(compileScript('main.tern', 'foo bar', { semanticChecks: false }, deps).diagnostics).toEqual([]);
  });

  it('selects the operator grouping', () => {
    const group = (precedence: 'legacy' | 'standard') => {
      const node = compileScript('main.tern', '2 * 3 + 1;', { precedence }, deps).body?.getProgram()[0];
      return node === undefined ? undefined : printNode(node);
    };
    expect(group('legacy')).toBe('(2 * (3 + 1))');
    expect(group('standard')).toBe('((2 * 3) + 1)');
  });
});

describe('artifacts', () => {
  it('produces an AST artifact when asked', () => {
    const res = compileScript('dir\\a.tern', 'var x = 1;', { dumpAst: true }, deps);
    expect(res.artifacts).toHaveLength(1);
    const [artifact] = res.artifacts;
    expect(artifact?.json.format).toBe('tern-ast');
    expect(artifact?.json.version).toBe(1);
    expect(artifact?.json.source).toBe('dir/a.tern');
    expect(artifact?.json.nodes).toBe(res.body?.getProgram());
  });

  it('produces nothing in ast-only mode or when errors were reported', () => {
    expect(compileScript('a.tern', 'var x = 1;', { dumpAst: true, astOnly: true }, deps).artifacts).toEqual([]);
    expect(compileScript('a.tern', 'f(]);', { dumpAst: true }, deps).artifacts).toEqual([]);
  });

  it('passes the parsed nodes to the injected writer', () => {
    const writeAst = vi.fn<Parameters<FormatWriters['writeAst']>, ReturnType<FormatWriters['writeAst']>>(
      defaultFormatWriters.writeAst,
    );
    compileScript('a.tern', 'var x = 1;', { dumpAst: true }, { formats: { writeAst } });
    expect(writeAst).toHaveBeenCalledTimes(1);
    expect(writeAst.mock.calls[0]?.[1]).toEqual({ source: 'a.tern' });
  });
});

describe('compileSource', () => {
  it('releases the context it registered', () => {
    const store = new ContextStore();
    compileSource({ kind: 'virtual', name: 'a.tern', text: 'var x = 1;' }, {}, deps, store);
    compileSource({ kind: 'virtual', name: 'b.tern', text: 'var = ;' }, {}, deps, store);
    expect(store.size).toBe(0);
    expect(store.nextContextId()).toBe(3);
  });
});

describe('compile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tern-compile-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and compiles a file', async () => {
    const entry = join(dir, 'main.tern');
    await writeFile(entry, 'var x = (;\n', 'utf8');
    const res = await compile(entry, {}, deps);
    expect(res.diagnostics.map((d) => [d.id, d.file, d.line, d.column])).toEqual([
      ['TRN201', entry, 1, 9],
      ['TRN100', entry, 1, 9],
    ]);
  });

  it('reports a file that cannot be read', async () => {
    const entry = join(dir, 'missing.tern');
    const res = await compile(entry, {}, deps);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe('TRN001');
    expect(res.diagnostics[0]?.file).toBe(entry);
    expect(res.diagnostics[0]?.message.startsWith('Failed to read entry file:')).toBe(true);
    expect(res.source).toBeUndefined();
  });
});
