#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import { reportFromDiagnostic } from './diagnostics/report.js';
import { SourceBuffer } from './diagnostics/source_buffer.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { printBody } from './frontend/print.js';
import type { PrecedenceMode } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  dumpAst: boolean;
  astOnly: boolean;
  semanticChecks: boolean;
  precedence: PrecedenceMode;
};

function usage(): string {
  return [
    'ternc [options] <entry.tern>',
    '',
    'Options:',
    '  -o, --output <file>   AST dump path (implies --dump-ast; default: <entry>.ast.json)',
    '      --dump-ast        Write the parsed AST as JSON',
    '      --ast-only        Print an outline of the AST to stdout and write nothing',
    '      --no-checks       Skip the pre-parse token checks',
    '      --precedence <m>  Operator grouping: legacy|standard (default: legacy)',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <entry.tern> must be the last argument.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function packageVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts runs from the repo root's src/, the built cli from dist/src/.
  const packageJsonPath = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')].find(
    (p) => existsSync(p),
  );
  if (packageJsonPath === undefined) return '0.0.0';
  const pkg: unknown = require(packageJsonPath);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function optionValue(argv: string[], i: number, flag: string): string {
  const a = argv[i] ?? '';
  if (a.startsWith(`${flag}=`)) {
    const v = a.slice(flag.length + 1);
    if (!v) fail(`${flag} expects a value`);
    return v;
  }
  const v = argv[i + 1];
  if (!v) fail(`${a} expects a value`);
  return v;
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let dumpAst = false;
  let astOnly = false;
  let semanticChecks = true;
  let precedence: PrecedenceMode = 'legacy';
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      outputPath = optionValue(argv, i, '--output');
      if (!a.includes('=')) i++;
      dumpAst = true;
      continue;
    }
    if (a === '--dump-ast') {
      dumpAst = true;
      continue;
    }
    if (a === '--ast-only' || a === '--print-ast') {
      astOnly = true;
      continue;
    }
    if (a === '--no-checks') {
      semanticChecks = false;
      continue;
    }
    if (a === '--precedence' || a.startsWith('--precedence=')) {
      const v = optionValue(argv, i, '--precedence');
      if (!a.includes('=')) i++;
      if (v !== 'legacy' && v !== 'standard') {
        fail(`Unsupported --precedence "${v}" (expected legacy|standard)`);
      }
      precedence = v;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <entry.tern> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.tern> argument (and it must be last)`);
  }
  if (astOnly && outputPath) {
    fail(`--ast-only writes no files; drop --output`);
  }
  if (outputPath && extname(outputPath).toLowerCase() !== '.json') {
    fail(`--output must end with ".json"`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    dumpAst,
    astOnly,
    semanticChecks,
    precedence,
  };
}

function defaultAstPath(entryFile: string): string {
  const entry = resolve(entryFile);
  const ext = extname(entry);
  const stem = ext.length > 0 ? entry.slice(0, -ext.length) : entry;
  return `${stem}.ast.json`;
}

async function writeArtifacts(path: string, artifacts: Artifact[]): Promise<void> {
  for (const artifact of artifacts) {
    if (artifact.kind !== 'ast') continue;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(artifact.json, null, 2)}\n`, 'utf8');
    process.stdout.write(`${path}\n`);
  }
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

function formatDiagnostic(d: Diagnostic, buffer: SourceBuffer | undefined): string {
  if (d.range && buffer) return reportFromDiagnostic(d).render(buffer);
  const loc = d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}\n`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        dumpAst: parsed.dumpAst,
        astOnly: parsed.astOnly,
        semanticChecks: parsed.semanticChecks,
        precedence: parsed.precedence,
      },
      { formats: defaultFormatWriters },
    );

    const buffer = res.source !== undefined ? new SourceBuffer(res.source) : undefined;
    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(formatDiagnostic(d, buffer));
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    if (parsed.astOnly && res.body) {
      process.stdout.write(printBody(res.body));
      return 0;
    }

    await writeArtifacts(parsed.outputPath ?? defaultAstPath(parsed.entryFile), res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ternc: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  const invoked = normalizePathForCompare(invokedAs);
  const normalizedSelf = normalizePathForCompare(self);
  if (invoked === normalizedSelf) return true;
  return invoked.endsWith('/dist/src/cli.js') && normalizedSelf.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
