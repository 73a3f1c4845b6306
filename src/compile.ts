import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps, PrecedenceMode } from './pipeline.js';

import { analyzeTokens } from './frontend/analysis.js';
import { ContextStore } from './frontend/context.js';
import type { SourceOrigin } from './frontend/context.js';
import { LEGACY_POLICY, STANDARD_POLICY } from './frontend/ops.js';
import type { OperatorPolicy } from './frontend/ops.js';
import { AstGenerator } from './frontend/parser.js';
import type { ParseOutcome, ParserError } from './frontend/parser.js';
import { locate, makeSourceFile } from './frontend/source.js';
import type { SourceFile } from './frontend/source.js';
import { lex } from './frontend/tokenizer.js';
import type { LexError, LexErrorKind } from './frontend/tokenizer.js';
import type { Artifact } from './formats/types.js';

function withDefaults(options: CompilerOptions): Required<CompilerOptions> {
  return {
    semanticChecks: options.semanticChecks ?? true,
    dumpAst: options.dumpAst ?? false,
    astOnly: options.astOnly ?? false,
    precedence: options.precedence ?? 'legacy',
  };
}

function operatorPolicy(mode: PrecedenceMode): OperatorPolicy {
  return mode === 'standard' ? STANDARD_POLICY : LEGACY_POLICY;
}

function withLocation(file: SourceFile, d: Diagnostic): Diagnostic {
  if (!d.range) return d;
  const { line, column } = locate(file, d.range.start);
  return { ...d, line, column };
}

const LEX_IDS = {
  UnknownChar: DiagnosticIds.LexUnknownChar,
  UnterminatedString: DiagnosticIds.LexUnterminatedString,
  UnterminatedComment: DiagnosticIds.LexUnterminatedComment,
} as const satisfies Record<LexErrorKind, Diagnostic['id']>;

function lexDiagnostic(file: SourceFile, e: LexError): Diagnostic {
  return withLocation(file, {
    id: LEX_IDS[e.kind],
    severity: 'error',
    message: e.message,
    file: file.name,
    range: e.range,
    label: e.kind === 'UnknownChar' ? 'not part of the language' : 'never closed',
  });
}

function parseDiagnostic(file: SourceFile, e: ParserError): Diagnostic {
  return withLocation(file, {
    id: e.reason === 'exhaustion' ? DiagnosticIds.UnexpectedEof : DiagnosticIds.ParseError,
    severity: 'error',
    message: e.message,
    file: file.name,
    range: e.range,
    label: e.label,
    ...(e.inline !== undefined ? { hint: e.inline } : {}),
  });
}

/**
 * Lex, check and parse one source held in memory.
 *
 * A context is registered in `store` while the source is parsed and removed afterwards.
 */
export function compileSource(
  origin: SourceOrigin,
  options: CompilerOptions,
  deps: PipelineDeps,
  store: ContextStore = new ContextStore(),
): CompileResult {
  const opts = withDefaults(options);
  const context = store.add(origin);
  const file = makeSourceFile(context.name, origin.text);
  const diagnostics: Diagnostic[] = [];

  try {
    const { tokens, errors } = lex(origin.text);
    for (const e of errors) diagnostics.push(lexDiagnostic(file, e));

    if (opts.semanticChecks) {
      for (const d of analyzeTokens(tokens, file.name)) diagnostics.push(withLocation(file, d));
    }

    let outcome: ParseOutcome;
    try {
      outcome = new AstGenerator(tokens, context, { operators: operatorPolicy(opts.precedence) }).generate();
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.InternalParseError,
        severity: 'error',
        message: `Internal error during parse: ${String(err)}`,
        file: file.name,
      });
      return { diagnostics, artifacts: [], source: origin.text };
    }

    if (!outcome.ok) {
      diagnostics.push(parseDiagnostic(file, outcome.error));
      return { diagnostics, artifacts: [], partial: outcome.partial, source: origin.text };
    }

    const artifacts: Artifact[] = [];
    if (opts.dumpAst && !opts.astOnly && !hasErrors(diagnostics)) {
      artifacts.push(deps.formats.writeAst(outcome.body.getProgram(), { source: file.name }));
    }
    return { diagnostics, artifacts, body: outcome.body, source: origin.text };
  } finally {
    store.remove(context.id);
  }
}

/**
 * Compile an in-memory script under a caller-chosen name.
 */
export function compileScript(
  name: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  return compileSource({ kind: 'virtual', name, text }, options, deps);
}

/**
 * Compile a Tern source file.
 *
 * The file is read once, as UTF-8, before anything is tokenized. Artifacts are produced in
 * memory via `deps.formats`; nothing is written to disk.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  let text: string;
  try {
    text = await readFile(resolve(entryFile), 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryFile,
        },
      ],
      artifacts: [],
    };
  }
  return compileSource({ kind: 'file', path: entryFile, text }, options, deps);
};
