import type { Diagnostic } from './diagnostics/types.js';
import type { AstBody } from './frontend/ast.js';
import type { Artifact, FormatWriters } from './formats/types.js';

export type PrecedenceMode = 'legacy' | 'standard';

/**
 * Options read once before a source is parsed.
 */
export interface CompilerOptions {
  /** Run the pre-parse token checks (adjacent identifiers, unbalanced delimiters). Default on. */
  semanticChecks?: boolean;
  /** Produce an AST JSON artifact. */
  dumpAst?: boolean;
  /** Stop after parsing: return the AST and produce no artifacts. */
  astOnly?: boolean;
  /**
   * Binary operator grouping. `legacy` keeps the right-recursive grammar where
   * `2 * 3 + 1` is `2 * (3 + 1)`; `standard` uses conventional precedence.
   */
  precedence?: PrecedenceMode;
}

/**
 * Result of a compilation run: diagnostics, the AST, and any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  /** Complete AST, when parsing succeeded. */
  body?: AstBody;
  /** Nodes parsed before the first parse error. */
  partial?: AstBody;
  /** Source text, when it could be read. */
  source?: string;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
