import type { Node } from '../frontend/ast.js';

/**
 * Serialized AST for one source.
 */
export type AstJson = {
  format: 'tern-ast';
  version: 1;
  source: string;
  nodes: readonly Node[];
};

/**
 * In-memory AST dump artifact.
 */
export interface AstArtifact {
  kind: 'ast';
  path?: string;
  json: AstJson;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AstArtifact;

export interface WriteAstOptions {
  /** Name of the source the AST was parsed from. */
  source?: string;
}

/**
 * Format writers used by the pipeline to turn a parsed AST into artifacts.
 */
export interface FormatWriters {
  writeAst(nodes: readonly Node[], opts?: WriteAstOptions): AstArtifact;
}
