import type { Node } from '../frontend/ast.js';
import type { AstArtifact, WriteAstOptions } from './types.js';

export function writeAst(nodes: readonly Node[], opts: WriteAstOptions = {}): AstArtifact {
  return {
    kind: 'ast',
    json: {
      format: 'tern-ast',
      version: 1,
      source: (opts.source ?? '').replace(/\\/g, '/'),
      nodes,
    },
  };
}
