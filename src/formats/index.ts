import type { FormatWriters } from './types.js';
import { writeAst } from './writeAst.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeAst,
};
