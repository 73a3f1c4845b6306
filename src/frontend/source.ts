/**
 * Source text plus precomputed line-start offsets, used to convert offsets into line/column pairs.
 */
export interface SourceFile {
  name: string;
  text: string;
  /**
   * 0-based offsets for the start of each line. The first entry is always 0.
   */
  lineStarts: number[];
}

/** 1-based line and column, as printed in `file:line:col` locations. */
export interface SourceLocation {
  line: number;
  column: number;
}

export function makeSourceFile(name: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }
  return { name, text, lineStarts };
}

/**
 * Convert a 0-based offset in `file.text` into a 1-based line/column location.
 */
export function locate(file: SourceFile, offset: number): SourceLocation {
  const clamped = Math.max(0, Math.min(offset, file.text.length));
  let lo = 0;
  let hi = file.lineStarts.length - 1;
  while (lo < hi) {
    const mid = Math.floor((lo + hi + 1) / 2);
    const midStart = file.lineStarts[mid] ?? 0;
    if (midStart <= clamped) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  const lineStart = file.lineStarts[lo] ?? 0;
  return { line: lo + 1, column: clamped - lineStart + 1 };
}
