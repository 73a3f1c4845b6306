/**
 * Line/column location inside a source string.
 *
 * `line` is 1-based, `column` is 0-based and counts UTF-16 code units since the last line feed.
 */
export interface Position {
  line: number;
  column: number;
  /** 0-based code-unit offset into the source text. */
  offset: number;
}

/**
 * Half-open offset range `[start, end)` into a source string.
 */
export interface TextRange {
  start: number;
  end: number;
}

/**
 * A labelled source span.
 */
export interface Region {
  start: Position;
  end: Position;
  label: string;
}

/**
 * True when `a` comes no later than `b`.
 */
export function isLeading(a: Position, b: Position): boolean {
  return a.line < b.line || (a.line === b.line && a.column <= b.column);
}

export function makeRegion(start: Position, end: Position, label = ''): Region {
  return { start, end, label };
}

export function regionIncludes(region: Region, pos: Position): boolean {
  return isLeading(region.start, pos) && isLeading(pos, region.end);
}

/**
 * Grow `region` so that it ends at `pos` when `pos` lies beyond the current end.
 */
export function expandRegion(region: Region, pos: Position): Region {
  if (isLeading(pos, region.end)) return region;
  return { ...region, end: pos };
}

/**
 * Move the end of `region` back to `pos`.
 *
 * Throws a `RangeError` when `pos` lies before the region start.
 */
export function shrinkRegion(region: Region, pos: Position): Region {
  if (!isLeading(region.start, pos)) {
    throw new RangeError(
      `Cannot shrink region ending at ${region.end.line}:${region.end.column} to ${pos.line}:${pos.column} before its start ${region.start.line}:${region.start.column}`,
    );
  }
  return { ...region, end: pos };
}

export function joinRanges(a: TextRange, b: TextRange): TextRange {
  return { start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}
