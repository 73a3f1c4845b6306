import type { TextRange } from '../frontend/position.js';

/**
 * One line of a {@link SourceBuffer}, without its line feed.
 */
export class SourceLine {
  /** Offset of the first character of the line. */
  readonly offset: number;
  /** Length of the line, excluding the line feed. */
  readonly len: number;
  /** 1-based line number. */
  readonly line: number;
  readonly source: string;

  constructor(offset: number, line: number, source: string) {
    this.offset = offset;
    this.len = source.length;
    this.line = line;
    this.source = source;
  }

  /** Offset one past the last character of the line. */
  offsetMax(): number {
    return this.offset + this.len;
  }

  /** `range` relative to the start of this line. */
  offsetRelative(range: TextRange): TextRange {
    return { start: range.start - this.offset, end: range.end - this.offset };
  }

  /** Line text without surrounding whitespace, plus how many leading characters were cut. */
  trim(): { text: string; leading: number } {
    const withoutLeading = this.source.trimStart();
    return {
      text: withoutLeading.trimEnd(),
      leading: this.source.length - withoutLeading.length,
    };
  }

  /** Columns between the start of the trimmed line and `range.start`, never negative. */
  spacesUntil(range: TextRange): number {
    return Math.max(0, this.offsetRelative(range).start - this.trim().leading);
  }
}

/**
 * Diagnostics view of a source text. Lines are recomputed on every call.
 */
export class SourceBuffer {
  private readonly text: string;

  constructor(text: string) {
    this.text = text;
  }

  get(): string {
    return this.text;
  }

  getLines(): SourceLine[] {
    const lines: SourceLine[] = [];
    let offset = 0;
    this.text.split('\n').forEach((source, i) => {
      lines.push(new SourceLine(offset, i + 1, source));
      offset += source.length + 1;
    });
    return lines;
  }

  /** The line whose `[offset, offset + len]` contains `offset`. */
  getLineAt(offset: number): SourceLine | undefined {
    return this.getLines().find((l) => l.offset <= offset && offset <= l.offsetMax());
  }
}
