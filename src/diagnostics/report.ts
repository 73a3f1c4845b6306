import type { TextRange } from '../frontend/position.js';
import { SourceBuffer } from './source_buffer.js';
import type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './types.js';

const SEVERITY_TAG: Record<DiagnosticSeverity, string> = {
  error: 'Err',
  warning: 'Wrn',
  info: 'Inf',
};

/**
 * An underlined excerpt of one source line.
 */
export class Snippet {
  readonly range: TextRange;
  readonly message: string;
  readonly inline: string | undefined;

  constructor(range: TextRange, message: string, inline?: string) {
    this.range = range;
    this.message = message;
    this.inline = inline;
  }

  /**
   * Render against `buffer`. The underline has one `~` per character of the range (at least one)
   * and is shifted left by the indentation trimmed off the displayed line.
   */
  getPrint(buffer: SourceBuffer, name: string, severity: DiagnosticSeverity = 'error'): string[] {
    const text = buffer.get();
    const start = Math.max(0, Math.min(this.range.start, text.length));
    const line = buffer.getLineAt(start);
    if (line === undefined) return [`${SEVERITY_TAG[severity]} | ---> ${this.message}`];

    const gutter = String(line.line);
    const pad = ' '.repeat(gutter.length);
    const column = start - line.offset + 1;
    const underline = '~'.repeat(Math.max(1, this.range.end - this.range.start));
    const marker = ' '.repeat(line.spacesUntil(this.range)) + underline;

    return [
      `${pad} --> ${name}:${line.line}:${column}`,
      `${pad} |`,
      `${gutter} | ${line.trim().text}`,
      `${pad} | ${this.inline ? `${marker} ${this.inline}` : marker}`,
      `${SEVERITY_TAG[severity]} | ---> ${this.message}`,
    ];
  }
}

/**
 * A rendered diagnostic: a headline plus one or more snippets.
 */
export class Report {
  readonly message: string;
  readonly name: string;
  readonly severity: DiagnosticSeverity;
  readonly id: DiagnosticId | undefined;
  private readonly snippets: Snippet[] = [];

  constructor(message: string, name: string, severity: DiagnosticSeverity = 'error', id?: DiagnosticId) {
    this.message = message;
    this.name = name;
    this.severity = severity;
    this.id = id;
  }

  addSnippet(snippet: Snippet): this {
    this.snippets.push(snippet);
    return this;
  }

  getSnippets(): readonly Snippet[] {
    return this.snippets;
  }

  render(buffer: SourceBuffer): string {
    const head = this.id ? `${this.severity}[${this.id}]: ${this.message}` : `${this.severity}: ${this.message}`;
    const lines = [head];
    for (const snippet of this.snippets) {
      lines.push(...snippet.getPrint(buffer, this.name, this.severity));
    }
    return `${lines.join('\n')}\n`;
  }
}

/**
 * Build a report for a diagnostic that carries a source range; diagnostics without one get a
 * headline only.
 */
export function reportFromDiagnostic(diagnostic: Diagnostic): Report {
  const report = new Report(diagnostic.message, diagnostic.file, diagnostic.severity, diagnostic.id);
  if (diagnostic.range) {
    report.addSnippet(
      new Snippet(diagnostic.range, diagnostic.hint ?? diagnostic.message, diagnostic.label),
    );
  }
  return report;
}

export function renderDiagnostic(diagnostic: Diagnostic, text: string): string {
  return reportFromDiagnostic(diagnostic).render(new SourceBuffer(text));
}
