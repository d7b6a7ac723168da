export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

// Parsing reports errors only.
export type Severity = "error";

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  help?: string;
}

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", message, span, help };
}

/**
 * Append-only diagnostic list owned by a single parse.
 * Parse functions push into it and signal failure by returning no node.
 */
export class DiagnosticSink {
  private readonly items: Diagnostic[] = [];

  report(diag: Diagnostic): void {
    this.items.push(diag);
  }

  get size(): number {
    return this.items.length;
  }

  /** True when anything was reported after `mark` (a previous `size`). */
  hasErrorsSince(mark: number): boolean {
    return this.items.length > mark;
  }

  all(): readonly Diagnostic[] {
    return this.items;
  }

  messages(): string[] {
    return this.items.map((d) => d.message);
  }
}
