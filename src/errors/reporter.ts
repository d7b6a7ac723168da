import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { Diagnostic } from "./diagnostic.js";

export interface FormatOptions {
  /** Plain text without ANSI colour codes. */
  plain?: boolean;
}

export function formatDiagnostic(source: string, diag: Diagnostic, options: FormatOptions = {}): string {
  const c = painter(options);
  const lines = source.split("\n");
  const line = (lines[diag.span.start.line - 1] ?? "").replace(/\r$/, "");
  const lineNum = String(diag.span.start.line);
  const padding = " ".repeat(lineNum.length);

  // EOF and other zero-width spans still get one caret.
  const width = diag.span.end.line === diag.span.start.line
    ? Math.max(1, diag.span.end.column - diag.span.start.column)
    : Math.max(1, line.length - diag.span.start.column + 1);

  let output = `${c.red.bold(diag.severity)}: ${c.bold(diag.message)}\n`;
  output += `${padding} ${c.blue("-->")} ${diag.span.source}:${diag.span.start.line}:${diag.span.start.column}\n`;
  output += `${padding} ${c.blue("|")}\n`;
  output += `${c.blue(lineNum)} ${c.blue("|")} ${line}\n`;
  output += `${padding} ${c.blue("|")} ${" ".repeat(diag.span.start.column - 1)}${c.red("^".repeat(width))}\n`;

  if (diag.help) {
    output += `${padding} ${c.blue("=")} ${c.green("help")}: ${diag.help}\n`;
  }

  return output;
}

export function formatDiagnostics(
  source: string,
  diagnostics: readonly Diagnostic[],
  options: FormatOptions = {},
): string {
  const body = diagnostics.map((d) => formatDiagnostic(source, d, options)).join("\n");
  const errorCount = diagnostics.length;
  if (errorCount === 0) return body;
  const c = painter(options);
  return `${body}\n${c.red.bold(`${errorCount} ${errorCount === 1 ? "error" : "errors"}`)}\n`;
}

function painter(options: FormatOptions): ChalkInstance {
  return options.plain ? new Chalk({ level: 0 }) : chalk;
}
