import chalk from "chalk";
import type { Diagnostic, Severity } from "./diagnostic.js";

const LABELS: Record<Severity, (text: string) => string> = {
  error: (text) => chalk.red.bold(text),
  warning: (text) => chalk.yellow.bold(text),
  info: (text) => chalk.blue.bold(text),
};

/** Shape of a diagnostic in `ilower check --json`. */
export interface JsonDiagnostic {
  severity: Severity;
  code: string | null;
  message: string;
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  hint: string | null;
}

/**
 * Render a diagnostic with every source line its span covers. Interpolated
 * literals may run over several lines, so each line gets its own underline.
 */
export function formatDiagnostic(source: string, diag: Diagnostic): string {
  const lines = source.split("\n");
  const { start, end } = diag.span;
  // A span ending at column 1 stops with the previous line.
  const lastLine = end.line > start.line && end.column === 1 ? end.line - 1 : end.line;
  const gutter = " ".repeat(String(lastLine).length);
  const bar = chalk.blue("|");
  const code = diag.code ? `[${diag.code}]` : "";

  let output = `${LABELS[diag.severity](diag.severity)}${code}: ${chalk.bold(diag.message)}\n`;
  output += `${gutter} ${chalk.blue("-->")} ${diag.span.source}:${start.line}:${start.column}\n`;
  output += `${gutter} ${bar}\n`;

  for (let n = start.line; n <= lastLine; n++) {
    const text = lines[n - 1] ?? "";
    const from = n === start.line ? start.column : 1;
    const to = n === end.line ? end.column : text.length + 1;
    output += `${chalk.blue(String(n).padStart(gutter.length))} ${bar} ${text}\n`;
    output += `${gutter} ${bar} ${" ".repeat(from - 1)}${chalk.red("^".repeat(Math.max(1, to - from)))}\n`;
  }

  if (diag.help) {
    output += `${gutter} ${chalk.blue("=")} ${chalk.green("help")}: ${diag.help}\n`;
  }
  return output;
}

export function formatDiagnostics(source: string, diagnostics: Diagnostic[]): string {
  return diagnostics.map((d) => formatDiagnostic(source, d)).join("\n");
}

export function toJsonDiagnostic(diag: Diagnostic): JsonDiagnostic {
  return {
    severity: diag.severity,
    code: diag.code ?? null,
    message: diag.message,
    line: diag.span.start.line,
    column: diag.span.start.column,
    endLine: diag.span.end.line,
    endColumn: diag.span.end.column,
    hint: diag.help ?? null,
  };
}
