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

export type Severity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "UnbalancedDelimiter"
  | "IllegalContext"
  | "LexicalError"
  | "EmbeddedSyntax"
  | "PlainInterpolation";

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  help?: string;
  code?: DiagnosticCode;
}

export function error(message: string, span: Span, help?: string, code?: DiagnosticCode): Diagnostic {
  return { severity: "error", message, span, help, code };
}

export function warning(message: string, span: Span, help?: string, code?: DiagnosticCode): Diagnostic {
  return { severity: "warning", message, span, help, code };
}

/**
 * Walk `text` from `start` (the position of `text[0]`) up to `offset`
 * and return the position reached.
 */
export function advancePosition(start: Position, text: string, offset: number): Position {
  let line = start.line;
  let column = start.column;
  const limit = Math.min(offset, text.length);
  for (let i = 0; i < limit; i++) {
    if (text[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { offset: start.offset + limit, line, column };
}

/** Span of `length` characters starting at `offset` within `text`. */
export function spanWithin(
  source: string,
  start: Position,
  text: string,
  offset: number,
  length: number,
): Span {
  return {
    start: advancePosition(start, text, offset),
    end: advancePosition(start, text, offset + length),
    source,
  };
}

/**
 * Re-anchor a span produced by a sub-lexer (which starts at line 1,
 * column 1, offset 0) onto `base` in the enclosing source.
 */
export function shiftSpan(span: Span, base: Position): Span {
  const shift = (p: Position): Position => ({
    offset: base.offset + p.offset,
    line: base.line + p.line - 1,
    column: p.line === 1 ? base.column + p.column - 1 : p.column,
  });
  return { start: shift(span.start), end: shift(span.end), source: span.source };
}
