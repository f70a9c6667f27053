export interface Position {
  /** UTF-16 index into the source text. */
  offset: number;
  line: number;
  /** 1-based, counted in code points. */
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  help?: string;
}

export const START_POSITION: Position = Object.freeze({ offset: 0, line: 1, column: 1 });

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", message, span, help };
}

export function warning(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "warning", message, span, help };
}

export function makeSpan(source: string, start: Position, end: Position): Span {
  return { start, end, source };
}

/** The position reached after reading `text` starting at `from`. */
export function advancePosition(from: Position, text: string): Position {
  let { offset, line, column } = from;
  for (const ch of text) {
    offset += ch.length;
    if (ch === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { offset, line, column };
}
