export interface Position {
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

export interface Diagnostic {
  message: string;
  span: Span;
  /** The full source line the span starts on. */
  lineText: string;
  help?: string;
}

/** A source file as the lexer saw it: its name and its lines, without terminators. */
export interface SourceFile {
  name: string;
  lines: string[];
}

export function error(message: string, span: Span, lineText: string, help?: string): Diagnostic {
  return { message, span, lineText, help };
}

export function makeSpan(source: string, line: number, column: number, width: number): Span {
  return {
    start: { line, column },
    end: { line, column: column + width },
    source,
  };
}

export function lineAt(file: SourceFile, line: number): string {
  return file.lines[line - 1] ?? "";
}

/** The position just past the last character of the last line. */
export function endOfInput(file: SourceFile): Position {
  const line = Math.max(1, file.lines.length);
  return { line, column: Array.from(lineAt(file, line)).length + 1 };
}
