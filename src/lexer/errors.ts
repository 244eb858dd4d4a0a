import type { Diagnostic } from "../errors/diagnostic.js";
import { error, makeSpan } from "../errors/diagnostic.js";

export interface UnknownCharacterError {
  kind: "UnknownCharacter";
  char: string;
  /** The whole line the character was found on. */
  lineText: string;
  line: number;
  column: number;
}

export type LexerError = UnknownCharacterError;

export function unknownCharacter(
  char: string,
  lineText: string,
  line: number,
  column: number,
): LexerError {
  return { kind: "UnknownCharacter", char, lineText, line, column };
}

export function lexerErrorToDiagnostic(err: LexerError, filename: string): Diagnostic {
  switch (err.kind) {
    case "UnknownCharacter":
      return error(
        `unknown character '${err.char}'`,
        makeSpan(filename, err.line, err.column, 1),
        err.lineText,
      );
  }
}
