import type { Diagnostic, SourceFile } from "../errors/diagnostic.js";
import { endOfInput, error, lineAt, makeSpan } from "../errors/diagnostic.js";
import type { Token, TokenKind } from "../lexer/tokens.js";
import { describeToken, describeTokenKind, tokenWidth } from "../lexer/tokens.js";

export type TokenTypeError =
  | { kind: "Expected"; expected: TokenKind; got: Token }
  | { kind: "ExpectedGotNone"; expected: TokenKind }
  | { kind: "ExpectedSomeGotNone" };

export type TermError =
  | { kind: "TokenType"; error: TokenTypeError }
  | { kind: "NoTerm" };

export type StatementError =
  | { kind: "Term"; error: TermError }
  | { kind: "TokenType"; error: TokenTypeError }
  | { kind: "MissingReturn"; name: string; closing: Token }
  | { kind: "UnexpectedToken"; token: Token };

export type ParserError = { kind: "Statement"; error: StatementError };

export function expected(kind: TokenKind, got: Token): TokenTypeError {
  return { kind: "Expected", expected: kind, got };
}

export function expectedGotNone(kind: TokenKind): TokenTypeError {
  return { kind: "ExpectedGotNone", expected: kind };
}

export function expectedSomeGotNone(): TokenTypeError {
  return { kind: "ExpectedSomeGotNone" };
}

const STATEMENT_HELP = "a statement is either 'return <integer>;' or a function like 'int main() { ... }'";

export function parserErrorToDiagnostic(err: ParserError, file: SourceFile): Diagnostic {
  return statementErrorToDiagnostic(err.error, file);
}

function statementErrorToDiagnostic(err: StatementError, file: SourceFile): Diagnostic {
  switch (err.kind) {
    case "Term":
      return termErrorToDiagnostic(err.error, file);
    case "TokenType":
      return tokenTypeErrorToDiagnostic(err.error, file);
    case "MissingReturn":
      return atToken(
        `function '${err.name}' does not end with a return statement`,
        err.closing,
        file,
        "add 'return <integer>;' before the closing '}'",
      );
    case "UnexpectedToken":
      return atToken(`unexpected ${describeToken(err.token)}`, err.token, file, STATEMENT_HELP);
  }
}

function termErrorToDiagnostic(err: TermError, file: SourceFile): Diagnostic {
  switch (err.kind) {
    case "TokenType":
      return tokenTypeErrorToDiagnostic(err.error, file);
    case "NoTerm":
      return atEnd("expected a term, got end of input", file);
  }
}

function tokenTypeErrorToDiagnostic(err: TokenTypeError, file: SourceFile): Diagnostic {
  switch (err.kind) {
    case "Expected":
      return atToken(
        `expected ${describeTokenKind(err.expected)}, got ${describeToken(err.got)}`,
        err.got,
        file,
      );
    case "ExpectedGotNone":
      return atEnd(`expected ${describeTokenKind(err.expected)}, got end of input`, file);
    case "ExpectedSomeGotNone":
      return atEnd("unexpected end of input", file);
  }
}

function atToken(message: string, token: Token, file: SourceFile, help?: string): Diagnostic {
  return error(
    message,
    makeSpan(file.name, token.line, token.column, tokenWidth(token.type)),
    lineAt(file, token.line),
    help,
  );
}

function atEnd(message: string, file: SourceFile): Diagnostic {
  const end = endOfInput(file);
  return error(message, makeSpan(file.name, end.line, end.column, 1), lineAt(file, end.line));
}
