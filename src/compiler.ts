import { Lexer } from "./lexer/lexer.js";
import { lexerErrorToDiagnostic } from "./lexer/errors.js";
import { Parser } from "./parser/parser.js";
import { parserErrorToDiagnostic } from "./parser/errors.js";
import type { Token } from "./lexer/tokens.js";
import type { Program } from "./ast/nodes.js";
import type { Diagnostic } from "./errors/diagnostic.js";

export interface CompileOptions {
  /** Stop once the file is tokenized. */
  emitTokens?: boolean;
}

export interface CompileResult {
  tokens?: Token[];
  program?: Program;
  /** Every lexical error, or the first parse error. Non-empty means compilation failed. */
  errors: Diagnostic[];
}

/**
 * Run the front end over a source string.
 *
 * The whole file is tokenized before parsing starts. If any character is
 * unknown, all of them are reported and the parser never runs.
 */
export function compile(
  source: string,
  filename: string,
  options: CompileOptions = {},
): CompileResult {
  // 1. Lex
  const lexer = new Lexer(source);
  const { tokens, errors: lexErrors } = lexer.tokenize();

  if (lexErrors.length > 0) {
    return { tokens, errors: lexErrors.map((e) => lexerErrorToDiagnostic(e, filename)) };
  }

  if (options.emitTokens) {
    return { tokens, errors: [] };
  }

  // 2. Parse
  const parsed = new Parser(tokens).parse();
  if (!parsed.ok) {
    const file = { name: filename, lines: lexer.lines };
    return { tokens, errors: [parserErrorToDiagnostic(parsed.error, file)] };
  }

  return { tokens, program: parsed.value, errors: [] };
}
