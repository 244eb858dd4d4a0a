import { TokenKind, makeToken, type Token, type TokenType } from "./tokens.js";
import { KEYWORDS, SYMBOLS } from "./keywords.js";
import { unknownCharacter, type LexerError } from "./errors.js";

/** Position of the scanner in the file, carried from one line to the next. */
export interface LexerState {
  line: number;
  column: number;
}

export function createLexerState(): LexerState {
  return { line: 1, column: 1 };
}

/**
 * Tokenizes one line of an `.o2` file, appending to `tokens`.
 *
 * Unknown characters are reported and skipped, so the rest of the line is
 * still scanned. When the line is done the state moves to column 1 of the
 * next line.
 */
export function tokenize(lineText: string, tokens: Token[], state: LexerState): LexerError[] {
  const errors: LexerError[] = [];
  const chars = Array.from(lineText);
  let index = 0;

  while (index < chars.length) {
    const ch = chars[index];
    const symbol = SYMBOLS.get(ch);

    if (symbol !== undefined) {
      tokens.push(makeToken({ kind: symbol }, state.line, state.column));
      state.column++;
      index++;
    } else if (ch === " ") {
      state.column++;
      index++;
    } else if (isAlpha(ch) || ch === "_") {
      const start = index;
      while (index < chars.length && (isAlphaNum(chars[index]) || chars[index] === "_")) {
        index++;
        state.column++;
      }
      const text = chars.slice(start, index).join("");
      pushRun(tokens, state, classifyWord(text), index - start);
    } else if (isDigit(ch)) {
      const start = index;
      while (index < chars.length && isDigit(chars[index])) {
        index++;
        state.column++;
      }
      const text = chars.slice(start, index).join("");
      pushRun(tokens, state, { kind: TokenKind.IntegerLiteral, text }, index - start);
    } else {
      errors.push(unknownCharacter(ch, lineText, state.line, state.column));
      state.column++;
      index++;
    }
  }

  state.line++;
  state.column = 1;

  return errors;
}

/**
 * Splits source text into lines the way a line reader does: `\n` and `\r\n`
 * both end a line, and a final line terminator does not start a new line.
 */
export function splitLines(source: string): string[] {
  if (source === "") return [];
  const lines = source.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (source.endsWith("\n")) lines.pop();
  return lines;
}

export interface LexResult {
  tokens: Token[];
  errors: LexerError[];
}

export class Lexer {
  readonly lines: string[];

  constructor(source: string) {
    this.lines = splitLines(source);
  }

  tokenize(): LexResult {
    const state = createLexerState();
    const tokens: Token[] = [];
    const errors: LexerError[] = [];
    for (const line of this.lines) {
      errors.push(...tokenize(line, tokens, state));
    }
    return { tokens, errors };
  }
}

// The run has already been consumed, so its first column is `length` back.
function pushRun(tokens: Token[], state: LexerState, type: TokenType, length: number): void {
  tokens.push(makeToken(type, state.line, state.column - length));
}

function classifyWord(text: string): TokenType {
  const keyword = KEYWORDS.get(text);
  if (keyword !== undefined) return { kind: keyword };
  return { kind: TokenKind.Identifier, text };
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isAlphaNum(ch: string): boolean {
  return isDigit(ch) || isAlpha(ch);
}
