export enum TokenKind {
  // Literals
  IntegerLiteral = "IntegerLiteral",

  // Identifiers
  Identifier = "Identifier",

  // Keywords
  KeywordReturn = "KeywordReturn",

  // Types
  TypeInt = "TypeInt",

  // Symbols
  SymbolOpenParen = "SymbolOpenParen",
  SymbolCloseParen = "SymbolCloseParen",
  SymbolOpenCurly = "SymbolOpenCurly",
  SymbolCloseCurly = "SymbolCloseCurly",
  SymbolSemicolon = "SymbolSemicolon",
}

/** Kinds whose tokens carry the scanned text. */
export type TextTokenKind = TokenKind.IntegerLiteral | TokenKind.Identifier;

/** Kinds whose spelling is fixed. */
export type FixedTokenKind = Exclude<TokenKind, TextTokenKind>;

export type TokenType =
  | { kind: TokenKind.IntegerLiteral; text: string }
  | { kind: TokenKind.Identifier; text: string }
  | { kind: FixedTokenKind };

export const LEXEMES: Record<FixedTokenKind, string> = {
  [TokenKind.KeywordReturn]: "return",
  [TokenKind.TypeInt]: "int",
  [TokenKind.SymbolOpenParen]: "(",
  [TokenKind.SymbolCloseParen]: ")",
  [TokenKind.SymbolOpenCurly]: "{",
  [TokenKind.SymbolCloseCurly]: "}",
  [TokenKind.SymbolSemicolon]: ";",
};

export interface Token {
  readonly type: TokenType;
  /** 1-based */
  readonly line: number;
  /** 1-based, column of the token's first character */
  readonly column: number;
}

export function makeToken(type: TokenType, line: number, column: number): Token {
  return { type, line, column };
}

export function tokenTypeToString(type: TokenType): string {
  switch (type.kind) {
    case TokenKind.IntegerLiteral:
    case TokenKind.Identifier:
      return `${type.kind}(${type.text})`;
    default:
      return type.kind;
  }
}

// "SymbolOpenParen:1:9"
export function tokenToString(token: Token): string {
  return `${tokenTypeToString(token.type)}:${token.line}:${token.column}`;
}

/** Number of columns the token occupies on its line. */
export function tokenWidth(type: TokenType): number {
  switch (type.kind) {
    case TokenKind.IntegerLiteral:
    case TokenKind.Identifier:
      return Array.from(type.text).length;
    default:
      return LEXEMES[type.kind].length;
  }
}

export function describeTokenKind(kind: TokenKind): string {
  switch (kind) {
    case TokenKind.IntegerLiteral:
      return "an integer literal";
    case TokenKind.Identifier:
      return "an identifier";
    default:
      return `'${LEXEMES[kind]}'`;
  }
}

export function describeToken(token: Token): string {
  const type = token.type;
  switch (type.kind) {
    case TokenKind.IntegerLiteral:
      return `integer literal '${type.text}'`;
    case TokenKind.Identifier:
      return `identifier '${type.text}'`;
    default:
      return `'${LEXEMES[type.kind]}'`;
  }
}
