import { TokenKind, type FixedTokenKind } from "./tokens.js";

export const KEYWORDS: Map<string, FixedTokenKind> = new Map([
  ["return", TokenKind.KeywordReturn],
  ["int", TokenKind.TypeInt],
]);

export const SYMBOLS: Map<string, FixedTokenKind> = new Map([
  ["(", TokenKind.SymbolOpenParen],
  [")", TokenKind.SymbolCloseParen],
  ["{", TokenKind.SymbolOpenCurly],
  ["}", TokenKind.SymbolCloseCurly],
  [";", TokenKind.SymbolSemicolon],
]);
