import { TokenKind, type Token } from "../lexer/tokens.js";
import { err, ok, type Result } from "../errors/result.js";
import {
  expected, expectedGotNone, expectedSomeGotNone,
  type ParserError, type StatementError, type TermError, type TokenTypeError,
} from "./errors.js";
import {
  TypeTag,
  type FunctionDeclare, type Program, type ReturnStatement, type Statement, type Term,
} from "../ast/nodes.js";

/**
 * Recursive-descent parser over a fully lexed file.
 *
 *   FunctionDeclare ::= 'int' Identifier '(' ')' '{' Statement* '}'
 *   Return          ::= 'return' Term ';'
 *   Term            ::= IntegerLiteral
 *
 * Parsing stops at the first error; nothing is recovered.
 */
export class Parser {
  private tokens: readonly Token[];
  private pos: number = 0;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
  }

  parse(): Result<Program, ParserError> {
    const program: Program = [];
    while (this.pos < this.tokens.length) {
      const statement = this.parseStatement();
      if (!statement.ok) return err({ kind: "Statement", error: statement.error });
      program.push(statement.value);
    }
    return ok(program);
  }

  /** The token `offset` places past the cursor, without consuming it. */
  peek(offset: number = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  /** Returns the token at the cursor and always moves past it, even at the end. */
  consume(): Token | undefined {
    const token = this.tokens[this.pos];
    this.pos++;
    return token;
  }

  // ============================================================
  // Statements
  // ============================================================

  private parseStatement(): Result<Statement, StatementError> {
    if (this.isFunctionDeclareAhead()) return this.parseFunctionDeclare();

    const next = this.peek();
    if (next === undefined) return err({ kind: "TokenType", error: expectedSomeGotNone() });
    if (next.type.kind === TokenKind.KeywordReturn) return this.parseReturn();

    return err({ kind: "UnexpectedToken", token: next });
  }

  private isFunctionDeclareAhead(): boolean {
    return (
      this.peek(0)?.type.kind === TokenKind.TypeInt &&
      this.peek(1)?.type.kind === TokenKind.Identifier &&
      this.peek(2)?.type.kind === TokenKind.SymbolOpenParen
    );
  }

  private parseFunctionDeclare(): Result<FunctionDeclare, StatementError> {
    // int main() {...}
    // ^^^
    const returnType = this.expect(TokenKind.TypeInt);
    if (!returnType.ok) return err({ kind: "TokenType", error: returnType.error });

    // int main() {...}
    //     ^^^^
    const name = this.expectIdent();
    if (!name.ok) return err({ kind: "TokenType", error: name.error });

    // int main() {...}
    //         ^^^
    for (const kind of [TokenKind.SymbolOpenParen, TokenKind.SymbolCloseParen, TokenKind.SymbolOpenCurly]) {
      const symbol = this.expect(kind);
      if (!symbol.ok) return err({ kind: "TokenType", error: symbol.error });
    }

    const block = this.parseBody();
    if (!block.ok) return block;

    const { body, closing } = block.value;
    if (body.length === 0 || body[body.length - 1].kind !== "Return") {
      return err({ kind: "MissingReturn", name: name.value, closing });
    }

    // parseBody stopped on the '}'
    this.consume();

    return ok({ kind: "FunctionDeclare", name: name.value, returnType: TypeTag.Int, body });
  }

  private parseBody(): Result<{ body: Statement[]; closing: Token }, StatementError> {
    const body: Statement[] = [];
    for (;;) {
      const next = this.peek();
      if (next === undefined) return err({ kind: "TokenType", error: expectedSomeGotNone() });
      if (next.type.kind === TokenKind.SymbolCloseCurly) return ok({ body, closing: next });

      const statement = this.parseStatement();
      if (!statement.ok) return statement;
      body.push(statement.value);
    }
  }

  private parseReturn(): Result<ReturnStatement, StatementError> {
    // return ...;
    // ^^^^^^
    const keyword = this.expect(TokenKind.KeywordReturn);
    if (!keyword.ok) return err({ kind: "TokenType", error: keyword.error });

    const term = this.parseTerm();
    if (!term.ok) return err({ kind: "Term", error: term.error });

    // return ...;
    //           ^
    const semicolon = this.expect(TokenKind.SymbolSemicolon);
    if (!semicolon.ok) return err({ kind: "TokenType", error: semicolon.error });

    return ok({ kind: "Return", term: term.value });
  }

  // ============================================================
  // Terms
  // ============================================================

  private parseTerm(): Result<Term, TermError> {
    const next = this.peek();
    if (next === undefined) return err({ kind: "NoTerm" });

    const type = next.type;
    if (type.kind !== TokenKind.IntegerLiteral) {
      return err({ kind: "TokenType", error: expected(TokenKind.IntegerLiteral, next) });
    }

    this.consume();
    return ok({ kind: "IntegerLiteral", text: type.text });
  }

  // ============================================================
  // Helpers
  // ============================================================

  private expect(kind: TokenKind): Result<Token, TokenTypeError> {
    const token = this.consume();
    if (token === undefined) return err(expectedGotNone(kind));
    if (token.type.kind !== kind) return err(expected(kind, token));
    return ok(token);
  }

  private expectIdent(): Result<string, TokenTypeError> {
    const token = this.consume();
    if (token === undefined) return err(expectedGotNone(TokenKind.Identifier));

    const type = token.type;
    if (type.kind !== TokenKind.Identifier) return err(expected(TokenKind.Identifier, token));
    return ok(type.text);
  }
}
