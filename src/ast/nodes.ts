// ============================================================
// Types
// ============================================================

export enum TypeTag {
  Int = "int",
}

// ============================================================
// Statements
// ============================================================

export type Statement = FunctionDeclare | ReturnStatement;

/** `int main() { ... }`. The body is never empty and always ends in a return. */
export interface FunctionDeclare {
  kind: "FunctionDeclare";
  name: string;
  returnType: TypeTag;
  body: Statement[];
}

export interface ReturnStatement {
  kind: "Return";
  term: Term;
}

// ============================================================
// Terms
// ============================================================

export type Term = IntegerLiteralTerm;

export interface IntegerLiteralTerm {
  kind: "IntegerLiteral";
  /** Digits exactly as written. */
  text: string;
}

// ============================================================
// Program
// ============================================================

export type Program = Statement[];
