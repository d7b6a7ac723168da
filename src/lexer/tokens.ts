import type { Span } from "../errors/diagnostic.js";

export enum TokenKind {
  // Special
  Illegal = "ILLEGAL",
  EOF = "EOF",

  // Identifiers and literals
  Ident = "IDENT",
  Int = "INT",
  Float = "FLOAT",
  String = "STRING",
  Bool = "BOOL",
  Nil = "NIL",

  // Delimiters
  LParen = "(",
  RParen = ")",
  LBrace = "{",
  RBrace = "}",
  Comma = ",",
  Semicolon = ";",

  // Operators
  Add = "+",
  Sub = "-",
  Mul = "*",
  Div = "/",
  Mod = "%",
  Assign = "=",
  Eq = "==",
  NotEq = "!=",
  Lt = "<",
  Gt = ">",
  Le = "<=",
  Ge = ">=",
  Not = "!",
  And = "&&",
  Or = "||",

  // Keywords
  If = "if",
  Else = "else",
  While = "while",
  For = "for",
  Loop = "loop",
  In = "in",
  Func = "fn",
  Return = "return",
  Type = "TYPE",
  Void = "void",
  TypeOf = "typeof",
  Break = "break",
  Continue = "continue",
}

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly span: Span;
}

/** Kinds that can start a type annotation (`int x`, `void f()`). */
export type TypeKeyword = TokenKind.Type | TokenKind.Void;

export function isTypeKeyword(kind: TokenKind): kind is TypeKeyword {
  return kind === TokenKind.Type || kind === TokenKind.Void;
}
