import { TokenKind } from "../lexer/tokens.js";

export enum Precedence {
  Lowest = 1,
  Or,          // ||
  And,         // &&
  Equals,      // == !=
  LessGreater, // < > <= >=
  Sum,         // + -
  Product,     // * / %
  Prefix,      // -x +x
  Call,
}

export const PRECEDENCES: ReadonlyMap<TokenKind, Precedence> = new Map([
  [TokenKind.Or, Precedence.Or],
  [TokenKind.And, Precedence.And],
  [TokenKind.Eq, Precedence.Equals],
  [TokenKind.NotEq, Precedence.Equals],
  [TokenKind.Lt, Precedence.LessGreater],
  [TokenKind.Gt, Precedence.LessGreater],
  [TokenKind.Le, Precedence.LessGreater],
  [TokenKind.Ge, Precedence.LessGreater],
  [TokenKind.Add, Precedence.Sum],
  [TokenKind.Sub, Precedence.Sum],
  [TokenKind.Mul, Precedence.Product],
  [TokenKind.Div, Precedence.Product],
  [TokenKind.Mod, Precedence.Product],
]);

export function precedenceOf(kind: TokenKind, table: ReadonlyMap<TokenKind, Precedence> = PRECEDENCES): Precedence {
  return table.get(kind) ?? Precedence.Lowest;
}
