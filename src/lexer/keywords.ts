import { TokenKind } from "./tokens.js";

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ["if", TokenKind.If],
  ["else", TokenKind.Else],
  ["while", TokenKind.While],
  ["for", TokenKind.For],
  ["loop", TokenKind.Loop],
  ["in", TokenKind.In],
  ["fn", TokenKind.Func],
  ["func", TokenKind.Func],
  ["return", TokenKind.Return],
  ["typeof", TokenKind.TypeOf],
  ["break", TokenKind.Break],
  ["continue", TokenKind.Continue],
  ["true", TokenKind.Bool],
  ["false", TokenKind.Bool],
  ["null", TokenKind.Nil],
  ["nil", TokenKind.Nil],
  // All primitive type names share one kind; the parser tells them apart by text.
  ["int", TokenKind.Type],
  ["string", TokenKind.Type],
  ["void", TokenKind.Type],
  ["float", TokenKind.Type],
]);

export function lookupIdent(text: string): TokenKind {
  return KEYWORDS.get(text) ?? TokenKind.Ident;
}
