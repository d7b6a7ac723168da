import type { Diagnostic } from "../errors/diagnostic.js";
import { error } from "../errors/diagnostic.js";
import { TokenKind, type Token } from "../lexer/tokens.js";

export function unexpectedNextToken(expected: TokenKind, actual: Token): Diagnostic {
  return error(
    `expected next token to be ${expected}, got ${actual.kind} instead`,
    actual.span,
    bracesHint(expected),
  );
}

export function noPrefixParseFunction(token: Token): Diagnostic {
  if (token.kind === TokenKind.EOF) {
    return error("unexpected end of input", token.span);
  }
  return error(`no prefix parse function for ${token.kind} found`, token.span, illegalHint(token));
}

export function unexpectedToken(token: Token): Diagnostic {
  return error(`unexpected token: ${token.text}`, token.span);
}

export function expectedStatement(token: Token): Diagnostic {
  return error(`expected statement, got ${token.kind} instead`, token.span);
}

export function expectedType(token: Token): Diagnostic {
  return error(`expected type, got ${token.kind}`, token.span);
}

export function expectedParameterType(token: Token): Diagnostic {
  return error(
    `expected parameter type, got ${token.kind}`,
    token.span,
    "Parameters are written as 'type name', e.g. 'int count'",
  );
}

export function invalidNumber(token: Token, what: "integer" | "float"): Diagnostic {
  return error(
    `could not parse ${JSON.stringify(token.text)} as ${what}`,
    token.span,
    what === "integer" ? "Integer literals must fit in a signed 64-bit integer" : undefined,
  );
}

export function nestingTooDeep(token: Token, limit: number): Diagnostic {
  return error("nesting too deep", token.span, `Statements and expressions nest at most ${limit} levels`);
}

function bracesHint(expected: TokenKind): string | undefined {
  if (expected === TokenKind.LBrace) {
    return "Loop and function bodies must be wrapped in '{' and '}'";
  }
  return undefined;
}

function illegalHint(token: Token): string | undefined {
  if (token.kind !== TokenKind.Illegal) return undefined;
  if (token.text.startsWith('"')) return "String literal is missing its closing '\"'";
  if (token.text === "&") return "Use '&&' for logical and";
  if (token.text === "|") return "Use '||' for logical or";
  return undefined;
}
