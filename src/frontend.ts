import { Lexer } from "./lexer/lexer.js";
import { Parser } from "./parser/parser.js";
import type { Token } from "./lexer/tokens.js";
import type { Program, Expression } from "./ast/nodes.js";
import type { Diagnostic } from "./errors/diagnostic.js";

export interface ParseResult {
  program: Program;
  /** Messages in report order. Non-empty means `program` may be missing statements. */
  errors: string[];
  diagnostics: readonly Diagnostic[];
}

export interface ExpressionParseResult {
  expression: Expression | null;
  errors: string[];
  diagnostics: readonly Diagnostic[];
}

export function tokenize(source: string, filename: string = "<stdin>"): Token[] {
  return new Lexer(source, filename).tokenize();
}

/**
 * Parse a whole source string. Never throws on malformed input: the returned
 * program holds every statement that parsed, the errors describe the rest.
 */
export function parse(source: string, filename: string = "<stdin>"): ParseResult {
  const parser = new Parser(new Lexer(source, filename), filename);
  const program = parser.parseProgram();
  return { program, errors: parser.errors(), diagnostics: parser.diagnostics() };
}

/** Parse a single expression such as `typeof(x + 1)`. */
export function parseExpression(source: string, filename: string = "<stdin>"): ExpressionParseResult {
  const parser = new Parser(new Lexer(source, filename), filename);
  const expression = parser.parseStandaloneExpression();
  return { expression, errors: parser.errors(), diagnostics: parser.diagnostics() };
}
