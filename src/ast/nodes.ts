import type { Span } from "../errors/diagnostic.js";
import type { TypeKeyword } from "../lexer/tokens.js";

// ============================================================
// Base
// ============================================================

interface BaseNode {
  readonly span: Span;
}

// ============================================================
// Program
// ============================================================

export interface Program extends BaseNode {
  readonly kind: "Program";
  readonly statements: readonly Statement[];
}

// ============================================================
// Expressions
// ============================================================

export type Expression =
  | Identifier
  | IntegerLiteral
  | FloatLiteral
  | StringLiteral
  | BooleanLiteral
  | NilLiteral
  | VoidLiteral
  | PrefixExpression
  | InfixExpression
  | TypeOfExpression;

export interface Identifier extends BaseNode {
  readonly kind: "Identifier";
  readonly name: string;
}

export interface IntegerLiteral extends BaseNode {
  readonly kind: "IntegerLiteral";
  /** Always within the signed 64-bit range. */
  readonly value: bigint;
  readonly text: string;
}

export interface FloatLiteral extends BaseNode {
  readonly kind: "FloatLiteral";
  readonly value: number;
  readonly text: string;
}

export interface StringLiteral extends BaseNode {
  readonly kind: "StringLiteral";
  readonly value: string;
}

export interface BooleanLiteral extends BaseNode {
  readonly kind: "BooleanLiteral";
  readonly value: boolean;
  readonly text: string;
}

export interface NilLiteral extends BaseNode {
  readonly kind: "NilLiteral";
  /** "null" or "nil", as written. */
  readonly text: string;
}

export interface VoidLiteral extends BaseNode {
  readonly kind: "VoidLiteral";
  readonly text: string;
}

export type PrefixOperator = "+" | "-";

export interface PrefixExpression extends BaseNode {
  readonly kind: "PrefixExpression";
  readonly operator: PrefixOperator;
  readonly operand: Expression;
}

export type InfixOperator =
  | "+" | "-" | "*" | "/" | "%"
  | "==" | "!="
  | "<" | ">" | "<=" | ">="
  | "&&" | "||";

export interface InfixExpression extends BaseNode {
  readonly kind: "InfixExpression";
  readonly operator: InfixOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface TypeOfExpression extends BaseNode {
  readonly kind: "TypeOfExpression";
  readonly operand: Expression;
}

// ============================================================
// Statements
// ============================================================

export type Statement =
  | ExpressionStatement
  | VariableDeclaration
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | BlockStatement
  | IfStatement
  | WhileStatement
  | LoopStatement
  | ForStatement
  | FunctionStatement;

export interface ExpressionStatement extends BaseNode {
  readonly kind: "ExpressionStatement";
  readonly expression: Expression;
}

export interface VariableDeclaration extends BaseNode {
  readonly kind: "VariableDeclaration";
  readonly declaredType: TypeAnnotation;
  readonly name: Identifier;
  readonly initializer: Expression;
}

export interface ReturnStatement extends BaseNode {
  readonly kind: "ReturnStatement";
  readonly value?: Expression;
}

export interface BreakStatement extends BaseNode {
  readonly kind: "BreakStatement";
}

export interface ContinueStatement extends BaseNode {
  readonly kind: "ContinueStatement";
}

export interface BlockStatement extends BaseNode {
  readonly kind: "BlockStatement";
  readonly statements: readonly Statement[];
}

export interface ElseIfClause extends BaseNode {
  readonly kind: "ElseIfClause";
  readonly condition: Expression;
  readonly block: BlockStatement;
}

export interface IfStatement extends BaseNode {
  readonly kind: "IfStatement";
  readonly condition: Expression;
  readonly thenBlock: BlockStatement;
  /** In source order; evaluated top to bottom, first true wins. */
  readonly elseIfs: readonly ElseIfClause[];
  readonly elseBlock?: BlockStatement;
}

export interface WhileStatement extends BaseNode {
  readonly kind: "WhileStatement";
  readonly condition: Expression;
  readonly block: BlockStatement;
}

/** `loop { ... }`: runs until a `break`. */
export interface LoopStatement extends BaseNode {
  readonly kind: "LoopStatement";
  readonly block: BlockStatement;
}

export interface ForStatement extends BaseNode {
  readonly kind: "ForStatement";
  readonly variable: Identifier;
  readonly iterable: Expression;
  readonly block: BlockStatement;
}

export interface FunctionStatement extends BaseNode {
  readonly kind: "FunctionStatement";
  readonly returnType: TypeAnnotation;
  readonly name: Identifier;
  readonly parameters: readonly Parameter[];
  readonly body: BlockStatement;
}

// ============================================================
// Declarations support
// ============================================================

export interface TypeAnnotation extends BaseNode {
  readonly kind: "TypeAnnotation";
  readonly token: TypeKeyword;
  /** Primitive type name as written: int, string, float or void. */
  readonly name: string;
}

export interface Parameter extends BaseNode {
  readonly kind: "Parameter";
  readonly type: TypeAnnotation;
  readonly name: Identifier;
}

/**
 * Splits a left-nested infix chain such as `((a + b) - c)` into its leftmost
 * operand and its links, innermost first. Walks the spine without recursion.
 */
export function flattenInfixChain(expr: InfixExpression): { head: Expression; links: InfixExpression[] } {
  const links: InfixExpression[] = [];
  let node: Expression = expr;
  while (node.kind === "InfixExpression") {
    links.push(node);
    node = node.left;
  }
  return { head: node, links: links.reverse() };
}

/** Exhaustiveness guard for switches over node kinds. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled node: ${String(value)}`);
}
