import type { Expression, InfixOperator } from "../ast/nodes.js";
import { assertNever, flattenInfixChain } from "../ast/nodes.js";
import type { TypeEnvironment } from "./environment.js";
import { type PrimitiveType, INT, FLOAT, STRING, VOID, UNKNOWN, isNumeric } from "./types.js";

/**
 * The type an expression would evaluate to, worked out from the declared
 * types in `types` without evaluating anything. Unresolvable shapes are "unknown".
 */
export function inferType(expr: Expression, types: TypeEnvironment): PrimitiveType {
  switch (expr.kind) {
    case "IntegerLiteral":
    case "BooleanLiteral":
      return INT;
    case "FloatLiteral":
      return FLOAT;
    case "StringLiteral":
    case "TypeOfExpression":
      return STRING;
    case "NilLiteral":
    case "VoidLiteral":
      return VOID;
    case "Identifier":
      return types.get(expr.name);
    case "PrefixExpression": {
      const operand = inferType(expr.operand, types);
      return isNumeric(operand) ? operand : UNKNOWN;
    }
    case "InfixExpression": {
      const { head, links } = flattenInfixChain(expr);
      let type = inferType(head, types);
      for (const link of links) {
        type = inferInfix(link.operator, type, inferType(link.right, types));
      }
      return type;
    }
    default:
      return assertNever(expr);
  }
}

function inferInfix(operator: InfixOperator, left: PrimitiveType, right: PrimitiveType): PrimitiveType {
  switch (operator) {
    case "==":
    case "!=":
      return INT;
    case "<":
    case ">":
    case "<=":
    case ">=":
    case "&&":
    case "||":
      return isNumeric(left) && isNumeric(right) ? INT : UNKNOWN;
    case "+":
      if (left === STRING && right === STRING) return STRING;
      return arithmeticResult(left, right);
    case "-":
    case "*":
    case "/":
    case "%":
      return arithmeticResult(left, right);
  }
}

function arithmeticResult(left: PrimitiveType, right: PrimitiveType): PrimitiveType {
  if (left === INT && right === INT) return INT;
  if (isNumeric(left) && isNumeric(right)) return FLOAT;
  return UNKNOWN;
}
