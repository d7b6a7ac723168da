import type { Expression, InfixExpression, InfixOperator, PrefixOperator } from "../ast/nodes.js";
import { assertNever, flattenInfixChain } from "../ast/nodes.js";
import type { EvalEnvironment } from "./environment.js";
import {
  type Value, NULL, intValue, floatValue, stringValue, boolValue, typeOfValue, valuesEqual,
} from "./values.js";

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

/**
 * Evaluates expressions only: literals, identifiers, prefix and infix
 * arithmetic, and typeof. Statements are never executed.
 */
export class Evaluator {
  evaluate(expr: Expression, env: EvalEnvironment): Value {
    switch (expr.kind) {
      case "IntegerLiteral":
        return intValue(expr.value);
      case "FloatLiteral":
        return floatValue(expr.value);
      case "StringLiteral":
        return stringValue(expr.value);
      case "BooleanLiteral":
        return boolValue(expr.value);
      case "NilLiteral":
      case "VoidLiteral":
        return NULL;
      case "Identifier": {
        const value = env.lookup(expr.name);
        if (value === undefined) {
          throw new EvaluationError(`identifier not found: ${expr.name}`);
        }
        return value;
      }
      case "PrefixExpression":
        return this.evalPrefix(expr.operator, this.evaluate(expr.operand, env));
      case "InfixExpression":
        return this.evalInfixChain(expr, env);
      case "TypeOfExpression":
        // Any operand works, nested typeof included: the operand is evaluated and its type named.
        return stringValue(typeOfValue(this.evaluate(expr.operand, env)));
      default:
        return assertNever(expr);
    }
  }

  // Folds the left spine of `1 + 1 + ...` iteratively.
  private evalInfixChain(expr: InfixExpression, env: EvalEnvironment): Value {
    const { head, links } = flattenInfixChain(expr);
    let value = this.evaluate(head, env);
    for (const link of links) {
      value = this.evalInfix(link.operator, value, this.evaluate(link.right, env));
    }
    return value;
  }

  private evalPrefix(operator: PrefixOperator, operand: Value): Value {
    if (operand.kind === "int") {
      return operator === "-" ? intValue(-operand.value) : operand;
    }
    if (operand.kind === "float") {
      return operator === "-" ? floatValue(-operand.value) : operand;
    }
    throw new EvaluationError(`unknown operator: ${operator}${typeOfValue(operand)}`);
  }

  private evalInfix(operator: InfixOperator, left: Value, right: Value): Value {
    if (left.kind === "int" && right.kind === "int") {
      return this.evalIntegerInfix(operator, left.value, right.value);
    }
    if (
      (left.kind === "int" || left.kind === "float") &&
      (right.kind === "int" || right.kind === "float")
    ) {
      return this.evalFloatInfix(operator, Number(left.value), Number(right.value));
    }
    if (left.kind === "string" && right.kind === "string" && operator === "+") {
      return stringValue(left.value + right.value);
    }
    if (operator === "==") return boolValue(valuesEqual(left, right));
    if (operator === "!=") return boolValue(!valuesEqual(left, right));

    throw this.unknownOperator(operator, left, right);
  }

  private evalIntegerInfix(operator: InfixOperator, left: bigint, right: bigint): Value {
    switch (operator) {
      case "+": return intValue(left + right);
      case "-": return intValue(left - right);
      case "*": return intValue(left * right);
      case "/":
        if (right === 0n) throw new EvaluationError("division by zero");
        return intValue(left / right);
      case "%":
        if (right === 0n) throw new EvaluationError("division by zero");
        return intValue(left % right);
      case "<": return boolValue(left < right);
      case ">": return boolValue(left > right);
      case "<=": return boolValue(left <= right);
      case ">=": return boolValue(left >= right);
      case "==": return boolValue(left === right);
      case "!=": return boolValue(left !== right);
      case "&&": return boolValue(left !== 0n && right !== 0n);
      case "||": return boolValue(left !== 0n || right !== 0n);
    }
  }

  private evalFloatInfix(operator: InfixOperator, left: number, right: number): Value {
    switch (operator) {
      case "+": return floatValue(left + right);
      case "-": return floatValue(left - right);
      case "*": return floatValue(left * right);
      case "/":
        if (right === 0) throw new EvaluationError("division by zero");
        return floatValue(left / right);
      case "%":
        if (right === 0) throw new EvaluationError("division by zero");
        return floatValue(left % right);
      case "<": return boolValue(left < right);
      case ">": return boolValue(left > right);
      case "<=": return boolValue(left <= right);
      case ">=": return boolValue(left >= right);
      case "==": return boolValue(left === right);
      case "!=": return boolValue(left !== right);
      case "&&": return boolValue(left !== 0 && right !== 0);
      case "||": return boolValue(left !== 0 || right !== 0);
    }
  }

  private unknownOperator(operator: InfixOperator, left: Value, right: Value): EvaluationError {
    return new EvaluationError(`unknown operator: ${typeOfValue(left)} ${operator} ${typeOfValue(right)}`);
  }
}
