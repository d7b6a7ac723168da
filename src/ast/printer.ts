import type {
  Program, Statement, Expression, BlockStatement, InfixExpression, Parameter, TypeAnnotation,
} from "./nodes.js";
import { assertNever, flattenInfixChain } from "./nodes.js";

// Canonical rendering used by diagnostics, the CLI and golden tests.
// Infix nodes print as "(left op right)", blocks as "{ stmt stmt }".

export function printProgram(program: Program): string {
  return program.statements.map((s) => printStatement(s) + "\n").join("");
}

export function printStatement(stmt: Statement): string {
  switch (stmt.kind) {
    case "ExpressionStatement":
      return printExpression(stmt.expression);
    case "VariableDeclaration":
      return `${printType(stmt.declaredType)} ${stmt.name.name} = ${printExpression(stmt.initializer)};`;
    case "ReturnStatement":
      return stmt.value ? `return ${printExpression(stmt.value)};` : "return;";
    case "BreakStatement":
      return "break;";
    case "ContinueStatement":
      return "continue;";
    case "BlockStatement":
      return printBlock(stmt);
    case "IfStatement": {
      let out = `if (${printExpression(stmt.condition)}) ${printBlock(stmt.thenBlock)}`;
      for (const clause of stmt.elseIfs) {
        out += ` else if (${printExpression(clause.condition)}) ${printBlock(clause.block)}`;
      }
      if (stmt.elseBlock) {
        out += ` else ${printBlock(stmt.elseBlock)}`;
      }
      return out;
    }
    case "WhileStatement":
      return `while (${printExpression(stmt.condition)}) ${printBlock(stmt.block)}`;
    case "LoopStatement":
      return `loop ${printBlock(stmt.block)}`;
    case "ForStatement":
      return `for (${stmt.variable.name} in ${printExpression(stmt.iterable)}) ${printBlock(stmt.block)}`;
    case "FunctionStatement": {
      const params = stmt.parameters.map(printParameter).join(", ");
      return `${printType(stmt.returnType)} ${stmt.name.name}(${params}) ${printBlock(stmt.body)}`;
    }
    default:
      return assertNever(stmt);
  }
}

export function printExpression(expr: Expression): string {
  switch (expr.kind) {
    case "Identifier":
      return expr.name;
    case "IntegerLiteral":
    case "FloatLiteral":
    case "BooleanLiteral":
    case "NilLiteral":
    case "VoidLiteral":
      return expr.text;
    case "StringLiteral":
      return `"${expr.value}"`;
    case "PrefixExpression":
      return `(${expr.operator}${printExpression(expr.operand)})`;
    case "InfixExpression":
      return printInfix(expr);
    case "TypeOfExpression":
      return `typeof(${printExpression(expr.operand)})`;
    default:
      return assertNever(expr);
  }
}

function printInfix(expr: InfixExpression): string {
  const { head, links } = flattenInfixChain(expr);
  let out = "(".repeat(links.length) + printExpression(head);
  for (const link of links) {
    out += ` ${link.operator} ${printExpression(link.right)})`;
  }
  return out;
}

function printBlock(block: BlockStatement): string {
  let out = "{ ";
  for (const stmt of block.statements) {
    out += printStatement(stmt) + " ";
  }
  return out + "}";
}

function printParameter(param: Parameter): string {
  return `${printType(param.type)} ${param.name.name}`;
}

function printType(type: TypeAnnotation): string {
  return type.name;
}
