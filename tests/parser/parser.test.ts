import { describe, it, expect } from "vitest";
import { Lexer } from "../../src/lexer/lexer.js";
import { TokenKind } from "../../src/lexer/tokens.js";
import { Parser } from "../../src/parser/parser.js";
import { Precedence, PRECEDENCES } from "../../src/parser/precedence.js";
import { DiagnosticSink } from "../../src/errors/diagnostic.js";
import { printProgram } from "../../src/ast/printer.js";

function parse(source: string) {
  const parser = new Parser(new Lexer(source, "test.brc"), "test.brc");
  const program = parser.parseProgram();
  return { program, errors: parser.errors(), diagnostics: parser.diagnostics() };
}

function render(source: string): string {
  const { program, errors } = parse(source);
  expect(errors).toEqual([]);
  return printProgram(program);
}

describe("Parser", () => {
  describe("operator precedence", () => {
    it("binds product tighter than sum", () => {
      expect(render("123 + 4 * 5")).toBe("(123 + (4 * 5))\n");
      expect(render("a + b * c")).toBe("(a + (b * c))\n");
    });

    it("binds comparison tighter than equality", () => {
      expect(render("a < b == c")).toBe("((a < b) == c)\n");
    });

    it("binds && tighter than ||", () => {
      expect(render("a || b && c")).toBe("(a || (b && c))\n");
    });

    it("is left associative", () => {
      expect(render("a - b - c")).toBe("((a - b) - c)\n");
      expect(render("a % b / c")).toBe("((a % b) / c)\n");
    });

    it("binds prefix operators tightest", () => {
      expect(render("-a + b")).toBe("((-a) + b)\n");
      expect(render("- -a")).toBe("(-(-a))\n");
      expect(render("+a")).toBe("(+a)\n");
    });

    it("honours parentheses", () => {
      expect(render("(a + b) * c")).toBe("((a + b) * c)\n");
    });

    it("parses typeof around a full expression", () => {
      expect(render("typeof(x + y * 2)")).toBe("typeof((x + (y * 2)))\n");
    });

    it("accepts a custom precedence table", () => {
      const precedences = new Map<TokenKind, Precedence>([
        ...PRECEDENCES,
        [TokenKind.Add, Precedence.Product],
        [TokenKind.Mul, Precedence.Sum],
      ]);
      const parser = new Parser(new Lexer("1 + 2 * 3", "test.brc"), "test.brc", { precedences });
      const program = parser.parseProgram();
      expect(parser.errors()).toEqual([]);
      expect(printProgram(program)).toBe("((1 + 2) * 3)\n");
    });
  });

  describe("literals", () => {
    it("parses integers as 64-bit values", () => {
      const { program, errors } = parse("9223372036854775807");
      expect(errors).toEqual([]);
      const stmt = program.statements[0];
      expect(stmt.kind).toBe("ExpressionStatement");
      if (stmt.kind === "ExpressionStatement" && stmt.expression.kind === "IntegerLiteral") {
        expect(stmt.expression.value).toBe(9223372036854775807n);
      }
    });

    it("rejects integers outside the 64-bit range", () => {
      const { program, errors } = parse("99999999999999999999");
      expect(errors).toEqual([
        'could not parse "99999999999999999999" as integer',
        "unexpected token: 99999999999999999999",
      ]);
      expect(program.statements).toHaveLength(0);
    });

    it("parses floats", () => {
      const { program } = parse("3.14");
      const stmt = program.statements[0];
      expect(stmt.kind).toBe("ExpressionStatement");
      if (stmt.kind === "ExpressionStatement") {
        expect(stmt.expression.kind).toBe("FloatLiteral");
        if (stmt.expression.kind === "FloatLiteral") {
          expect(stmt.expression.value).toBe(3.14);
        }
      }
    });

    it("parses strings, booleans and nil", () => {
      expect(render('"hi"')).toBe('"hi"\n');
      expect(render("true")).toBe("true\n");
      expect(render("nil")).toBe("nil\n");

      const { program } = parse("false");
      const stmt = program.statements[0];
      if (stmt.kind === "ExpressionStatement" && stmt.expression.kind === "BooleanLiteral") {
        expect(stmt.expression.value).toBe(false);
      }
    });
  });

  describe("declarations and functions", () => {
    it("parses a variable declaration", () => {
      const { program, errors } = parse("int foo = 1;");
      expect(errors).toEqual([]);
      const stmt = program.statements[0];
      expect(stmt.kind).toBe("VariableDeclaration");
      if (stmt.kind === "VariableDeclaration") {
        expect(stmt.declaredType.name).toBe("int");
        expect(stmt.name.name).toBe("foo");
        expect(stmt.initializer.kind).toBe("IntegerLiteral");
      }
      expect(printProgram(program)).toBe("int foo = 1;\n");
    });

    it("treats a type followed by a name and '(' as a function", () => {
      const { program, errors } = parse("int foo() {}");
      expect(errors).toEqual([]);
      const stmt = program.statements[0];
      expect(stmt.kind).toBe("FunctionStatement");
      if (stmt.kind === "FunctionStatement") {
        expect(stmt.name.name).toBe("foo");
        expect(stmt.returnType.name).toBe("int");
        expect(stmt.parameters).toHaveLength(0);
        expect(stmt.body.statements).toHaveLength(0);
      }
    });

    it("reports a declaration without an initializer", () => {
      const { program, errors } = parse("int foo");
      expect(errors).toEqual(["expected next token to be =, got EOF instead"]);
      expect(program.statements).toHaveLength(0);
    });

    it("reports a declaration without a name", () => {
      const { errors } = parse("int 5");
      expect(errors).toEqual(["expected next token to be IDENT, got INT instead"]);
    });

    it("parses a void function with an empty return", () => {
      const { program, errors } = parse("void test() { return; }");
      expect(errors).toEqual([]);
      expect(program.statements).toHaveLength(1);
      const stmt = program.statements[0];
      if (stmt.kind === "FunctionStatement") {
        expect(stmt.name.name).toBe("test");
        expect(stmt.returnType.name).toBe("void");
        expect(stmt.body.statements).toHaveLength(1);
        const ret = stmt.body.statements[0];
        expect(ret.kind).toBe("ReturnStatement");
        if (ret.kind === "ReturnStatement") {
          expect(ret.value).toBeUndefined();
        }
      }
      expect(printProgram(program)).toBe("void test() { return; }\n");
    });

    it("parses typed parameters", () => {
      expect(render("float calculate(int a, float b, string name) { return a + b * -3; }"))
        .toBe("float calculate(int a, float b, string name) { return (a + (b * (-3))); }\n");
    });

    it("gives fn and func functions a void return type", () => {
      const { program, errors } = parse("fn greet() { }");
      expect(errors).toEqual([]);
      const stmt = program.statements[0];
      if (stmt.kind === "FunctionStatement") {
        expect(stmt.returnType.token).toBe(TokenKind.Void);
        expect(stmt.returnType.name).toBe("void");
      }
      expect(render("fn greet() { }")).toBe("void greet() { }\n");
      expect(render("func greet() { }")).toBe("void greet() { }\n");
    });

    it("reports an untyped parameter", () => {
      const { program, errors } = parse("int f(x) {}");
      expect(errors).toEqual(["expected parameter type, got IDENT"]);
      expect(program.statements).toHaveLength(0);
    });
  });

  describe("return statements", () => {
    it("accepts a bare return at end of input", () => {
      const { program, errors } = parse("return");
      expect(errors).toEqual([]);
      const stmt = program.statements[0];
      expect(stmt.kind).toBe("ReturnStatement");
      if (stmt.kind === "ReturnStatement") {
        expect(stmt.value).toBeUndefined();
      }
    });

    it("accepts a bare return before a closing brace", () => {
      expect(render("void f() { return }")).toBe("void f() { return; }\n");
    });

    it("parses a return value", () => {
      expect(render("int f() { return 1 + 2; }")).toBe("int f() { return (1 + 2); }\n");
    });
  });

  describe("control flow", () => {
    it("parses else-if chains in source order", () => {
      const source = "if (a) {1} else if (b) {2} else if (c) {3} else {4}";
      const { program, errors } = parse(source);
      expect(errors).toEqual([]);
      const stmt = program.statements[0];
      expect(stmt.kind).toBe("IfStatement");
      if (stmt.kind === "IfStatement") {
        expect(stmt.elseIfs).toHaveLength(2);
        expect(stmt.elseIfs[0].condition).toMatchObject({ kind: "Identifier", name: "b" });
        expect(stmt.elseIfs[1].condition).toMatchObject({ kind: "Identifier", name: "c" });
        expect(stmt.elseBlock?.statements).toHaveLength(1);
      }
      expect(printProgram(program)).toBe("if (a) { 1 } else if (b) { 2 } else if (c) { 3 } else { 4 }\n");
    });

    it("wraps unbraced branches in blocks", () => {
      expect(render("void testNoBraces() { if (x > 10) return x; else return 0; }"))
        .toBe("void testNoBraces() { if ((x > 10)) { return x; } else { return 0; } }\n");
    });

    it("parses while, loop and for", () => {
      expect(render("while (x < 10) { x }")).toBe("while ((x < 10)) { x }\n");
      expect(render("loop { break; }")).toBe("loop { break; }\n");
      expect(render("for (item in items) { continue }")).toBe("for (item in items) { continue; }\n");
    });

    it("reports a missing branch body", () => {
      const { errors } = parse("if (x)");
      expect(errors).toEqual(["expected statement, got EOF instead"]);
    });

    it("reports a while without parentheses", () => {
      const { errors } = parse("while x {}");
      expect(errors).toEqual(["expected next token to be (, got IDENT instead"]);
    });

    it("hints at braces for an unbraced loop body", () => {
      const { errors, diagnostics } = parse("loop x");
      expect(errors).toEqual(["expected next token to be {, got IDENT instead"]);
      expect(diagnostics[0].help).toBe("Loop and function bodies must be wrapped in '{' and '}'");
    });

    it("requires 'in' in a for header", () => {
      const { errors } = parse("for (x of xs) {}");
      expect(errors).toEqual(["expected next token to be in, got IDENT instead"]);
    });

    it("reports an unterminated block", () => {
      const { program, errors } = parse("void f() { return 1;");
      expect(errors).toEqual(["expected next token to be }, got EOF instead"]);
      expect(program.statements).toHaveLength(0);
    });
  });

  describe("error recovery", () => {
    it("reports each malformed statement once", () => {
      const { program, errors } = parse("if x) {} if y) {}");
      expect(errors).toEqual([
        "expected next token to be (, got IDENT instead",
        "expected next token to be (, got IDENT instead",
      ]);
      expect(program.statements).toHaveLength(0);
    });

    it("resumes after a semicolon", () => {
      const { program, errors } = parse("int x = ; int y = 2;");
      expect(errors).toEqual(["no prefix parse function for ; found"]);
      expect(printProgram(program)).toBe("int y = 2;\n");
    });

    it("resumes inside a block", () => {
      const { program, errors } = parse("void f() { x + ; return 1; }");
      expect(errors).toEqual(["no prefix parse function for ; found"]);
      expect(printProgram(program)).toBe("void f() { return 1; }\n");
    });

    it("reports illegal characters", () => {
      const { errors } = parse("@");
      expect(errors).toEqual(["no prefix parse function for ILLEGAL found", "unexpected token: @"]);
    });

    it("reports an expression cut off by end of input", () => {
      const { errors } = parse("x +");
      expect(errors).toEqual(["unexpected end of input"]);
    });

    it("has no prefix form for '!'", () => {
      const { program, errors } = parse("!x");
      expect(errors).toEqual(["no prefix parse function for ! found", "unexpected token: !"]);
      expect(program.statements).toHaveLength(0);
    });

    it("hints at the closing quote of an unterminated string", () => {
      const { diagnostics } = parse('"oops');
      expect(diagnostics[0].message).toBe("no prefix parse function for ILLEGAL found");
      expect(diagnostics[0].help).toBe("String literal is missing its closing '\"'");
    });

    it("reports into a shared sink", () => {
      const sink = new DiagnosticSink();
      const parser = new Parser(new Lexer("@", "test.brc"), "test.brc", { diagnostics: sink });
      parser.parseProgram();
      expect(sink.size).toBe(2);
      expect(sink.hasErrorsSince(0)).toBe(true);
      expect(sink.hasErrorsSince(2)).toBe(false);
    });
  });

  describe("recovery boundaries", () => {
    it("reports an empty branch once and still consumes its else", () => {
      const { program, errors } = parse("if (a) ; else b");
      expect(errors).toEqual(["expected statement, got ; instead"]);
      expect(program.statements).toHaveLength(0);
    });

    it("reports a failed else-if branch once", () => {
      const { errors } = parse("if (a) {} else if (b) ; else c");
      expect(errors).toEqual(["expected statement, got ; instead"]);
    });

    it("skips the braced body of a broken statement whole", () => {
      const { program, errors } = parse("void f() { if x) { a } b } int y = 1;");
      expect(errors).toEqual(["expected next token to be (, got IDENT instead"]);
      expect(printProgram(program)).toBe("void f() { b }\nint y = 1;\n");
    });
  });

  describe("nesting limit", () => {
    it("parses moderately nested parentheses", () => {
      expect(render("(".repeat(200) + "1" + ")".repeat(200))).toBe("1\n");
    });

    it("reports deeply nested parentheses instead of overflowing", () => {
      const { program, errors, diagnostics } = parse("(".repeat(5000) + "1" + ")".repeat(5000));
      expect(errors).toEqual(["nesting too deep", "unexpected token: ("]);
      expect(diagnostics[0].help).toBe("Statements and expressions nest at most 256 levels");
      expect(program.statements).toHaveLength(0);
    });

    it("reports deeply nested prefix operators", () => {
      const { errors } = parse("-".repeat(300) + "1");
      expect(errors).toEqual(["nesting too deep", "unexpected token: -"]);
    });

    it("reports deeply nested blocks once and keeps the outer statement", () => {
      const { program, errors } = parse("while (1) { ".repeat(300) + "}".repeat(300));
      expect(errors).toEqual(["nesting too deep"]);
      expect(program.statements).toHaveLength(1);
      expect(program.statements[0].kind).toBe("WhileStatement");
    });
  });

  describe("programs", () => {
    it("parses an empty program", () => {
      const { program, errors } = parse("");
      expect(errors).toEqual([]);
      expect(program.statements).toHaveLength(0);
    });

    it("renders one statement per line", () => {
      expect(render("int x = 10; return x;")).toBe("int x = 10;\nreturn x;\n");
      expect(render("a b")).toBe("a\nb\n");
    });

    it("records source spans", () => {
      const { program } = parse("x + 1");
      const stmt = program.statements[0];
      expect(stmt.span.start.column).toBe(1);
      expect(stmt.span.end.column).toBe(6);
      expect(stmt.span.source).toBe("test.brc");
    });
  });

  describe("standalone expressions", () => {
    function parseStandalone(source: string) {
      const parser = new Parser(new Lexer(source, "<eval>"), "<eval>");
      return { expression: parser.parseStandaloneExpression(), errors: parser.errors() };
    }

    it("accepts one expression with an optional semicolon", () => {
      expect(parseStandalone("typeof(42)").expression?.kind).toBe("TypeOfExpression");
      expect(parseStandalone("1 + 2;").expression?.kind).toBe("InfixExpression");
    });

    it("rejects trailing input", () => {
      const { expression, errors } = parseStandalone("1 2");
      expect(expression).toBeNull();
      expect(errors).toEqual(["expected next token to be EOF, got INT instead"]);
    });
  });
});
