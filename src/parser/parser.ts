import { TokenKind, isTypeKeyword, type Token } from "../lexer/tokens.js";
import type { Diagnostic, Span } from "../errors/diagnostic.js";
import { DiagnosticSink } from "../errors/diagnostic.js";
import { Lookahead, type TokenSource } from "./lookahead.js";
import { Precedence, PRECEDENCES, precedenceOf } from "./precedence.js";
import {
  unexpectedNextToken, noPrefixParseFunction, unexpectedToken, expectedStatement,
  expectedParameterType, expectedType, invalidNumber, nestingTooDeep,
} from "./errors.js";
import type {
  Program, Statement, Expression,
  ExpressionStatement, VariableDeclaration, ReturnStatement, BreakStatement,
  ContinueStatement, BlockStatement, IfStatement, ElseIfClause, WhileStatement,
  LoopStatement, ForStatement, FunctionStatement, Parameter, TypeAnnotation,
  Identifier, IntegerLiteral, FloatLiteral, PrefixExpression, InfixExpression,
  InfixOperator, TypeOfExpression,
} from "../ast/nodes.js";

const INT64_MAX = 9223372036854775807n;

// Combined statement and expression nesting the parser accepts.
const MAX_NESTING_DEPTH = 256;

// Tokens that begin a new statement; error recovery stops in front of them.
const STATEMENT_KEYWORDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.If,
  TokenKind.While,
  TokenKind.For,
  TokenKind.Loop,
  TokenKind.Func,
  TokenKind.Return,
  TokenKind.Break,
  TokenKind.Continue,
  TokenKind.Type,
]);

export interface ParserOptions {
  /** Operator precedence table; defaults to the language's table. */
  precedences?: ReadonlyMap<TokenKind, Precedence>;
  /** Sink to report into; a fresh one is created when omitted. */
  diagnostics?: DiagnosticSink;
}

/**
 * Recursive-descent parser with a Pratt expression core.
 *
 * Every parse method starts with the first token of its construct in `cur`
 * and returns with `cur` on the construct's last token. A `null` result
 * means the construct failed and at least one diagnostic was reported.
 */
export class Parser {
  private tokens: Lookahead;
  private sink: DiagnosticSink;
  private precedences: ReadonlyMap<TokenKind, Precedence>;
  private filename: string;
  private depth: number = 0;

  constructor(source: TokenSource, filename: string = "<stdin>", options: ParserOptions = {}) {
    this.tokens = new Lookahead(source);
    this.sink = options.diagnostics ?? new DiagnosticSink();
    this.precedences = options.precedences ?? PRECEDENCES;
    this.filename = filename;
  }

  parseProgram(): Program {
    const start = this.cur;
    const statements: Statement[] = [];

    while (!this.curIs(TokenKind.EOF)) {
      this.parseStatementInto(statements);
    }

    return { kind: "Program", statements, span: this.spanFrom(start) };
  }

  /** Parses a lone expression, optionally followed by ';', that must span the whole input. */
  parseStandaloneExpression(): Expression | null {
    const expr = this.parseExpression(Precedence.Lowest);
    if (!expr) return null;
    if (this.peekIs(TokenKind.Semicolon)) this.nextToken();
    if (!this.expectPeek(TokenKind.EOF)) return null;
    return expr;
  }

  errors(): string[] {
    return this.sink.messages();
  }

  diagnostics(): readonly Diagnostic[] {
    return this.sink.all();
  }

  // ============================================================
  // Statements
  // ============================================================

  /**
   * Parses the statement at `cur` into `statements` and leaves `cur` on the
   * first token after it. After a failure, skips ahead to the next statement
   * boundary so one bad statement does not produce a run of follow-on errors.
   */
  private parseStatementInto(statements: Statement[]): void {
    const mark = this.sink.size;
    const stmt = this.parseStatement();
    if (stmt) {
      statements.push(stmt);
    } else if (this.sink.hasErrorsSince(mark)) {
      this.synchronize();
      return;
    }
    this.nextToken();
  }

  private parseStatement(): Statement | null {
    if (!this.enterNesting()) return null;
    const stmt = this.parseStatementAtCurrent();
    this.depth--;
    return stmt;
  }

  private parseStatementAtCurrent(): Statement | null {
    switch (this.cur.kind) {
      case TokenKind.If: return this.parseIfStatement();
      case TokenKind.Return: return this.parseReturnStatement();
      case TokenKind.Break: return this.parseBreakStatement();
      case TokenKind.Continue: return this.parseContinueStatement();
      case TokenKind.While: return this.parseWhileStatement();
      case TokenKind.Loop: return this.parseLoopStatement();
      case TokenKind.For: return this.parseForStatement();
      case TokenKind.Func: return this.parseFunctionStatement();
      case TokenKind.Type:
      case TokenKind.Void:
        // `int f(` is a function; `int x =` and anything else is a declaration.
        if (this.peekIs(TokenKind.Ident) && this.tokens.afterNext.kind === TokenKind.LParen) {
          return this.parseFunctionStatement();
        }
        return this.parseVariableDeclaration();
      case TokenKind.RBrace:
      case TokenKind.Semicolon:
      case TokenKind.EOF:
        return null;
      default:
        return this.parseExpressionStatement();
    }
  }

  private parseExpressionStatement(): ExpressionStatement | null {
    const start = this.cur;
    const expression = this.parseExpression(Precedence.Lowest);
    if (!expression) {
      if (!this.curIs(TokenKind.RBrace) && !this.curIs(TokenKind.Semicolon) && !this.curIs(TokenKind.EOF)) {
        this.report(unexpectedToken(this.cur));
      }
      return null;
    }
    this.skipOptionalSemicolon();
    return { kind: "ExpressionStatement", expression, span: this.spanFrom(start) };
  }

  private parseVariableDeclaration(): VariableDeclaration | null {
    const start = this.cur;
    const declaredType = this.typeAnnotationAt(start);
    if (!declaredType) {
      this.report(expectedType(start));
      return null;
    }

    if (!this.expectPeek(TokenKind.Ident)) return null;
    const name = this.identifierAt(this.cur);

    if (!this.expectPeek(TokenKind.Assign)) return null;
    this.nextToken();
    const initializer = this.parseExpression(Precedence.Lowest);
    if (!initializer) return null;

    this.skipOptionalSemicolon();
    return { kind: "VariableDeclaration", declaredType, name, initializer, span: this.spanFrom(start) };
  }

  private parseReturnStatement(): ReturnStatement | null {
    const start = this.cur;

    if (this.peekIs(TokenKind.Semicolon)) {
      this.nextToken();
      return { kind: "ReturnStatement", span: this.spanFrom(start) };
    }
    if (this.peekIs(TokenKind.RBrace) || this.peekIs(TokenKind.EOF)) {
      return { kind: "ReturnStatement", span: start.span };
    }

    this.nextToken();
    const value = this.parseExpression(Precedence.Lowest);
    if (!value) return null;

    this.skipOptionalSemicolon();
    return { kind: "ReturnStatement", value, span: this.spanFrom(start) };
  }

  private parseBreakStatement(): BreakStatement {
    const start = this.cur;
    this.skipOptionalSemicolon();
    return { kind: "BreakStatement", span: this.spanFrom(start) };
  }

  private parseContinueStatement(): ContinueStatement {
    const start = this.cur;
    this.skipOptionalSemicolon();
    return { kind: "ContinueStatement", span: this.spanFrom(start) };
  }

  /** Expects `cur` on '{'; returns with `cur` on the matching '}'. */
  private parseBlockStatement(): BlockStatement | null {
    const start = this.cur;
    this.nextToken();

    const statements: Statement[] = [];
    while (!this.curIs(TokenKind.RBrace) && !this.curIs(TokenKind.EOF)) {
      this.parseStatementInto(statements);
    }

    if (!this.curIs(TokenKind.RBrace)) {
      this.report(unexpectedNextToken(TokenKind.RBrace, this.cur));
      return null;
    }
    return { kind: "BlockStatement", statements, span: this.spanFrom(start) };
  }

  private parseIfStatement(): IfStatement | null {
    const start = this.cur;

    const condition = this.parseParenthesizedCondition();
    if (!condition) return null;
    // After a failed branch the rest of the chain is still consumed, then the if fails.
    const thenBlock = this.parseBody();
    let failed = !thenBlock;

    const elseIfs: ElseIfClause[] = [];
    let elseBlock: BlockStatement | undefined;

    while (this.peekIs(TokenKind.Else)) {
      this.nextToken();
      const clauseStart = this.cur;

      if (this.peekIs(TokenKind.If)) {
        this.nextToken();
        const elseIfCondition = this.parseParenthesizedCondition();
        if (!elseIfCondition) return null;
        const block = this.parseBody();
        if (!block) {
          failed = true;
          continue;
        }
        elseIfs.push({
          kind: "ElseIfClause",
          condition: elseIfCondition,
          block,
          span: this.spanFrom(clauseStart),
        });
      } else {
        const block = this.parseBody();
        if (!block) return null;
        elseBlock = block;
        break; // a plain else ends the chain
      }
    }

    if (!thenBlock || failed) return null;

    return { kind: "IfStatement", condition, thenBlock, elseIfs, elseBlock, span: this.spanFrom(start) };
  }

  private parseWhileStatement(): WhileStatement | null {
    const start = this.cur;

    const condition = this.parseParenthesizedCondition();
    if (!condition) return null;
    if (!this.expectPeek(TokenKind.LBrace)) return null;
    const block = this.parseBlockStatement();
    if (!block) return null;

    return { kind: "WhileStatement", condition, block, span: this.spanFrom(start) };
  }

  private parseLoopStatement(): LoopStatement | null {
    const start = this.cur;

    if (!this.expectPeek(TokenKind.LBrace)) return null;
    const block = this.parseBlockStatement();
    if (!block) return null;

    return { kind: "LoopStatement", block, span: this.spanFrom(start) };
  }

  private parseForStatement(): ForStatement | null {
    const start = this.cur;

    if (!this.expectPeek(TokenKind.LParen)) return null;
    if (!this.expectPeek(TokenKind.Ident)) return null;
    const variable = this.identifierAt(this.cur);

    if (!this.expectPeek(TokenKind.In)) return null;
    this.nextToken();
    const iterable = this.parseExpression(Precedence.Lowest);
    if (!iterable) return null;

    if (!this.expectPeek(TokenKind.RParen)) return null;
    if (!this.expectPeek(TokenKind.LBrace)) return null;
    const block = this.parseBlockStatement();
    if (!block) return null;

    return { kind: "ForStatement", variable, iterable, block, span: this.spanFrom(start) };
  }

  private parseFunctionStatement(): FunctionStatement | null {
    const start = this.cur;

    let returnType: TypeAnnotation | null;
    if (start.kind === TokenKind.Func) {
      // `fn name()` declares no return type
      returnType = { kind: "TypeAnnotation", token: TokenKind.Void, name: "void", span: start.span };
    } else {
      returnType = this.typeAnnotationAt(start);
    }
    if (!returnType) {
      this.report(expectedType(start));
      return null;
    }

    if (!this.expectPeek(TokenKind.Ident)) return null;
    const name = this.identifierAt(this.cur);

    if (!this.expectPeek(TokenKind.LParen)) return null;
    const parameters = this.parseFunctionParameters();
    if (!parameters) return null;

    if (!this.expectPeek(TokenKind.LBrace)) return null;
    const body = this.parseBlockStatement();
    if (!body) return null;

    return { kind: "FunctionStatement", returnType, name, parameters, body, span: this.spanFrom(start) };
  }

  /** Expects `cur` on '('; returns with `cur` on ')'. */
  private parseFunctionParameters(): Parameter[] | null {
    const params: Parameter[] = [];

    if (this.peekIs(TokenKind.RParen)) {
      this.nextToken();
      return params;
    }

    this.nextToken();
    const first = this.parseParameter();
    if (!first) return null;
    params.push(first);

    while (this.peekIs(TokenKind.Comma)) {
      this.nextToken(); // ','
      this.nextToken();
      const param = this.parseParameter();
      if (!param) return null;
      params.push(param);
    }

    if (!this.expectPeek(TokenKind.RParen)) return null;
    return params;
  }

  private parseParameter(): Parameter | null {
    const start = this.cur;
    const type = this.typeAnnotationAt(start);
    if (!type) {
      this.report(expectedParameterType(start));
      return null;
    }

    if (!this.expectPeek(TokenKind.Ident)) return null;
    const name = this.identifierAt(this.cur);
    return { kind: "Parameter", type, name, span: this.spanFrom(start) };
  }

  /** `( expr )` after if, else if and while. Leaves `cur` on ')'. */
  private parseParenthesizedCondition(): Expression | null {
    if (!this.expectPeek(TokenKind.LParen)) return null;
    this.nextToken();
    const condition = this.parseExpression(Precedence.Lowest);
    if (!condition) return null;
    if (!this.expectPeek(TokenKind.RParen)) return null;
    return condition;
  }

  /**
   * Body of an if/else branch: a braced block, or a single statement wrapped
   * in a one-statement block so both forms share one shape.
   */
  private parseBody(): BlockStatement | null {
    if (this.peekIs(TokenKind.LBrace)) {
      this.nextToken();
      return this.parseBlockStatement();
    }

    this.nextToken();
    const start = this.cur;
    const mark = this.sink.size;
    const stmt = this.parseStatement();
    if (!stmt) {
      if (!this.sink.hasErrorsSince(mark)) this.report(expectedStatement(start));
      return null;
    }
    return { kind: "BlockStatement", statements: [stmt], span: stmt.span };
  }

  // ============================================================
  // Expressions (Pratt parser)
  // ============================================================

  private parseExpression(minPrec: Precedence): Expression | null {
    if (!this.enterNesting()) return null;
    const expr = this.parseOperatorChain(minPrec);
    this.depth--;
    return expr;
  }

  private parseOperatorChain(minPrec: Precedence): Expression | null {
    let left = this.parsePrefix();
    if (!left) return null;

    while (
      !this.peekIs(TokenKind.Semicolon) &&
      !this.peekIs(TokenKind.EOF) &&
      minPrec < this.peekPrecedence()
    ) {
      this.nextToken();
      const infix = this.parseInfixExpression(left);
      if (!infix) return null;
      left = infix;
    }

    return left;
  }

  private parsePrefix(): Expression | null {
    const tok = this.cur;
    switch (tok.kind) {
      case TokenKind.Ident:
        return this.identifierAt(tok);
      case TokenKind.Int:
        return this.parseIntegerLiteral();
      case TokenKind.Float:
        return this.parseFloatLiteral();
      case TokenKind.String:
        return { kind: "StringLiteral", value: tok.text, span: tok.span };
      case TokenKind.Bool:
        return { kind: "BooleanLiteral", value: tok.text === "true", text: tok.text, span: tok.span };
      case TokenKind.Nil:
        return { kind: "NilLiteral", text: tok.text, span: tok.span };
      case TokenKind.Void:
        return { kind: "VoidLiteral", text: tok.text, span: tok.span };
      case TokenKind.LParen:
        return this.parseGroupedExpression();
      case TokenKind.Sub:
      case TokenKind.Add:
        return this.parsePrefixExpression();
      case TokenKind.TypeOf:
        return this.parseTypeOfExpression();
      default:
        this.report(noPrefixParseFunction(tok));
        return null;
    }
  }

  private parseIntegerLiteral(): IntegerLiteral | null {
    const tok = this.cur;
    if (!/^[0-9]+$/.test(tok.text) || BigInt(tok.text) > INT64_MAX) {
      this.report(invalidNumber(tok, "integer"));
      return null;
    }
    return { kind: "IntegerLiteral", value: BigInt(tok.text), text: tok.text, span: tok.span };
  }

  private parseFloatLiteral(): FloatLiteral | null {
    const tok = this.cur;
    const value = Number(tok.text);
    if (!/^[0-9]+\.[0-9]*$/.test(tok.text) || !Number.isFinite(value)) {
      this.report(invalidNumber(tok, "float"));
      return null;
    }
    return { kind: "FloatLiteral", value, text: tok.text, span: tok.span };
  }

  private parseGroupedExpression(): Expression | null {
    this.nextToken();
    const expr = this.parseExpression(Precedence.Lowest);
    if (!expr) return null;
    if (!this.expectPeek(TokenKind.RParen)) return null;
    return expr;
  }

  private parsePrefixExpression(): PrefixExpression | null {
    const opToken = this.cur;
    this.nextToken();
    const operand = this.parseExpression(Precedence.Prefix);
    if (!operand) return null;
    return {
      kind: "PrefixExpression",
      operator: opToken.kind === TokenKind.Sub ? "-" : "+",
      operand,
      span: this.spanBetween(opToken.span, operand.span),
    };
  }

  private parseTypeOfExpression(): TypeOfExpression | null {
    const start = this.cur;
    if (!this.expectPeek(TokenKind.LParen)) return null;
    this.nextToken();
    const operand = this.parseExpression(Precedence.Lowest);
    if (!operand) return null;
    if (!this.expectPeek(TokenKind.RParen)) return null;
    return { kind: "TypeOfExpression", operand, span: this.spanFrom(start) };
  }

  private parseInfixExpression(left: Expression): InfixExpression | null {
    const opToken = this.cur;
    const operator = infixOperatorOf(opToken.kind);
    if (!operator) {
      this.report(unexpectedToken(opToken));
      return null;
    }

    const precedence = this.curPrecedence();
    this.nextToken();
    const right = this.parseExpression(precedence);
    if (!right) return null;

    return {
      kind: "InfixExpression",
      operator,
      left,
      right,
      span: this.spanBetween(left.span, right.span),
    };
  }

  // ============================================================
  // Helpers
  // ============================================================

  private get cur(): Token {
    return this.tokens.current;
  }

  private nextToken(): void {
    this.tokens.advance();
  }

  private curIs(kind: TokenKind): boolean {
    return this.tokens.current.kind === kind;
  }

  private peekIs(kind: TokenKind): boolean {
    return this.tokens.next.kind === kind;
  }

  /** The single checkpoint: consumes the next token if it matches, else reports. */
  private expectPeek(kind: TokenKind): boolean {
    if (this.peekIs(kind)) {
      this.nextToken();
      return true;
    }
    this.report(unexpectedNextToken(kind, this.tokens.next));
    return false;
  }

  private skipOptionalSemicolon(): void {
    if (this.peekIs(TokenKind.Semicolon)) this.nextToken();
  }

  private peekPrecedence(): Precedence {
    return precedenceOf(this.tokens.next.kind, this.precedences);
  }

  private curPrecedence(): Precedence {
    return precedenceOf(this.cur.kind, this.precedences);
  }

  private report(diag: Diagnostic): void {
    this.sink.report(diag);
  }

  /** Counts one nesting level; reports and refuses once the limit is reached. */
  private enterNesting(): boolean {
    if (this.depth >= MAX_NESTING_DEPTH) {
      this.report(nestingTooDeep(this.cur, MAX_NESTING_DEPTH));
      return false;
    }
    this.depth++;
    return true;
  }

  private identifierAt(tok: Token): Identifier {
    return { kind: "Identifier", name: tok.text, span: tok.span };
  }

  private typeAnnotationAt(tok: Token): TypeAnnotation | null {
    if (!isTypeKeyword(tok.kind)) return null;
    return { kind: "TypeAnnotation", token: tok.kind, name: tok.text, span: tok.span };
  }

  /**
   * Skips to the next statement boundary: just past a ';' or a braced group
   * opened while skipping, onto a statement keyword, or onto the '}' that
   * closes the enclosing block (left for the block's own loop). Braces are
   * counted so a broken statement's body is skipped whole.
   */
  private synchronize(): void {
    let braces = 0;
    while (!this.curIs(TokenKind.EOF)) {
      if (this.curIs(TokenKind.LBrace)) {
        braces++;
      } else if (this.curIs(TokenKind.RBrace)) {
        if (braces === 0) return;
        braces--;
        if (braces === 0) {
          this.nextToken();
          return;
        }
      } else if (braces === 0 && this.curIs(TokenKind.Semicolon)) {
        this.nextToken();
        return;
      }
      const atBoundary = braces === 0 && STATEMENT_KEYWORDS.has(this.tokens.next.kind);
      this.nextToken();
      if (atBoundary) return;
    }
  }

  private spanFrom(startToken: Token): Span {
    return {
      start: startToken.span.start,
      end: this.cur.span.end,
      source: this.filename,
    };
  }

  private spanBetween(start: Span, end: Span): Span {
    return {
      start: start.start,
      end: end.end,
      source: this.filename,
    };
  }
}

function infixOperatorOf(kind: TokenKind): InfixOperator | null {
  switch (kind) {
    case TokenKind.Add: return "+";
    case TokenKind.Sub: return "-";
    case TokenKind.Mul: return "*";
    case TokenKind.Div: return "/";
    case TokenKind.Mod: return "%";
    case TokenKind.Eq: return "==";
    case TokenKind.NotEq: return "!=";
    case TokenKind.Lt: return "<";
    case TokenKind.Gt: return ">";
    case TokenKind.Le: return "<=";
    case TokenKind.Ge: return ">=";
    case TokenKind.And: return "&&";
    case TokenKind.Or: return "||";
    default: return null;
  }
}
