import { TokenKind, type Token } from "./tokens.js";
import { lookupIdent } from "./keywords.js";

/**
 * Pull-based scanner. Each `nextToken()` call yields one token; once the input
 * is exhausted every further call yields EOF with empty text.
 */
export class Lexer {
  private source: string;
  private filename: string;
  private pos: number = 0;
  private line: number = 1;
  private col: number = 1;

  constructor(source: string, filename: string = "<stdin>") {
    this.source = source;
    this.filename = filename;
  }

  /** Drains the scanner. The result always ends with exactly one EOF token. */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const tok = this.nextToken();
      tokens.push(tok);
      if (tok.kind === TokenKind.EOF) return tokens;
    }
  }

  nextToken(): Token {
    this.skipWhitespace();

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenKind.EOF, "", this.pos, this.line, this.col);
    }

    const ch = this.source[this.pos];
    if (this.isDigit(ch)) return this.readNumber();
    if (this.isLetter(ch)) return this.readIdentOrKeyword();
    if (ch === '"') return this.readString();

    return this.readPunctuation();
  }

  private readNumber(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    let isFloat = false;

    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      this.advance();
    }

    // A single '.' turns the literal into a float; the fraction may be empty ("1.").
    if (this.pos < this.source.length && this.source[this.pos] === ".") {
      isFloat = true;
      this.advance();
      while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
        this.advance();
      }
    }

    const text = this.source.slice(startPos, this.pos);
    return this.makeToken(isFloat ? TokenKind.Float : TokenKind.Int, text, startPos, startLine, startCol);
  }

  private readIdentOrKeyword(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (this.pos < this.source.length && this.isLetter(this.source[this.pos])) {
      this.advance();
    }

    const text = this.source.slice(startPos, this.pos);
    return this.makeToken(lookupIdent(text), text, startPos, startLine, startCol);
  }

  private readString(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    this.advance(); // skip opening "
    const bodyStart = this.pos;

    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      this.advance();
    }

    if (this.pos >= this.source.length) {
      // Unterminated: the whole tail, opening quote included, becomes one illegal token.
      return this.makeToken(TokenKind.Illegal, this.source.slice(startPos), startPos, startLine, startCol);
    }

    const text = this.source.slice(bodyStart, this.pos);
    this.advance(); // skip closing "
    return this.makeToken(TokenKind.String, text, startPos, startLine, startCol);
  }

  private readPunctuation(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    const ch = this.source[this.pos];
    const next = this.pos + 1 < this.source.length ? this.source[this.pos + 1] : "";

    // Two-character tokens
    switch (ch + next) {
      case "==": this.advance(); this.advance(); return this.makeToken(TokenKind.Eq, "==", startPos, startLine, startCol);
      case "!=": this.advance(); this.advance(); return this.makeToken(TokenKind.NotEq, "!=", startPos, startLine, startCol);
      case "&&": this.advance(); this.advance(); return this.makeToken(TokenKind.And, "&&", startPos, startLine, startCol);
      case "||": this.advance(); this.advance(); return this.makeToken(TokenKind.Or, "||", startPos, startLine, startCol);
    }

    // Single-character tokens
    this.advance();
    switch (ch) {
      case "(": return this.makeToken(TokenKind.LParen, ch, startPos, startLine, startCol);
      case ")": return this.makeToken(TokenKind.RParen, ch, startPos, startLine, startCol);
      case "{": return this.makeToken(TokenKind.LBrace, ch, startPos, startLine, startCol);
      case "}": return this.makeToken(TokenKind.RBrace, ch, startPos, startLine, startCol);
      case ",": return this.makeToken(TokenKind.Comma, ch, startPos, startLine, startCol);
      case ";": return this.makeToken(TokenKind.Semicolon, ch, startPos, startLine, startCol);
      case "+": return this.makeToken(TokenKind.Add, ch, startPos, startLine, startCol);
      case "-": return this.makeToken(TokenKind.Sub, ch, startPos, startLine, startCol);
      case "*": return this.makeToken(TokenKind.Mul, ch, startPos, startLine, startCol);
      case "/": return this.makeToken(TokenKind.Div, ch, startPos, startLine, startCol);
      case "%": return this.makeToken(TokenKind.Mod, ch, startPos, startLine, startCol);
      case "<": return this.makeToken(TokenKind.Lt, ch, startPos, startLine, startCol);
      case ">": return this.makeToken(TokenKind.Gt, ch, startPos, startLine, startCol);
      case "=": return this.makeToken(TokenKind.Assign, ch, startPos, startLine, startCol);
      case "!": return this.makeToken(TokenKind.Not, ch, startPos, startLine, startCol);
    }

    // Lone '&' and '|' land here too
    return this.makeToken(TokenKind.Illegal, ch, startPos, startLine, startCol);
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
        this.advance();
      } else {
        break;
      }
    }
  }

  private advance(): void {
    if (this.pos < this.source.length) {
      if (this.source[this.pos] === "\n") {
        this.line++;
        this.col = 1;
      } else {
        this.col++;
      }
      this.pos++;
    }
  }

  private makeToken(
    kind: TokenKind,
    text: string,
    startPos: number,
    startLine: number,
    startCol: number,
  ): Token {
    return {
      kind,
      text,
      span: {
        start: { offset: startPos, line: startLine, column: startCol },
        end: { offset: this.pos, line: this.line, column: this.col },
        source: this.filename,
      },
    };
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isLetter(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_" || /\p{L}/u.test(ch);
  }
}
