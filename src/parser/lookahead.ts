import type { Token } from "../lexer/tokens.js";

export interface TokenSource {
  nextToken(): Token;
}

/**
 * Fixed three-slot window over a token source: the current token, the next
 * one, and the one after that. Slots are refilled one at a time on `advance`.
 */
export class Lookahead {
  private source: TokenSource;
  private window: [Token, Token, Token];

  constructor(source: TokenSource) {
    this.source = source;
    this.window = [source.nextToken(), source.nextToken(), source.nextToken()];
  }

  get current(): Token {
    return this.window[0];
  }

  get next(): Token {
    return this.window[1];
  }

  /** Only the type-keyword disambiguation reads this far ahead. */
  get afterNext(): Token {
    return this.window[2];
  }

  advance(): Token {
    this.window = [this.window[1], this.window[2], this.source.nextToken()];
    return this.window[0];
  }
}
