import { END_OF_INPUT } from "./consts.ts";
import { describeToken, type Token, type TokenKind } from "./lexer.ts";
import { ParseError } from "./parseError.ts";

/**
 * A cursor over the lexer's token stream for recursive descent.
 */
export class TokenBuffer {
  private idx = 0;

  public constructor(
    private readonly tokens: readonly Token[],
    private readonly inputLength: number,
  ) {}

  /**
   * Returns the next token without consuming it, or null at end of input.
   */
  peek(): Token | null {
    return this.tokens[this.idx] ?? null;
  }

  /**
   * Consumes and returns the next token, which must be of the given kind.
   */
  match(kind: TokenKind, expected: string): Token {
    const next = this.peek();
    if (next === null || next.kind !== kind) {
      throw this.error(expected);
    }
    this.idx++;
    return next;
  }

  /**
   * Returns whether any token is left.
   */
  remaining(): boolean {
    return this.idx < this.tokens.length;
  }

  /**
   * Builds a ParseError for the current position.
   */
  error(expected: string): ParseError {
    const next = this.peek();
    if (next === null) {
      return new ParseError(this.inputLength, expected, END_OF_INPUT);
    }
    return new ParseError(next.position, expected, describeToken(next));
  }
}
