/**
 * Lexer and parser error definitions.
 *
 * Both errors carry the character offset of the offending input so that a
 * caller can point at it. Neither is ever retried or recovered from inside
 * the parser.
 *
 * @module
 */

/**
 * Raised by the lexer when the input holds no tokens at all, or, in strict
 * mode, when it meets a character outside the grammar.
 */
export class LexError extends Error {
  constructor(
    message: string,
    public readonly position: number,
  ) {
    super(message);
    this.name = "LexError";
  }
}

/**
 * Raised by the parser on malformed syntax.
 */
export class ParseError extends Error {
  constructor(
    public readonly position: number,
    public readonly expected: string,
    public readonly found: string,
  ) {
    super(`expected ${expected} but found ${found} at position ${position}`);
    this.name = "ParseError";
  }
}
