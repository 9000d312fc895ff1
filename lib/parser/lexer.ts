/**
 * Lexer for untyped lambda expressions.
 *
 * Splits the input into abstraction markers, dots, parentheses and
 * identifiers. Both `\` and `λ` produce the same `lambda` token. Whitespace
 * is dropped; any other character is skipped, or rejected in strict mode.
 *
 * @module
 */
import {
  DOT,
  IDENTIFIER_CHAR_REGEX,
  IDENTIFIER_START_REGEX,
  LAMBDA_MARKERS,
  LEFT_PAREN,
  RIGHT_PAREN,
  WHITESPACE_REGEX,
} from "./consts.ts";
import { LexError } from "./parseError.ts";

export type TokenKind = "lambda" | "dot" | "lparen" | "rparen" | "identifier";

export interface Token {
  kind: TokenKind;
  /** Source text of the token. */
  text: string;
  /** Character offset of the token in the input. */
  position: number;
}

export interface LexerOptions {
  /** Reject characters outside the grammar instead of skipping them. */
  strict?: boolean;
}

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
  [LEFT_PAREN, "lparen"],
  [RIGHT_PAREN, "rparen"],
  [DOT, "dot"],
]);

export function tokenize(input: string, options: LexerOptions = {}): Token[] {
  const tokens: Token[] = [];
  let idx = 0;

  while (idx < input.length) {
    const ch = input.charAt(idx);

    if (WHITESPACE_REGEX.test(ch)) {
      idx++;
      continue;
    }

    if (LAMBDA_MARKERS.includes(ch)) {
      tokens.push({ kind: "lambda", text: ch, position: idx });
      idx++;
      continue;
    }

    const punctuation = PUNCTUATION.get(ch);
    if (punctuation !== undefined) {
      tokens.push({ kind: punctuation, text: ch, position: idx });
      idx++;
      continue;
    }

    if (IDENTIFIER_START_REGEX.test(ch)) {
      const start = idx;
      idx++;
      while (idx < input.length && IDENTIFIER_CHAR_REGEX.test(input.charAt(idx))) {
        idx++;
      }
      tokens.push({
        kind: "identifier",
        text: input.slice(start, idx),
        position: start,
      });
      continue;
    }

    if (options.strict) {
      throw new LexError(`unexpected character '${ch}' at position ${idx}`, idx);
    }
    idx++;
  }

  if (tokens.length === 0) {
    throw new LexError("empty expression", input.length);
  }

  return tokens;
}

export const describeToken = (token: Token): string =>
  token.kind === "identifier" ? `identifier '${token.text}'` : `'${token.text}'`;
