import {
  createApplication,
  mkUntypedAbs,
  mkVar,
  type UntypedLambda,
} from "../terms/lambda.ts";
import { END_OF_INPUT } from "./consts.ts";
import { type LexerOptions, tokenize } from "./lexer.ts";
import { TokenBuffer } from "./tokenBuffer.ts";

const TERM = "a variable, '(' or a lambda";

/**
 * A construct still being read. `acc` is the left-associated application of
 * the atoms read so far inside it.
 */
type Frame =
  | { kind: "root"; acc: UntypedLambda | null }
  | {
    kind: "abstraction";
    param: string;
    acc: UntypedLambda | null;
    parent: Frame;
  }
  | { kind: "group"; acc: UntypedLambda | null; parent: Frame };

const attach = (frame: Frame, term: UntypedLambda): void => {
  frame.acc = frame.acc === null ? term : createApplication(frame.acc, term);
};

/**
 * Parses an untyped lambda term (including applications) by chaining
 * together atomic terms. Application associates to the left and an
 * abstraction body extends as far right as possible.
 *
 * Open abstractions and parentheses are kept on an explicit stack of frames,
 * so nesting depth is bounded only by memory.
 */
export function parseUntypedLambdaInternal(buf: TokenBuffer): UntypedLambda {
  let frame: Frame = { kind: "root", acc: null };

  for (;;) {
    switch (buf.peek()?.kind) {
      case "identifier":
        attach(frame, mkVar(buf.match("identifier", "a variable").text));
        continue;
      case "lambda": {
        buf.match("lambda", "a lambda");
        const param = buf.match("identifier", "a parameter name after the lambda");
        buf.match("dot", `'.' after parameter '${param.text}'`);
        frame = { kind: "abstraction", param: param.text, acc: null, parent: frame };
        continue;
      }
      case "lparen":
        buf.match("lparen", "'('");
        frame = { kind: "group", acc: null, parent: frame };
        continue;
    }

    // nothing here starts an atom, so the innermost frame ends
    const acc = frame.acc;
    if (acc === null) {
      throw buf.error(TERM);
    }
    switch (frame.kind) {
      case "root":
        return acc;
      case "abstraction": {
        const abs = mkUntypedAbs(frame.param, acc);
        frame = frame.parent;
        attach(frame, abs);
        break;
      }
      case "group":
        buf.match("rparen", "')'");
        frame = frame.parent;
        attach(frame, acc);
        break;
    }
  }
}

/**
 * Parses an input string into an untyped lambda term.
 *
 * @throws LexError when the input holds no tokens
 * @throws ParseError on malformed syntax, including unconsumed trailing input
 */
export function parseLambda(
  input: string,
  options: LexerOptions = {},
): UntypedLambda {
  const buf = new TokenBuffer(tokenize(input, options), input.length);
  const term = parseUntypedLambdaInternal(buf);
  if (buf.remaining()) {
    throw buf.error(END_OF_INPUT);
  }
  return term;
}
