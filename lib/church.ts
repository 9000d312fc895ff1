/**
 * Church numeral encoding and decoding.
 *
 * The numeral n is `λf.λx.f (f (… (f x)))` with n applications of f.
 *
 * @module
 */
import {
  abstractOver,
  createApplication,
  mkVar,
  type UntypedLambda,
} from "./terms/lambda.ts";

/**
 * Builds the Church numeral for a non-negative integer.
 */
export function churchNumeral(n: number, f = "f", x = "x"): UntypedLambda {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`not a natural number: ${n}`);
  }
  if (f === x) {
    throw new RangeError("the two binders of a Church numeral must differ");
  }
  let body: UntypedLambda = mkVar(x);
  for (let i = 0; i < n; i++) {
    body = createApplication(mkVar(f), body);
  }
  return abstractOver([f, x], body);
}

/**
 * Reads a Church numeral back as a number, whatever its binder names.
 * Returns null for any term that is not a numeral.
 */
export function unChurchNumeral(term: UntypedLambda): number | null {
  if (term.kind !== "lambda-abs" || term.body.kind !== "lambda-abs") {
    return null;
  }
  const f = term.name;
  const x = term.body.name;
  let body = term.body.body;
  let count = 0;

  // with f === x the outer binder is shadowed, so only zero is possible
  while (
    f !== x && body.kind === "non-terminal" && body.lft.kind === "lambda-var" &&
    body.lft.name === f
  ) {
    count++;
    body = body.rgt;
  }

  return body.kind === "lambda-var" && body.name === x ? count : null;
}
