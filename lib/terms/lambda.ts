/**
 * Untyped lambda calculus term representation and printing.
 *
 * This module defines the AST for untyped lambda calculus terms (variables,
 * abstractions and applications), constructors for each variant, and the
 * canonical printer used for traces, classification and the CLI.
 *
 * Terms are plain immutable objects. Nothing in this package writes to a node
 * after it has been built.
 *
 * @module
 */

/**
 * This is a single term variable with a name.
 *
 * For instance, in the expression "λx.y", this is just "y".
 */
export interface LambdaVar {
  kind: "lambda-var";
  name: string;
}

export const mkVar = (name: string): LambdaVar => ({
  kind: "lambda-var",
  name,
});

// λx.<body>, where x is a name
export interface UntypedLambdaAbs {
  kind: "lambda-abs";
  name: string;
  body: UntypedLambda;
}

export const mkUntypedAbs = (
  name: string,
  body: UntypedLambda,
): UntypedLambdaAbs => ({
  kind: "lambda-abs",
  name,
  body,
});

/**
 * An application in the untyped lambda calculus
 */
export interface UntypedApplication {
  kind: "non-terminal";
  lft: UntypedLambda;
  rgt: UntypedLambda;
}

/**
 * The legal terms of the untyped lambda calculus.
 * e ::= x | λx.e | e e, where x is a variable name, and e is a valid expr
 */
export type UntypedLambda =
  | LambdaVar
  | UntypedLambdaAbs
  | UntypedApplication;

/**
 * Creates an application of one untyped lambda term to another.
 * @param left the function term
 * @param right the argument term
 * @returns a new application node
 */
export const createApplication = (
  left: UntypedLambda,
  right: UntypedLambda,
): UntypedApplication => ({
  kind: "non-terminal",
  lft: left,
  rgt: right,
});

/**
 * Left-associated application of a non-empty list of terms:
 * `typelessApp(f, x, y)` is `(f x) y`.
 */
export const typelessApp = (
  head: UntypedLambda,
  ...rest: UntypedLambda[]
): UntypedLambda => rest.reduce<UntypedLambda>(createApplication, head);

/**
 * Nested abstractions over the given parameters:
 * `abstractOver(["f", "x"], body)` is `λf.λx.body`.
 */
export const abstractOver = (
  names: string[],
  body: UntypedLambda,
): UntypedLambda =>
  names.reduceRight<UntypedLambda>(
    (acc, name) => mkUntypedAbs(name, acc),
    body,
  );

/**
 * Pretty-prints an untyped lambda expression in canonical form.
 *
 * Applications associate to the left and abstraction bodies extend as far
 * right as possible, so only two kinds of parentheses are ever needed: around
 * an abstraction in function position, and around an abstraction or an
 * application in argument position. The output re-parses to the same tree.
 *
 * The walk keeps its own stack, so arbitrarily deep terms print.
 *
 * @param ut the untyped lambda term
 * @param glyph the abstraction marker, `λ` or `\`
 */
export const prettyPrintUntypedLambda = (
  ut: UntypedLambda,
  glyph = "λ",
): string => {
  const out: string[] = [];
  // pending work, popped from the end: a term to print or literal text
  const pending: (UntypedLambda | string)[] = [ut];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (typeof next === "string") {
      out.push(next);
      continue;
    }
    switch (next.kind) {
      case "lambda-var":
        out.push(next.name);
        break;
      case "lambda-abs":
        out.push(`${glyph}${next.name}.`);
        pending.push(next.body);
        break;
      case "non-terminal": {
        const wrapArg = next.rgt.kind !== "lambda-var";
        const wrapFn = next.lft.kind === "lambda-abs";
        if (wrapArg) pending.push(")");
        pending.push(next.rgt);
        pending.push(wrapArg ? " (" : " ");
        if (wrapFn) pending.push(")");
        pending.push(next.lft);
        if (wrapFn) pending.push("(");
        break;
      }
    }
  }

  return out.join("");
};

/**
 * Structural equality, names included. Use `alphaEquivalent` to ignore the
 * choice of bound variable names.
 */
export const termsEqual = (a: UntypedLambda, b: UntypedLambda): boolean => {
  const pairs: [UntypedLambda, UntypedLambda][] = [[a, b]];

  for (let pair = pairs.pop(); pair !== undefined; pair = pairs.pop()) {
    const [x, y] = pair;
    if (x === y) continue;
    switch (x.kind) {
      case "lambda-var":
        if (y.kind !== "lambda-var" || x.name !== y.name) return false;
        break;
      case "lambda-abs":
        if (y.kind !== "lambda-abs" || x.name !== y.name) return false;
        pairs.push([x.body, y.body]);
        break;
      case "non-terminal":
        if (y.kind !== "non-terminal") return false;
        pairs.push([x.rgt, y.rgt], [x.lft, y.lft]);
        break;
    }
  }
  return true;
};
