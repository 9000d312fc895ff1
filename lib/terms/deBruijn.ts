/**
 * De Bruijn Index Conversion
 *
 * This module converts named lambda terms into a De Bruijn representation.
 * Bound variables become indices counting the binders between an occurrence
 * and the abstraction that binds it; free variables keep their names. Two
 * terms are alpha-equivalent exactly when their De Bruijn forms are equal.
 *
 * @module
 */

import type { UntypedLambda } from "./lambda.ts";

/**
 * A bound variable reference using a De Bruijn index.
 * The index represents the number of binders to traverse upward to reach the binding site.
 */
export interface DeBruijnVar {
  kind: "DbVar";
  index: number;
}

/**
 * A free term variable identified by its original name.
 */
export interface DeBruijnFreeVar {
  kind: "DbFreeVar";
  name: string;
}

/**
 * An abstraction: λ body
 */
export interface DeBruijnAbs {
  kind: "DbAbs";
  body: DeBruijnTerm;
}

/**
 * An application: left right
 */
export interface DeBruijnApp {
  kind: "DbApp";
  left: DeBruijnTerm;
  right: DeBruijnTerm;
}

export type DeBruijnTerm =
  | DeBruijnVar
  | DeBruijnFreeVar
  | DeBruijnAbs
  | DeBruijnApp;

type ConversionTask =
  | { op: "visit"; term: UntypedLambda }
  | { op: "abs" }
  | { op: "app" };

/**
 * Converts a named term to De Bruijn form.
 *
 * @param term the term to convert
 * @param ctx binder names in scope, innermost first
 */
export function toDeBruijn(
  term: UntypedLambda,
  ctx: readonly string[] = [],
): DeBruijnTerm {
  // binder names in scope, innermost last
  const scope = [...ctx].reverse();
  const results: DeBruijnTerm[] = [];
  const tasks: ConversionTask[] = [{ op: "visit", term }];

  const popResult = (): DeBruijnTerm => {
    const result = results.pop();
    if (result === undefined) {
      throw new Error("De Bruijn conversion stack underflow");
    }
    return result;
  };

  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    switch (task.op) {
      case "abs":
        scope.pop();
        results.push({ kind: "DbAbs", body: popResult() });
        break;
      case "app": {
        const right = popResult();
        const left = popResult();
        results.push({ kind: "DbApp", left, right });
        break;
      }
      case "visit": {
        const t = task.term;
        switch (t.kind) {
          case "lambda-var": {
            const at = scope.lastIndexOf(t.name);
            results.push(
              at >= 0
                ? { kind: "DbVar", index: scope.length - 1 - at }
                : { kind: "DbFreeVar", name: t.name },
            );
            break;
          }
          case "lambda-abs":
            scope.push(t.name);
            tasks.push({ op: "abs" }, { op: "visit", term: t.body });
            break;
          case "non-terminal":
            tasks.push(
              { op: "app" },
              { op: "visit", term: t.rgt },
              { op: "visit", term: t.lft },
            );
            break;
        }
        break;
      }
    }
  }

  return popResult();
}

/**
 * Prints a De Bruijn term with the same parenthesization rules as the named
 * printer: `λx.λy.x` becomes `λ.λ.1`.
 */
export function prettyPrintDeBruijn(term: DeBruijnTerm): string {
  const out: string[] = [];
  const pending: (DeBruijnTerm | string)[] = [term];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (typeof next === "string") {
      out.push(next);
      continue;
    }
    switch (next.kind) {
      case "DbVar":
        out.push(String(next.index));
        break;
      case "DbFreeVar":
        out.push(next.name);
        break;
      case "DbAbs":
        out.push("λ.");
        pending.push(next.body);
        break;
      case "DbApp": {
        const wrapRight = next.right.kind === "DbAbs" ||
          next.right.kind === "DbApp";
        const wrapLeft = next.left.kind === "DbAbs";
        if (wrapRight) pending.push(")");
        pending.push(next.right);
        pending.push(wrapRight ? " (" : " ");
        if (wrapLeft) pending.push(")");
        pending.push(next.left);
        if (wrapLeft) pending.push("(");
        break;
      }
    }
  }

  return out.join("");
}

export function deBruijnEqual(a: DeBruijnTerm, b: DeBruijnTerm): boolean {
  const pairs: [DeBruijnTerm, DeBruijnTerm][] = [[a, b]];

  for (let pair = pairs.pop(); pair !== undefined; pair = pairs.pop()) {
    const [x, y] = pair;
    switch (x.kind) {
      case "DbVar":
        if (y.kind !== "DbVar" || x.index !== y.index) return false;
        break;
      case "DbFreeVar":
        if (y.kind !== "DbFreeVar" || x.name !== y.name) return false;
        break;
      case "DbAbs":
        if (y.kind !== "DbAbs") return false;
        pairs.push([x.body, y.body]);
        break;
      case "DbApp":
        if (y.kind !== "DbApp") return false;
        pairs.push([x.right, y.right], [x.left, y.left]);
        break;
    }
  }
  return true;
}

/**
 * True when the two terms differ at most in the names of bound variables.
 */
export const alphaEquivalent = (a: UntypedLambda, b: UntypedLambda): boolean =>
  deBruijnEqual(toDeBruijn(a), toDeBruijn(b));

/**
 * A string key that is identical for alpha-equivalent terms.
 */
export const alphaKey = (term: UntypedLambda): string =>
  prettyPrintDeBruijn(toDeBruijn(term));
