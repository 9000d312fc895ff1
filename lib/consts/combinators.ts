/**
 * Predefined lambda calculus combinators.
 *
 * This module provides the closed terms the classifier knows by name. Several
 * of them coincide up to renaming: KI is both False and Church 0, K is True.
 *
 * @module
 */
import { parseLambda } from "../parser/untyped.ts";
import type { UntypedLambda } from "../terms/lambda.ts";

export interface KnownCombinator {
  symbol: string;
  description: string;
  term: UntypedLambda;
}

// λx.x
export const I = parseLambda("λx.x");

// λxy.x, selects the first of two arguments
export const K = parseLambda("λx.λy.x");

// λxy.y, selects the second of two arguments
export const KI = parseLambda("λx.λy.y");

// λxyz.xz(yz)
export const S = parseLambda("λx.λy.λz.x z (y z)");

// λfgx.f(gx)
export const B = parseLambda("λf.λg.λx.f (g x)");

// λfxy.fyx
export const C = parseLambda("λf.λx.λy.f y x");

// λxy.xyy, duplicates the second argument
export const W = parseLambda("λx.λy.x y y");

// λx.xx
export const M = parseLambda("λx.x x");

// (λx.xx)(λx.xx), reduces to itself
export const Omega = parseLambda("(λx.x x) (λx.x x)");

// λf.(λx.f(xx))(λx.f(xx))
export const Y = parseLambda("λf.(λx.f (x x)) (λx.f (x x))");

// Turing's fixed-point combinator
export const Theta = parseLambda("(λx.λy.y (x x y)) (λx.λy.y (x x y))");

export const KNOWN_COMBINATORS: readonly KnownCombinator[] = [
  { symbol: "I", description: "Identity", term: I },
  { symbol: "K", description: "Constant / True", term: K },
  { symbol: "KI", description: "False / Church 0", term: KI },
  { symbol: "S", description: "Substitution", term: S },
  { symbol: "B", description: "Composition", term: B },
  { symbol: "C", description: "Flip", term: C },
  { symbol: "W", description: "Duplication", term: W },
  { symbol: "M", description: "Self-application", term: M },
  { symbol: "Ω", description: "Omega", term: Omega },
  { symbol: "Y", description: "Fixed-point", term: Y },
  { symbol: "Θ", description: "Turing fixed-point", term: Theta },
];

export const combinatorLabel = (combinator: KnownCombinator): string =>
  `${combinator.symbol} (${combinator.description})`;
