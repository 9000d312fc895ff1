/**
 * Names a term when it is one of the well-known combinators or a Church
 * numeral.
 *
 * @module
 */
import { churchNumeral, unChurchNumeral } from "./church.ts";
import {
  combinatorLabel,
  KNOWN_COMBINATORS,
} from "./consts/combinators.ts";
import { alphaKey } from "./terms/deBruijn.ts";
import {
  prettyPrintUntypedLambda,
  type UntypedLambda,
} from "./terms/lambda.ts";

/**
 * - `alpha`: terms match when they are equal up to bound variable names, so
 *   `λa.a` is I.
 * - `syntactic`: terms match only when their canonical prints are identical,
 *   so `λa.a` is not I.
 */
export type MatchMode = "alpha" | "syntactic";

export interface ClassifyOptions {
  matching?: MatchMode;
}

/**
 * @returns a label such as `"S (Substitution)"` or `"Church 3"`, or null when
 *   the term is not recognized.
 */
export function classify(
  term: UntypedLambda,
  options: ClassifyOptions = {},
): string | null {
  const matching = options.matching ?? "alpha";
  const key = matching === "alpha" ? alphaKey : prettyPrintUntypedLambda;
  const termKey = key(term);

  const known = KNOWN_COMBINATORS.find((c) => key(c.term) === termKey);
  if (known) return combinatorLabel(known);

  const n = unChurchNumeral(term);
  if (n === null) return null;
  if (matching === "syntactic" && termKey !== key(churchNumeral(n))) {
    return null;
  }
  return `Church ${n}`;
}
