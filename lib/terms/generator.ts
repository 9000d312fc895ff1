/**
 * Random untyped lambda term generation.
 *
 * This module generates random lambda terms of a given size from a seeded
 * random source, so the same seed always yields the same term.
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  mkVar,
  type UntypedLambda,
} from "./lambda.ts";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

export const DEFAULT_NAMES: readonly string[] = ["x", "y", "z", "f"];

/**
 * @param rs the random source to use.
 * @param n the number of variable occurrences in the result.
 * @param names the pool of names used for binders and variables.
 * @returns a random term. Roughly a third of the interior nodes are
 *   abstractions; variables favour names bound by an enclosing abstraction.
 */
export const randLambda = (
  rs: RandomSource,
  n: number,
  names: readonly string[] = DEFAULT_NAMES,
): UntypedLambda => {
  if (n <= 0) {
    throw new Error("A valid term must contain at least one variable.");
  }
  if (names.length === 0) {
    throw new Error("at least one variable name is required");
  }
  return build(rs, n, names, []);
};

const pick = <T>(rs: RandomSource, items: readonly T[]): T => {
  const item = items[rs.intBetween(0, items.length - 1)];
  if (item === undefined) {
    throw new Error("random index out of range");
  }
  return item;
};

const build = (
  rs: RandomSource,
  n: number,
  names: readonly string[],
  scope: readonly string[],
): UntypedLambda => {
  const die = rs.intBetween(1, 3);

  if (die === 1) {
    const name = pick(rs, names);
    return mkUntypedAbs(name, build(rs, n, names, [name, ...scope]));
  }

  if (n === 1) {
    const pool = scope.length > 0 && rs.intBetween(0, 3) > 0 ? scope : names;
    return mkVar(pick(rs, pool));
  }

  const split = rs.intBetween(1, n - 1);
  return createApplication(
    build(rs, split, names, scope),
    build(rs, n - split, names, scope),
  );
};
