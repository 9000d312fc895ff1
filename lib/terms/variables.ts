/**
 * Free and bound variable computation and fresh name generation.
 *
 * Both variable sets are recomputed from the tree on every call; terms carry
 * no cached metadata. Sets iterate in left-to-right order of first
 * occurrence, so arrays built from them are stable across runs.
 *
 * @module
 */
import type { UntypedLambda } from "./lambda.ts";

/**
 * Computes the free variables of an untyped lambda term.
 */
export function freeVars(term: UntypedLambda): Set<string> {
  const free = new Set<string>();
  // how many enclosing binders currently bind each name
  const bound = new Map<string, number>();
  // a term to visit, or the name of a binder whose scope ends here
  const pending: (UntypedLambda | string)[] = [term];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (typeof next === "string") {
      bound.set(next, (bound.get(next) ?? 1) - 1);
      continue;
    }
    switch (next.kind) {
      case "lambda-var":
        if (!bound.get(next.name)) {
          free.add(next.name);
        }
        break;
      case "lambda-abs":
        bound.set(next.name, (bound.get(next.name) ?? 0) + 1);
        pending.push(next.name, next.body);
        break;
      case "non-terminal":
        pending.push(next.rgt, next.lft);
        break;
    }
  }

  return free;
}

/**
 * Every parameter name introduced by an abstraction anywhere in the term,
 * whether or not the body refers to it.
 */
export function boundVars(term: UntypedLambda): Set<string> {
  const bound = new Set<string>();
  const pending: UntypedLambda[] = [term];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    switch (next.kind) {
      case "lambda-var":
        break;
      case "lambda-abs":
        bound.add(next.name);
        pending.push(next.body);
        break;
      case "non-terminal":
        pending.push(next.rgt, next.lft);
        break;
    }
  }

  return bound;
}

export const isClosed = (term: UntypedLambda): boolean =>
  freeVars(term).size === 0;

/**
 * True when `name` occurs free anywhere in `term`. Stops at the first hit
 * instead of building the whole set.
 */
export function occursFree(name: string, term: UntypedLambda): boolean {
  const pending: UntypedLambda[] = [term];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    switch (next.kind) {
      case "lambda-var":
        if (next.name === name) return true;
        break;
      case "lambda-abs":
        if (next.name !== name) pending.push(next.body);
        break;
      case "non-terminal":
        pending.push(next.rgt, next.lft);
        break;
    }
  }

  return false;
}

const SINGLE_LETTERS = "abcdefghijklmnopqrstuvwxyz";

/**
 * Generates a fresh name avoiding conflicts.
 *
 * Single letters are tried first, in alphabetical order; after that the base
 * name (minus any trailing digits) gets a numeric suffix counting from zero.
 * The result depends only on the arguments.
 */
export function freshName(base: string, avoid: ReadonlySet<string>): string {
  for (const letter of SINGLE_LETTERS) {
    if (!avoid.has(letter)) return letter;
  }
  const stem = base.replace(/[0-9]+$/, "") || "x";
  let counter = 0;
  let candidate = `${stem}${counter}`;
  while (avoid.has(candidate)) {
    counter++;
    candidate = `${stem}${counter}`;
  }
  return candidate;
}
