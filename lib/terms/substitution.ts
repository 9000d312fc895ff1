/**
 * Capture-avoiding substitution for untyped lambda terms.
 *
 * `substitute(M, x, N)` computes M[x := N]. When an abstraction in M binds a
 * name that is free in N, the binder is alpha-renamed to a fresh name before
 * the substitution descends into its body, so no free variable of N is ever
 * captured.
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  mkVar,
  type UntypedApplication,
  type UntypedLambda,
  type UntypedLambdaAbs,
} from "./lambda.ts";
import { boundVars, freeVars, freshName, occursFree } from "./variables.ts";

// work items of the substitution walk; "app" and "abs" rebuild a node
// from the results of its children
type SubstitutionTask =
  | { op: "visit"; term: UntypedLambda }
  | { op: "app"; node: UntypedApplication }
  | { op: "abs"; node: UntypedLambdaAbs };

/**
 * Replaces the free occurrences of `variable` in `term` with `replacement`.
 *
 * Sub-trees in which `variable` does not occur free are returned as they are,
 * so the result shares structure with the input wherever nothing changed.
 */
export function substitute(
  term: UntypedLambda,
  variable: string,
  replacement: UntypedLambda,
): UntypedLambda {
  const replacementFree = freeVars(replacement);
  const results: UntypedLambda[] = [];
  const tasks: SubstitutionTask[] = [{ op: "visit", term }];

  const popResult = (): UntypedLambda => {
    const result = results.pop();
    if (result === undefined) {
      throw new Error("substitution result stack underflow");
    }
    return result;
  };

  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    switch (task.op) {
      case "app": {
        const rgt = popResult();
        const lft = popResult();
        const node = task.node;
        results.push(
          lft === node.lft && rgt === node.rgt
            ? node
            : createApplication(lft, rgt),
        );
        break;
      }
      case "abs": {
        const body = popResult();
        const node = task.node;
        results.push(
          body === node.body ? node : mkUntypedAbs(node.name, body),
        );
        break;
      }
      case "visit": {
        const t = task.term;
        switch (t.kind) {
          case "lambda-var":
            results.push(t.name === variable ? replacement : t);
            break;
          case "non-terminal":
            tasks.push(
              { op: "app", node: t },
              { op: "visit", term: t.rgt },
              { op: "visit", term: t.lft },
            );
            break;
          case "lambda-abs":
            // shadowed
            if (t.name === variable) {
              results.push(t);
            } else if (
              replacementFree.has(t.name) && occursFree(variable, t.body)
            ) {
              const avoid = new Set([
                ...freeVars(t.body),
                ...boundVars(t.body),
                ...replacementFree,
                variable,
              ]);
              const renamed = alphaRename(t, freshName(t.name, avoid));
              tasks.push(
                { op: "abs", node: renamed },
                { op: "visit", term: renamed.body },
              );
            } else {
              tasks.push(
                { op: "abs", node: t },
                { op: "visit", term: t.body },
              );
            }
            break;
        }
        break;
      }
    }
  }

  return popResult();
}

/**
 * Alpha-renames the binder of an abstraction: `λx.M` becomes `λy.M[x := y]`.
 *
 * The caller picks `newName`; it must not occur free in the body, otherwise
 * the renamed binder would capture it.
 */
export function alphaRename(
  abs: UntypedLambdaAbs,
  newName: string,
): UntypedLambdaAbs {
  if (abs.name === newName) return abs;
  if (occursFree(newName, abs.body)) {
    throw new RangeError(
      `cannot rename ${abs.name} to ${newName}: ${newName} is free in the body`,
    );
  }
  return mkUntypedAbs(newName, substitute(abs.body, abs.name, mkVar(newName)));
}

/**
 * Contracts a beta redex: `(λx.body) arg` becomes `body[x := arg]`.
 */
export const betaContract = (
  abs: UntypedLambdaAbs,
  argument: UntypedLambda,
): UntypedLambda => substitute(abs.body, abs.name, argument);
