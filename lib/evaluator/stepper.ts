/**
 * Strategy-driven redex search and single-step beta reduction.
 *
 * A redex is located by a path of directions from the root, contracted by
 * capture-avoiding substitution, and spliced back into a fresh copy of the
 * spine above it. Everything off that spine is shared with the input.
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  prettyPrintUntypedLambda,
  type UntypedLambda,
  type UntypedLambdaAbs,
} from "../terms/lambda.ts";
import { betaContract } from "../terms/substitution.ts";
import { reducesUnderLambda, Strategy } from "./strategy.ts";

/** One move from a node to a child: function, argument, or body. */
export type Direction = "lft" | "rgt" | "body";

export interface RedexSite {
  path: Direction[];
  abs: UntypedLambdaAbs;
  argument: UntypedLambda;
}

/**
 * Printable account of one contraction, for traces and the CLI.
 */
export interface RedexDescription {
  path: Direction[];
  parameter: string;
  body: string;
  argument: string;
  /** The redex itself, `(λx.body) argument`. */
  redex: string;
  /** What the redex contracted to. */
  contractum: string;
}

/**
 * the shape of a step result.
 * altered is set if a redex was found and contracted; expr is the term after
 * the step, or the input unchanged when it is in normal form under the
 * strategy.
 */
export type StepResult =
  | { altered: false; expr: UntypedLambda }
  | { altered: true; expr: UntypedLambda; redex: RedexDescription };

/**
 * A node reached during redex search, linked back to the root so the path is
 * only materialized for the node that turns out to be the redex.
 */
interface Visit {
  term: UntypedLambda;
  up: { parent: Visit; direction: Direction } | null;
}

const child = (
  parent: Visit,
  term: UntypedLambda,
  direction: Direction,
): Visit => ({ term, up: { parent, direction } });

function pathTo(visit: Visit): Direction[] {
  const path: Direction[] = [];
  let at = visit;
  while (at.up !== null) {
    path.push(at.up.direction);
    at = at.up.parent;
  }
  return path.reverse();
}

const site = (visit: Visit): RedexSite | null => {
  const term = visit.term;
  return term.kind === "non-terminal" && term.lft.kind === "lambda-abs"
    ? { path: pathTo(visit), abs: term.lft, argument: term.rgt }
    : null;
};

// pre-order: a node before its function, its function before its argument
function leftmostOutermost(
  term: UntypedLambda,
  underLambda: boolean,
  intoArguments: boolean,
): RedexSite | null {
  const pending: Visit[] = [{ term, up: null }];

  for (let visit = pending.pop(); visit !== undefined; visit = pending.pop()) {
    const t = visit.term;
    switch (t.kind) {
      case "lambda-var":
        break;
      case "lambda-abs":
        if (underLambda) pending.push(child(visit, t.body, "body"));
        break;
      case "non-terminal": {
        const here = site(visit);
        if (here) return here;
        if (intoArguments) pending.push(child(visit, t.rgt, "rgt"));
        pending.push(child(visit, t.lft, "lft"));
        break;
      }
    }
  }
  return null;
}

// post-order: function, then argument, then the node itself
function leftmostInnermost(
  term: UntypedLambda,
  underLambda: boolean,
): RedexSite | null {
  // a node is pushed a second time, marked done, once its children are queued
  const pending: [Visit, boolean][] = [[{ term, up: null }, false]];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const [visit, done] = next;
    const t = visit.term;
    if (done) {
      const here = site(visit);
      if (here) return here;
      continue;
    }
    switch (t.kind) {
      case "lambda-var":
        break;
      case "lambda-abs":
        if (underLambda) pending.push([child(visit, t.body, "body"), false]);
        break;
      case "non-terminal":
        pending.push(
          [visit, true],
          [child(visit, t.rgt, "rgt"), false],
          [child(visit, t.lft, "lft"), false],
        );
        break;
    }
  }
  return null;
}

/**
 * Finds the redex the strategy would contract next, or null when the term is
 * in normal form (weak normal form for call-by-name and call-by-value).
 */
export function findRedex(
  term: UntypedLambda,
  strategy: Strategy,
): RedexSite | null {
  const underLambda = reducesUnderLambda(strategy);
  switch (strategy) {
    case Strategy.NormalOrder:
      return leftmostOutermost(term, underLambda, true);
    case Strategy.CallByName:
      return leftmostOutermost(term, underLambda, false);
    case Strategy.ApplicativeOrder:
    case Strategy.CallByValue:
      return leftmostInnermost(term, underLambda);
  }
}

/**
 * Rebuilds `term` with the sub-term at `path` replaced by `replace(subterm)`.
 * Only the nodes along the path are copied.
 */
export function replaceAt(
  term: UntypedLambda,
  path: readonly Direction[],
  replace: (subterm: UntypedLambda) => UntypedLambda,
): UntypedLambda {
  const rebuild: ((subterm: UntypedLambda) => UntypedLambda)[] = [];
  let current = term;

  for (const direction of path) {
    const node = current;
    if (node.kind === "non-terminal" && direction === "lft") {
      rebuild.push((lft) => createApplication(lft, node.rgt));
      current = node.lft;
    } else if (node.kind === "non-terminal" && direction === "rgt") {
      rebuild.push((rgt) => createApplication(node.lft, rgt));
      current = node.rgt;
    } else if (node.kind === "lambda-abs" && direction === "body") {
      rebuild.push((body) => mkUntypedAbs(node.name, body));
      current = node.body;
    } else {
      throw new RangeError(
        `path step '${direction}' does not apply to ${node.kind}`,
      );
    }
  }

  let result = replace(current);
  for (let up = rebuild.pop(); up !== undefined; up = rebuild.pop()) {
    result = up(result);
  }
  return result;
}

/**
 * Contracts the redex at a site found in `term`.
 */
export function contractAt(
  term: UntypedLambda,
  redexSite: RedexSite,
): { expr: UntypedLambda; contractum: UntypedLambda } {
  const contractum = betaContract(redexSite.abs, redexSite.argument);
  return { expr: replaceAt(term, redexSite.path, () => contractum), contractum };
}

export const describeRedex = (
  redexSite: RedexSite,
  contractum: UntypedLambda,
): RedexDescription => ({
  path: redexSite.path,
  parameter: redexSite.abs.name,
  body: prettyPrintUntypedLambda(redexSite.abs.body),
  argument: prettyPrintUntypedLambda(redexSite.argument),
  redex: prettyPrintUntypedLambda(
    createApplication(redexSite.abs, redexSite.argument),
  ),
  contractum: prettyPrintUntypedLambda(contractum),
});

/**
 * Performs one beta step under the given strategy.
 */
export function stepOnce(
  term: UntypedLambda,
  strategy: Strategy,
): StepResult {
  const redexSite = findRedex(term, strategy);
  if (redexSite === null) {
    return { altered: false, expr: term };
  }
  const { expr, contractum } = contractAt(term, redexSite);
  return { altered: true, expr, redex: describeRedex(redexSite, contractum) };
}
