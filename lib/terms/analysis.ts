/**
 * Structural analysis of a lambda term: its shape, variables and size
 * metrics. Attached to every reduction result for the final term.
 *
 * @module
 */
import { prettyPrintUntypedLambda, type UntypedLambda } from "./lambda.ts";
import { boundVars, freeVars } from "./variables.ts";

export type TermKind =
  | "variable"
  | "closed-abstraction"
  | "open-abstraction"
  | "application";

export interface TermAnalysis {
  kind: TermKind;
  freeVariables: string[];
  boundVariables: string[];
  isClosed: boolean;
  abstractionCount: number;
  applicationCount: number;
  variableCount: number;
  /** Height of the tree; a lone variable has depth 1. */
  depth: number;
  /** Length of the canonical print. */
  size: number;
}

interface NodeCounts {
  abstractions: number;
  applications: number;
  variables: number;
  depth: number;
}

function countNodes(term: UntypedLambda): NodeCounts {
  const counts: NodeCounts = {
    abstractions: 0,
    applications: 0,
    variables: 0,
    depth: 0,
  };
  const pending: [UntypedLambda, number][] = [[term, 1]];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const [t, depth] = next;
    counts.depth = Math.max(counts.depth, depth);
    switch (t.kind) {
      case "lambda-var":
        counts.variables++;
        break;
      case "lambda-abs":
        counts.abstractions++;
        pending.push([t.body, depth + 1]);
        break;
      case "non-terminal":
        counts.applications++;
        pending.push([t.rgt, depth + 1], [t.lft, depth + 1]);
        break;
    }
  }

  return counts;
}

export function analyzeTerm(term: UntypedLambda): TermAnalysis {
  const free = [...freeVars(term)];
  const counts = countNodes(term);

  let kind: TermKind;
  switch (term.kind) {
    case "lambda-var":
      kind = "variable";
      break;
    case "lambda-abs":
      kind = free.length === 0 ? "closed-abstraction" : "open-abstraction";
      break;
    case "non-terminal":
      kind = "application";
      break;
  }

  return {
    kind,
    freeVariables: free,
    boundVariables: [...boundVars(term)],
    isClosed: free.length === 0,
    abstractionCount: counts.abstractions,
    applicationCount: counts.applications,
    variableCount: counts.variables,
    depth: counts.depth,
    size: prettyPrintUntypedLambda(term).length,
  };
}
