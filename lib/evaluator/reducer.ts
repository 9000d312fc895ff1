/**
 * Bounded multi-step reduction with a full trace.
 *
 * `reduce` never throws for any term: divergence shows up in the result as
 * `maxStepsReached`, together with the partial trace.
 *
 * @module
 */
import { classify, type ClassifyOptions } from "../classifier.ts";
import { parseLambda } from "../parser/untyped.ts";
import type { LexerOptions } from "../parser/lexer.ts";
import { analyzeTerm, type TermAnalysis } from "../terms/analysis.ts";
import {
  prettyPrintUntypedLambda,
  type UntypedLambda,
} from "../terms/lambda.ts";
import { boundVars, freeVars } from "../terms/variables.ts";
import {
  DEFAULT_MAX_STEPS,
  DEFAULT_STRATEGY,
  STAGNATION_WINDOW,
} from "./defaults.ts";
import { findRedex, type RedexDescription, stepOnce } from "./stepper.ts";
import type { Strategy } from "./strategy.ts";

export type TraceAction = "initial" | "beta-reduction";

export interface TraceEntry {
  step: number;
  term: string;
  action: TraceAction;
  /** The contraction that produced this snapshot; absent for step 0. */
  redex?: RedexDescription;
  freeVariables: string[];
  boundVariables: string[];
}

export interface ReductionResult {
  originalTerm: string;
  finalTerm: string;
  isNormalForm: boolean;
  stepsTaken: number;
  /** True when a bound (the step budget or the stagnation guard) ended the run. */
  maxStepsReached: boolean;
  /** True when the run stopped on identical consecutive snapshots. */
  stagnated: boolean;
  strategy: Strategy;
  combinator?: string;
  analysis: TermAnalysis;
  trace: TraceEntry[];
}

const snapshot = (
  step: number,
  term: UntypedLambda,
  redex?: RedexDescription,
): TraceEntry => ({
  step,
  term: prettyPrintUntypedLambda(term),
  action: redex ? "beta-reduction" : "initial",
  ...(redex ? { redex } : {}),
  freeVariables: [...freeVars(term)],
  boundVariables: [...boundVars(term)],
});

const isStagnant = (trace: readonly TraceEntry[]): boolean => {
  if (trace.length < STAGNATION_WINDOW) return false;
  const window = trace.slice(-STAGNATION_WINDOW);
  return window.every((entry) => entry.term === window[0]?.term);
};

/**
 * A finished reduction together with the final term itself, for callers that
 * keep working on it.
 */
export interface ReductionRun {
  result: ReductionResult;
  term: UntypedLambda;
}

/**
 * Reduces `term` under `strategy` until it reaches a normal form, the step
 * budget runs out, or the last snapshots stop changing.
 *
 * @param maxSteps the most contractions to perform; a non-negative integer
 * @throws RangeError when `maxSteps` is negative or not an integer
 */
export const reduce = (
  term: UntypedLambda,
  strategy: Strategy = DEFAULT_STRATEGY,
  maxSteps: number = DEFAULT_MAX_STEPS,
  classifyOptions: ClassifyOptions = {},
): ReductionResult =>
  runReduction(term, strategy, maxSteps, classifyOptions).result;

/**
 * Same as `reduce`, but also returns the final term.
 */
export function runReduction(
  term: UntypedLambda,
  strategy: Strategy = DEFAULT_STRATEGY,
  maxSteps: number = DEFAULT_MAX_STEPS,
  classifyOptions: ClassifyOptions = {},
): ReductionRun {
  if (!Number.isSafeInteger(maxSteps) || maxSteps < 0) {
    throw new RangeError(`maxSteps must be a non-negative integer, got ${maxSteps}`);
  }

  const trace: TraceEntry[] = [snapshot(0, term)];
  let current = term;
  let stepsTaken = 0;
  let stagnated = false;

  while (stepsTaken < maxSteps) {
    const result = stepOnce(current, strategy);
    if (!result.altered) break;

    current = result.expr;
    stepsTaken++;
    trace.push(snapshot(stepsTaken, current, result.redex));

    if (isStagnant(trace)) {
      stagnated = true;
      break;
    }
  }

  const isNormalForm = findRedex(current, strategy) === null;
  const combinator = classify(current, classifyOptions);

  const result: ReductionResult = {
    originalTerm: prettyPrintUntypedLambda(term),
    finalTerm: prettyPrintUntypedLambda(current),
    isNormalForm,
    stepsTaken,
    maxStepsReached: !isNormalForm,
    stagnated,
    strategy,
    ...(combinator !== null ? { combinator } : {}),
    analysis: analyzeTerm(current),
    trace,
  };
  return { result, term: current };
}

export interface ReduceExpressionOptions extends LexerOptions, ClassifyOptions {
  strategy?: Strategy;
  maxSteps?: number;
}

/**
 * Parses and reduces an expression in one call.
 *
 * @throws LexError or ParseError when the text is malformed
 */
export function reduceExpression(
  text: string,
  options: ReduceExpressionOptions = {},
): ReductionResult {
  const term = parseLambda(text, { strict: options.strict });
  return reduce(
    term,
    options.strategy ?? DEFAULT_STRATEGY,
    options.maxSteps ?? DEFAULT_MAX_STEPS,
    { matching: options.matching },
  );
}
