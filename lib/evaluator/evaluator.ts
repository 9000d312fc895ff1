/**
 * Evaluator interface for untyped lambda terms.
 *
 * This module defines the interface for evaluators bound to one reduction
 * strategy, providing both single-step and bounded full reduction.
 *
 * @module
 */
import type { ClassifyOptions } from "../classifier.ts";
import type { UntypedLambda } from "../terms/lambda.ts";
import { DEFAULT_MAX_STEPS } from "./defaults.ts";
import { reduce, type ReductionResult } from "./reducer.ts";
import { stepOnce, type StepResult } from "./stepper.ts";
import type { Strategy } from "./strategy.ts";

export interface Evaluator {
  readonly strategy: Strategy;

  /** Apply exactly one β-step (or return unchanged). */
  stepOnce(expr: UntypedLambda): StepResult;

  /** Keep stepping until normal form, stagnation, or maxSteps. */
  reduce(expr: UntypedLambda, maxSteps?: number): ReductionResult;
}

export const createEvaluator = (
  strategy: Strategy,
  classifyOptions: ClassifyOptions = {},
): Evaluator => ({
  strategy,
  stepOnce: (expr) => stepOnce(expr, strategy),
  reduce: (expr, maxSteps = DEFAULT_MAX_STEPS) =>
    reduce(expr, strategy, maxSteps, classifyOptions),
});
