/**
 * Untyped lambda calculus: parsing, capture-avoiding substitution,
 * strategy-driven beta reduction and combinator classification.
 *
 * This module re-exports the public API:
 * - lexer and parser, with their error types
 * - term constructors, canonical printer and variable utilities
 * - the stepper, the bounded reducer and evaluators bound to a strategy
 * - the combinator classifier and Church numerals
 *
 * @example
 * ```ts
 * import { parseLambda, reduce, Strategy } from "lambda-stepper";
 * const result = reduce(parseLambda("(λx.λy.x) a b"), Strategy.NormalOrder, 10);
 * result.finalTerm; // "a"
 * ```
 *
 * @module
 */

// Parser exports
/** Parses a string representation of an untyped lambda expression into its AST. */
export { parseLambda } from "./parser/untyped.ts";
export {
  type LexerOptions,
  type Token,
  type TokenKind,
  tokenize,
} from "./parser/lexer.ts";
export { LexError, ParseError } from "./parser/parseError.ts";

// Lambda terms exports
export {
  abstractOver,
  createApplication,
  type LambdaVar,
  mkUntypedAbs,
  mkVar,
  /** Generates the canonical string representation of an untyped lambda expression. */
  prettyPrintUntypedLambda,
  termsEqual,
  typelessApp,
  type UntypedApplication,
  type UntypedLambda,
  type UntypedLambdaAbs,
} from "./terms/lambda.ts";
export { boundVars, freeVars, freshName, isClosed } from "./terms/variables.ts";
export { alphaRename, substitute } from "./terms/substitution.ts";
export {
  alphaEquivalent,
  type DeBruijnTerm,
  prettyPrintDeBruijn,
  toDeBruijn,
} from "./terms/deBruijn.ts";
export { analyzeTerm, type TermAnalysis } from "./terms/analysis.ts";
export { randLambda, type RandomSource } from "./terms/generator.ts";

// Evaluator exports
export { ALL_STRATEGIES, parseStrategy, Strategy } from "./evaluator/strategy.ts";
export {
  type Direction,
  findRedex,
  type RedexDescription,
  stepOnce,
  type StepResult,
} from "./evaluator/stepper.ts";
export {
  reduce,
  reduceExpression,
  type ReduceExpressionOptions,
  type ReductionResult,
  type ReductionRun,
  runReduction,
  type TraceEntry,
} from "./evaluator/reducer.ts";
export { createEvaluator, type Evaluator } from "./evaluator/evaluator.ts";
export { DEFAULT_MAX_STEPS, DEFAULT_STRATEGY } from "./evaluator/defaults.ts";

// Classification exports
export { classify, type ClassifyOptions, type MatchMode } from "./classifier.ts";
export { churchNumeral, unChurchNumeral } from "./church.ts";
export { KNOWN_COMBINATORS, type KnownCombinator } from "./consts/combinators.ts";
