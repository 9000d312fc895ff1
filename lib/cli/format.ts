/**
 * Plain-text rendering of reduction results and syntax errors for the CLI.
 *
 * @module
 */
import type { ReductionResult, TraceEntry } from "../evaluator/reducer.ts";
import { LexError, ParseError } from "../parser/parseError.ts";

export const formatTraceEntry = (entry: TraceEntry): string =>
  entry.redex
    ? `${entry.step}: ${entry.term}    [${entry.redex.redex} → ${entry.redex.contractum}]`
    : `${entry.step}: ${entry.term}`;

export function formatResult(
  result: ReductionResult,
  withTrace = false,
): string[] {
  const lines: string[] = [];
  if (withTrace) {
    lines.push(...result.trace.map(formatTraceEntry));
  }

  let status: string;
  if (result.isNormalForm) {
    status = "normal form";
  } else if (result.stagnated) {
    status = "stopped: term stopped changing (likely divergent)";
  } else {
    status = "stopped: step budget exhausted (possibly divergent)";
  }

  lines.push(`result:   ${result.finalTerm}`);
  lines.push(`steps:    ${result.stepsTaken} (${result.strategy})`);
  lines.push(`status:   ${status}`);
  if (result.combinator !== undefined) {
    lines.push(`matches:  ${result.combinator}`);
  }
  return lines;
}

/**
 * Renders a lexer or parser error with a caret under the offending column.
 * Returns null for any other error.
 */
export function formatSyntaxError(input: string, e: unknown): string[] | null {
  if (!(e instanceof LexError) && !(e instanceof ParseError)) {
    return null;
  }
  const column = Math.min(e.position, input.length);
  return [
    `${e.name}: ${e.message}`,
    `  ${input}`,
    `  ${" ".repeat(column)}^`,
  ];
}
