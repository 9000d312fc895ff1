import { expect } from "chai";
import { describe, it } from "mocha";
import rsexport from "random-seed";

import { reduce } from "../../lib/evaluator/reducer.ts";
import { ALL_STRATEGIES } from "../../lib/evaluator/strategy.ts";
import { parseLambda } from "../../lib/parser/untyped.ts";
import { randLambda } from "../../lib/terms/generator.ts";
import {
  prettyPrintUntypedLambda,
  type UntypedLambda,
} from "../../lib/terms/lambda.ts";
import { substitute } from "../../lib/terms/substitution.ts";
import { freeVars } from "../../lib/terms/variables.ts";

const { create } = rsexport;

const SAMPLES = 40;
const MAX_STEPS = 15;

const sample = (label: string): UntypedLambda[] =>
  Array.from({ length: SAMPLES }, (_, i) => {
    const rs = create(`${label}-${i}`);
    return randLambda(rs, rs.intBetween(1, 6));
  });

const sorted = (names: Iterable<string>): string[] => [...names].sort();

describe("lambda term properties", () => {
  it("parses every printed term back to the same tree", () => {
    for (const term of sample("print")) {
      expect(parseLambda(prettyPrintUntypedLambda(term))).to.deep.equal(term);
    }
  });

  it("computes the free variables of a substitution exactly", () => {
    const replacements = sample("replacement");
    sample("substitution").forEach((term, i) => {
      const replacement = replacements[i] ?? parseLambda("y");
      const before = freeVars(term);
      const expected = new Set(before);
      expected.delete("x");
      if (before.has("x")) {
        for (const name of freeVars(replacement)) expected.add(name);
      }
      expect(sorted(freeVars(substitute(term, "x", replacement)))).to.deep
        .equal(sorted(expected));
    });
  });

  it("leaves a term untouched when the variable is not free in it", () => {
    const replacement = parseLambda("λx.x x");
    for (const term of sample("untouched")) {
      if (freeVars(term).has("q")) continue;
      expect(substitute(term, "q", replacement)).to.equal(term);
    }
  });

  it("never exceeds the step budget and traces every step", () => {
    for (const strategy of ALL_STRATEGIES) {
      for (const term of sample(`budget-${strategy}`)) {
        const result = reduce(term, strategy, MAX_STEPS);
        expect(result.stepsTaken).to.be.at.most(MAX_STEPS);
        expect(result.trace).to.have.length(result.stepsTaken + 1);
        expect(result.trace.map((entry) => entry.step)).to.deep.equal(
          Array.from({ length: result.stepsTaken + 1 }, (_, i) => i),
        );
        expect(result.maxStepsReached).to.equal(!result.isNormalForm);
      }
    }
  });

  it("does nothing more to a normal form", () => {
    for (const strategy of ALL_STRATEGIES) {
      for (const term of sample(`idempotent-${strategy}`)) {
        const first = reduce(term, strategy, MAX_STEPS);
        if (!first.isNormalForm) continue;
        const second = reduce(parseLambda(first.finalTerm), strategy, MAX_STEPS);
        expect(second.stepsTaken).to.equal(0);
        expect(second.finalTerm).to.equal(first.finalTerm);
      }
    }
  });
});
