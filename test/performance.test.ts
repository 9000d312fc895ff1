import { expect } from "chai";
import { describe, it } from "mocha";
import { hrtime } from "node:process";

import { reduce } from "../lib/evaluator/reducer.ts";
import { Strategy } from "../lib/evaluator/strategy.ts";
import { parseLambda } from "../lib/parser/untyped.ts";

describe("reducer performance", function () {
  this.timeout(20_000);

  it("keeps the cost of a step proportional to the term on a growing spine", () => {
    // (λx.x x x) (λx.x x x) adds one copy of itself to the spine per step
    const N = 1000;
    const term = parseLambda("(\\x.x x x) (\\x.x x x)");

    const start = hrtime.bigint();
    const result = reduce(term, Strategy.NormalOrder, N);
    const elapsedMs = Number((hrtime.bigint() - start) / 1_000_000n);

    console.log(`reduced ${N} steps in ${elapsedMs} ms`);

    expect(result.stepsTaken).to.equal(N);
    expect(result.stagnated).to.equal(false);
    expect(result.finalTerm).to.equal(
      Array.from({ length: N + 2 }, () => "(λx.x x x)").join(" "),
    );
    expect(elapsedMs).to.be.below(2000);
  });
});
