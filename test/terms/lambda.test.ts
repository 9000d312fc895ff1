import { expect } from "chai";
import { describe, it } from "mocha";

import { parseLambda } from "../../lib/parser/untyped.ts";
import {
  abstractOver,
  mkUntypedAbs,
  mkVar,
  prettyPrintUntypedLambda,
  termsEqual,
  typelessApp,
} from "../../lib/terms/lambda.ts";

describe("prettyPrintUntypedLambda", () => {
  const cases: [string, string][] = [
    ["x", "x"],
    ["\\x.x", "λx.x"],
    ["f x y", "f x y"],
    ["f (x y)", "f (x y)"],
    ["(\\x.x) y", "(λx.x) y"],
    ["f (\\x.x)", "f (λx.x)"],
    ["\\x.\\y.x y", "λx.λy.x y"],
    ["(\\x.x x) (\\x.x x)", "(λx.x x) (λx.x x)"],
    ["\\f.\\x.f (f (f x))", "λf.λx.f (f (f x))"],
    ["((a b) (c d))", "a b (c d)"],
    ["(\\x.x) (\\y.y) z", "(λx.x) (λy.y) z"],
  ];

  for (const [src, printed] of cases) {
    it(`prints ${src} as ${printed}`, () => {
      expect(prettyPrintUntypedLambda(parseLambda(src))).to.equal(printed);
    });

    it(`re-parses the print of ${src} to the same tree`, () => {
      const term = parseLambda(src);
      expect(parseLambda(prettyPrintUntypedLambda(term))).to.deep.equal(term);
    });
  }

  it("prints with an ASCII marker on request", () => {
    const term = parseLambda("(λx.λy.x) a");
    expect(prettyPrintUntypedLambda(term, "\\")).to.equal("(\\x.\\y.x) a");
  });

  it("parenthesizes an abstraction built directly in function position", () => {
    const term = typelessApp(mkUntypedAbs("x", mkVar("x")), mkVar("y"), mkVar("z"));
    expect(prettyPrintUntypedLambda(term)).to.equal("(λx.x) y z");
  });
});

describe("term constructors", () => {
  it("abstractOver nests binders left to right", () => {
    expect(abstractOver(["f", "x"], mkVar("x"))).to.deep.equal(
      mkUntypedAbs("f", mkUntypedAbs("x", mkVar("x"))),
    );
  });

  it("typelessApp with one argument is the term itself", () => {
    expect(typelessApp(mkVar("x"))).to.deep.equal(mkVar("x"));
  });
});

describe("termsEqual", () => {
  it("compares structure and names", () => {
    expect(termsEqual(parseLambda("λx.x y"), parseLambda("\\x.(x y)"))).to.equal(true);
    expect(termsEqual(parseLambda("λx.x"), parseLambda("λy.y"))).to.equal(false);
    expect(termsEqual(parseLambda("f x"), parseLambda("λf.x"))).to.equal(false);
  });
});
