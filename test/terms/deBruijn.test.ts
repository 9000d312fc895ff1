import { expect } from "chai";
import { describe, it } from "mocha";

import { parseLambda } from "../../lib/parser/untyped.ts";
import {
  alphaEquivalent,
  alphaKey,
  prettyPrintDeBruijn,
  toDeBruijn,
} from "../../lib/terms/deBruijn.ts";

const db = (src: string): string =>
  prettyPrintDeBruijn(toDeBruijn(parseLambda(src)));

describe("De Bruijn conversion", () => {
  it("converts bound variables to indices", () => {
    expect(toDeBruijn(parseLambda("λx.λy.x"))).to.deep.equal({
      kind: "DbAbs",
      body: { kind: "DbAbs", body: { kind: "DbVar", index: 1 } },
    });
  });

  it("keeps free variables by name", () => {
    expect(db("λx.x y")).to.equal("λ.0 y");
  });

  it("resolves shadowed names to the innermost binder", () => {
    expect(db("λx.λx.x")).to.equal("λ.λ.0");
  });

  it("prints with the canonical parenthesization", () => {
    expect(db("(λx.x) (λy.y)")).to.equal("(λ.0) (λ.0)");
    expect(db("λf.λx.f (f x)")).to.equal("λ.λ.1 (1 0)");
  });
});

describe("alphaEquivalent", () => {
  it("ignores bound variable names", () => {
    expect(alphaEquivalent(parseLambda("λa.a"), parseLambda("λx.x"))).to.equal(true);
    expect(
      alphaEquivalent(parseLambda("λa.λb.a b"), parseLambda("λx.λy.x y")),
    ).to.equal(true);
  });

  it("distinguishes binding structure", () => {
    expect(
      alphaEquivalent(parseLambda("λx.λy.x"), parseLambda("λx.λy.y")),
    ).to.equal(false);
  });

  it("distinguishes free variable names", () => {
    expect(alphaEquivalent(parseLambda("λx.y"), parseLambda("λx.z"))).to.equal(false);
  });

  it("gives alpha-equivalent terms the same key", () => {
    expect(alphaKey(parseLambda("λp.λq.q p"))).to.equal(
      alphaKey(parseLambda("λa.λb.b a")),
    );
  });
});
