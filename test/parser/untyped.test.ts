import { expect } from "chai";
import { describe, it } from "mocha";

import {
  mkUntypedAbs,
  mkVar,
  prettyPrintUntypedLambda,
  typelessApp,
} from "../../lib/terms/lambda.ts";
import { parseLambda } from "../../lib/parser/untyped.ts";

describe("Parser - untyped λ-calculus", () => {
  describe("parseLambda → application parsing", () => {
    it("simple application", () => {
      expect(parseLambda("a b")).to.deep.equal(
        typelessApp(mkVar("a"), mkVar("b")),
      );
    });

    it("application with parentheses", () => {
      expect(parseLambda("(a b)")).to.deep.equal(
        typelessApp(mkVar("a"), mkVar("b")),
      );
    });

    it("associates to the left", () => {
      expect(parseLambda("f x y")).to.deep.equal(
        typelessApp(typelessApp(mkVar("f"), mkVar("x")), mkVar("y")),
      );
      expect(parseLambda("f x y")).to.deep.equal(parseLambda("(f x) y"));
      expect(parseLambda("f x y")).not.to.deep.equal(parseLambda("f (x y)"));
    });

    it("nested application", () => {
      expect(parseLambda("a (b c)")).to.deep.equal(
        typelessApp(mkVar("a"), typelessApp(mkVar("b"), mkVar("c"))),
      );
    });

    it("drops redundant parentheses", () => {
      expect(parseLambda("((x))")).to.deep.equal(mkVar("x"));
    });
  });

  describe("parseLambda → abstractions", () => {
    it("extends the body as far right as possible", () => {
      expect(parseLambda("\\x.\\y.x y")).to.deep.equal(
        mkUntypedAbs(
          "x",
          mkUntypedAbs("y", typelessApp(mkVar("x"), mkVar("y"))),
        ),
      );
    });

    it("treats both markers alike", () => {
      expect(parseLambda("λx.x")).to.deep.equal(parseLambda("\\x.x"));
    });

    it("parses an abstraction in argument position", () => {
      expect(parseLambda("f \\x.x y")).to.deep.equal(
        typelessApp(
          mkVar("f"),
          mkUntypedAbs("x", typelessApp(mkVar("x"), mkVar("y"))),
        ),
      );
    });

    it("applies a parenthesized abstraction", () => {
      expect(parseLambda("(\\x.x) y")).to.deep.equal(
        typelessApp(mkUntypedAbs("x", mkVar("x")), mkVar("y")),
      );
    });

    it("accepts multi-character names", () => {
      expect(parseLambda("λfoo.foo bar")).to.deep.equal(
        mkUntypedAbs("foo", typelessApp(mkVar("foo"), mkVar("bar"))),
      );
    });
  });

  describe("parseLambda → complex expressions", () => {
    it("var applied to λ-expression", () => {
      expect(parseLambda("a (λb.b (a a))")).to.deep.equal(
        typelessApp(
          mkVar("a"),
          mkUntypedAbs(
            "b",
            typelessApp(mkVar("b"), typelessApp(mkVar("a"), mkVar("a"))),
          ),
        ),
      );
    });

    it("parses Church-style predecessor (pred)", () => {
      const src = "λn. λf. λx. n (λg. λh. h (g f)) (λu. x) (λu. u)";

      const expected = mkUntypedAbs(
        "n",
        mkUntypedAbs(
          "f",
          mkUntypedAbs(
            "x",
            typelessApp(
              mkVar("n"),
              mkUntypedAbs(
                "g",
                mkUntypedAbs(
                  "h",
                  typelessApp(mkVar("h"), typelessApp(mkVar("g"), mkVar("f"))),
                ),
              ),
              mkUntypedAbs("u", mkVar("x")),
              mkUntypedAbs("u", mkVar("u")),
            ),
          ),
        ),
      );

      // parse → pretty-print → parse again round-trip
      const term = parseLambda(src);
      expect(term).to.deep.equal(expected);

      const pretty = prettyPrintUntypedLambda(term);
      expect(pretty).to.equal(
        "λn.λf.λx.n (λg.λh.h (g f)) (λu.x) (λu.u)",
      );
      expect(parseLambda(pretty)).to.deep.equal(expected);
    });

    it("ignores skipped characters in lenient mode", () => {
      expect(parseLambda("x , y")).to.deep.equal(parseLambda("x y"));
    });
  });

  describe("parseLambda → deep nesting", () => {
    it("parses deeply nested parentheses", () => {
      const n = 20_000;
      expect(parseLambda("(".repeat(n) + "x" + ")".repeat(n))).to.deep.equal(
        mkVar("x"),
      );
    });

    it("parses deeply nested abstractions", () => {
      let term = parseLambda("λa.".repeat(20_000) + "a");
      let binders = 0;
      while (term.kind === "lambda-abs") {
        binders++;
        term = term.body;
      }
      expect(binders).to.equal(20_000);
      expect(term).to.deep.equal(mkVar("a"));
    });

    it("reports an unclosed group at any depth", () => {
      const n = 20_000;
      expect(() => parseLambda("(".repeat(n) + "x" + ")".repeat(n - 1)))
        .to.throw("expected ')' but found end of input at position 40000");
    });
  });
});
