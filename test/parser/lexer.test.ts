import { expect } from "chai";
import { describe, it } from "mocha";

import { tokenize } from "../../lib/parser/lexer.ts";
import { LexError } from "../../lib/parser/parseError.ts";

describe("tokenize", () => {
  it("splits an abstraction into marker, parameter, dot and body", () => {
    expect(tokenize("\\x.x")).to.deep.equal([
      { kind: "lambda", text: "\\", position: 0 },
      { kind: "identifier", text: "x", position: 1 },
      { kind: "dot", text: ".", position: 2 },
      { kind: "identifier", text: "x", position: 3 },
    ]);
  });

  it("normalizes both abstraction markers to one token kind", () => {
    const kinds = (src: string) => tokenize(src).map((t) => t.kind);
    expect(kinds("λx.x")).to.deep.equal(kinds("\\x.x"));
    expect(tokenize("λx.x")[0]).to.deep.equal({
      kind: "lambda",
      text: "λ",
      position: 0,
    });
  });

  it("reads identifiers as maximal alphanumeric runs", () => {
    expect(tokenize("foo x0 bar_baz").map((t) => t.text)).to.deep.equal([
      "foo",
      "x0",
      "bar_baz",
    ]);
  });

  it("records character offsets across whitespace", () => {
    const tokens = tokenize("  ( f\tx )");
    expect(tokens.map((t) => [t.kind, t.position])).to.deep.equal([
      ["lparen", 2],
      ["identifier", 4],
      ["identifier", 6],
      ["rparen", 8],
    ]);
  });

  it("skips unknown characters by default", () => {
    expect(tokenize("x # y").map((t) => t.text)).to.deep.equal(["x", "y"]);
  });

  it("does not start an identifier with a digit", () => {
    expect(tokenize("1x").map((t) => t.text)).to.deep.equal(["x"]);
  });

  it("rejects unknown characters in strict mode", () => {
    expect(() => tokenize("x # y", { strict: true })).to.throw(
      LexError,
      "unexpected character '#' at position 2",
    );
  });

  it("reports the offending position in strict mode", () => {
    try {
      tokenize("\\x.x + y", { strict: true });
      expect.fail("expected a LexError");
    } catch (e) {
      expect(e).to.be.instanceOf(LexError);
      if (e instanceof LexError) {
        expect(e.position).to.equal(5);
        expect(e.name).to.equal("LexError");
      }
    }
  });

  it("fails on empty and whitespace-only input", () => {
    expect(() => tokenize("")).to.throw(LexError, "empty expression");
    expect(() => tokenize("   \n\t")).to.throw(LexError, "empty expression");
  });

  it("fails when every character was skipped", () => {
    expect(() => tokenize("#!?")).to.throw(LexError, "empty expression");
  });
});
