import { describe, it, expect } from "vitest";
import type { Document } from "../../src/core/ast";
import { optimize, optimizeWithStats } from "../../src/core/compiler/optimize";
import { composeSourceMaps } from "../../src/core/compiler/sourcemap";
import { arr, bin, call, doc, fn, if_, let_, lit, print, ret, runLines, v } from "../helpers/coreil";

describe("optimize", () => {
  it("folds constant arithmetic", () => {
    const { doc: out, stats } = optimizeWithStats(doc([print(bin("+", lit(1), bin("*", lit(2), lit(3))))]));
    expect(out.body).toEqual([print(lit(7))]);
    expect(stats.folded).toBe(2);
  });

  it("keeps a division by a literal zero for run time", () => {
    const division = print(bin("/", lit(1), lit(0)));
    expect(optimize(doc([division])).body).toEqual([division]);
  });

  it("folds an integral float result into a float literal", () => {
    expect(optimize(doc([print(bin("+", lit(1.5), lit(1.5)))])).body).toEqual([print(lit({ float: 3 }))]);
    expect(optimize(doc([print(bin("//", lit({ float: 7 }), lit(2)))])).body).toEqual([print(lit({ float: 3 }))]);
  });

  it("leaves a negative zero result unfolded", () => {
    const product = print(bin("*", lit(-1.5), lit(0)));
    expect(optimize(doc([product])).body).toEqual([product]);
  });

  it("drops statements after a terminator", () => {
    const { doc: out, stats } = optimizeWithStats(doc([fn("f", [], [ret(lit(1)), print(lit("never"))])]));
    expect(out.body).toEqual([fn("f", [], [ret(lit(1))])]);
    expect(stats.deadStatements).toBe(1);
  });

  it("inlines the taken branch of a nested If with a literal test", () => {
    const input = doc([fn("g", [], [if_(lit(true), [ret(lit(1))], [ret(lit(2))]), print(lit("never"))])]);
    const { doc: out, stats } = optimizeWithStats(input);
    expect(out.body).toEqual([fn("g", [], [ret(lit(1))])]);
    expect(stats.branchesResolved).toBe(1);
  });

  it("keeps a top-level If so statement indices stay stable", () => {
    const out = optimize(doc([if_(lit(false), [print(lit("no"))]), print(lit("yes"))]));
    expect(out.body).toEqual([{ type: "If", test: lit(true), then: [] }, print(lit("yes"))]);
  });

  it("applies identities only where the operand type is known", () => {
    const length = { type: "Length" as const, base: v("xs") };
    const out = optimize(
      doc([let_("xs", arr()), print(bin("+", length, lit(0))), let_("y", lit("s")), print(bin("+", v("y"), lit(0)))]),
    );
    expect(out.body[1]).toEqual(print(length));
    expect(out.body[3]).toEqual(print(bin("+", v("y"), lit(0))));
  });

  it("keeps a top-level else branch as the body of an always-taken If", () => {
    const out = optimize(doc([if_(lit(false), [print(lit("then"))], [print(lit("else"))]), print(lit("after"))]));
    expect(out.body).toEqual([{ type: "If", test: lit(true), then: [print(lit("else"))] }, print(lit("after"))]);
  });

  it("drops statements after an If whose taken branch throws", () => {
    const { doc: out, stats } = optimizeWithStats(
      doc([if_(lit(1), [{ type: "Throw", message: lit("x") }]), print(lit("never"))]),
    );
    expect(out.body).toEqual([{ type: "If", test: lit(true), then: [{ type: "Throw", message: lit("x") }] }]);
    expect(stats.deadStatements).toBe(1);
  });

  it("keeps functions defined after a top-level Throw", () => {
    const f = fn("f", [], [ret(lit("hi"))]);
    const out = optimize(doc([print(call("f")), { type: "Throw", message: lit("stop") }, f]));
    expect(out.body).toEqual([print(call("f")), { type: "Throw", message: lit("stop") }, f]);
  });

  it("drops source_map indices of removed top-level statements", () => {
    const input: Document = {
      ...doc([{ type: "Throw", message: lit("stop") }, print(lit("unreachable"))]),
      source_map: { "1": [0], "2": [1] },
    };
    expect(optimize(input).source_map).toEqual({ "1": [0] });
  });
});

describe("optimized programs behave like the originals", () => {
  const cases: Array<[string, Document, string[]]> = [
    [
      "literal-false If with an else branch",
      doc([if_(lit(false), [print(lit("then"))], [print(lit("else"))]), print(lit("after"))]),
      ["else", "after"],
    ],
    [
      "top-level Throw before a FuncDef",
      doc([print(call("f")), { type: "Throw", message: lit("stop") }, fn("f", [], [ret(lit("hi"))])]),
      ["hi", "runtime error: stop"],
    ],
    [
      "float literals and float floor division",
      doc([print(lit({ float: 2 }), bin("//", lit({ float: 7 }), lit(2)))]),
      ["2.0 3.0"],
    ],
    [
      "literal If nested in a function body",
      doc([
        fn("g", ["n"], [if_(lit(0), [ret(lit("zero"))], [ret(v("n"))]), print(lit("never"))]),
        print(call("g", lit(4))),
      ]),
      ["4"],
    ],
    [
      "short-circuit on a literal left operand",
      doc([print(bin("and", lit(0), call("missing")), bin("or", lit("x"), call("missing")))]),
      ["0 x"],
    ],
  ];

  it.each(cases)("%s", (_name, d, expected) => {
    const plain = runLines(d);
    expect(plain.lines).toEqual(expected);
    expect(runLines(optimize(d))).toEqual(plain);
  });
});

describe("composeSourceMaps", () => {
  it("chains english lines through statements to generated lines", () => {
    const composed = composeSourceMaps({ "1": [0, 1], "2": [2], "3": [5] }, { 0: 4, 1: 4, 2: 9 });
    expect(composed).toEqual({ "1": [4], "2": [9] });
  });
});
