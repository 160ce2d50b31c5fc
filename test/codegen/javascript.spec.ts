import { describe, it, expect } from "vitest";
import * as vm from "node:vm";
import type { Document } from "../../src/core/ast";
import { lower } from "../../src/core/compiler/lower";
import { emit } from "../../src/core/codegen/registry";
import { arr, assign, bin, call, doc, fn, forRange, if_, let_, lit, print, ret, runLines, v } from "../helpers/coreil";

/** Emits `d` for JavaScript and runs it in a fresh context. */
function runEmitted(d: Document): { lines: string[]; exitCode: number } {
  const lines: string[] = [];
  const proc: { exitCode: number | undefined; env: Record<string, string>; cwd: () => string; platform: string } = {
    exitCode: undefined,
    env: {},
    cwd: () => "/",
    platform: "linux",
  };
  const code = emit("javascript", lower(d)).code;
  vm.runInNewContext(code, { console: { log: (s: unknown) => lines.push(String(s)) }, process: proc });
  return { lines, exitCode: proc.exitCode ?? 0 };
}

function expectParity(d: Document): void {
  expect(runEmitted(d)).toEqual(runLines(d));
}

describe("javascript backend", () => {
  it("places the program inside rt.main", () => {
    const result = emit("javascript", lower(doc([print(lit(1))])));
    const lines = result.code.split("\n");
    expect(result.fileName).toBe("main.js");
    expect(result.runtimeFiles).toEqual([]);
    expect(lines[result.lineMap[0] - 1]).toBe("  rt.print([1n]);");
    expect(lines).toContain("rt.main(() => {");
  });

  it("matches the interpreter on arithmetic and formatting", () => {
    expectParity(
      doc([
        print(bin("//", lit(-7), lit(2)), bin("%", lit(-7), lit(2)), bin("/", lit(1), lit(2))),
        print(lit(2.0), lit(1e20), lit(null), lit(true), lit("s")),
        print(arr(lit(1), lit("x"), lit(2.5))),
      ]),
    );
  });

  it("matches the interpreter on loops and functions", () => {
    expectParity(
      doc([
        fn("fact", ["n"], [if_(bin("<=", v("n"), lit(1)), [ret(lit(1))]), ret(bin("*", v("n"), call("fact", bin("-", v("n"), lit(1)))))]),
        let_("total", lit(0)),
        forRange("i", 0, 5, [assign("total", bin("+", v("total"), v("i")))]),
        print(v("total"), call("fact", lit(20))),
      ]),
    );
  });

  it("matches the interpreter on maps and try/catch", () => {
    expectParity(
      doc([
        let_("m", { type: "Map", items: [{ key: lit("b"), value: lit(1) }, { key: lit("a"), value: lit(2) }] }),
        { type: "Set", base: v("m"), key: lit("b"), value: lit(3) },
        print(v("m"), { type: "Keys", base: v("m") }),
        {
          type: "TryCatch",
          body: [print(bin("/", lit(1), lit(0)))],
          catch_var: "e",
          catch_body: [print(v("e"))],
          finally_body: [print(lit("done"))],
        },
      ]),
    );
  });

  it("keeps float literals and integers beyond 2^53 exact", () => {
    const d = doc([print(lit({ float: 2 }), bin("//", lit({ float: 7 }), lit(2))), print(lit(9007199254740993n))]);
    expect(runEmitted(d)).toEqual({ lines: ["2.0 3.0", "9007199254740993"], exitCode: 0 });
    expectParity(d);
  });

  it("resolves negative slice bounds and rejects an index past the front", () => {
    const xs = v("xs");
    const d = doc([
      let_("xs", arr(lit(1), lit(2), lit(3), lit(4), lit(5))),
      print({ type: "Slice", base: xs, start: lit(-2), end: lit(5) }),
      print({ type: "Slice", base: xs, start: lit(-4), end: lit(-1) }),
      print({ type: "Index", base: xs, index: lit(-6) }),
    ]);
    expect(runEmitted(d)).toEqual({ lines: ["[4, 5]", "[2, 3, 4]", "runtime error: index out of range"], exitCode: 1 });
    expectParity(d);
  });

  it("pops equal-priority heap items in insertion order", () => {
    const h = v("h");
    const d = doc([
      let_("h", { type: "HeapNew" }),
      { type: "HeapPush", base: h, priority: lit(1), value: lit("first") },
      { type: "HeapPush", base: h, priority: lit(1), value: lit("second") },
      { type: "HeapPush", base: h, priority: lit(1), value: lit("third") },
      { type: "HeapPop", base: h, target: "a" },
      { type: "HeapPop", base: h, target: "b" },
      { type: "HeapPop", base: h, target: "c" },
      print(v("a"), v("b"), v("c")),
    ]);
    expect(runEmitted(d).lines).toEqual(["first second third"]);
    expectParity(d);
  });

  it("skips even numbers and stops at 7", () => {
    const d = doc([
      forRange("i", 0, 10, [
        if_(bin("==", bin("%", v("i"), lit(2)), lit(0)), [{ type: "Continue" }]),
        if_(bin(">=", v("i"), lit(7)), [{ type: "Break" }]),
        print(v("i")),
      ]),
    ]);
    expect(runEmitted(d).lines).toEqual(["1", "3", "5"]);
    expectParity(d);
  });

  it("keeps a re-inserted map key in its first position", () => {
    const m = v("m");
    const d = doc([
      let_("m", { type: "Map", items: [] }),
      { type: "Set", base: m, key: lit("b"), value: lit(1) },
      { type: "Set", base: m, key: lit("a"), value: lit(2) },
      { type: "Set", base: m, key: lit("c"), value: lit(3) },
      { type: "Set", base: m, key: lit("a"), value: lit(4) },
      print({ type: "Keys", base: m }),
      print(m),
    ]);
    expect(runEmitted(d).lines).toEqual(["['b', 'a', 'c']", "{'b': 1, 'a': 4, 'c': 3}"]);
    expectParity(d);
  });

  it("never evaluates the index when the bounds check fails", () => {
    const xs = v("xs");
    const inBounds = bin(
      "and",
      bin("<", v("i"), { type: "Length", base: xs }),
      bin(">", { type: "Index", base: xs, index: v("i") }, lit(0)),
    );
    const d = doc([
      let_("xs", arr(lit(3), lit(1))),
      let_("i", lit(0)),
      { type: "While", test: inBounds, body: [assign("i", bin("+", v("i"), lit(1)))] },
      print(v("i"), inBounds),
    ]);
    expect(runEmitted(d)).toEqual({ lines: ["2 False"], exitCode: 0 });
    expectParity(d);
  });

  it("reports a runtime error and exits with 1 like the interpreter", () => {
    const d = doc([print(lit("before")), print({ type: "Index", base: arr(lit(1)), index: lit(3) })]);
    expect(runEmitted(d)).toEqual({ lines: ["before", "runtime error: index out of range"], exitCode: 1 });
    expectParity(d);
  });
});
