import { describe, it, expect } from "vitest";
import type { Stmt } from "../../src/core/ast";
import { run } from "../../src/core/eval/interp";
import { arr, bin, call, doc, fn, forRange, if_, let_, lit, print, ret, runLines, v } from "../helpers/coreil";

describe("interpreter", () => {
  describe("values and printing", () => {
    it("prints scalars the way the reference format does", () => {
      const { lines, exitCode } = runLines(
        doc([
          print(lit("a"), lit(1), lit(null), lit(true)),
          print(bin("/", lit(7), lit(2))),
          print(bin("/", lit(4), lit(2))),
          print(bin("+", lit(0.1), lit(0.2))),
          print(lit(1e20)),
        ]),
      );
      expect(exitCode).toBe(0);
      expect(lines).toEqual(["a 1 None True", "3.5", "2.0", "0.30000000000000004", "1e+20"]);
    });

    it("uses floor semantics for // and %", () => {
      const { lines } = runLines(
        doc([print(bin("//", lit(-7), lit(2)), bin("%", lit(-7), lit(2)), bin("%", lit(7), lit(-2)))]),
      );
      expect(lines).toEqual(["-4 1 -1"]);
    });

    it("quotes strings only inside containers", () => {
      const { lines } = runLines(
        doc([
          print(arr(lit(1), lit("x"), lit(2.5))),
          print({ type: "Tuple", items: [lit(1)] }),
          print({ type: "Set", items: [] }),
          print({ type: "Set", items: [lit(1), lit(2), lit(1)] }),
          print({
            type: "Record",
            fields: [
              { name: "name", value: lit("ada") },
              { name: "age", value: lit(36) },
            ],
          }),
        ]),
      );
      expect(lines).toEqual(["[1, 'x', 2.5]", "(1,)", "set()", "{1, 2}", "{'name': 'ada', 'age': 36}"]);
    });

    it("formats mixed parts with StringFormat", () => {
      const { lines } = runLines(
        doc([print({ type: "StringFormat", parts: [lit("n="), lit(3), lit(" ok="), lit(true)] })]),
      );
      expect(lines).toEqual(["n=3 ok=True"]);
    });
  });

  describe("sequences", () => {
    const xs = let_("xs", arr(lit(1), lit(2), lit(3), lit(4), lit(5)));
    const slice = (start: number, end: number) => ({ type: "Slice" as const, base: v("xs"), start: lit(start), end: lit(end) });

    it("resolves negative slice bounds from the end", () => {
      const { lines } = runLines(doc([xs, print(slice(-2, 5)), print(slice(-4, -1))]));
      expect(lines).toEqual(["[4, 5]", "[2, 3, 4]"]);
    });

    it("reads negative indices from the end", () => {
      const { lines } = runLines(doc([xs, print({ type: "Index", base: v("xs"), index: lit(-1) })]));
      expect(lines).toEqual(["5"]);
    });

    it("fails on an index past either end", () => {
      const { lines, exitCode } = runLines(doc([xs, print({ type: "Index", base: v("xs"), index: lit(-6) })]));
      expect(exitCode).toBe(1);
      expect(lines).toEqual(["runtime error: index out of range"]);
    });

    it("indexes strings by code point", () => {
      const { lines } = runLines(
        doc([
          print({ type: "Substring", base: lit("hello"), start: lit(1), end: lit(3) }),
          print({ type: "StringLength", base: lit("héllo") }),
          print({ type: "Join", sep: lit("-"), items: arr(lit("a"), lit("b")) }),
          print({ type: "StringSplit", base: lit("a,b"), delimiter: lit(",") }),
        ]),
      );
      expect(lines).toEqual(["el", "5", "a-b", "['a', 'b']"]);
    });
  });

  describe("maps", () => {
    it("keeps insertion order and the position of re-assigned keys", () => {
      const body: Stmt[] = [
        let_("m", {
          type: "Map",
          items: [
            { key: lit("b"), value: lit(1) },
            { key: lit("a"), value: lit(2) },
          ],
        }),
        { type: "Set", base: v("m"), key: lit("c"), value: lit(3) },
        { type: "Set", base: v("m"), key: lit("b"), value: lit(9) },
        { type: "ForEach", var: "k", iter: v("m"), body: [print(v("k"))] },
        print(v("m")),
        print({ type: "Keys", base: v("m") }),
      ];
      const { lines } = runLines(doc(body));
      expect(lines).toEqual(["b", "a", "c", "{'b': 9, 'a': 2, 'c': 3}", "['b', 'a', 'c']"]);
    });

    it("returns None for a missing key and the default with GetDefault", () => {
      const body: Stmt[] = [
        let_("m", { type: "Map", items: [] }),
        print({ type: "Get", base: v("m"), key: lit("x") }),
        print({ type: "GetDefault", base: v("m"), key: lit("x"), default: lit(0) }),
      ];
      expect(runLines(doc(body)).lines).toEqual(["None", "0"]);
    });
  });

  describe("control flow", () => {
    it("skips and stops loops with Continue and Break", () => {
      const body: Stmt[] = [
        forRange("i", 0, 10, [
          if_(bin("==", bin("%", v("i"), lit(2)), lit(0)), [{ type: "Continue" }]),
          if_(bin(">", v("i"), lit(5)), [{ type: "Break" }]),
          print(v("i")),
        ]),
      ];
      expect(runLines(doc(body)).lines).toEqual(["1", "3", "5"]);
    });

    it("short-circuits and / or and yields the deciding operand", () => {
      const body: Stmt[] = [
        print(bin("and", lit(false), bin("/", lit(1), lit(0)))),
        print(bin("or", lit(1), call("nope"))),
        print(bin("and", lit(2), lit(3))),
      ];
      const { lines, exitCode } = runLines(doc(body));
      expect(exitCode).toBe(0);
      expect(lines).toEqual(["False", "1", "3"]);
    });

    it("runs the first matching Switch case", () => {
      const body: Stmt[] = [
        {
          type: "Switch",
          test: lit(2),
          cases: [
            { value: lit(1), body: [print(lit("one"))] },
            { value: lit(2), body: [print(lit("two"))] },
          ],
          default: [print(lit("other"))],
        },
      ];
      expect(runLines(doc(body)).lines).toEqual(["two"]);
    });

    it("catches thrown messages and runtime faults, then runs finally", () => {
      const body: Stmt[] = [
        {
          type: "TryCatch",
          body: [{ type: "Throw", message: lit("bad") }],
          catch_var: "e",
          catch_body: [print(v("e"))],
          finally_body: [print(lit("done"))],
        },
        {
          type: "TryCatch",
          body: [let_("x", bin("/", lit(1), lit(0)))],
          catch_var: "e",
          catch_body: [print(v("e"))],
        },
      ];
      expect(runLines(doc(body)).lines).toEqual(["bad", "done", "division by zero"]);
    });

    it("reports an uncaught Throw with a non-string message in printed form", () => {
      const { lines, exitCode } = runLines(doc([{ type: "Throw", message: arr(lit(1)) }]));
      expect(exitCode).toBe(1);
      expect(lines).toEqual(["runtime error: [1]"]);
    });
  });

  describe("functions", () => {
    it("recurses with 64-bit integers", () => {
      const body: Stmt[] = [
        fn("fact", ["n"], [
          if_(bin("<=", v("n"), lit(1)), [ret(lit(1))]),
          ret(bin("*", v("n"), call("fact", bin("-", v("n"), lit(1))))),
        ]),
        print(call("fact", lit(20))),
      ];
      expect(runLines(doc(body)).lines).toEqual(["2432902008176640000"]);
    });

    it("keeps names bound in a function body local to it", () => {
      const body: Stmt[] = [
        let_("x", lit(10)),
        fn("f", [], [let_("x", lit(5)), ret(v("x"))]),
        print(call("f"), v("x")),
      ];
      expect(runLines(doc(body)).lines).toEqual(["5 10"]);
    });

    it("reads globals that the function never binds", () => {
      const body: Stmt[] = [let_("count", lit(41)), fn("inc", [], [ret(bin("+", v("count"), lit(1)))]), print(call("inc"))];
      expect(runLines(doc(body)).lines).toEqual(["42"]);
    });

    it("returns None from a function that falls off its end", () => {
      const body: Stmt[] = [fn("noop", [], []), print(call("noop"))];
      expect(runLines(doc(body)).lines).toEqual(["None"]);
    });

    it("stops runaway recursion at the call depth limit", () => {
      const body: Stmt[] = [
        fn("down", ["n"], [ret(call("down", bin("+", v("n"), lit(1))))]),
        print(call("down", lit(0))),
      ];
      const { lines, exitCode } = runLines(doc(body), { maxCallDepth: 50 });
      expect(exitCode).toBe(1);
      expect(lines).toEqual(["runtime error: maximum call depth exceeded"]);
    });

    it("checks arity", () => {
      const body: Stmt[] = [fn("f", ["a"], [ret(v("a"))]), print(call("f", lit(1), lit(2)))];
      expect(runLines(doc(body)).lines).toEqual(["runtime error: function 'f' expects 1 argument, got 2"]);
    });

    it("rejects unknown functions at run time", () => {
      const body: Stmt[] = [print(lit("before")), { type: "Call", name: "nope", args: [] }, print(lit("after"))];
      expect(runLines(doc(body)).lines).toEqual(["before", "runtime error: unknown function 'nope'"]);
    });

    it("still runs the legacy helpers under old versions", () => {
      const body: Stmt[] = [
        let_("m", { type: "Map", items: [{ key: lit("k"), value: lit(1) }] }),
        print(call("get_or_default", v("m"), lit("z"), lit(7))),
        let_("xs", arr()),
        { type: "Call", name: "append", args: [v("xs"), lit(3)] },
        print(v("xs")),
      ];
      expect(runLines(doc(body, "coreil-0.4")).lines).toEqual(["7", "[3]"]);
    });
  });

  describe("data structures", () => {
    it("pops a heap by priority, ties in insertion order", () => {
      const push = (priority: number, value: string): Stmt => ({
        type: "HeapPush",
        base: v("h"),
        priority: lit(priority),
        value: lit(value),
      });
      const body: Stmt[] = [
        let_("h", { type: "HeapNew" }),
        push(3, "c"),
        push(1, "a"),
        push(2, "b"),
        push(1, "a2"),
        print({ type: "HeapSize", base: v("h") }, v("h")),
        {
          type: "While",
          test: bin(">", { type: "HeapSize", base: v("h") }, lit(0)),
          body: [{ type: "HeapPop", base: v("h"), target: "top" }, print(v("top"))],
        },
      ];
      expect(runLines(doc(body)).lines).toEqual(["4 <heap size=4>", "a", "a2", "b", "c"]);
    });

    it("pushes and pops both ends of a deque", () => {
      const body: Stmt[] = [
        let_("d", { type: "DequeNew" }),
        { type: "PushBack", base: v("d"), value: lit(1) },
        { type: "PushBack", base: v("d"), value: lit(2) },
        { type: "PushFront", base: v("d"), value: lit(0) },
        print(v("d")),
        { type: "PopBack", base: v("d"), target: "last" },
        print(v("last"), { type: "DequeSize", base: v("d") }),
      ];
      expect(runLines(doc(body)).lines).toEqual(["deque([0, 1, 2])", "2 2"]);
    });

    it("fails on a missing record field", () => {
      const body: Stmt[] = [
        let_("r", { type: "Record", fields: [{ name: "a", value: lit(1) }] }),
        print({ type: "GetField", base: v("r"), name: "b" }),
      ];
      expect(runLines(doc(body)).lines).toEqual(["runtime error: field 'b' not found in record"]);
    });
  });

  describe("run options", () => {
    it("hands the failure to errorCallback instead of printing it", () => {
      const lines: string[] = [];
      const errors: string[] = [];
      const exitCode = run(doc([print(bin("//", lit(1), lit(0)))]), {
        out: line => lines.push(line),
        errorCallback: message => errors.push(message),
      });
      expect(exitCode).toBe(1);
      expect(lines).toEqual([]);
      expect(errors).toEqual(["division by zero"]);
    });

    it("calls the step hook before every statement at every depth", () => {
      const seen: Array<[string, number, number, boolean]> = [];
      run(
        doc([let_("x", lit(1)), fn("f", ["a"], [ret(v("a"))]), print(call("f", v("x")))]),
        {
          out: () => undefined,
          stepHook: (stmt, index, locals, _globals, _functions, depth) => {
            seen.push([stmt.type, index, depth, locals !== null]);
          },
        },
      );
      expect(seen).toEqual([
        ["Let", 0, 0, false],
        ["FuncDef", 1, 0, false],
        ["Print", 2, 0, false],
        ["Return", 0, 1, true],
      ]);
    });
  });
});
