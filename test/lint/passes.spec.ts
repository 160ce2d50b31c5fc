import { describe, it, expect } from "vitest";
import type { Document } from "../../src/core/ast";
import { emptyBodyPass } from "../../src/lint/passes/emptyBody";
import { unreachableCodePass } from "../../src/lint/passes/unreachableCode";
import { unusedVariablePass } from "../../src/lint/passes/unusedVariable";
import { variableShadowingPass } from "../../src/lint/passes/variableShadowing";
import { assign, doc, fn, forRange, if_, let_, lit, print, ret, v } from "../helpers/coreil";

describe("lint passes", () => {
  describe("unreachableCodePass", () => {
    it("flags the statement after a terminator", () => {
      const d = doc([fn("f", [], [ret(lit(1)), print(lit(2))])]);
      expect(unreachableCodePass.run(d).diagnostics).toEqual([
        {
          code: "W0200",
          severity: "warning",
          message: "Unreachable code after Return",
          path: "$.body[0].body[1]",
          data: { terminator: "Return" },
        },
      ]);
    });

    it("accepts a terminator in last position", () => {
      const d = doc([forRange("i", 0, 3, [if_(v("i"), [{ type: "Break" }])])]);
      expect(unreachableCodePass.run(d).diagnostics).toEqual([]);
    });
  });

  describe("unusedVariablePass", () => {
    it("reports each unread name once", () => {
      const d = doc([let_("x", lit(1)), assign("x", lit(2)), let_("y", lit(3)), print(v("y"))]);
      const diags = unusedVariablePass.run(d).diagnostics;
      expect(diags.map(x => [x.code, x.path, x.message])).toEqual([
        ["W0201", "$.body[0]", "Variable 'x' is assigned but never read"],
      ]);
    });
  });

  describe("variableShadowingPass", () => {
    it("flags parameters and locals that reuse a global name", () => {
      const d: Document = doc([
        let_("n", lit(1)),
        let_("total", lit(0)),
        fn("f", ["n"], [let_("total", v("n")), ret(v("total"))]),
        print(v("n"), v("total")),
      ]);
      expect(variableShadowingPass.run(d).diagnostics.map(x => x.message)).toEqual([
        "Variable 'n' in function 'f' shadows a global",
        "Variable 'total' in function 'f' shadows a global",
      ]);
    });
  });

  describe("emptyBodyPass", () => {
    it("flags empty loops, functions and then-branches but not else", () => {
      const d = doc([
        { type: "While", test: lit(false), body: [] },
        fn("noop", [], []),
        if_(lit(true), [], []),
        if_(lit(true), [print(lit(1))], []),
      ]);
      expect(emptyBodyPass.run(d).diagnostics.map(x => [x.path, x.message])).toEqual([
        ["$.body[0].body", "Empty while loop body"],
        ["$.body[1].body", "Empty function body"],
        ["$.body[2].then", "Empty if body"],
      ]);
    });
  });
});
