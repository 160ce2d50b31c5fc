import { describe, it, expect } from "vitest";
import { createDefaultRunner, lint, LintRunner } from "../../src/lint/runner";
import type { Pass } from "../../src/lint/types";
import { warnDiag } from "../../src/outcome/diagnostic";
import { doc, fn, let_, lit, print, ret, v } from "../helpers/coreil";

const sample = doc([
  let_("unused", lit(1)),
  let_("g", lit(2)),
  fn("f", ["g"], [ret(v("g")), print(lit(1))]),
  { type: "While", test: lit(false), body: [] },
  print(v("g")),
]);

function makePass(id: string, calls: string[]): Pass {
  return {
    id,
    name: id,
    run: () => {
      calls.push(id);
      return { diagnostics: [warnDiag("W9999", `${id} ran`)] };
    },
  };
}

describe("LintRunner", () => {
  it("runs passes in registration order", () => {
    const calls: string[] = [];
    const runner = new LintRunner();
    runner.register(makePass("b", calls));
    runner.register(makePass("a", calls));
    const { diagnostics, passResults } = runner.run(doc([]));
    expect(calls).toEqual(["b", "a"]);
    expect(diagnostics.map(d => d.message)).toEqual(["b ran", "a ran"]);
    expect([...passResults.keys()]).toEqual(["b", "a"]);
  });

  it("rejects a duplicate pass id", () => {
    const runner = new LintRunner();
    runner.register(makePass("a", []));
    expect(() => runner.register(makePass("a", []))).toThrow("Lint pass already registered: a");
  });

  it("skips passes that are off and overrides severity", () => {
    const calls: string[] = [];
    const runner = new LintRunner({ a: "off", b: "error" });
    runner.register(makePass("a", calls));
    runner.register(makePass("b", calls));
    const { diagnostics } = runner.run(doc([]));
    expect(calls).toEqual(["b"]);
    expect(diagnostics.map(d => d.severity)).toEqual(["error"]);
    expect(runner.hasErrors(diagnostics)).toBe(true);
  });
});

describe("default passes", () => {
  it("registers the built-in rules", () => {
    expect(createDefaultRunner().registered()).toEqual(["unreachable-code", "unused-variable", "variable-shadowing", "empty-body"]);
  });

  it("reports every finding on a document", () => {
    expect(lint(sample).map(d => [d.code, d.path])).toEqual([
      ["W0200", "$.body[2].body[1]"],
      ["W0201", "$.body[0]"],
      ["W0202", "$.body[2]"],
      ["W0203", "$.body[3].body"],
    ]);
  });

  it("applies configured levels", () => {
    const diags = lint(sample, { "unused-variable": "off", "empty-body": "info" });
    expect(diags.map(d => [d.code, d.severity])).toEqual([
      ["W0200", "warning"],
      ["W0202", "warning"],
      ["W0203", "info"],
    ]);
  });
});
