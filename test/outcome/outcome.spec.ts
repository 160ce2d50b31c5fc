import { describe, it, expect } from "vitest";
import { UnknownTargetError, UnsupportedOperationError } from "../../src/core/codegen/errors";
import { ValidationFailedError } from "../../src/core/compiler/pipeline";
import { ConfigError } from "../../src/core/config/config";
import { CoreILRuntimeError } from "../../src/core/eval/errors";
import { CircularImportError, ModuleNotFoundError } from "../../src/core/modules/errors";
import { ToolchainError } from "../../src/core/toolchain/errors";
import { makeDiagnostic } from "../../src/outcome/codes";
import { formatDiagnostic, warnDiag } from "../../src/outcome/diagnostic";
import { allDiagnostics, failure, wrapFailure } from "../../src/outcome/failure";
import { attempt, failureFromError } from "../../src/outcome/fromError";
import { done, fail, isDone, isFail, mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/outcome";

describe("diagnostics", () => {
  it("fills templates and keeps the parameters", () => {
    expect(makeDiagnostic("W0201", { name: "x" }, "$.body[0]")).toEqual({
      code: "W0201",
      severity: "warning",
      message: "Variable 'x' is assigned but never read",
      path: "$.body[0]",
      data: { name: "x" },
    });
  });

  it("formats with and without a path", () => {
    expect(formatDiagnostic(makeDiagnostic("E0301", { target: "cobol" }))).toBe("error [E0301] Unknown target: cobol");
    expect(formatDiagnostic(warnDiag("W0203", "Empty if body", { path: "$.body[1].then" }))).toBe(
      "$.body[1].then: warning [W0203] Empty if body",
    );
  });
});

describe("failures", () => {
  it("collects diagnostics through causes without duplicates", () => {
    const shared = makeDiagnostic("E0200", { message: "boom" });
    const inner = failure("runtime-error", "boom", { diagnostics: [shared] });
    const outer = wrapFailure(inner, "while running");
    expect(outer.message).toBe("while running");
    expect(outer.cause).toBe(inner);
    expect(allDiagnostics(outer)).toEqual([shared]);
  });
});

describe("failureFromError", () => {
  it("turns validation errors into one diagnostic each", () => {
    const f = failureFromError(
      new ValidationFailedError([
        { path: "$.body[0]", message: "Break is only allowed inside a loop" },
        { path: "$.version", message: "bad version" },
      ]),
    );
    expect(f.reason).toBe("validation-failed");
    expect(f.message).toBe("document has 2 validation errors");
    expect(f.diagnostics.map(formatDiagnostic)).toEqual([
      "$.body[0]: error [E0100] Break is only allowed inside a loop",
      "$.version: error [E0100] bad version",
    ]);
  });

  it("maps each error class to its reason and code", () => {
    const cases: Array<[unknown, string, string]> = [
      [new UnsupportedOperationError("go", "MethodCall", "tier2"), "unsupported-operation", "E0300"],
      [new UnknownTargetError("cobol", ["javascript"]), "unknown-target", "E0301"],
      [new ToolchainError("cpp", "missing-tool", "required tool not found: g++"), "toolchain-error", "E0401"],
      [new ToolchainError("cpp", "timeout", "cpp compile timed out after 5ms"), "toolchain-error", "E0402"],
      [new ModuleNotFoundError("lib.x", "/m/lib/x.coreil.json"), "module-error", "E0500"],
      [new CircularImportError("a", "/m/a.coreil.json"), "module-error", "E0501"],
      [new ConfigError("compile.optimize must be true or false"), "config-error", "E0600"],
      [new CoreILRuntimeError("division by zero"), "runtime-error", "E0200"],
    ];
    for (const [error, reason, code] of cases) {
      const f = failureFromError(error);
      expect([f.reason, f.diagnostics.map(d => d.code)]).toEqual([reason, [code]]);
    }
  });

  it("appends tool output to a compile failure", () => {
    const f = failureFromError(new ToolchainError("go", "compile", "go compilation failed (exit 1)", "main.go:3: oops\n"));
    expect(f.diagnostics[0].message).toBe("go compile failed: go compilation failed (exit 1)\nmain.go:3: oops");
  });

  it("treats anything else as internal", () => {
    expect(failureFromError(new TypeError("nope"))).toEqual({ reason: "internal-error", message: "nope", diagnostics: [] });
  });
});

describe("outcomes", () => {
  it("wraps a returned value or a thrown error", () => {
    const ok = attempt(() => 21);
    expect(isDone(ok) && ok.value).toBe(21);
    const bad = attempt<number>(() => {
      throw new CoreILRuntimeError("index out of range");
    });
    expect(isFail(bad)).toBe(true);
    expect(match(bad, { done: () => "done", fail: f => f.failure.reason })).toBe("runtime-error");
  });

  it("maps and unwraps", () => {
    expect(unwrap(mapOutcome(done(2), n => n * 3))).toBe(6);
    const failed = fail(failure("config-error", "bad config"));
    expect(unwrapOr(mapOutcome<number, number>(failed, n => n + 1), -1)).toBe(-1);
    expect(() => unwrap(failed)).toThrow("bad config");
  });
});
