import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as vm from "node:vm";
import {
  checkParity,
  runTarget,
  targetPlan,
  ToolchainError,
  type SpawnRequest,
  type SpawnResult,
  type Spawner,
} from "../../src/core/toolchain";
import { bin, doc, lit, print } from "../helpers/coreil";

const ok = (stdout = ""): SpawnResult => ({ status: 0, stdout, stderr: "", timedOut: false, missing: false });

function recording(results: SpawnResult[]): { spawner: Spawner; requests: SpawnRequest[] } {
  const requests: SpawnRequest[] = [];
  const spawner: Spawner = request => {
    requests.push(request);
    return results[requests.length - 1] ?? ok();
  };
  return { spawner, requests };
}

/** Runs `main.js` from the request's directory in a fresh context. */
const vmSpawner: Spawner = ({ cwd }) => {
  const out: string[] = [];
  const proc: { exitCode: number | undefined } = { exitCode: undefined };
  const code = fs.readFileSync(path.join(cwd, "main.js"), "utf8");
  vm.runInNewContext(code, { console: { log: (s: unknown) => out.push(String(s)) }, process: proc });
  return { status: proc.exitCode ?? 0, stdout: out.map(l => l + "\n").join(""), stderr: "", timedOut: false, missing: false };
};

describe("targetPlan", () => {
  it("runs javascript without a compile step", () => {
    expect(targetPlan("javascript", "/tmp/a")).toEqual({ compile: [], run: { command: "node", args: ["main.js"] } });
  });

  it("runs python through the interpreter command", () => {
    expect(targetPlan("python", "/tmp/a")).toEqual({ compile: [], run: { command: "python3", args: ["main.py"] } });
    expect(targetPlan("python", "/tmp/a", { python: "pypy3" }).run.command).toBe("pypy3");
  });

  it("uses configured commands", () => {
    const plan = targetPlan("cpp", "/tmp/a", { cpp: "clang++" });
    expect(plan.compile).toEqual([
      { command: "clang++", args: ["-std=c++17", "-O2", "-I", "/tmp/a", "main.cpp", "-o", plan.run.command] },
    ]);
  });
});

describe("runTarget", () => {
  it("compiles then runs in the artifact directory", () => {
    const { spawner, requests } = recording([ok(), ok("hi\n")]);
    const result = runTarget("go", "/tmp/art", { timeoutMs: 1000, spawner });
    expect(result).toEqual({ target: "go", stdout: "hi\n", stderr: "", exitCode: 0 });
    expect(requests.map(r => [r.command, r.cwd, r.timeoutMs])).toEqual([
      ["go", "/tmp/art", 1000],
      [requests[1].command, "/tmp/art", 1000],
    ]);
  });

  it("passes a program-level error through as exit code 1", () => {
    const { spawner } = recording([{ ...ok("runtime error: boom\n"), status: 1 }]);
    expect(runTarget("javascript", "/tmp/art", { timeoutMs: 1000, spawner }).exitCode).toBe(1);
  });

  const failing: Array<[string, SpawnResult, string, string]> = [
    ["a missing tool", { ...ok(), status: null, missing: true }, "missing-tool", "required tool not found: g++"],
    ["a timeout", { ...ok(), status: null, timedOut: true }, "timeout", "cpp compile timed out after 50ms"],
    ["a compiler failure", { ...ok(), status: 2, stderr: "syntax" }, "compile", "cpp compilation failed (exit 2)"],
  ];
  for (const [label, result, category, message] of failing) {
    it(`classifies ${label}`, () => {
      const { spawner } = recording([result]);
      try {
        runTarget("cpp", "/tmp/art", { timeoutMs: 50, spawner });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ToolchainError);
        if (e instanceof ToolchainError) {
          expect(e.category).toBe(category);
          expect(e.message).toBe(message);
        }
      }
    });
  }

  it("treats other exit codes from the program as a crash", () => {
    const { spawner } = recording([ok(), { ...ok(), status: 139 }]);
    expect(() => runTarget("cpp", "/tmp/art", { timeoutMs: 50, spawner })).toThrow("cpp program crashed (exit 139)");
  });
});

describe("checkParity", () => {
  const program = doc([print(lit("sum"), bin("+", lit(2), lit(3))), print(bin("/", lit(1), lit(0)))]);

  it("matches the interpreter on the javascript backend", () => {
    const outRoot = fs.mkdtempSync(path.join(os.tmpdir(), "coreil-parity-"));
    const logged: string[] = [];
    const report = checkParity(program, ["javascript"], { outRoot, timeoutMs: 1000, spawner: vmSpawner, log: l => logged.push(l) });
    expect(report.expected).toEqual({ stdout: "sum 5\nruntime error: division by zero", exitCode: 1 });
    expect(report.outcomes).toEqual([{ target: "javascript", status: "match" }]);
    expect(report.ok).toBe(true);
    expect(logged).toEqual(["javascript: wrote 1 file", "javascript: match"]);
  });

  it("reports a mismatch and skips unsupported targets", () => {
    const outRoot = fs.mkdtempSync(path.join(os.tmpdir(), "coreil-parity-"));
    const withHost = doc([print({ type: "ExternalCall", module: "os", function: "platform", args: [] })]);
    const { spawner } = recording([ok(), ok("linux\n")]);

    const skipped = checkParity(withHost, ["go"], { outRoot, timeoutMs: 1000, spawner });
    expect(skipped.outcomes).toEqual([
      { target: "go", status: "skipped", reason: "go backend does not support ExternalCall (tier2)" },
    ]);
    expect(skipped.ok).toBe(true);

    const report = checkParity(program, ["go"], { outRoot, timeoutMs: 1000, spawner: recording([ok(), ok("sum 5\n")]).spawner });
    expect(report.outcomes).toEqual([
      {
        target: "go",
        status: "mismatch",
        expected: "sum 5\nruntime error: division by zero",
        actual: "sum 5",
        expectedExit: 1,
        actualExit: 0,
      },
    ]);
    expect(report.ok).toBe(false);
  });
});
