// src/core/toolchain/runTarget.ts
// Compiles and runs an emitted artifact with the target's native tools.

import * as path from "path";
import { DEFAULT_COMMANDS } from "../config/config";
import { getTarget, type TargetName } from "../codegen/registry";
import { ToolchainError } from "./errors";
import { nodeSpawner, type SpawnResult, type Spawner } from "./spawner";

export interface Step {
  command: string;
  args: string[];
}

export interface TargetPlan {
  /** Steps that build the program; none for interpreted targets */
  compile: Step[];
  run: Step;
}

export interface RunTargetOptions {
  timeoutMs: number;
  spawner?: Spawner;
  /** Executable per target, as in the toolchain configuration */
  commands?: Partial<Record<TargetName, string>>;
}

export interface TargetRunResult {
  target: TargetName;
  stdout: string;
  stderr: string;
  exitCode: number;
}

const BINARY = process.platform === "win32" ? "program.exe" : "program";

/** The commands that build and run the artifact in `dir`. */
export function targetPlan(target: TargetName, dir: string, commands: Partial<Record<TargetName, string>> = {}): TargetPlan {
  const tool = { ...DEFAULT_COMMANDS, ...commands };
  const binary = path.join(dir, BINARY);
  switch (target) {
    case "javascript":
      return { compile: [], run: { command: tool.javascript, args: ["main.js"] } };
    case "cpp":
      return {
        compile: [{ command: tool.cpp, args: ["-std=c++17", "-O2", "-I", dir, "main.cpp", "-o", binary] }],
        run: { command: binary, args: [] },
      };
    case "rust":
      return {
        compile: [{ command: tool.rust, args: ["build", "--release", "--quiet"] }],
        run: { command: path.join(dir, "target", "release", "coreil-program"), args: [] },
      };
    case "go":
      return {
        compile: [{ command: tool.go, args: ["build", "-o", binary, "."] }],
        run: { command: binary, args: [] },
      };
    case "assemblyscript":
      return {
        compile: [{ command: tool.assemblyscript, args: ["main.ts", "--outFile", "main.wasm", "--optimize"] }],
        run: { command: tool.javascript, args: ["run.mjs", "main.wasm"] },
      };
    case "python":
      return { compile: [], run: { command: tool.python, args: ["main.py"] } };
  }
}

function check(target: TargetName, stage: "compile" | "runtime", step: Step, result: SpawnResult, timeoutMs: number): void {
  if (result.missing) {
    throw new ToolchainError(target, "missing-tool", `required tool not found: ${step.command}`);
  }
  if (result.timedOut) {
    throw new ToolchainError(target, "timeout", `${target} ${stage} timed out after ${timeoutMs}ms`, result.stderr);
  }
  if (stage === "compile" && result.status !== 0) {
    throw new ToolchainError(target, "compile", `${target} compilation failed (exit ${String(result.status)})`, result.stderr);
  }
  // Exit 1 is a program-level runtime error; anything else is a crash.
  if (stage === "runtime" && result.status !== 0 && result.status !== 1) {
    throw new ToolchainError(target, "runtime", `${target} program crashed (exit ${String(result.status)})`, result.stderr);
  }
}

/**
 * Builds and runs the artifact emitted for `target` into `artifactDir`.
 * Throws ToolchainError when a tool is missing, a step times out, the
 * compiler fails or the program crashes.
 */
export function runTarget(target: string, artifactDir: string, options: RunTargetOptions): TargetRunResult {
  const name = getTarget(target).name;
  const spawner = options.spawner ?? nodeSpawner;
  const plan = targetPlan(name, artifactDir, options.commands);
  const spawn = (step: Step): SpawnResult =>
    spawner({ command: step.command, args: step.args, cwd: artifactDir, timeoutMs: options.timeoutMs });

  for (const step of plan.compile) {
    check(name, "compile", step, spawn(step), options.timeoutMs);
  }
  const result = spawn(plan.run);
  check(name, "runtime", plan.run, result, options.timeoutMs);
  return { target: name, stdout: result.stdout, stderr: result.stderr, exitCode: result.status ?? 1 };
}
