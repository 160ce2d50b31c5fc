// test/cli/coreil.spec.ts
// Tests for the coreil command

import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { buildConfig, getVersion, parseCliArgs, runCli, type CliIO } from "../../bin/coreil-cli-lib";
import type { Document } from "../../src/core/ast";
import { bin, doc, let_, lit, print, v } from "../helpers/coreil";

type Captured = CliIO & { stdout: string[]; stderr: string[] };

function workspace(files: Record<string, unknown> = {}): Captured {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "coreil-cli-"));
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(cwd, name), JSON.stringify(content), "utf8");
  }
  const stdout: string[] = [];
  const stderr: string[] = [];
  return { cwd, env: {}, out: l => stdout.push(l), err: l => stderr.push(l), stdout, stderr };
}

const sum: Document = doc([let_("a", lit(2)), print(bin("+", v("a"), lit(1)))]);

describe("parseCliArgs", () => {
  it("reads a command, a file and flags", () => {
    expect(parseCliArgs(["emit", "prog.json", "-t", "go", "-O", "--out", "build"])).toEqual({
      errors: [],
      command: "emit",
      file: "prog.json",
      target: "go",
      optimize: true,
      out: "build",
    });
    expect(parseCliArgs(["parity", "p.json", "--targets", "javascript,cpp"]).targets).toEqual(["javascript", "cpp"]);
  });

  it("collects usage errors", () => {
    expect(parseCliArgs(["compile", "--port", "99999", "--bogus", "--target"]).errors).toEqual([
      "unknown command: compile",
      "invalid port: 99999",
      "unknown option: --bogus",
      "--target requires a value",
    ]);
  });
});

describe("buildConfig", () => {
  it("lets flags override the environment", () => {
    const config = buildConfig(parseCliArgs(["emit", "x.json", "-t", "rust"]), { cwd: os.tmpdir(), env: { COREIL_TARGET: "go", COREIL_OUT_DIR: "gen" } });
    expect(config.compile).toEqual({ target: "rust", optimize: false, outDir: "gen" });
  });
});

describe("runCli", () => {
  it("runs a document on the interpreter", async () => {
    const io = workspace({ "prog.json": sum });
    expect(await runCli(["run", "prog.json"], io)).toBe(0);
    expect(io.stdout).toEqual(["3"]);
  });

  it("reads float literals from the document text", async () => {
    const io = workspace();
    const lit2 = '{"type": "Literal", "value": 2.0}';
    const big = '{"type": "Literal", "value": 9007199254740993}';
    const text = `{"version": "${sum.version}", "body": [{"type": "Print", "args": [${lit2}, ${big}]}]}`;
    fs.writeFileSync(path.join(io.cwd, "floats.json"), text, "utf8");
    expect(await runCli(["run", "floats.json"], io)).toBe(0);
    expect(io.stdout).toEqual(["2.0 9007199254740993"]);
  });

  it("exits 1 on a runtime error", async () => {
    const io = workspace({ "prog.json": doc([print(bin("%", lit(1), lit(0)))]) });
    expect(await runCli(["run", "prog.json"], io)).toBe(1);
    expect(io.stdout).toEqual(["runtime error: modulo by zero"]);
  });

  it("validates and reports coded errors", async () => {
    const io = workspace({ "good.json": sum, "bad.json": doc([print(v("x"))]) });
    expect(await runCli(["validate", "good.json"], io)).toBe(0);
    expect(io.stdout).toEqual(["good.json: valid"]);
    expect(await runCli(["validate", "bad.json"], io)).toBe(1);
    expect(io.stderr).toEqual(["$.body[0].args[0].name: error [E0100] variable 'x' used before definition"]);
  });

  it("lints with levels from the config file", async () => {
    const prog = doc([let_("unused", lit(1)), print(lit(2))]);
    const io = workspace({ "prog.json": prog });
    expect(await runCli(["lint", "prog.json"], io)).toBe(0);
    expect(io.stdout).toEqual(["$.body[0]: warning [W0201] Variable 'unused' is assigned but never read"]);

    const strict = workspace({ "prog.json": prog, "coreil.config.json": { lint: { rules: { "unused-variable": "error" } } } });
    expect(await runCli(["lint", "prog.json"], strict)).toBe(1);
  });

  it("emits an artifact into the output directory", async () => {
    const io = workspace({ "prog.json": sum });
    expect(await runCli(["emit", "prog.json", "--target", "cpp", "--out", "build"], io)).toBe(0);
    expect(io.stdout).toEqual([path.join(io.cwd, "build", "main.cpp"), path.join(io.cwd, "build", "coreil_runtime.hpp")]);
  });

  it("reports an unsupported node through its diagnostic code", async () => {
    const io = workspace({ "prog.json": doc([print({ type: "ExternalCall", module: "os", function: "cwd", args: [] })]) });
    expect(await runCli(["emit", "prog.json", "-t", "rust"], io)).toBe(1);
    expect(io.stderr).toEqual(["error [E0300] rust backend does not support ExternalCall (tier2)"]);
  });

  it("lists targets", async () => {
    const io = workspace();
    expect(await runCli(["targets"], io)).toBe(0);
    expect(io.stdout[0]).toBe("javascript      self-contained Node.js script");
    expect(io.stdout).toHaveLength(6);
    expect(io.stdout[5]).toBe("python          Python 3 script with a runtime module");
  });

  it("exits 2 on usage errors", async () => {
    const io = workspace();
    expect(await runCli(["run", "--frobnicate"], io)).toBe(2);
    expect(io.stderr).toEqual(["error: unknown option: --frobnicate", "run 'coreil --help' for usage"]);
    expect(await runCli(["lint"], io)).toBe(2);
    expect(io.stderr.at(-1)).toBe("error: lint requires a file");
  });

  it("rejects an unknown target before reading anything", async () => {
    const io = workspace();
    expect(await runCli(["emit", "missing.json", "-t", "cobol"], io)).toBe(1);
    expect(io.stderr).toEqual(["error: unknown target 'cobol' (available: javascript, cpp, rust, go, assemblyscript, python)"]);
  });

  it("prints help and version", async () => {
    const io = workspace();
    expect(await runCli(["--help"], io)).toBe(0);
    expect(io.stdout[0].split("\n")[0]).toBe("coreil - validate, run, lint and compile Core IL documents");
    expect(getVersion()).toMatch(/^coreil v\d+\.\d+\.\d+$/);
  });
});
