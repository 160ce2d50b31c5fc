import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { lower } from "../../src/core/compiler/lower";
import { existingArtifact, writeArtifact } from "../../src/core/codegen/artifact";
import { UnknownTargetError, UnsupportedOperationError } from "../../src/core/codegen/errors";
import { emit, getTarget, isTargetName, listTargets } from "../../src/core/codegen/registry";
import { bin, call, doc, fn, if_, let_, lit, print, ret, v } from "../helpers/coreil";

const hello = doc([print(lit(1))]);

function lineOf(target: string, index = 0): string {
  const result = emit(target, lower(hello));
  return result.code.split("\n")[result.lineMap[index] - 1];
}

describe("registry", () => {
  it("lists every backend in order", () => {
    expect(listTargets().map(t => t.name)).toEqual(["javascript", "cpp", "rust", "go", "assemblyscript", "python"]);
  });

  it("rejects an unknown target with the available names", () => {
    expect(() => getTarget("cobol")).toThrow(UnknownTargetError);
    expect(() => getTarget("cobol")).toThrow("unknown target 'cobol' (available: javascript, cpp, rust, go, assemblyscript, python)");
    expect(isTargetName("go")).toBe(true);
    expect(isTargetName(3)).toBe(false);
  });
});

describe("native backends", () => {
  it("emits a print statement in each language", () => {
    expect(lineOf("cpp")).toBe("  coreil::print(std::vector<Value>{Value::integer(1)});");
    expect(lineOf("rust")).toBe("    rt::print(vec![Value::Int(1)])?;");
    expect(lineOf("go")).toBe("\trtPrint([]Value{int64(1)})");
    expect(lineOf("assemblyscript")).toBe("  rt_print([rt_int(1)]);");
  });

  it("names the entry point and runtime files", () => {
    const cpp = emit("cpp", hello);
    expect(cpp.code.trimEnd().split("\n").at(-1)).toBe("int main() { return coreil::run_main(program_); }");
    expect(cpp.runtimeFiles.map(f => f.name)).toEqual(["coreil_runtime.hpp"]);

    const rust = emit("rust", hello);
    expect(rust.fileName).toBe("src/main.rs");
    expect(rust.runtimeFiles.map(f => f.name)).toEqual(["Cargo.toml", "src/coreil_runtime.rs"]);

    const go = emit("go", hello);
    expect(go.code.split("\n")[1]).toBe("package main");
    expect(go.runtimeFiles.map(f => f.name)).toEqual(["coreil_runtime.go", "go.mod"]);

    const as = emit("assemblyscript", hello);
    expect(as.code.split("\n")).toContain('import { Value, UNDEF, NONE, rt_int, rt_print } from "./coreil_runtime";');
    expect(as.runtimeFiles.map(f => f.name)).toEqual(["coreil_runtime.ts", "run.mjs"]);
  });

  it("keeps the line map pointing at the statement after the import prelude", () => {
    const as = emit("assemblyscript", doc([let_("x", lit(1)), print(v("x"))]));
    const lines = as.code.split("\n");
    expect(lines[as.lineMap[0] - 1]).toBe("  v_x = rt_int(1);");
    expect(lines[as.lineMap[1] - 1]).toBe('  rt_print([rt_read(v_x, "x")]);');
  });

  it("sequences two effectful C++ arguments through a lambda", () => {
    const d = doc([let_("x", lit(1)), let_("y", lit(2)), print(bin("+", v("x"), v("y")))]);
    const result = emit("cpp", d);
    expect(result.code.split("\n")[result.lineMap[2] - 1]).toBe(
      '  coreil::print(std::vector<Value>{[&] { auto a0_ = coreil::read(v_x, "x"); auto a1_ = coreil::read(v_y, "y"); return coreil::add(a0_, a1_); }()});',
    );
  });

  it("rejects host interop on compiled backends", () => {
    const d = doc([print({ type: "ExternalCall", module: "os", function: "cwd", args: [] })]);
    for (const target of ["cpp", "rust", "go", "assemblyscript"]) {
      expect(() => emit(target, d)).toThrow(`${target} backend does not support ExternalCall (tier2)`);
    }
  });

  it("rejects exceptions and regex on assemblyscript", () => {
    const tryDoc = doc([{ type: "TryCatch", body: [], catch_var: "e", catch_body: [] }]);
    const regexDoc = doc([print({ type: "RegexMatch", string: lit("a"), pattern: lit("a") })]);
    expect(() => emit("assemblyscript", tryDoc)).toThrow(UnsupportedOperationError);
    expect(() => emit("assemblyscript", tryDoc)).toThrow("assemblyscript backend does not support TryCatch (construct)");
    expect(() => emit("assemblyscript", regexDoc)).toThrow("assemblyscript backend does not support RegexMatch (regex)");
    expect(() => emit("go", regexDoc)).not.toThrow();
  });
});

describe("python backend", () => {
  it("emits functions ahead of a main_ body that declares the globals", () => {
    const d = doc([
      fn("greet", ["n"], [let_("s", bin("+", lit("hi "), v("n"))), ret(v("s"))]),
      let_("x", lit({ float: 2 })),
      print(call("greet", lit("a")), v("x")),
    ]);
    const result = emit("python", d);
    expect(result.fileName).toBe("main.py");
    expect(result.code.split("\n")).toEqual([
      "# Generated from Core IL (coreil-1.10.5).",
      "import coreil_runtime as rt",
      "",
      "v_x = rt.UNDEF",
      "",
      "",
      "def fn_greet(v_n):",
      "    rt.enter()",
      "    try:",
      "        v_s = rt.UNDEF",
      '        v_s = rt.add("hi ", rt.read(v_n, "n"))',
      '        return rt.read(v_s, "s")',
      "        return None",
      "    finally:",
      "        rt.leave()",
      "",
      "",
      "def main_():",
      "    global v_x",
      "    v_x = 2.0",
      '    rt.print_([fn_greet("a"), rt.read(v_x, "x")])',
      "",
      "",
      "rt.main(main_)",
      "",
    ]);
    expect(result.lineMap).toEqual({ 0: 7, 1: 20, 2: 21 });
    expect(result.runtimeFiles.map(f => f.name)).toEqual(["coreil_runtime.py"]);
    expect(result.runtimeFiles[0].content).toContain("def main(body):");
  });

  it("fills empty blocks and keeps short-circuit operands lazy", () => {
    const d = doc([
      let_("a", lit(true)),
      if_(bin("and", v("a"), lit(0)), []),
      {
        type: "TryCatch",
        body: [{ type: "Throw", message: lit("boom") }],
        catch_var: "e",
        catch_body: [print(v("e"))],
        finally_body: [],
      },
    ]);
    const lines = emit("python", d).code.split("\n");
    const start = lines.indexOf("def main_():");
    expect(lines.slice(start, start + 12)).toEqual([
      "def main_():",
      "    global v_a, v_e",
      "    v_a = True",
      '    if rt.truthy((lambda t_: 0 if rt.truthy(t_) else t_)(rt.read(v_a, "a"))):',
      "        pass",
      "    try:",
      '        raise rt.error("boom")',
      "    except Exception as e0_:",
      "        v_e = rt.caught(e0_)",
      '        rt.print_([rt.read(v_e, "e")])',
      "    finally:",
      "        pass",
    ]);
  });

  it("passes host interop through to the runtime", () => {
    const d = doc([print({ type: "ExternalCall", module: "os", function: "cwd", args: [] })]);
    expect(emit("python", d).code).toContain('    rt.print_([rt.external("os", "cwd", [])])');
  });
});

describe("artifacts", () => {
  it("writes the main file with its runtime files", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "coreil-artifact-"));
    expect(existingArtifact(dir, "rust")).toBeUndefined();
    const written = writeArtifact(dir, emit("rust", hello));
    expect(written).toEqual([
      path.join(dir, "src/main.rs"),
      path.join(dir, "Cargo.toml"),
      path.join(dir, "src/coreil_runtime.rs"),
    ]);
    expect(existingArtifact(dir, "rust")).toBe(path.join(dir, "src/main.rs"));
    expect(fs.readFileSync(path.join(dir, "src/main.rs"), "utf8")).toContain("rt::run_main(program);");
  });
});
