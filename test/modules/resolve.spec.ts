import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Document, Stmt } from "../../src/core/ast";
import {
  CircularImportError,
  ModuleCache,
  ModuleLoadError,
  ModuleNotFoundError,
  resolveImports,
  resolveModulePath,
} from "../../src/core/modules";
import { bin, call, doc, fn, lit, print, ret, runLines, v } from "../helpers/coreil";

const importOf = (p: string, alias?: string): Stmt => (alias ? { type: "Import", path: p, alias } : { type: "Import", path: p });

function writeModule(dir: string, importPath: string, d: Document): string {
  const file = path.join(dir, ...importPath.split(".")) + ".coreil.json";
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(d), "utf8");
  return file;
}

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "coreil-modules-"));
}

const utils = doc([
  fn("double", ["n"], [ret(bin("*", v("n"), lit(2)))]),
  fn("quad", ["n"], [ret(call("double", call("double", v("n"))))]),
]);

describe("resolveImports", () => {
  it("returns a document without imports unchanged", () => {
    const d = doc([print(lit(1))]);
    expect(resolveImports(d)).toBe(d);
  });

  it("inlines module functions under the alias", () => {
    const dir = tmpDir();
    writeModule(dir, "lib.utils", utils);
    const resolved = resolveImports(doc([importOf("lib.utils", "u"), print(call("u.quad", lit(3)))]), { baseDir: dir });

    expect(resolved.body.map(s => (s.type === "FuncDef" ? s.name : s.type))).toEqual(["u__double", "u__quad", "Print"]);
    expect(resolved.body[1]).toEqual(fn("u__quad", ["n"], [ret(call("u__double", call("u__double", v("n"))))]));
    expect(runLines(resolved).lines).toEqual(["12"]);
  });

  it("defaults the alias to the last path segment", () => {
    const dir = tmpDir();
    writeModule(dir, "lib.utils", utils);
    const resolved = resolveImports(doc([importOf("lib.utils"), print(call("utils.double", lit(4)))]), { baseDir: dir });
    expect(runLines(resolved).lines).toEqual(["8"]);
  });

  it("moves source-map entries past the inlined functions", () => {
    const dir = tmpDir();
    writeModule(dir, "lib.utils", utils);
    const d: Document = { ...doc([importOf("lib.utils", "u"), print(lit(1))]), source_map: { "1": [0], "2": [1] } };
    expect(resolveImports(d, { baseDir: dir }).source_map).toEqual({ "2": [2] });
  });

  it("reuses a module loaded through a shared cache", () => {
    const dir = tmpDir();
    const file = writeModule(dir, "lib.utils", utils);
    const cache = new ModuleCache();
    resolveImports(doc([importOf("lib.utils")]), { baseDir: dir, cache });
    expect([...cache.loaded.keys()]).toEqual([file]);
    expect(cache.loading.size).toBe(0);
  });

  it("reports a missing module with the expected file", () => {
    const dir = tmpDir();
    const expected = path.join(dir, "missing.coreil.json");
    expect(() => resolveModulePath("missing", dir)).toThrow(ModuleNotFoundError);
    expect(() => resolveModulePath("missing", dir)).toThrow(`module 'missing' not found: expected ${expected}`);
  });

  it("detects a circular import", () => {
    const dir = tmpDir();
    writeModule(dir, "a", doc([importOf("b"), fn("fa", [], [])]));
    writeModule(dir, "b", doc([importOf("a"), fn("fb", [], [])]));
    const aFile = path.join(dir, "a.coreil.json");
    const attempt = () => resolveImports(doc([importOf("a")]), { baseDir: dir });
    expect(attempt).toThrow(CircularImportError);
    expect(attempt).toThrow(`circular import detected: a (${aFile})`);
  });

  it("rejects a module that fails validation", () => {
    const dir = tmpDir();
    const file = writeModule(dir, "bad", doc([print(v("nope"))]));
    expect(() => resolveImports(doc([importOf("bad")]), { baseDir: dir })).toThrow(
      `cannot load module ${file}: validation errors: $.body[0].args[0].name: variable 'nope' used before definition`,
    );
  });

  it("needs a base directory once anything is imported", () => {
    expect(() => resolveImports(doc([importOf("lib.utils")]))).toThrow(ModuleLoadError);
  });
});
