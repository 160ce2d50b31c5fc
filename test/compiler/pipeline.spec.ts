import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { Document } from "../../src/core/ast";
import { UnknownTargetError, UnsupportedOperationError } from "../../src/core/codegen/errors";
import { build, compile, interpret, prepare, ValidationFailedError } from "../../src/core/compiler/pipeline";
import { doc, lit, print, v } from "../helpers/coreil";

const hypot: Document = doc([
  print({ type: "ExternalCall", module: "math", function: "hypot", args: [lit(3), lit(4)] }),
]);

describe("pipeline", () => {
  let outDir: string;

  beforeEach(() => {
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), "coreil-pipeline-"));
  });

  afterEach(() => {
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  describe("prepare", () => {
    it("throws the validation errors of an invalid document", () => {
      let caught: unknown;
      try {
        prepare(doc([print(v("missing"))]));
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(ValidationFailedError);
      expect(caught instanceof ValidationFailedError && caught.errors).toEqual([
        { path: "$.body[0].args[0].name", message: "variable 'missing' used before definition" },
      ]);
    });

    it("records the passes it applied", () => {
      expect(prepare(doc([print(lit(1))])).passes.map(p => p.name)).toEqual(["validate", "lower"]);
      const optimized = prepare(doc([print(lit(1))]), { optimize: true });
      expect(optimized.passes.map(p => p.name)).toEqual(["validate", "lower", "optimize"]);
    });
  });

  describe("compile", () => {
    it("emits for the requested target and composes the source map", () => {
      const input: Document = { ...doc([print(lit(1))]), source_map: { "1": [0] } };
      const result = compile(input, { target: "javascript" });

      expect(result.output.target).toBe("javascript");
      expect(result.output.fileName).toBe("main.js");
      expect(result.passes.map(p => p.name)).toEqual(["validate", "lower", "emit:javascript"]);

      const line = result.output.lineMap[0];
      expect(result.sourceMap).toEqual({ "1": [line] });
      expect(result.output.code.split("\n")[line - 1].trim()).toBe("rt.print([1n]);");
    });

    it("rejects an unknown target before doing any work", () => {
      expect(() => compile(doc([print(v("missing"))]), { target: "cobol" })).toThrow(UnknownTargetError);
    });

    it("reports a construct the target cannot express", () => {
      expect(() => compile(hypot, { target: "cpp" })).toThrow("cpp backend does not support ExternalCall (tier2)");
    });
  });

  describe("build", () => {
    it("writes the artifact into the output directory", () => {
      const result = build(doc([print(lit("hi"))]), { target: "javascript", outDir });
      expect(result.kind).toBe("emitted");
      expect(result.kind === "emitted" && result.files).toEqual([path.join(outDir, "main.js")]);
      expect(fs.existsSync(path.join(outDir, "main.js"))).toBe(true);
    });

    it("keeps an existing artifact when the new document cannot be expressed", () => {
      build(doc([print(lit("hi"))]), { target: "cpp", outDir });
      const logged: string[] = [];
      const result = build(hypot, { target: "cpp", outDir, log: line => logged.push(line) });

      const previous = path.join(outDir, "main.cpp");
      expect(result.kind).toBe("reused");
      expect(result.kind === "reused" && result.file).toBe(previous);
      expect(logged).toEqual([`warning: cpp backend does not support ExternalCall (tier2); keeping existing ${previous}`]);
    });

    it("fails when there is nothing to fall back on", () => {
      expect(() => build(hypot, { target: "cpp", outDir, log: () => undefined })).toThrow(UnsupportedOperationError);
    });
  });

  describe("interpret", () => {
    it("runs the prepared document", () => {
      const lines: string[] = [];
      const code = interpret(doc([print(lit("ok"))]), { out: line => lines.push(line) });
      expect(code).toBe(0);
      expect(lines).toEqual(["ok"]);
    });
  });
});
