// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  ConfigError,
  configFromEnv,
  configFromFile,
  configFromObject,
  DEFAULT_COMMANDS,
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  validateConfig,
} from "../../../src/core/config/config";

function tmpFile(name: string, content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "coreil-config-"));
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, "utf8");
  return file;
}

describe("configFromEnv", () => {
  it("returns empty sections when nothing is set", () => {
    expect(configFromEnv("COREIL", {})).toEqual({ compile: {}, toolchain: {}, runtime: {}, debug: {} });
  });

  it("reads compile, toolchain and debug settings", () => {
    const config = configFromEnv("COREIL", {
      COREIL_TARGET: "go",
      COREIL_OPTIMIZE: "TRUE",
      COREIL_TIMEOUT_MS: "5000",
      COREIL_DEBUG_PORT: "9000",
      COREIL_CPP_COMMAND: "clang++",
    });
    expect(config.compile).toEqual({ target: "go", optimize: true });
    expect(config.toolchain).toEqual({ timeoutMs: 5000, commands: { ...DEFAULT_COMMANDS, cpp: "clang++" } });
    expect(config.debug).toEqual({ port: 9000 });
  });

  it("ignores numbers that do not parse", () => {
    expect(configFromEnv("COREIL", { COREIL_MAX_CALL_DEPTH: "deep" }).runtime).toEqual({});
  });

  it("rejects an unknown target", () => {
    expect(() => configFromEnv("COREIL", { COREIL_TARGET: "cobol" })).toThrow(
      "COREIL_TARGET must be one of: javascript, cpp, rust, go, assemblyscript, python",
    );
  });
});

describe("configFromObject", () => {
  it("accepts camelCase and snake_case keys", () => {
    const config = configFromObject({
      compile: { out_dir: "build", optimize: true },
      toolchain: { timeout_ms: 2500 },
      runtime: { maxCallDepth: 200 },
    });
    expect(config.compile).toEqual({ outDir: "build", optimize: true });
    expect(config.toolchain).toEqual({ timeoutMs: 2500 });
    expect(config.runtime).toEqual({ maxCallDepth: 200 });
  });

  it("reads lint rule levels", () => {
    expect(configFromObject({ lint: { rules: { "unused-variable": "error" } } }).lint).toEqual({
      rules: { "unused-variable": "error" },
    });
  });

  it("rejects mistyped values", () => {
    expect(() => configFromObject({ compile: { optimize: "yes" } })).toThrow("compile.optimize must be true or false");
    expect(() => configFromObject({ lint: { rules: { x: "loud" } } })).toThrow(ConfigError);
    expect(() => configFromObject({ toolchain: { commands: { cobol: "cobc" } } })).toThrow(
      "toolchain.commands must be one of: javascript, cpp, rust, go, assemblyscript, python",
    );
  });
});

describe("mergeConfigs", () => {
  it("starts from the defaults", () => {
    expect(mergeConfigs()).toEqual(DEFAULT_CONFIG);
  });

  it("lets later layers win and keeps unrelated fields", () => {
    const merged = mergeConfigs(
      { compile: { target: "rust", outDir: "a" }, toolchain: { commands: { ...DEFAULT_COMMANDS, go: "go1.22" } } },
      { compile: { outDir: "b" }, lint: { rules: { "empty-body": "off" } } },
    );
    expect(merged.compile).toEqual({ target: "rust", optimize: false, outDir: "b" });
    expect(merged.toolchain.commands.go).toBe("go1.22");
    expect(merged.toolchain.commands.rust).toBe("cargo");
    expect(merged.lint.rules).toEqual({ "empty-body": "off" });
  });
});

describe("config files", () => {
  it("parses the YAML subset", () => {
    const yaml = ["# settings", "compile:", "  target: cpp", "  optimize: true", "toolchain:", "  timeout_ms: 1500", "debug:", "  port: 0"].join(
      "\n",
    );
    expect(parseSimpleYaml(yaml)).toEqual({
      compile: { target: "cpp", optimize: true },
      toolchain: { timeout_ms: 1500 },
      debug: { port: 0 },
    });
  });

  it("loads a YAML file", () => {
    const file = tmpFile("coreil.config.yaml", "compile:\n  target: 'rust'\n");
    expect(configFromFile(file).compile).toEqual({ target: "rust" });
  });

  it("reports invalid JSON and unknown formats", () => {
    const bad = tmpFile("coreil.config.json", "{");
    expect(() => configFromFile(bad)).toThrow(ConfigError);
    expect(() => configFromFile(tmpFile("coreil.config.toml", ""))).toThrow("Unsupported config file format: .toml");
  });

  it("finds the default file in the working directory, under any overrides", () => {
    const file = tmpFile("coreil.config.json", JSON.stringify({ compile: { target: "go", outDir: "gen" } }));
    const config = loadConfig({ cwd: path.dirname(file), env: { COREIL_TARGET: "cpp" }, overrides: { compile: { outDir: "cli" } } });
    expect(config.compile).toEqual({ target: "go", optimize: false, outDir: "cli" });
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports bad limits and a depth that differs from the runtimes", () => {
    const result = validateConfig(mergeConfigs({ runtime: { maxCallDepth: 0 }, toolchain: { timeoutMs: 500 }, debug: { port: 70000 } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["maxCallDepth must be a positive integer", "debug port must be an integer between 0 and 65535"]);
    expect(result.warnings).toEqual(["timeoutMs is very low, compiles may time out"]);

    expect(validateConfig(mergeConfigs({ runtime: { maxCallDepth: 50 } })).warnings).toEqual([
      "maxCallDepth differs from the generated runtimes' fixed limit of 1000; interpreter and targets may disagree",
    ]);
  });
});
