// src/core/config/config.ts
// Configuration for the compiler, toolchain, debugger and linter.

import * as fs from "fs";
import * as path from "path";
import { isTargetName, TARGET_NAMES, type TargetName } from "../codegen/registry";

// =========================================================================
// Configuration Types
// =========================================================================

export type LintLevel = "off" | "info" | "warning" | "error";

export type CompileConfig = {
  /** Backend used when no --target is given */
  target: TargetName;
  /** Run the optimizer before emission */
  optimize: boolean;
  /** Directory emitted artifacts are written to */
  outDir: string;
};

export type ToolchainConfig = {
  /** Wall-clock limit for each compile or run step */
  timeoutMs: number;
  /** Executable used for each target's compile or run step */
  commands: Record<TargetName, string>;
};

export type RuntimeConfig = {
  maxCallDepth: number;
};

export type DebugConfig = {
  port: number;
};

export type LintConfig = {
  /** rule name -> level; "off" disables the pass */
  rules: Record<string, LintLevel>;
};

export type CoreILConfig = {
  compile: CompileConfig;
  toolchain: ToolchainConfig;
  runtime: RuntimeConfig;
  debug: DebugConfig;
  lint: LintConfig;
};

/** Partial configuration, as read from one source. */
export type ConfigOverrides = { [K in keyof CoreILConfig]?: Partial<CoreILConfig[K]> };

export class ConfigError extends Error {
  readonly code = "CONFIG";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_COMMANDS: Record<TargetName, string> = {
  javascript: "node",
  cpp: "g++",
  rust: "cargo",
  go: "go",
  assemblyscript: "asc",
  python: "python3",
};

export const DEFAULT_COMPILE_CONFIG: CompileConfig = {
  target: "javascript",
  optimize: false,
  outDir: "out",
};

export const DEFAULT_TOOLCHAIN_CONFIG: ToolchainConfig = {
  timeoutMs: 60_000,
  commands: DEFAULT_COMMANDS,
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxCallDepth: 1000,
};

export const DEFAULT_DEBUG_CONFIG: DebugConfig = {
  port: 4317,
};

export const DEFAULT_CONFIG: CoreILConfig = {
  compile: DEFAULT_COMPILE_CONFIG,
  toolchain: DEFAULT_TOOLCHAIN_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
  debug: DEFAULT_DEBUG_CONFIG,
  lint: { rules: {} },
};

export const DEFAULT_CONFIG_FILES = ["coreil.config.json", "coreil.config.yaml", "coreil.config.yml"];

// =========================================================================
// Field readers
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

/** First of the given keys that holds a value, camelCase or snake_case. */
function field(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined) return data[key];
  }
  return undefined;
}

function numberField(where: string, value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) throw new ConfigError(`${where} must be a number`);
  return value;
}

function booleanField(where: string, value: unknown): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new ConfigError(`${where} must be true or false`);
  return value;
}

function stringField(where: string, value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ConfigError(`${where} must be a string`);
  return value;
}

function targetField(where: string, value: unknown): TargetName | undefined {
  if (value === undefined) return undefined;
  if (!isTargetName(value)) throw new ConfigError(`${where} must be one of: ${TARGET_NAMES.join(", ")}`);
  return value;
}

function isLintLevel(value: unknown): value is LintLevel {
  return value === "off" || value === "info" || value === "warning" || value === "error";
}

/** `{ key: value }`, or `{}` when the value is absent, so spreading it never erases a default. */
function opt<K extends string, V>(key: K, value: V | undefined): Partial<Record<K, V>> {
  const out: Partial<Record<K, V>> = {};
  if (value !== undefined) out[key] = value;
  return out;
}

function parseEnvInt(text: string | undefined): number | undefined {
  if (text === undefined || text.trim() === "") return undefined;
  const n = parseInt(text, 10);
  return Number.isNaN(n) ? undefined : n;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Reads `<PREFIX>_TARGET`, `_OPTIMIZE`, `_OUT_DIR`, `_TIMEOUT_MS`,
 * `_MAX_CALL_DEPTH`, `_DEBUG_PORT` and `_<TARGET>_COMMAND`.
 */
export function configFromEnv(prefix = "COREIL", env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const get = (name: string): string | undefined => env[`${prefix}_${name}`] || undefined;
  const commands: Partial<Record<TargetName, string>> = {};
  for (const target of TARGET_NAMES) {
    const command = get(`${target.toUpperCase()}_COMMAND`);
    if (command) commands[target] = command;
  }
  const optimize = get("OPTIMIZE");

  return {
    compile: {
      ...opt("target", targetField(`${prefix}_TARGET`, get("TARGET"))),
      ...opt("optimize", optimize === undefined ? undefined : optimize === "1" || optimize.toLowerCase() === "true"),
      ...opt("outDir", get("OUT_DIR")),
    },
    toolchain: {
      ...opt("timeoutMs", parseEnvInt(get("TIMEOUT_MS"))),
      ...opt("commands", Object.keys(commands).length > 0 ? { ...DEFAULT_COMMANDS, ...commands } : undefined),
    },
    runtime: opt("maxCallDepth", parseEnvInt(get("MAX_CALL_DEPTH"))),
    debug: opt("port", parseEnvInt(get("DEBUG_PORT"))),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) throw new ConfigError(`Config file must hold an object: ${filePath}`);
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 */
export function configFromObject(data: Record<string, unknown>): ConfigOverrides {
  const compile = section(data, "compile");
  const toolchain = section(data, "toolchain");
  const runtime = section(data, "runtime");
  const debug = section(data, "debug");
  const lint = section(data, "lint");

  const commandData = section(toolchain, "commands");
  const commands: Partial<Record<TargetName, string>> = {};
  for (const [name, value] of Object.entries(commandData)) {
    const target = targetField("toolchain.commands", name);
    const command = stringField(`toolchain.commands.${name}`, value);
    if (target && command) commands[target] = command;
  }

  const rules: Record<string, LintLevel> = {};
  for (const [rule, level] of Object.entries(section(lint, "rules"))) {
    if (!isLintLevel(level)) throw new ConfigError(`lint.rules.${rule} must be off, info, warning or error`);
    rules[rule] = level;
  }

  return {
    compile: {
      ...opt("target", targetField("compile.target", field(compile, "target"))),
      ...opt("optimize", booleanField("compile.optimize", field(compile, "optimize"))),
      ...opt("outDir", stringField("compile.outDir", field(compile, "outDir", "out_dir"))),
    },
    toolchain: {
      ...opt("timeoutMs", numberField("toolchain.timeoutMs", field(toolchain, "timeoutMs", "timeout_ms"))),
      ...opt("commands", Object.keys(commands).length > 0 ? { ...DEFAULT_COMMANDS, ...commands } : undefined),
    },
    runtime: opt("maxCallDepth", numberField("runtime.maxCallDepth", field(runtime, "maxCallDepth", "max_call_depth"))),
    debug: opt("port", numberField("debug.port", field(debug, "port"))),
    lint: Object.keys(rules).length > 0 ? { rules } : {},
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): CoreILConfig {
  const result: CoreILConfig = { ...DEFAULT_CONFIG };

  for (const cfg of configs) {
    if (cfg.compile) result.compile = { ...result.compile, ...cfg.compile };
    if (cfg.toolchain) {
      result.toolchain = {
        ...result.toolchain,
        ...cfg.toolchain,
        commands: { ...result.toolchain.commands, ...cfg.toolchain.commands },
      };
    }
    if (cfg.runtime) result.runtime = { ...result.runtime, ...cfg.runtime };
    if (cfg.debug) result.debug = { ...result.debug, ...cfg.debug };
    if (cfg.lint) result.lint = { rules: { ...result.lint.rules, ...cfg.lint.rules } };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI args > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): CoreILConfig {
  const layers: ConfigOverrides[] = [configFromEnv("COREIL", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map(p => path.join(cwd, p)).find(p => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) layers.push(options.overrides);

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CoreILConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.runtime.maxCallDepth) || config.runtime.maxCallDepth < 1) {
    errors.push("maxCallDepth must be a positive integer");
  } else if (config.runtime.maxCallDepth !== DEFAULT_RUNTIME_CONFIG.maxCallDepth) {
    warnings.push("maxCallDepth differs from the generated runtimes' fixed limit of 1000; interpreter and targets may disagree");
  }
  if (config.toolchain.timeoutMs <= 0) {
    errors.push("timeoutMs must be positive");
  } else if (config.toolchain.timeoutMs < 1000) {
    warnings.push("timeoutMs is very low, compiles may time out");
  }
  if (!Number.isInteger(config.debug.port) || config.debug.port < 0 || config.debug.port > 65535) {
    errors.push("debug port must be an integer between 0 and 65535");
  }
  for (const target of TARGET_NAMES) {
    if (!config.toolchain.commands[target]) errors.push(`missing toolchain command for ${target}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
