// bin/coreil-cli-lib.ts
// Argument parsing and command implementations for the coreil command.
// Everything here takes its I/O as parameters so tests run it in process.

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { isTargetName, listTargets, TARGET_NAMES, type TargetName } from "../src/core/codegen/registry";
import { build, interpret, prepare } from "../src/core/compiler/pipeline";
import { loadConfig, validateConfig, type ConfigOverrides, type CoreILConfig } from "../src/core/config/config";
import { parseDocumentJson } from "../src/core/eval/json";
import { checkParity } from "../src/core/toolchain/parity";
import { validate } from "../src/core/validate/validate";
import { lint } from "../src/lint/runner";
import { makeDiagnostic } from "../src/outcome/codes";
import { formatDiagnostic } from "../src/outcome/diagnostic";
import { allDiagnostics } from "../src/outcome/failure";
import { failureFromError } from "../src/outcome/fromError";
import { DebugServer } from "../src/server/debugServer";
import { DebugSession } from "../src/server/debugSession";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const COMMANDS = ["run", "validate", "lint", "emit", "parity", "debug", "targets"] as const;
export type Command = (typeof COMMANDS)[number];

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  command?: Command;
  file?: string;
  target?: string;
  targets?: string[];
  out?: string;
  optimize?: boolean;
  port?: number;
  config?: string;
  /** Problems found while parsing; reported before anything runs */
  errors: string[];
};

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Called once `coreil debug` is listening; the process then stays up. */
  onServerStarted?: (server: DebugServer) => void;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };
  const value = (i: number, flag: string): string | undefined => {
    const v = args[i];
    if (v === undefined || v.startsWith("--")) {
      result.errors.push(`${flag} requires a value`);
      return undefined;
    }
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--optimize" || arg === "-O") {
      result.optimize = true;
    } else if (arg === "--target" || arg === "-t") {
      result.target = value(++i, arg);
    } else if (arg === "--targets") {
      result.targets = value(++i, arg)?.split(",").filter(t => t !== "");
    } else if (arg === "--out" || arg === "-o") {
      result.out = value(++i, arg);
    } else if (arg === "--config" || arg === "-c") {
      result.config = value(++i, arg);
    } else if (arg === "--port" || arg === "-p") {
      const raw = value(++i, arg);
      if (raw !== undefined) {
        const port = Number(raw);
        if (Number.isInteger(port) && port >= 0 && port <= 65535) result.port = port;
        else result.errors.push(`invalid port: ${raw}`);
      }
    } else if (arg.startsWith("-")) {
      result.errors.push(`unknown option: ${arg}`);
    } else if (result.command === undefined) {
      if (isCommand(arg)) result.command = arg;
      else result.errors.push(`unknown command: ${arg}`);
    } else if (result.file === undefined) {
      result.file = arg;
    } else {
      result.errors.push(`unexpected argument: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
coreil - validate, run, lint and compile Core IL documents

USAGE:
  coreil run <file>                   Run on the reference interpreter
  coreil validate <file>              Check structure, scoping and version
  coreil lint <file>                  Report likely mistakes
  coreil emit <file> [--target t]     Write a program for one backend
  coreil parity <file> [--targets a,b]
                                      Build and run on each backend, compare with the interpreter
  coreil debug <file> [--port n]      Serve a step debugger over HTTP and WebSocket
  coreil targets                      List backends

OPTIONS:
  -h, --help                          Show this help message
  -v, --version                       Show version information
  -t, --target <name>                 Backend: ${TARGET_NAMES.join(", ")}
  --targets <a,b,...>                 Backends for parity (default: all)
  -o, --out <dir>                     Output directory for emit and parity
  -O, --optimize                      Run the optimizer first
  -p, --port <n>                      Debug server port
  -c, --config <file>                 Configuration file (JSON or YAML)

Imports resolve against the directory of <file>.
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    const version = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
    return `coreil v${typeof version === "string" ? version : "0.0.0"}`;
  } catch {
    return "coreil v0.0.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/** Flags override the configuration file, which overrides the environment. */
export function buildConfig(args: CliArgs, io: Pick<CliIO, "cwd" | "env">): CoreILConfig {
  const overrides: ConfigOverrides = {};
  const compile: Partial<CoreILConfig["compile"]> = {};
  if (args.target !== undefined && isTargetName(args.target)) compile.target = args.target;
  if (args.optimize) compile.optimize = true;
  if (args.out !== undefined) compile.outDir = args.out;
  if (Object.keys(compile).length > 0) overrides.compile = compile;
  if (args.port !== undefined) overrides.debug = { port: args.port };

  return loadConfig({
    configFile: args.config === undefined ? undefined : path.resolve(io.cwd, args.config),
    overrides,
    env: io.env,
    cwd: io.cwd,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

type Loaded = { doc: unknown; file: string; baseDir: string };

function readDocument(file: string, cwd: string): Loaded {
  const resolved = path.resolve(cwd, file);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf8");
  } catch (e) {
    throw new Error(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let doc: unknown;
  try {
    doc = parseDocumentJson(text);
  } catch (e) {
    throw new Error(`${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return { doc, file: resolved, baseDir: path.dirname(resolved) };
}

function reportError(e: unknown, io: CliIO): number {
  const failure = failureFromError(e);
  const diagnostics = allDiagnostics(failure);
  if (diagnostics.length === 0) io.err(`error: ${failure.message}`);
  else for (const d of diagnostics) io.err(formatDiagnostic(d));
  return 1;
}

function cmdRun(loaded: Loaded, config: CoreILConfig, io: CliIO): number {
  return interpret(loaded.doc, {
    baseDir: loaded.baseDir,
    optimize: config.compile.optimize,
    maxCallDepth: config.runtime.maxCallDepth,
    out: io.out,
  });
}

function cmdValidate(loaded: Loaded, io: CliIO): number {
  const errors = validate(loaded.doc);
  for (const e of errors) io.err(formatDiagnostic(makeDiagnostic("E0100", { message: e.message }, e.path)));
  if (errors.length > 0) return 1;
  io.out(`${path.basename(loaded.file)}: valid`);
  return 0;
}

function cmdLint(loaded: Loaded, config: CoreILConfig, io: CliIO): number {
  const { doc } = prepare(loaded.doc, { baseDir: loaded.baseDir });
  const diagnostics = lint(doc, config.lint.rules);
  for (const d of diagnostics) io.out(formatDiagnostic(d));
  if (diagnostics.length === 0) io.out(`${path.basename(loaded.file)}: no issues`);
  return diagnostics.some(d => d.severity === "error") ? 1 : 0;
}

function cmdEmit(loaded: Loaded, config: CoreILConfig, io: CliIO): number {
  const outDir = path.resolve(io.cwd, config.compile.outDir);
  const result = build(loaded.doc, {
    target: config.compile.target,
    optimize: config.compile.optimize,
    baseDir: loaded.baseDir,
    outDir,
    log: io.err,
  });
  if (result.kind === "reused") {
    io.out(result.file);
    return 0;
  }
  for (const file of result.files) io.out(file);
  return 0;
}

function cmdParity(loaded: Loaded, args: CliArgs, config: CoreILConfig, io: CliIO): number {
  const targets: TargetName[] = [];
  for (const t of args.targets ?? TARGET_NAMES) {
    if (!isTargetName(t)) throw new Error(`unknown target '${t}' (available: ${TARGET_NAMES.join(", ")})`);
    targets.push(t);
  }
  const report = checkParity(loaded.doc, targets, {
    outRoot: path.resolve(io.cwd, config.compile.outDir),
    optimize: config.compile.optimize,
    baseDir: loaded.baseDir,
    timeoutMs: config.toolchain.timeoutMs,
    commands: config.toolchain.commands,
    log: io.err,
  });
  for (const o of report.outcomes) {
    if (o.status === "mismatch") {
      io.out(`${o.target}: mismatch (exit ${o.actualExit}, expected ${o.expectedExit})`);
      io.out(`  expected: ${JSON.stringify(o.expected)}`);
      io.out(`  actual:   ${JSON.stringify(o.actual)}`);
    } else if (o.status === "skipped") {
      io.out(`${o.target}: skipped (${o.reason})`);
    } else {
      io.out(`${o.target}: match`);
    }
  }
  return report.ok ? 0 : 1;
}

async function cmdDebug(loaded: Loaded, config: CoreILConfig, io: CliIO): Promise<number> {
  const session = new DebugSession({
    name: path.basename(loaded.file),
    baseDir: loaded.baseDir,
    maxCallDepth: config.runtime.maxCallDepth,
  });
  const loadResult = session.load(loaded.doc);
  if (!loadResult.success) {
    io.err(loadResult.error ?? "cannot load document");
    return 1;
  }
  const server = new DebugServer({
    port: config.debug.port,
    log: io.out,
    sessionDefaults: { baseDir: loaded.baseDir, maxCallDepth: config.runtime.maxCallDepth },
  });
  server.addSession(session);
  await server.start();
  io.out(`Session ${session.id}: ${loadResult.steps ?? 0} steps recorded${loadResult.truncated ? " (truncated)" : ""}`);
  io.onServerStarted?.(server);
  return 0;
}

function cmdTargets(io: CliIO): number {
  for (const t of listTargets()) io.out(`${t.name.padEnd(16)}${t.description}`);
  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY
// ═══════════════════════════════════════════════════════════════════════════════

/** Runs one command line; resolves with the process exit code. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const args = parseCliArgs(argv);

  if (args.help) {
    io.out(getHelpText());
    return 0;
  }
  if (args.version) {
    io.out(getVersion());
    return 0;
  }
  if (args.errors.length > 0) {
    for (const e of args.errors) io.err(`error: ${e}`);
    io.err("run 'coreil --help' for usage");
    return 2;
  }
  if (args.command === undefined) {
    io.out(getHelpText());
    return 2;
  }

  try {
    if (args.target !== undefined && !isTargetName(args.target)) {
      throw new Error(`unknown target '${args.target}' (available: ${TARGET_NAMES.join(", ")})`);
    }
    const config = buildConfig(args, io);
    const check = validateConfig(config);
    for (const w of check.warnings) io.err(`warning: ${w}`);
    if (!check.valid) {
      for (const e of check.errors) io.err(formatDiagnostic(makeDiagnostic("E0600", { message: e })));
      return 1;
    }

    if (args.command === "targets") return cmdTargets(io);
    if (args.file === undefined) {
      io.err(`error: ${args.command} requires a file`);
      return 2;
    }
    const loaded = readDocument(args.file, io.cwd);

    switch (args.command) {
      case "run":
        return cmdRun(loaded, config, io);
      case "validate":
        return cmdValidate(loaded, io);
      case "lint":
        return cmdLint(loaded, config, io);
      case "emit":
        return cmdEmit(loaded, config, io);
      case "parity":
        return cmdParity(loaded, args, config, io);
      case "debug":
        return await cmdDebug(loaded, config, io);
    }
  } catch (e) {
    return reportError(e, io);
  }
}
