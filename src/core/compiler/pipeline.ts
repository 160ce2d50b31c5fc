// src/core/compiler/pipeline.ts
// Document -> validate -> resolve imports -> lower -> optimize? -> {run | emit}

import type { Document } from "../ast";
import { existingArtifact, writeArtifact } from "../codegen/artifact";
import type { EmitResult } from "../codegen/emitter";
import { UnsupportedOperationError } from "../codegen/errors";
import { emit, getTarget } from "../codegen/registry";
import { run, type ExitCode, type RunOptions } from "../eval/interp";
import { ModuleCache, resolveImports } from "../modules";
import { isValidDocument, validate, type ValidationError } from "../validate/validate";
import { lower } from "./lower";
import { optimizeWithStats } from "./optimize";
import { composeSourceMaps, type ComposedSourceMap } from "./sourcemap";

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

/**
 * Record of a compiler pass application.
 */
export type PassRecord = {
  name: string;
  timestamp: number;
  /** Counters the pass reports, e.g. folded constants */
  metrics?: Record<string, number>;
};

export interface PrepareOptions {
  optimize?: boolean;
  /** Directory imports resolve against (normally the document's own directory) */
  baseDir?: string;
  cache?: ModuleCache;
}

export interface CompileOptions extends PrepareOptions {
  target: string;
}

export type PreparedDocument = {
  doc: Document;
  passes: PassRecord[];
};

export type CompilationResult = PreparedDocument & {
  output: EmitResult;
  /** english line -> generated lines, when the document carries a source map */
  sourceMap: ComposedSourceMap;
};

export class ValidationFailedError extends Error {
  readonly code = "VALIDATION";

  constructor(readonly errors: ValidationError[]) {
    super(`document has ${errors.length} validation error${errors.length === 1 ? "" : "s"}`);
    this.name = "ValidationFailedError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Passes
// ─────────────────────────────────────────────────────────────────

function countStatements(doc: Document): number {
  return doc.body.length;
}

/**
 * Validates, flattens imports, lowers and (optionally) optimizes. Throws
 * ValidationFailedError when the input is not a valid document.
 */
export function prepare(input: unknown, options: PrepareOptions = {}): PreparedDocument {
  if (!isValidDocument(input)) throw new ValidationFailedError(validate(input));

  const passes: PassRecord[] = [];
  passes.push({ name: "validate", timestamp: Date.now(), metrics: { statements: countStatements(input) } });

  let doc = resolveImports(input, { baseDir: options.baseDir, cache: options.cache ?? new ModuleCache() });
  if (doc !== input) {
    passes.push({ name: "resolveImports", timestamp: Date.now(), metrics: { statements: countStatements(doc) } });
  }

  doc = lower(doc);
  passes.push({ name: "lower", timestamp: Date.now() });

  if (options.optimize) {
    const result = optimizeWithStats(doc);
    doc = result.doc;
    passes.push({ name: "optimize", timestamp: Date.now(), metrics: { ...result.stats } });
  }

  return { doc, passes };
}

/** Prepares a document and emits it for one backend. */
export function compile(input: unknown, options: CompileOptions): CompilationResult {
  getTarget(options.target);
  const prepared = prepare(input, options);
  const output = emit(options.target, prepared.doc);
  prepared.passes.push({
    name: `emit:${output.target}`,
    timestamp: Date.now(),
    metrics: { lines: output.code.split("\n").length - 1, runtimeFiles: output.runtimeFiles.length },
  });
  return {
    ...prepared,
    output,
    sourceMap: composeSourceMaps(prepared.doc.source_map ?? {}, output.lineMap),
  };
}

export type BuildResult =
  | { kind: "emitted"; result: CompilationResult; files: string[] }
  | { kind: "reused"; file: string; error: UnsupportedOperationError };

/**
 * Compiles into `outDir`. When the backend cannot express the document but
 * an artifact from an earlier build exists there, that artifact is kept and a
 * warning logged.
 */
export function build(
  input: unknown,
  options: CompileOptions & { outDir: string; log?: (line: string) => void },
): BuildResult {
  const log = options.log ?? (line => console.error(line));
  let result: CompilationResult;
  try {
    result = compile(input, options);
  } catch (e) {
    if (!(e instanceof UnsupportedOperationError)) throw e;
    const previous = existingArtifact(options.outDir, options.target);
    if (previous === undefined) throw e;
    log(`warning: ${e.message}; keeping existing ${previous}`);
    return { kind: "reused", file: previous, error: e };
  }
  return { kind: "emitted", result, files: writeArtifact(options.outDir, result.output) };
}

/** Prepares a document and runs it on the reference interpreter. */
export function interpret(input: unknown, options: PrepareOptions & RunOptions = {}): ExitCode {
  return run(prepare(input, options).doc, options);
}
