// src/core/modules/resolve.ts
// Import flattening. Every FuncDef of an imported module is copied into the
// importing document as `<alias>__<name>` and calls are renamed to match, so
// the result has no Import nodes and needs nothing else from later passes.

import * as fs from "fs";
import * as path from "path";
import type { Document, Expr, SourceMapping, Stmt, StmtOf } from "../ast";
import { errorMessage } from "../eval/errors";
import { parseDocumentJson } from "../eval/json";
import { mapExprChildren, mapStmt } from "../traverse";
import { isValidDocument, validate } from "../validate/validate";
import { isSupportedVersion } from "../versions";
import { CircularImportError, ModuleLoadError, ModuleNotFoundError } from "./errors";

export const MODULE_EXTENSION = ".coreil.json";

/** Loaded and in-progress modules, keyed by absolute file path. */
export class ModuleCache {
  readonly loaded = new Map<string, Document>();
  readonly loading = new Set<string>();
}

export interface ResolveOptions {
  /** Directory imports are resolved against; required once a document imports anything. */
  baseDir?: string;
  cache?: ModuleCache;
}

/** `lib.utils` -> `<baseDir>/lib/utils.coreil.json` */
export function resolveModulePath(importPath: string, baseDir: string): string {
  const file = path.resolve(baseDir, ...importPath.split(".")) + MODULE_EXTENSION;
  if (!fs.existsSync(file) || !fs.statSync(file).isFile()) throw new ModuleNotFoundError(importPath, file);
  return file;
}

export function loadModuleDocument(file: string): Document {
  let data: unknown;
  try {
    data = parseDocumentJson(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new ModuleLoadError(file, errorMessage(e));
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ModuleLoadError(file, "not a Core IL document");
  }
  const version: unknown = Reflect.get(data, "version");
  if (!isSupportedVersion(version)) throw new ModuleLoadError(file, `unsupported version: ${String(version)}`);
  const errors = validate(data);
  if (errors.length > 0 || !isValidDocument(data)) {
    const shown = errors.slice(0, 5).map(e => `${e.path}: ${e.message}`);
    throw new ModuleLoadError(file, `validation errors: ${shown.join("; ")}`);
  }
  return data;
}

/** Top-level FuncDefs; later definitions of a name win. */
export function moduleExports(doc: Document): Map<string, StmtOf<"FuncDef">> {
  const out = new Map<string, StmtOf<"FuncDef">>();
  for (const s of doc.body) {
    if (s.type === "FuncDef") out.set(s.name, s);
  }
  return out;
}

type Rename = (name: string) => string | undefined;

export function renameCalls(body: readonly Stmt[], rename: Rename): Stmt[] {
  const expr = (e: Expr): Expr => {
    const x = mapExprChildren(e, expr);
    if (x.type !== "Call") return x;
    const to = rename(x.name);
    return to === undefined ? x : { ...x, name: to };
  };
  const block = (stmts: readonly Stmt[]): Stmt[] =>
    stmts.map(s => {
      const y = mapStmt(s, expr, block);
      if (y.type !== "Call") return y;
      const to = rename(y.name);
      return to === undefined ? y : { ...y, name: to };
    });
  return block(body);
}

/** `alias.name` -> `alias__name` for the given exports. */
function dottedRename(alias: string, names: ReadonlySet<string>): Rename {
  return name => {
    const dot = name.indexOf(".");
    if (dot < 0 || name.slice(0, dot) !== alias) return undefined;
    const rest = name.slice(dot + 1);
    return names.has(rest) ? `${alias}__${rest}` : undefined;
  };
}

function loadResolved(importPath: string, baseDir: string, cache: ModuleCache): Document {
  const file = resolveModulePath(importPath, baseDir);
  if (cache.loading.has(file)) throw new CircularImportError(importPath, file);
  const cached = cache.loaded.get(file);
  if (cached) return cached;

  cache.loading.add(file);
  try {
    const doc = resolveImports(loadModuleDocument(file), { baseDir: path.dirname(file), cache });
    cache.loaded.set(file, doc);
    return doc;
  } finally {
    cache.loading.delete(file);
  }
}

/**
 * Returns an import-free copy of `doc`. A document without imports is
 * returned as is.
 */
export function resolveImports(doc: Document, options: ResolveOptions = {}): Document {
  const imports = doc.body.filter((s): s is StmtOf<"Import"> => s.type === "Import");
  if (imports.length === 0) return doc;
  if (options.baseDir === undefined) {
    throw new ModuleLoadError(imports[0].path, "the document imports modules but no base directory was given");
  }
  const cache = options.cache ?? new ModuleCache();

  const inlined: Stmt[] = [];
  const renames: Rename[] = [];

  for (const imp of imports) {
    const alias = imp.alias ?? imp.path.slice(imp.path.lastIndexOf(".") + 1);
    const exports = moduleExports(loadResolved(imp.path, options.baseDir, cache));
    if (exports.size === 0) continue;

    const names = new Set(exports.keys());
    const dotted = dottedRename(alias, names);
    // Inside the module, plain calls to a sibling export follow it too.
    const inModule: Rename = name => dotted(name) ?? (names.has(name) ? `${alias}__${name}` : undefined);
    for (const fn of exports.values()) {
      inlined.push(...renameCalls([{ ...fn, name: `${alias}__${fn.name}` }], inModule));
    }
    renames.push(dotted);
  }

  const rest = doc.body.filter(s => s.type !== "Import");
  const body = renameCalls(rest, name => {
    for (const rename of renames) {
      const to = rename(name);
      if (to !== undefined) return to;
    }
    return undefined;
  });

  const out: Document = { ...doc, body: [...inlined, ...body] };
  if (doc.source_map) out.source_map = shiftSourceMap(doc, inlined.length);
  return out;
}

/** Re-points source-map indices after imports are dropped and functions prepended. */
function shiftSourceMap(doc: Document, prepended: number): SourceMapping {
  const moved = new Map<number, number>();
  let next = prepended;
  doc.body.forEach((s, i) => {
    if (s.type !== "Import") moved.set(i, next++);
  });
  const out: SourceMapping = {};
  for (const [line, indices] of Object.entries(doc.source_map ?? {})) {
    const kept = indices.flatMap(i => {
      const to = moved.get(i);
      return to === undefined ? [] : [to];
    });
    if (kept.length > 0) out[line] = kept;
  }
  return out;
}
