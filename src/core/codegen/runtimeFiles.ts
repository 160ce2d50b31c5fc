// src/core/codegen/runtimeFiles.ts
// Runtime libraries shipped beside generated code, read from runtime/<target>/.

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { RuntimeFile } from "./emitter";

const RUNTIME_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../runtime");

const cache = new Map<string, string>();

export function runtimeDir(target: string): string {
  return path.join(RUNTIME_ROOT, target);
}

export function readRuntimeFile(target: string, name: string): string {
  const file = path.join(runtimeDir(target), name);
  let content = cache.get(file);
  if (content === undefined) {
    content = fs.readFileSync(file, "utf8");
    cache.set(file, content);
  }
  return content;
}

export function runtimeFilesFor(target: string, names: readonly string[]): RuntimeFile[] {
  return names.map(name => ({ name, content: readRuntimeFile(target, name) }));
}
