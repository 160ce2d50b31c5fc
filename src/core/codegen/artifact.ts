// src/core/codegen/artifact.ts
// Emitted artifacts on disk: the main file plus its runtime files.

import * as fs from "fs";
import * as path from "path";
import type { EmitResult } from "./emitter";
import { getTarget } from "./registry";

/** Writes the artifact under `outDir` and returns the paths written. */
export function writeArtifact(outDir: string, result: EmitResult): string[] {
  const files = [{ name: result.fileName, content: result.code }, ...result.runtimeFiles];
  return files.map(file => {
    const dest = path.join(outDir, file.name);
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.writeFileSync(dest, file.content, "utf8");
    return dest;
  });
}

/** Main file of a previously written artifact for `target`, if there is one. */
export function existingArtifact(outDir: string, target: string): string | undefined {
  const file = path.join(outDir, getTarget(target).fileName);
  return fs.existsSync(file) ? file : undefined;
}
