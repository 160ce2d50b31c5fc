// src/core/codegen/registry.ts
// Backend registry: name -> emitter factory.

import type { Document } from "../ast";
import type { BaseEmitter, EmitResult } from "./emitter";
import { UnknownTargetError } from "./errors";
import { AssemblyScriptEmitter } from "./targets/assemblyscript";
import { CppEmitter } from "./targets/cpp";
import { GoEmitter } from "./targets/go";
import { JavaScriptEmitter } from "./targets/javascript";
import { PythonEmitter } from "./targets/python";
import { RustEmitter } from "./targets/rust";

export const TARGET_NAMES = ["javascript", "cpp", "rust", "go", "assemblyscript", "python"] as const;
export type TargetName = (typeof TARGET_NAMES)[number];

export interface TargetInfo {
  name: TargetName;
  description: string;
  /** Main generated file, relative to the artifact directory */
  fileName: string;
  create(): BaseEmitter;
}

const TARGETS: Record<TargetName, TargetInfo> = {
  javascript: {
    name: "javascript",
    description: "self-contained Node.js script",
    fileName: "main.js",
    create: () => new JavaScriptEmitter(),
  },
  cpp: {
    name: "cpp",
    description: "C++17 with a header-only runtime",
    fileName: "main.cpp",
    create: () => new CppEmitter(),
  },
  rust: {
    name: "rust",
    description: "Cargo project",
    fileName: "src/main.rs",
    create: () => new RustEmitter(),
  },
  go: {
    name: "go",
    description: "Go module in package main",
    fileName: "main.go",
    create: () => new GoEmitter(),
  },
  assemblyscript: {
    name: "assemblyscript",
    description: "AssemblyScript compiled to WebAssembly",
    fileName: "main.ts",
    create: () => new AssemblyScriptEmitter(),
  },
  python: {
    name: "python",
    description: "Python 3 script with a runtime module",
    fileName: "main.py",
    create: () => new PythonEmitter(),
  },
};

export function isTargetName(name: unknown): name is TargetName {
  return typeof name === "string" && TARGET_NAMES.some(t => t === name);
}

export function getTarget(name: string): TargetInfo {
  if (!isTargetName(name)) throw new UnknownTargetError(name, TARGET_NAMES);
  return TARGETS[name];
}

export function listTargets(): TargetInfo[] {
  return TARGET_NAMES.map(name => TARGETS[name]);
}

/** Emits a lowered document for one backend. */
export function emit(target: string, doc: Document): EmitResult {
  return getTarget(target).create().emit(doc);
}
