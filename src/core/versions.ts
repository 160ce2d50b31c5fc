// src/core/versions.ts
// Core IL version table and per-node feature gating.

import type { ExprType, StmtType } from "./ast";

export const COREIL_VERSION = "coreil-1.10.5";

export const SUPPORTED_VERSIONS = [
  "coreil-0.1",
  "coreil-0.2",
  "coreil-0.3",
  "coreil-0.4",
  "coreil-0.5",
  "coreil-1.0",
  "coreil-1.1",
  "coreil-1.2",
  "coreil-1.3",
  "coreil-1.4",
  "coreil-1.5",
  "coreil-1.6",
  "coreil-1.7",
  "coreil-1.8",
  "coreil-1.9",
  "coreil-1.10",
  "coreil-1.10.5",
] as const;

export type CoreILVersion = (typeof SUPPORTED_VERSIONS)[number];

export function isSupportedVersion(version: unknown): version is CoreILVersion {
  return SUPPORTED_VERSIONS.some(v => v === version);
}

/** Numeric parts of a version id: "coreil-1.10.5" -> [1, 10, 5]. */
export function versionParts(version: string): number[] {
  return version.replace(/^coreil-/, "").split(".").map(p => parseInt(p, 10));
}

export function compareVersions(a: string, b: string): number {
  const pa = versionParts(a);
  const pb = versionParts(b);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const d = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (d !== 0) return d;
  }
  return 0;
}

/** v0.5 and every 1.x forbid the legacy helper calls. */
export function isSealedVersion(version: string): boolean {
  if (!version.startsWith("coreil-")) return false;
  const [major = 0, minor = 0] = versionParts(version);
  if (Number.isNaN(major) || Number.isNaN(minor)) return false;
  return (major === 0 && minor >= 5) || major >= 1;
}

export function versionErrorMessage(): string {
  return `version must be one of: ${SUPPORTED_VERSIONS.map(v => `'${v}'`).join(", ")}`;
}

// ─────────────────────────────────────────────────────────────────
// Feature gating
// ─────────────────────────────────────────────────────────────────

export const EXPR_SINCE: Record<ExprType | "Range", CoreILVersion> = {
  Literal: "coreil-0.1",
  Var: "coreil-0.1",
  Binary: "coreil-0.1",
  Call: "coreil-0.1",
  Array: "coreil-0.2",
  Index: "coreil-0.2",
  Length: "coreil-0.2",
  Range: "coreil-0.3",
  Map: "coreil-0.4",
  Get: "coreil-0.4",
  GetDefault: "coreil-0.5",
  Keys: "coreil-0.5",
  Tuple: "coreil-0.5",
  Record: "coreil-1.1",
  GetField: "coreil-1.1",
  Set: "coreil-1.1",
  SetHas: "coreil-1.1",
  SetSize: "coreil-1.1",
  DequeNew: "coreil-1.1",
  DequeSize: "coreil-1.1",
  HeapNew: "coreil-1.1",
  HeapSize: "coreil-1.1",
  HeapPeek: "coreil-1.1",
  StringLength: "coreil-1.1",
  Substring: "coreil-1.1",
  CharAt: "coreil-1.1",
  Join: "coreil-1.1",
  StringSplit: "coreil-1.1",
  StringTrim: "coreil-1.1",
  StringUpper: "coreil-1.1",
  StringLower: "coreil-1.1",
  StringStartsWith: "coreil-1.1",
  StringEndsWith: "coreil-1.1",
  StringContains: "coreil-1.1",
  StringReplace: "coreil-1.1",
  Math: "coreil-1.2",
  MathPow: "coreil-1.2",
  MathConst: "coreil-1.2",
  JsonParse: "coreil-1.3",
  JsonStringify: "coreil-1.3",
  RegexMatch: "coreil-1.3",
  RegexFindAll: "coreil-1.3",
  RegexReplace: "coreil-1.3",
  RegexSplit: "coreil-1.3",
  ExternalCall: "coreil-1.4",
  Slice: "coreil-1.5",
  Not: "coreil-1.5",
  MethodCall: "coreil-1.6",
  PropertyGet: "coreil-1.6",
  ToInt: "coreil-1.9",
  ToFloat: "coreil-1.9",
  ToString: "coreil-1.9",
  Ternary: "coreil-1.10",
  StringFormat: "coreil-1.10",
};

export const STMT_SINCE: Record<StmtType, CoreILVersion> = {
  Let: "coreil-0.1",
  Assign: "coreil-0.1",
  If: "coreil-0.1",
  While: "coreil-0.1",
  Print: "coreil-0.1",
  Call: "coreil-0.1",
  SetIndex: "coreil-0.2",
  FuncDef: "coreil-0.3",
  Return: "coreil-0.3",
  For: "coreil-0.3",
  ForEach: "coreil-0.3",
  Set: "coreil-0.4",
  Push: "coreil-0.5",
  SetField: "coreil-1.1",
  SetAdd: "coreil-1.1",
  SetRemove: "coreil-1.1",
  PushBack: "coreil-1.1",
  PushFront: "coreil-1.1",
  PopFront: "coreil-1.1",
  PopBack: "coreil-1.1",
  HeapPush: "coreil-1.1",
  HeapPop: "coreil-1.1",
  Break: "coreil-1.7",
  Continue: "coreil-1.7",
  TryCatch: "coreil-1.8",
  Throw: "coreil-1.8",
  Switch: "coreil-1.10",
  Import: "coreil-1.10.5",
};

/** Negative indices resolve from the end from this version on. */
export const NEGATIVE_INDEX_SINCE: CoreILVersion = "coreil-1.5";

export function supportsFeature(version: string, since: CoreILVersion): boolean {
  return compareVersions(version, since) >= 0;
}

export function exprSince(type: string): CoreILVersion | undefined {
  return Object.prototype.hasOwnProperty.call(EXPR_SINCE, type) ? lookup(EXPR_SINCE, type) : undefined;
}

export function stmtSince(type: string): CoreILVersion | undefined {
  return Object.prototype.hasOwnProperty.call(STMT_SINCE, type) ? lookup(STMT_SINCE, type) : undefined;
}

function lookup(table: Readonly<Record<string, CoreILVersion>>, key: string): CoreILVersion | undefined {
  return table[key];
}
