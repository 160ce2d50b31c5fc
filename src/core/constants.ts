// src/core/constants.ts
// Shared limits and operator tables.

import type { BinaryOp, MathConstName, MathOp } from "./ast";

/** Function-call nesting limit shared by the interpreter and generated runtimes. */
export const MAX_CALL_DEPTH = 1000;

export const BINARY_OPS: readonly BinaryOp[] = [
  "+", "-", "*", "/", "//", "%",
  "==", "!=", "<", "<=", ">", ">=",
  "and", "or",
];

export const ARITHMETIC_OPS: readonly BinaryOp[] = ["+", "-", "*", "/", "//", "%"];

export const COMPARISON_OPS: readonly BinaryOp[] = ["==", "!=", "<", "<=", ">", ">="];

export const MATH_OPS: readonly MathOp[] = ["sin", "cos", "tan", "sqrt", "floor", "ceil", "abs", "log", "exp"];

export const MATH_CONSTS: readonly MathConstName[] = ["pi", "e"];

/** Helper calls accepted before the sealed versions. */
export const LEGACY_HELPER_CALLS = ["get_or_default", "keys", "append", "entries"] as const;

export const REGEX_FLAGS = ["i", "m", "s"] as const;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export function isBinaryOp(op: unknown): op is BinaryOp {
  return BINARY_OPS.some(o => o === op);
}

export function isMathOp(op: unknown): op is MathOp {
  return MATH_OPS.some(o => o === op);
}

export function isMathConst(name: unknown): name is MathConstName {
  return MATH_CONSTS.some(c => c === name);
}

export function isLegacyHelper(name: string): boolean {
  return LEGACY_HELPER_CALLS.some(h => h === name);
}
