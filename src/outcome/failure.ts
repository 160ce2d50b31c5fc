// src/outcome/failure.ts

import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "validation-failed"
  | "runtime-error"
  | "unsupported-operation"
  | "unknown-target"
  | "toolchain-error"
  | "module-error"
  | "config-error"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  diagnostics: Diagnostic[];
  cause?: Failure;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>,
): Failure {
  const f: Failure = { reason, message, diagnostics: opts?.diagnostics ?? [] };
  if (opts?.cause) f.cause = opts.cause;
  return f;
}

export function wrapFailure(inner: Failure, message: string): Failure {
  return { ...inner, message, cause: inner };
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}
