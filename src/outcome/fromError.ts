// src/outcome/fromError.ts
// Thrown errors -> Failure with coded diagnostics.

import { UnknownTargetError, UnsupportedOperationError } from "../core/codegen/errors";
import { ValidationFailedError } from "../core/compiler/pipeline";
import { ConfigError } from "../core/config/config";
import { CoreILRuntimeError, errorMessage } from "../core/eval/errors";
import { CircularImportError, ModuleLoadError, ModuleNotFoundError } from "../core/modules/errors";
import { ToolchainError } from "../core/toolchain/errors";
import { makeDiagnostic } from "./codes";
import { failure, type Failure } from "./failure";
import { done, fail, type Outcome } from "./outcome";

export function failureFromError(e: unknown): Failure {
  if (e instanceof ValidationFailedError) {
    return failure("validation-failed", e.message, {
      diagnostics: e.errors.map(v => makeDiagnostic("E0100", { message: v.message }, v.path)),
    });
  }
  if (e instanceof UnsupportedOperationError) {
    return failure("unsupported-operation", e.message, {
      diagnostics: [makeDiagnostic("E0300", { target: e.target, node: e.nodeType, category: e.category })],
    });
  }
  if (e instanceof UnknownTargetError) {
    return failure("unknown-target", e.message, { diagnostics: [makeDiagnostic("E0301", { target: e.target })] });
  }
  if (e instanceof ToolchainError) {
    const detail = e.stderr.trim() === "" ? e.message : `${e.message}\n${e.stderr.trim()}`;
    const diag =
      e.category === "missing-tool"
        ? makeDiagnostic("E0401", { target: e.target, detail })
        : e.category === "timeout"
          ? makeDiagnostic("E0402", { target: e.target, detail })
          : makeDiagnostic("E0400", { target: e.target, stage: e.category, detail });
    return failure("toolchain-error", e.message, { diagnostics: [diag] });
  }
  if (e instanceof ModuleNotFoundError) {
    return failure("module-error", e.message, { diagnostics: [makeDiagnostic("E0500", { module: e.importPath })] });
  }
  if (e instanceof CircularImportError) {
    return failure("module-error", e.message, { diagnostics: [makeDiagnostic("E0501", { module: e.importPath })] });
  }
  if (e instanceof ModuleLoadError) {
    return failure("module-error", e.message, {
      diagnostics: [makeDiagnostic("E0502", { file: e.file, reason: e.reason })],
    });
  }
  if (e instanceof ConfigError) {
    return failure("config-error", e.message, { diagnostics: [makeDiagnostic("E0600", { message: e.message })] });
  }
  if (e instanceof CoreILRuntimeError) {
    return failure("runtime-error", e.message, { diagnostics: [makeDiagnostic("E0200", { message: e.message })] });
  }
  return failure("internal-error", errorMessage(e));
}

/** Runs `fn`, turning a thrown error into a Fail outcome. */
export function attempt<A>(fn: () => A): Outcome<A> {
  const started = Date.now();
  try {
    const value = fn();
    return done(value, { durationMs: Date.now() - started });
  } catch (e) {
    return fail(failureFromError(e), { durationMs: Date.now() - started });
  }
}
