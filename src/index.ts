// src/index.ts
// Core IL backend - Public API
//
// Interface for CLI tools, editor integrations and test harnesses.

// ═══════════════════════════════════════════════════════════════════════════════
// DATA MODEL
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  Document,
  Expr,
  ExprOf,
  ExprType,
  Stmt,
  StmtOf,
  StmtType,
  LiteralValue,
  FloatLiteral,
  BinaryOp,
  SourceMapping,
} from "./core/ast";
export { parseDocumentJson } from "./core/eval/json";
export { COREIL_VERSION, SUPPORTED_VERSIONS, isSupportedVersion, type CoreILVersion } from "./core/versions";

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

export { validate, isValidDocument, formatValidationErrors, type ValidationError } from "./core/validate/validate";

// ═══════════════════════════════════════════════════════════════════════════════
// INTERPRETER
// ═══════════════════════════════════════════════════════════════════════════════

export { run, Interpreter, type RunOptions, type StepHook, type ExitCode, type Env } from "./core/eval/interp";
export { CoreILRuntimeError } from "./core/eval/errors";
export { formatValue } from "./core/eval/format";
export type { Val } from "./core/eval/values";

// ═══════════════════════════════════════════════════════════════════════════════
// PASSES & PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/compiler";
export * from "./core/modules";

// ═══════════════════════════════════════════════════════════════════════════════
// CODE GENERATION
// ═══════════════════════════════════════════════════════════════════════════════

export { emit, getTarget, listTargets, isTargetName, TARGET_NAMES, type TargetName, type TargetInfo } from "./core/codegen/registry";
export type { EmitResult, RuntimeFile } from "./core/codegen/emitter";
export { UnsupportedOperationError, UnknownTargetError, type UnsupportedCategory } from "./core/codegen/errors";
export { writeArtifact, existingArtifact } from "./core/codegen/artifact";

// ═══════════════════════════════════════════════════════════════════════════════
// TOOLCHAIN
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/toolchain";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION, DIAGNOSTICS, LINT
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export * from "./outcome";
export { lint, LintRunner, createDefaultRunner, DEFAULT_PASSES, type Pass, type PassResult, type LintRules } from "./lint";

// ═══════════════════════════════════════════════════════════════════════════════
// DEBUGGER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./server";
