// src/core/codegen/errors.ts

/**
 * - tier2: ExternalCall / MethodCall / PropertyGet on a target without a host
 * - construct: a node the target language cannot express
 * - regex: regex nodes on a target without a regex engine
 */
export type UnsupportedCategory = "tier2" | "construct" | "regex";

export class UnsupportedOperationError extends Error {
  constructor(
    readonly target: string,
    readonly nodeType: string,
    readonly category: UnsupportedCategory,
  ) {
    super(`${target} backend does not support ${nodeType} (${category})`);
    this.name = "UnsupportedOperationError";
  }
}

export class UnknownTargetError extends Error {
  constructor(
    readonly target: string,
    readonly available: readonly string[],
  ) {
    super(`unknown target '${target}' (available: ${available.join(", ")})`);
    this.name = "UnknownTargetError";
  }
}
