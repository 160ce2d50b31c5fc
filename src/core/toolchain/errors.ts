// src/core/toolchain/errors.ts

export type ToolchainErrorCategory = "compile" | "runtime" | "timeout" | "missing-tool";

/** A compile or run step of generated code that did not complete normally. */
export class ToolchainError extends Error {
  constructor(
    readonly target: string,
    readonly category: ToolchainErrorCategory,
    message: string,
    /** The tool's own error output */
    readonly stderr = "",
  ) {
    super(message);
    this.name = "ToolchainError";
  }
}
