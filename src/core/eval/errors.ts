// src/core/eval/errors.ts
// Runtime faults raised while evaluating a document.

/**
 * A fault inside a running program. Faults and user `Throw`s share one
 * representation once they reach the completion layer: the message string.
 */
export class CoreILRuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CoreILRuntimeError";
  }
}

/** Message of any error thrown by host code while a program runs. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
