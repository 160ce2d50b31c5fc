// src/lint/runner.ts

import type { Document } from "../core/ast";
import type { LintLevel } from "../core/config/config";
import type { Diagnostic } from "../outcome/diagnostic";
import { emptyBodyPass } from "./passes/emptyBody";
import { unreachableCodePass } from "./passes/unreachableCode";
import { unusedVariablePass } from "./passes/unusedVariable";
import { variableShadowingPass } from "./passes/variableShadowing";
import type { LintRules, Pass, PassResult } from "./types";

export class LintRunner {
  private passes: Map<string, Pass> = new Map();

  constructor(private readonly rules: LintRules = {}) {}

  register(pass: Pass): void {
    if (this.passes.has(pass.id)) throw new Error(`Lint pass already registered: ${pass.id}`);
    this.passes.set(pass.id, pass);
  }

  registered(): string[] {
    return Array.from(this.passes.keys());
  }

  run(doc: Document): { diagnostics: Diagnostic[]; passResults: Map<string, PassResult> } {
    const diagnostics: Diagnostic[] = [];
    const passResults = new Map<string, PassResult>();

    for (const pass of this.passes.values()) {
      const level = this.rules[pass.id];
      if (level === "off") continue;
      const result = pass.run(doc);
      passResults.set(pass.id, result);
      diagnostics.push(...applySeverityOverride(result.diagnostics, level));
    }

    return { diagnostics, passResults };
  }

  hasErrors(diags: Diagnostic[]): boolean {
    return diags.some(d => d.severity === "error");
  }
}

function applySeverityOverride(diagnostics: Diagnostic[], override: LintLevel | undefined): Diagnostic[] {
  if (override === undefined || override === "off") {
    return diagnostics;
  }
  return diagnostics.map(d => ({ ...d, severity: override }));
}

export const DEFAULT_PASSES: readonly Pass[] = [
  unreachableCodePass,
  unusedVariablePass,
  variableShadowingPass,
  emptyBodyPass,
];

export function createDefaultRunner(rules?: LintRules): LintRunner {
  const runner = new LintRunner(rules);
  for (const pass of DEFAULT_PASSES) runner.register(pass);
  return runner;
}

/** Runs every default pass over `doc`. */
export function lint(doc: Document, rules?: LintRules): Diagnostic[] {
  return createDefaultRunner(rules).run(doc).diagnostics;
}
