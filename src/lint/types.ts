// src/lint/types.ts

import type { Document } from "../core/ast";
import type { LintLevel } from "../core/config/config";
import type { Diagnostic } from "../outcome/diagnostic";

export interface PassResult {
  diagnostics: Diagnostic[];
}

export interface Pass {
  /** Rule id used in `lint.rules` configuration, e.g. `unused-variable` */
  id: string;
  name: string;
  run(doc: Document): PassResult;
}

export type LintRules = Record<string, LintLevel>;
