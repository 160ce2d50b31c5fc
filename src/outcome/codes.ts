// src/outcome/codes.ts

import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Validation", template: "{message}" },

  E0200: { code: "E0200", severity: "error", category: "Runtime", template: "runtime error: {message}" },

  W0200: { code: "W0200", severity: "warning", category: "Lint", template: "Unreachable code after {terminator}" },
  W0201: { code: "W0201", severity: "warning", category: "Lint", template: "Variable '{name}' is assigned but never read" },
  W0202: {
    code: "W0202",
    severity: "warning",
    category: "Lint",
    template: "Variable '{name}' in function '{function}' shadows a global",
  },
  W0203: { code: "W0203", severity: "warning", category: "Lint", template: "Empty {construct} body" },

  E0300: {
    code: "E0300",
    severity: "error",
    category: "Emission",
    template: "{target} backend does not support {node} ({category})",
  },
  E0301: { code: "E0301", severity: "error", category: "Emission", template: "Unknown target: {target}" },

  E0400: { code: "E0400", severity: "error", category: "Toolchain", template: "{target} {stage} failed: {detail}" },
  E0401: { code: "E0401", severity: "error", category: "Toolchain", template: "{target}: {detail}" },
  E0402: { code: "E0402", severity: "error", category: "Toolchain", template: "{target}: {detail}" },

  E0500: { code: "E0500", severity: "error", category: "Module", template: "Module not found: {module}" },
  E0501: { code: "E0501", severity: "error", category: "Module", template: "Circular import: {module}" },
  E0502: { code: "E0502", severity: "error", category: "Module", template: "Cannot load module {file}: {reason}" },

  E0600: { code: "E0600", severity: "error", category: "Config", template: "Invalid configuration: {message}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(code: DiagnosticCode, params?: Record<string, string | number>, path?: string): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const diag: Diagnostic = { code: def.code, severity: def.severity, message };
  if (path !== undefined) diag.path = path;
  if (params) diag.data = params;
  return diag;
}
