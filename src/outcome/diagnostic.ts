// src/outcome/diagnostic.ts

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** JSON path of the node, e.g. `$.body[2].then[0]` */
  path?: string;
  data?: Record<string, string | number>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

/** `path: severity [code] message`; the path prefix is omitted when absent. */
export function formatDiagnostic(d: Diagnostic): string {
  const head = `${d.severity} [${d.code}] ${d.message}`;
  return d.path ? `${d.path}: ${head}` : head;
}
