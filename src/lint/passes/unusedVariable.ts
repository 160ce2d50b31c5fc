import type { Document } from "../../core/ast";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { readNames, walkStatements } from "../analysis/walk";
import type { Pass, PassResult } from "../types";

/** Let/Assign targets that no expression in the document ever reads. */
export const unusedVariablePass: Pass = {
  id: "unused-variable",
  name: "Unused Variable",
  run(doc: Document): PassResult {
    const diagnostics: Diagnostic[] = [];
    const read = readNames(doc.body);
    const reported = new Set<string>();

    walkStatements(doc.body, (stmt, path) => {
      if (stmt.type !== "Let" && stmt.type !== "Assign") return;
      if (read.has(stmt.name) || reported.has(stmt.name)) return;
      reported.add(stmt.name);
      diagnostics.push(makeDiagnostic("W0201", { name: stmt.name }, path));
    });
    return { diagnostics };
  },
};
