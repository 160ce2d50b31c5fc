import { collectBoundNames, type Document } from "../../core/ast";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { walkStatements } from "../analysis/walk";
import type { Pass, PassResult } from "../types";

// Any name a function binds is local to it, so a function that assigns a
// global's name never touches the global.
export const variableShadowingPass: Pass = {
  id: "variable-shadowing",
  name: "Variable Shadowing",
  run(doc: Document): PassResult {
    const diagnostics: Diagnostic[] = [];
    const globals = new Set(collectBoundNames(doc.body));

    walkStatements(doc.body, (stmt, path) => {
      if (stmt.type !== "FuncDef") return;
      const locals = new Set([...stmt.params, ...collectBoundNames(stmt.body)]);
      for (const name of locals) {
        if (globals.has(name)) {
          diagnostics.push(makeDiagnostic("W0202", { name, function: stmt.name }, path));
        }
      }
    });
    return { diagnostics };
  },
};
