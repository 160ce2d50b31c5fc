import type { Document } from "../../core/ast";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { walkBlocks } from "../analysis/walk";
import type { Pass, PassResult } from "../types";

const TERMINATORS = new Set(["Return", "Break", "Continue", "Throw"]);

export const unreachableCodePass: Pass = {
  id: "unreachable-code",
  name: "Unreachable Code",
  run(doc: Document): PassResult {
    const diagnostics: Diagnostic[] = [];
    walkBlocks(doc.body, block => {
      const at = block.stmts.findIndex(s => TERMINATORS.has(s.type));
      if (at < 0 || at === block.stmts.length - 1) return;
      diagnostics.push(makeDiagnostic("W0200", { terminator: block.stmts[at].type }, `${block.path}[${at + 1}]`));
    });
    return { diagnostics };
  },
};
