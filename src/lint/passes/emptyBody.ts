import type { Document } from "../../core/ast";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { walkBlocks, type BlockKind } from "../analysis/walk";
import type { Pass, PassResult } from "../types";

// Block kind -> construct named in the message. Other kinds may be empty.
const CHECKED: Partial<Record<BlockKind, string>> = {
  function: "function",
  while: "while loop",
  for: "for loop",
  foreach: "for-each loop",
  then: "if",
  try: "try",
};

export const emptyBodyPass: Pass = {
  id: "empty-body",
  name: "Empty Body",
  run(doc: Document): PassResult {
    const diagnostics: Diagnostic[] = [];
    walkBlocks(doc.body, block => {
      const construct = CHECKED[block.kind];
      if (construct === undefined || block.stmts.length > 0) return;
      diagnostics.push(makeDiagnostic("W0203", { construct }, block.path));
    });
    return { diagnostics };
  },
};
