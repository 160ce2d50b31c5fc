// src/lint/analysis/walk.ts
// Statement walking with JSON paths and block kinds.

import type { Stmt } from "../../core/ast";
import { stmtExprs, walkExpr } from "../../core/traverse";

export type BlockKind = "body" | "function" | "while" | "for" | "foreach" | "then" | "else" | "case" | "default" | "try" | "catch" | "finally";

export interface Block {
  kind: BlockKind;
  /** JSON path of the statement list, e.g. `$.body[1].then` */
  path: string;
  stmts: Stmt[];
  /** Name of the enclosing function, if any */
  fn?: string;
}

/** Named child blocks of `stmt`, which sits at `path`. */
export function blocksOf(stmt: Stmt, path: string, fn?: string): Block[] {
  const block = (kind: BlockKind, key: string, stmts: Stmt[], inFn = fn): Block =>
    inFn === undefined ? { kind, path: `${path}.${key}`, stmts } : { kind, path: `${path}.${key}`, stmts, fn: inFn };

  switch (stmt.type) {
    case "FuncDef":
      return [block("function", "body", stmt.body, stmt.name)];
    case "While":
      return [block("while", "body", stmt.body)];
    case "For":
      return [block("for", "body", stmt.body)];
    case "ForEach":
      return [block("foreach", "body", stmt.body)];
    case "If":
      return stmt.else ? [block("then", "then", stmt.then), block("else", "else", stmt.else)] : [block("then", "then", stmt.then)];
    case "Switch":
      return [
        ...stmt.cases.map((c, i) => block("case", `cases[${i}].body`, c.body)),
        ...(stmt.default ? [block("default", "default", stmt.default)] : []),
      ];
    case "TryCatch":
      return [
        block("try", "body", stmt.body),
        block("catch", "catch_body", stmt.catch_body),
        ...(stmt.finally_body ? [block("finally", "finally_body", stmt.finally_body)] : []),
      ];
    default:
      return [];
  }
}

/** Visits every block, the top-level body first, in source order. */
export function walkBlocks(body: Stmt[], visit: (block: Block) => void): void {
  const go = (block: Block): void => {
    visit(block);
    block.stmts.forEach((stmt, i) => {
      for (const child of blocksOf(stmt, `${block.path}[${i}]`, block.fn)) go(child);
    });
  };
  go({ kind: "body", path: "$.body", stmts: body });
}

/** Visits every statement with its path and enclosing function. */
export function walkStatements(body: Stmt[], visit: (stmt: Stmt, path: string, fn: string | undefined) => void): void {
  walkBlocks(body, block => {
    block.stmts.forEach((stmt, i) => visit(stmt, `${block.path}[${i}]`, block.fn));
  });
}

/** Every variable name read anywhere in `body`. */
export function readNames(body: Stmt[]): Set<string> {
  const names = new Set<string>();
  walkStatements(body, stmt => {
    for (const e of stmtExprs(stmt)) {
      walkExpr(e, x => {
        if (x.type === "Var") names.add(x.name);
      });
    }
  });
  return names;
}
