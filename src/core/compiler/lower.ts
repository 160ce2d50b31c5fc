// src/core/compiler/lower.ts
// Lowering: one canonical tree shape for every backend.
//
// For/ForEach and Range stay native loop nodes (a While rewrite would make
// Continue skip the increment). What goes away:
//   - StringFormat with no parts      -> Literal ""
//   - legacy get_or_default(m, k, d)  -> GetDefault
//   - legacy keys(m)                  -> Keys
//   - legacy append(a, v) statement   -> Push
// A legacy call is only rewritten when no user function of that name exists.

import type { Document, Expr, Stmt } from "../ast";
import { cloneDocument } from "../ast";
import { mapExprChildren, mapStmt } from "../traverse";

export function lower(doc: Document): Document {
  const out = cloneDocument(doc);
  const userFunctions = new Set(out.body.flatMap(s => (s.type === "FuncDef" ? [s.name] : [])));
  const isHelper = (name: string): boolean => !userFunctions.has(name);

  const lowerExpr = (e: Expr): Expr => {
    const x = mapExprChildren(e, lowerExpr);
    if (x.type === "StringFormat" && x.parts.length === 0) return { type: "Literal", value: "" };
    if (x.type === "Call" && isHelper(x.name)) {
      const [a, b, c] = x.args;
      if (x.name === "get_or_default" && x.args.length === 3) return { type: "GetDefault", base: a, key: b, default: c };
      if (x.name === "keys" && x.args.length === 1) return { type: "Keys", base: a };
    }
    return x;
  };

  const lowerStmt = (s: Stmt): Stmt => {
    const x = mapStmt(s, lowerExpr, lowerBlock);
    if (x.type === "Call" && x.name === "append" && x.args.length === 2 && isHelper("append")) {
      return { type: "Push", base: x.args[0], value: x.args[1] };
    }
    return x;
  };

  const lowerBlock = (body: Stmt[]): Stmt[] => body.map(lowerStmt);

  out.body = lowerBlock(out.body);
  return out;
}
