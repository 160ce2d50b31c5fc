// src/core/traverse.ts
// Structural rebuilding of expression and statement trees.
//
// `mapExprChildren` / `mapStmt` copy one node with its direct children
// replaced; every pass that rewrites a document (lowering, optimizer, module
// renaming) is a bottom-up fold over these two.

import type { Expr, ExprOf, RangeExpr, Stmt, StmtOf } from "./ast";
import { isRange } from "./ast";

export type ExprFn = (e: Expr) => Expr;
export type BlockFn = (body: Stmt[]) => Stmt[];

/** Copy of `e` with each direct child expression replaced by `f(child)`. */
export function mapExprChildren(e: Expr, f: ExprFn): Expr {
  switch (e.type) {
    case "Literal":
    case "Var":
    case "DequeNew":
    case "HeapNew":
    case "MathConst":
      return { ...e };
    case "Binary":
      return { ...e, left: f(e.left), right: f(e.right) };
    case "Not":
      return { ...e, arg: f(e.arg) };
    case "Call":
    case "ExternalCall":
      return { ...e, args: e.args.map(f) };
    case "MethodCall":
      return { ...e, object: f(e.object), args: e.args.map(f) };
    case "PropertyGet":
      return { ...e, object: f(e.object) };
    case "Ternary":
      return { ...e, test: f(e.test), consequent: f(e.consequent), alternate: f(e.alternate) };
    case "StringFormat":
      return { ...e, parts: e.parts.map(f) };
    case "Array":
    case "Tuple":
    case "Set":
      return { ...e, items: e.items.map(f) };
    case "Index":
    case "CharAt":
      return { ...e, base: f(e.base), index: f(e.index) };
    case "Slice":
    case "Substring":
      return { ...e, base: f(e.base), start: f(e.start), end: f(e.end) };
    case "Length":
    case "Keys":
    case "GetField":
    case "SetSize":
    case "DequeSize":
    case "HeapSize":
    case "HeapPeek":
    case "StringLength":
    case "StringTrim":
    case "StringUpper":
    case "StringLower":
      return { ...e, base: f(e.base) };
    case "Map":
      return { ...e, items: e.items.map(({ key, value }) => ({ key: f(key), value: f(value) })) };
    case "Get":
      return { ...e, base: f(e.base), key: f(e.key) };
    case "GetDefault":
      return { ...e, base: f(e.base), key: f(e.key), default: f(e.default) };
    case "Record":
      return { ...e, fields: e.fields.map(({ name, value }) => ({ name, value: f(value) })) };
    case "SetHas":
      return { ...e, base: f(e.base), value: f(e.value) };
    case "Join":
      return { ...e, sep: f(e.sep), items: f(e.items) };
    case "StringSplit":
      return { ...e, base: f(e.base), delimiter: f(e.delimiter) };
    case "StringStartsWith":
      return { ...e, base: f(e.base), prefix: f(e.prefix) };
    case "StringEndsWith":
      return { ...e, base: f(e.base), suffix: f(e.suffix) };
    case "StringContains":
      return { ...e, base: f(e.base), substring: f(e.substring) };
    case "StringReplace":
      return { ...e, base: f(e.base), old: f(e.old), new: f(e.new) };
    case "Math":
      return { ...e, arg: f(e.arg) };
    case "MathPow":
      return { ...e, base: f(e.base), exponent: f(e.exponent) };
    case "JsonParse":
      return { ...e, source: f(e.source) };
    case "JsonStringify": {
      const out: ExprOf<"JsonStringify"> = { ...e, value: f(e.value) };
      if (e.pretty) out.pretty = f(e.pretty);
      return out;
    }
    case "RegexMatch":
    case "RegexFindAll": {
      const out = { ...e, string: f(e.string), pattern: f(e.pattern) };
      if (e.flags) out.flags = f(e.flags);
      return out;
    }
    case "RegexReplace": {
      const out: ExprOf<"RegexReplace"> = {
        ...e,
        string: f(e.string),
        pattern: f(e.pattern),
        replacement: f(e.replacement),
      };
      if (e.flags) out.flags = f(e.flags);
      return out;
    }
    case "RegexSplit": {
      const out: ExprOf<"RegexSplit"> = { ...e, string: f(e.string), pattern: f(e.pattern) };
      if (e.flags) out.flags = f(e.flags);
      if (e.maxsplit) out.maxsplit = f(e.maxsplit);
      return out;
    }
    case "ToInt":
    case "ToFloat":
    case "ToString":
      return { ...e, value: f(e.value) };
  }
}

/** Direct child expressions of `e`, in field order. */
export function exprChildren(e: Expr): Expr[] {
  const out: Expr[] = [];
  mapExprChildren(e, child => {
    out.push(child);
    return child;
  });
  return out;
}

function mapIter(iter: Expr | RangeExpr, f: ExprFn): Expr | RangeExpr {
  return isRange(iter) ? { ...iter, from: f(iter.from), to: f(iter.to) } : f(iter);
}

/**
 * Copy of `s` with its direct expressions mapped by `f` and its child blocks
 * by `g`. Absent optional fields stay absent.
 */
export function mapStmt(s: Stmt, f: ExprFn, g: BlockFn): Stmt {
  switch (s.type) {
    case "Let":
    case "Assign":
      return { ...s, value: f(s.value) };
    case "If": {
      const out: StmtOf<"If"> = { ...s, test: f(s.test), then: g(s.then) };
      if (s.else) out.else = g(s.else);
      return out;
    }
    case "While":
      return { ...s, test: f(s.test), body: g(s.body) };
    case "For":
      return { ...s, iter: mapIter(s.iter, f), body: g(s.body) };
    case "ForEach":
      return { ...s, iter: f(s.iter), body: g(s.body) };
    case "Switch": {
      const out: StmtOf<"Switch"> = {
        ...s,
        test: f(s.test),
        cases: s.cases.map(c => ({ value: f(c.value), body: g(c.body) })),
      };
      if (s.default) out.default = g(s.default);
      return out;
    }
    case "Break":
    case "Continue":
    case "Import":
      return { ...s };
    case "Print":
    case "Call":
      return { ...s, args: s.args.map(f) };
    case "FuncDef":
      return { ...s, params: [...s.params], body: g(s.body) };
    case "Return":
      return s.value === undefined ? { ...s } : { ...s, value: f(s.value) };
    case "SetIndex":
      return { ...s, base: f(s.base), index: f(s.index), value: f(s.value) };
    case "Set":
      return { ...s, base: f(s.base), key: f(s.key), value: f(s.value) };
    case "Push":
    case "SetField":
    case "SetAdd":
    case "SetRemove":
    case "PushBack":
    case "PushFront":
      return { ...s, base: f(s.base), value: f(s.value) };
    case "PopFront":
    case "PopBack":
    case "HeapPop":
      return { ...s, base: f(s.base) };
    case "HeapPush":
      return { ...s, base: f(s.base), priority: f(s.priority), value: f(s.value) };
    case "TryCatch": {
      const out: StmtOf<"TryCatch"> = { ...s, body: g(s.body), catch_body: g(s.catch_body) };
      if (s.finally_body) out.finally_body = g(s.finally_body);
      return out;
    }
    case "Throw":
      return { ...s, message: f(s.message) };
  }
}

/** Direct expressions of a statement (the Range bounds of a For included). */
export function stmtExprs(s: Stmt): Expr[] {
  const out: Expr[] = [];
  mapStmt(
    s,
    e => {
      out.push(e);
      return e;
    },
    body => body,
  );
  return out;
}

/** Pre-order visit of `e` and every nested expression. */
export function walkExpr(e: Expr, visit: (e: Expr) => void): void {
  visit(e);
  for (const child of exprChildren(e)) walkExpr(child, visit);
}

/** Pre-order visit of every statement in `body`, descending into child blocks. */
export function walkStmts(body: readonly Stmt[], visit: (s: Stmt) => void): void {
  for (const s of body) {
    visit(s);
    mapStmt(s, e => e, block => {
      walkStmts(block, visit);
      return block;
    });
  }
}
