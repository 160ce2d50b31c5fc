// src/core/compiler/optimize.ts
// Semantics-preserving rewrites: same output, same errors, never required
// for correctness.
//
//   1. constant folding (Binary, Not, Ternary, StringFormat over literals)
//   2. dead code after Return / Break / Continue / Throw
//   3. If with a literal test
//   4. identities (x+0, x-0, x*1, x and true, x or false)

import type { Document, Expr, ExprOf, LiteralValue, Stmt } from "../ast";
import { cloneDocument, collectBoundNames, isLiteral, numericLiteral } from "../ast";
import { ARITHMETIC_OPS, COMPARISON_OPS } from "../constants";
import { CoreILRuntimeError } from "../eval/errors";
import { formatValue } from "../eval/format";
import { binaryOp } from "../eval/ops";
import { fromLiteral, truthy, type Val } from "../eval/values";
import { mapExprChildren, mapStmt } from "../traverse";

export interface OptimizeStats {
  folded: number;
  deadStatements: number;
  branchesResolved: number;
  identities: number;
}

const TERMINATORS = new Set<Stmt["type"]>(["Return", "Break", "Continue", "Throw"]);

/** Value back to a literal, when a literal reads back as the same value. */
function toLiteral(v: Val): LiteralValue | undefined {
  switch (v.tag) {
    case "Null":
      return null;
    case "Bool":
      return v.b;
    case "Str":
      return v.s;
    case "Int":
      return v.n >= BigInt(Number.MIN_SAFE_INTEGER) && v.n <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(v.n) : v.n;
    case "Float":
      if (!Number.isFinite(v.n) || Object.is(v.n, -0)) return undefined;
      return Number.isInteger(v.n) ? { float: v.n } : v.n;
    default:
      return undefined;
  }
}

function literalOf(v: Val): Expr | undefined {
  const value = toLiteral(v);
  return value === undefined ? undefined : { type: "Literal", value };
}

function isIntLiteral(e: Expr, n?: number): boolean {
  if (!isLiteral(e)) return false;
  const num = numericLiteral(e.value);
  return num?.kind === "int" && (n === undefined || num.n === BigInt(n));
}

const INT_RESULT = new Set<Expr["type"]>(["ToInt", "Length", "StringLength", "SetSize", "DequeSize", "HeapSize"]);
const NUMERIC_RESULT = new Set<Expr["type"]>(["ToFloat", "MathPow", "MathConst", ...INT_RESULT]);
const BOOL_RESULT = new Set<Expr["type"]>([
  "Not",
  "SetHas",
  "StringStartsWith",
  "StringEndsWith",
  "StringContains",
  "RegexMatch",
]);

function knownInt(e: Expr): boolean {
  if (isIntLiteral(e)) return true;
  if (INT_RESULT.has(e.type)) return true;
  return e.type === "Binary" && ["+", "-", "*", "//", "%"].includes(e.op) && knownInt(e.left) && knownInt(e.right);
}

function knownNumeric(e: Expr): boolean {
  if (isLiteral(e)) return numericLiteral(e.value) !== undefined;
  if (NUMERIC_RESULT.has(e.type)) return true;
  if (e.type === "Math") return true;
  return e.type === "Binary" && ARITHMETIC_OPS.includes(e.op) && knownNumeric(e.left) && knownNumeric(e.right);
}

function knownBool(e: Expr): boolean {
  if (isLiteral(e)) return typeof e.value === "boolean";
  if (BOOL_RESULT.has(e.type)) return true;
  if (e.type !== "Binary") return false;
  if (COMPARISON_OPS.includes(e.op)) return true;
  return (e.op === "and" || e.op === "or") && knownBool(e.left) && knownBool(e.right);
}

class Optimizer {
  readonly stats: OptimizeStats = { folded: 0, deadStatements: 0, branchesResolved: 0, identities: 0 };

  expr = (e: Expr): Expr => {
    const x = mapExprChildren(e, this.expr);
    switch (x.type) {
      case "Binary":
        return this.binary(x);
      case "Not":
        if (!isLiteral(x.arg)) return x;
        this.stats.folded++;
        return { type: "Literal", value: !truthy(fromLiteral(x.arg.value)) };
      case "Ternary":
        if (!isLiteral(x.test)) return x;
        this.stats.folded++;
        return truthy(fromLiteral(x.test.value)) ? x.consequent : x.alternate;
      case "StringFormat": {
        const parts: LiteralValue[] = [];
        for (const p of x.parts) {
          if (!isLiteral(p)) return x;
          parts.push(p.value);
        }
        this.stats.folded++;
        return { type: "Literal", value: parts.map(v => formatValue(fromLiteral(v))).join("") };
      }
      default:
        return x;
    }
  };

  private binary(x: ExprOf<"Binary">): Expr {
    const { op, left, right } = x;
    if (isLiteral(left)) {
      const l = fromLiteral(left.value);
      if (op === "and" || op === "or") {
        this.stats.folded++;
        return truthy(l) === (op === "and") ? right : left;
      }
      if (isLiteral(right)) {
        const folded = this.fold(x, l, fromLiteral(right.value));
        if (folded) return folded;
      }
    }
    const identity = this.identity(x);
    if (identity) {
      this.stats.identities++;
      return identity;
    }
    return x;
  }

  private fold(x: ExprOf<"Binary">, l: Val, r: Val): Expr | undefined {
    if (x.op === "and" || x.op === "or") return undefined;
    try {
      const lit = literalOf(binaryOp(x.op, l, r));
      if (lit) this.stats.folded++;
      return lit;
    } catch (e) {
      // Division by zero, overflow and type errors stay for run time.
      if (e instanceof CoreILRuntimeError) return undefined;
      throw e;
    }
  }

  private identity({ op, left, right }: ExprOf<"Binary">): Expr | undefined {
    switch (op) {
      case "+":
        // -0.0 + 0 is 0.0, so only integers.
        if (isIntLiteral(right, 0) && knownInt(left)) return left;
        if (isIntLiteral(left, 0) && knownInt(right)) return right;
        return undefined;
      case "-":
        return isIntLiteral(right, 0) && knownNumeric(left) ? left : undefined;
      case "*":
        if (isIntLiteral(right, 1) && knownNumeric(left)) return left;
        if (isIntLiteral(left, 1) && knownNumeric(right)) return right;
        return undefined;
      case "and":
        return isLiteral(right) && right.value === true && knownBool(left) ? left : undefined;
      case "or":
        return isLiteral(right) && right.value === false && knownBool(left) ? left : undefined;
      default:
        return undefined;
    }
  }

  private stmt(s: Stmt, nested: boolean): Stmt[] {
    const x = mapStmt(s, this.expr, this.nestedBlock);
    if (x.type !== "If" || !isLiteral(x.test)) return [x];
    this.stats.branchesResolved++;
    const taken = truthy(fromLiteral(x.test.value)) ? x.then : (x.else ?? []);
    const declares = collectBoundNames(x.then).length > 0 || collectBoundNames(x.else ?? []).length > 0;
    // Top-level statement indices are source-map keys, so the If stays.
    if (nested && !declares) return taken;
    return [{ type: "If", test: { type: "Literal", value: true }, then: taken }];
  }

  block(body: Stmt[], nested: boolean): Stmt[] {
    const out: Stmt[] = [];
    for (let i = 0; i < body.length; i++) {
      const produced = this.stmt(body[i], nested);
      out.push(...produced);
      if (!produced.some(terminates)) continue;
      const rest = body.slice(i + 1);
      // Functions are defined before the body runs, so a FuncDef after a
      // top-level Throw is still callable from the statements before it.
      if (!nested && rest.some(r => r.type === "FuncDef")) {
        for (const r of rest) out.push(...this.stmt(r, nested));
      } else {
        this.stats.deadStatements += rest.length;
      }
      break;
    }
    return out;
  }

  nestedBlock = (body: Stmt[]): Stmt[] => this.block(body, true);
}

/** Control never reaches the next statement: a terminator, or an If on a literal whose taken branch ends in one. */
function terminates(s: Stmt): boolean {
  if (TERMINATORS.has(s.type)) return true;
  if (s.type !== "If" || !isLiteral(s.test)) return false;
  const taken = truthy(fromLiteral(s.test.value)) ? s.then : (s.else ?? []);
  const last = taken[taken.length - 1];
  return last !== undefined && terminates(last);
}

export function optimizeWithStats(doc: Document): { doc: Document; stats: OptimizeStats } {
  const out = cloneDocument(doc);
  const opt = new Optimizer();
  out.body = opt.block(out.body, false);
  if (out.source_map) {
    const kept = out.body.length;
    const map: Record<string, number[]> = {};
    for (const [line, indices] of Object.entries(out.source_map)) {
      const live = indices.filter(i => i < kept);
      if (live.length > 0) map[line] = live;
    }
    out.source_map = map;
  }
  return { doc: out, stats: opt.stats };
}

export function optimize(doc: Document): Document {
  return optimizeWithStats(doc).doc;
}
