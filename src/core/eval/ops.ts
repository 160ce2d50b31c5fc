// src/core/eval/ops.ts
// Strict (non short-circuit) binary operators.

import type { BinaryOp } from "../ast";
import { CoreILRuntimeError } from "./errors";
import {
  compareOrder,
  isNumeric,
  mkArray,
  mkBool,
  mkFloat,
  mkInt,
  mkStr,
  mkTuple,
  toNumber,
  typeName,
  valuesEqual,
  type Val,
} from "./values";

export type StrictBinaryOp = Exclude<BinaryOp, "and" | "or">;

function unsupported(op: string, a: Val, b: Val): CoreILRuntimeError {
  return new CoreILRuntimeError(`unsupported operand types for ${op}: '${typeName(a)}' and '${typeName(b)}'`);
}

export function floorDivInt(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q;
}

export function floorModInt(a: bigint, b: bigint): bigint {
  const r = a % b;
  return r !== 0n && (r < 0n) !== (b < 0n) ? r + b : r;
}

export function floorModFloat(a: number, b: number): number {
  const r = a % b;
  return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
}

function isZero(v: Val): boolean {
  return (v.tag === "Int" && v.n === 0n) || (v.tag === "Float" && v.n === 0);
}

export function binaryOp(op: StrictBinaryOp, a: Val, b: Val): Val {
  switch (op) {
    case "==":
      return mkBool(valuesEqual(a, b));
    case "!=":
      return mkBool(!valuesEqual(a, b));
    case "<":
      return mkBool(compareOrder(a, b) < 0);
    case "<=":
      return mkBool(compareOrder(a, b) <= 0);
    case ">":
      return mkBool(compareOrder(a, b) > 0);
    case ">=":
      return mkBool(compareOrder(a, b) >= 0);
    case "+":
      if (a.tag === "Str" && b.tag === "Str") return mkStr(a.s + b.s);
      if (a.tag === "Array" && b.tag === "Array") return mkArray([...a.items, ...b.items]);
      if (a.tag === "Tuple" && b.tag === "Tuple") return mkTuple([...a.items, ...b.items]);
      return arithmetic(op, a, b);
    default:
      return arithmetic(op, a, b);
  }
}

function arithmetic(op: "+" | "-" | "*" | "/" | "//" | "%", a: Val, b: Val): Val {
  if (!isNumeric(a) || !isNumeric(b)) throw unsupported(op, a, b);

  if (op === "/") {
    if (isZero(b)) throw new CoreILRuntimeError("division by zero");
    return mkFloat(toNumber(a) / toNumber(b));
  }

  if (a.tag === "Int" && b.tag === "Int") {
    switch (op) {
      case "+":
        return mkInt(a.n + b.n);
      case "-":
        return mkInt(a.n - b.n);
      case "*":
        return mkInt(a.n * b.n);
      case "//":
        if (b.n === 0n) throw new CoreILRuntimeError("division by zero");
        return mkInt(floorDivInt(a.n, b.n));
      case "%":
        if (b.n === 0n) throw new CoreILRuntimeError("modulo by zero");
        return mkInt(floorModInt(a.n, b.n));
    }
  }

  const x = toNumber(a);
  const y = toNumber(b);
  switch (op) {
    case "+":
      return mkFloat(x + y);
    case "-":
      return mkFloat(x - y);
    case "*":
      return mkFloat(x * y);
    case "//":
      if (y === 0) throw new CoreILRuntimeError("division by zero");
      return mkFloat(Math.floor(x / y));
    case "%":
      if (y === 0) throw new CoreILRuntimeError("modulo by zero");
      return mkFloat(floorModFloat(x, y));
  }
}
