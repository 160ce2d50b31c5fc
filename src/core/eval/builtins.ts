// src/core/eval/builtins.ts
// Primitive operations shared by the interpreter and the debug tooling:
// sequence access, strings, math and type conversion.

import type { MathConstName, MathOp } from "../ast";
import { CoreILRuntimeError } from "./errors";
import { formatValue } from "./format";
import {
  isNumeric,
  mkArray,
  mkFloat,
  mkInt,
  mkStr,
  mkTuple,
  toNumber,
  typeName,
  type Val,
  type ValOf,
} from "./values";

// ─────────────────────────────────────────────────────────────────
// Argument coercion
// ─────────────────────────────────────────────────────────────────

export function expectStr(v: Val, what: string): string {
  if (v.tag !== "Str") throw new CoreILRuntimeError(`${what} must be a string, got ${typeName(v)}`);
  return v.s;
}

export function expectInt(v: Val, what: string): bigint {
  if (v.tag !== "Int") throw new CoreILRuntimeError(`${what} must be an integer, got ${typeName(v)}`);
  return v.n;
}

export function expectArray(v: Val, what: string): ValOf<"Array"> {
  if (v.tag !== "Array") throw new CoreILRuntimeError(`${what} must be a list, got ${typeName(v)}`);
  return v;
}

export function expectMap(v: Val, what: string): ValOf<"Map"> {
  if (v.tag !== "Map") throw new CoreILRuntimeError(`${what} must be a map, got ${typeName(v)}`);
  return v;
}

export function expectSet(v: Val, what: string): ValOf<"Set"> {
  if (v.tag !== "Set") throw new CoreILRuntimeError(`${what} must be a set, got ${typeName(v)}`);
  return v;
}

export function expectRecord(v: Val, what: string): ValOf<"Record"> {
  if (v.tag !== "Record") throw new CoreILRuntimeError(`${what} must be a record, got ${typeName(v)}`);
  return v;
}

export function expectDeque(v: Val, what: string): ValOf<"Deque"> {
  if (v.tag !== "Deque") throw new CoreILRuntimeError(`${what} must be a deque, got ${typeName(v)}`);
  return v;
}

export function expectHeap(v: Val, what: string): ValOf<"Heap"> {
  if (v.tag !== "Heap") throw new CoreILRuntimeError(`${what} must be a heap, got ${typeName(v)}`);
  return v;
}

// ─────────────────────────────────────────────────────────────────
// Indexing and slicing
// ─────────────────────────────────────────────────────────────────

/** Negative positions count from the end; the result is bounds-checked. */
export function resolveIndex(length: number, index: bigint): number {
  const i = index < 0n ? index + BigInt(length) : index;
  if (i < 0n || i >= BigInt(length)) throw new CoreILRuntimeError("index out of range");
  return Number(i);
}

/** Slice bounds clamp instead of failing. Null means "from the start" / "to the end". */
export function sliceBounds(length: number, start: Val, end: Val): [number, number] {
  const norm = (v: Val, fallback: number): number => {
    if (v.tag === "Null") return fallback;
    const n = Number(expectInt(v, "slice bound"));
    if (n < 0) return Math.max(0, length + n);
    return Math.min(n, length);
  };
  const s = norm(start, 0);
  const e = norm(end, length);
  return [s, Math.max(s, e)];
}

/** Strings are indexed by code point. */
export function codePoints(s: string): string[] {
  return Array.from(s);
}

export function indexValue(base: Val, index: Val): Val {
  const i = expectInt(index, "index");
  switch (base.tag) {
    case "Array":
    case "Tuple":
      return base.items[resolveIndex(base.items.length, i)];
    case "Str": {
      const chars = codePoints(base.s);
      return mkStr(chars[resolveIndex(chars.length, i)]);
    }
    default:
      throw new CoreILRuntimeError(`'${typeName(base)}' object is not subscriptable`);
  }
}

export function sliceValue(base: Val, start: Val, end: Val): Val {
  switch (base.tag) {
    case "Array": {
      const [s, e] = sliceBounds(base.items.length, start, end);
      return mkArray(base.items.slice(s, e));
    }
    case "Tuple": {
      const [s, e] = sliceBounds(base.items.length, start, end);
      return mkTuple(base.items.slice(s, e));
    }
    case "Str": {
      const chars = codePoints(base.s);
      const [s, e] = sliceBounds(chars.length, start, end);
      return mkStr(chars.slice(s, e).join(""));
    }
    default:
      throw new CoreILRuntimeError(`'${typeName(base)}' object is not sliceable`);
  }
}

export function lengthOf(base: Val): Val {
  switch (base.tag) {
    case "Array":
    case "Tuple":
    case "Deque":
      return mkInt(BigInt(base.items.length));
    case "Str":
      return mkInt(BigInt(codePoints(base.s).length));
    case "Map":
      return mkInt(BigInt(base.entries.size));
    case "Set":
      return mkInt(BigInt(base.members.size));
    case "Record":
      return mkInt(BigInt(base.fields.size));
    case "Heap":
      return mkInt(BigInt(base.entries.length));
    default:
      throw new CoreILRuntimeError(`object of type '${typeName(base)}' has no len()`);
  }
}

/** Items a ForEach visits: sequence elements, map keys, set members, characters. */
export function iterationItems(v: Val): Val[] {
  switch (v.tag) {
    case "Array":
    case "Tuple":
    case "Deque":
      return [...v.items];
    case "Map":
      return [...v.entries.values()].map(e => e.key);
    case "Set":
      return [...v.members.values()];
    case "Record":
      return [...v.fields.keys()].map(mkStr);
    case "Str":
      return codePoints(v.s).map(mkStr);
    default:
      throw new CoreILRuntimeError(`'${typeName(v)}' object is not iterable`);
  }
}

// ─────────────────────────────────────────────────────────────────
// Strings
// ─────────────────────────────────────────────────────────────────

export function joinStrings(sep: Val, items: Val): Val {
  const s = expectStr(sep, "join separator");
  if (items.tag !== "Array" && items.tag !== "Tuple" && items.tag !== "Deque") {
    throw new CoreILRuntimeError(`join items must be a list, got ${typeName(items)}`);
  }
  return mkStr(items.items.map(item => expectStr(item, "join item")).join(s));
}

export function splitString(base: Val, delimiter: Val): Val {
  const s = expectStr(base, "split base");
  const d = expectStr(delimiter, "split delimiter");
  if (d === "") throw new CoreILRuntimeError("empty separator");
  return mkArray(s.split(d).map(mkStr));
}

export function replaceString(base: Val, old: Val, neu: Val): Val {
  const s = expectStr(base, "replace base");
  const o = expectStr(old, "replace old");
  const n = expectStr(neu, "replace new");
  return mkStr(s.replaceAll(o, () => n));
}

export function substring(base: Val, start: Val, end: Val): Val {
  return sliceValue(mkStr(expectStr(base, "substring base")), start, end);
}

export function charAt(base: Val, index: Val): Val {
  return indexValue(mkStr(expectStr(base, "char_at base")), index);
}

// ─────────────────────────────────────────────────────────────────
// Math
// ─────────────────────────────────────────────────────────────────

function floatToInt(x: number): Val {
  if (!Number.isFinite(x)) throw new CoreILRuntimeError("cannot convert non-finite float to int");
  return mkInt(BigInt(x));
}

export function mathOp(op: MathOp, arg: Val): Val {
  if (!isNumeric(arg)) throw new CoreILRuntimeError(`math.${op} requires a number, got ${typeName(arg)}`);
  const x = toNumber(arg);
  switch (op) {
    case "sin":
      return mkFloat(Math.sin(x));
    case "cos":
      return mkFloat(Math.cos(x));
    case "tan":
      return mkFloat(Math.tan(x));
    case "exp":
      return mkFloat(Math.exp(x));
    case "sqrt":
      if (x < 0) throw new CoreILRuntimeError("math domain error");
      return mkFloat(Math.sqrt(x));
    case "log":
      if (x <= 0) throw new CoreILRuntimeError("math domain error");
      return mkFloat(Math.log(x));
    case "floor":
      return arg.tag === "Int" ? arg : floatToInt(Math.floor(x));
    case "ceil":
      return arg.tag === "Int" ? arg : floatToInt(Math.ceil(x));
    case "abs":
      return arg.tag === "Int" ? mkInt(arg.n < 0n ? -arg.n : arg.n) : mkFloat(Math.abs(x));
  }
}

export function mathPow(base: Val, exponent: Val): Val {
  if (!isNumeric(base) || !isNumeric(exponent)) {
    throw new CoreILRuntimeError(`unsupported operand types for pow: '${typeName(base)}' and '${typeName(exponent)}'`);
  }
  if (base.tag === "Int" && exponent.tag === "Int" && exponent.n >= 0n) {
    const b = base.n;
    if ((b > 1n || b < -1n) && exponent.n > 64n) throw new CoreILRuntimeError("integer overflow");
    return mkInt(b ** exponent.n);
  }
  const x = toNumber(base);
  const y = toNumber(exponent);
  if (x === 0 && y < 0) throw new CoreILRuntimeError("zero to a negative power");
  if (x < 0 && !Number.isInteger(y)) throw new CoreILRuntimeError("math domain error");
  const r = Math.pow(x, y);
  if (!Number.isFinite(r) && Number.isFinite(x) && Number.isFinite(y)) {
    throw new CoreILRuntimeError("numeric result out of range");
  }
  return mkFloat(r);
}

export function mathConst(name: MathConstName): Val {
  return mkFloat(name === "pi" ? Math.PI : Math.E);
}

// ─────────────────────────────────────────────────────────────────
// Conversions
// ─────────────────────────────────────────────────────────────────

const INT_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

export function toInt(v: Val): Val {
  switch (v.tag) {
    case "Int":
      return v;
    case "Float":
      return floatToInt(Math.trunc(v.n));
    case "Bool":
      return mkInt(v.b ? 1n : 0n);
    case "Str": {
      const t = v.s.trim();
      if (!INT_TEXT.test(t)) throw new CoreILRuntimeError(`cannot convert '${v.s}' to int`);
      return mkInt(BigInt(t));
    }
    default:
      throw new CoreILRuntimeError(`cannot convert ${typeName(v)} to int`);
  }
}

export function toFloat(v: Val): Val {
  switch (v.tag) {
    case "Int":
      return mkFloat(Number(v.n));
    case "Float":
      return v;
    case "Bool":
      return mkFloat(v.b ? 1 : 0);
    case "Str": {
      const t = v.s.trim();
      if (FLOAT_TEXT.test(t)) return mkFloat(parseFloat(t));
      const special = SPECIAL_FLOAT.exec(t);
      if (special) {
        const magnitude = special[2].toLowerCase() === "nan" ? NaN : Infinity;
        return mkFloat(special[1] === "-" ? -magnitude : magnitude);
      }
      throw new CoreILRuntimeError(`cannot convert '${v.s}' to float`);
    }
    default:
      throw new CoreILRuntimeError(`cannot convert ${typeName(v)} to float`);
  }
}

export function toStr(v: Val): Val {
  return v.tag === "Str" ? v : mkStr(formatValue(v));
}
