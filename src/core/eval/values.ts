// src/core/eval/values.ts
// Runtime values of the reference interpreter.
//
// Integers are bigint and floats are number, so the two never collapse into
// one another. Containers are mutable and shared by reference.

import { numericOf, type LiteralValue } from "../ast";
import { INT64_MAX, INT64_MIN } from "../constants";
import { CoreILRuntimeError } from "./errors";

export type MapEntry = { key: Val; value: Val };
export type HeapEntry = { priority: Val; seq: number; value: Val };

export type Val =
  | { tag: "Null" }
  | { tag: "Bool"; b: boolean }
  | { tag: "Int"; n: bigint }
  | { tag: "Float"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "Array"; items: Val[] }
  | { tag: "Tuple"; items: readonly Val[] }
  | { tag: "Map"; entries: Map<string, MapEntry> }
  | { tag: "Set"; members: Map<string, Val> }
  | { tag: "Record"; fields: Map<string, Val> }
  | { tag: "Deque"; items: Val[] }
  | { tag: "Heap"; entries: HeapEntry[]; counter: number };

export type Tag = Val["tag"];
export type ValOf<T extends Tag> = Extract<Val, { tag: T }>;

export const VNull: Val = { tag: "Null" };
export const VTrue: Val = { tag: "Bool", b: true };
export const VFalse: Val = { tag: "Bool", b: false };

export function mkBool(b: boolean): Val {
  return b ? VTrue : VFalse;
}

/** Integers outside the signed 64-bit range are a runtime error. */
export function mkInt(n: bigint): Val {
  if (n < INT64_MIN || n > INT64_MAX) throw new CoreILRuntimeError("integer overflow");
  return { tag: "Int", n };
}

export function mkFloat(n: number): Val {
  return { tag: "Float", n };
}

export function mkStr(s: string): Val {
  return { tag: "Str", s };
}

export function mkArray(items: Val[]): Val {
  return { tag: "Array", items };
}

export function mkTuple(items: readonly Val[]): Val {
  return { tag: "Tuple", items };
}

export function mkMap(pairs: Array<[Val, Val]> = []): ValOf<"Map"> {
  const m: ValOf<"Map"> = { tag: "Map", entries: new Map() };
  for (const [k, v] of pairs) mapSet(m, k, v);
  return m;
}

export function mkSet(items: Val[] = []): ValOf<"Set"> {
  const s: ValOf<"Set"> = { tag: "Set", members: new Map() };
  for (const item of items) setAdd(s, item);
  return s;
}

export function mkRecord(fields: Array<[string, Val]>): Val {
  return { tag: "Record", fields: new Map(fields) };
}

export function mkDeque(): Val {
  return { tag: "Deque", items: [] };
}

export function mkHeap(): Val {
  return { tag: "Heap", entries: [], counter: 0 };
}

/** Document literal -> value. */
export function fromLiteral(value: LiteralValue): Val {
  if (value === null) return VNull;
  if (typeof value === "boolean") return mkBool(value);
  if (typeof value === "string") return mkStr(value);
  const num = numericOf(value);
  return num.kind === "int" ? mkInt(num.n) : mkFloat(num.n);
}

const TYPE_NAMES: Record<Tag, string> = {
  Null: "NoneType",
  Bool: "bool",
  Int: "int",
  Float: "float",
  Str: "str",
  Array: "list",
  Tuple: "tuple",
  Map: "dict",
  Set: "set",
  Record: "record",
  Deque: "deque",
  Heap: "heap",
};

export function typeName(v: Val): string {
  return TYPE_NAMES[v.tag];
}

export function isNumeric(v: Val): v is ValOf<"Int"> | ValOf<"Float"> {
  return v.tag === "Int" || v.tag === "Float";
}

export function toNumber(v: ValOf<"Int"> | ValOf<"Float">): number {
  return v.tag === "Int" ? Number(v.n) : v.n;
}

// ─────────────────────────────────────────────────────────────────
// Hashing: value-equality keys for maps and sets
// ─────────────────────────────────────────────────────────────────

/**
 * Canonical key string. Integers and integral floats share a key, booleans
 * never collide with numbers, mutable containers are rejected.
 */
export function keyOf(v: Val): string {
  switch (v.tag) {
    case "Null":
      return "n";
    case "Bool":
      return v.b ? "b:1" : "b:0";
    case "Int":
      return `i:${v.n}`;
    case "Float":
      if (Number.isInteger(v.n) && Math.abs(v.n) <= 2 ** 63) return `i:${BigInt(v.n)}`;
      return Number.isNaN(v.n) ? "f:nan" : `f:${v.n}`;
    case "Str":
      return `s:${JSON.stringify(v.s)}`;
    case "Tuple":
      return `t:(${v.items.map(keyOf).join(",")})`;
    default:
      throw new CoreILRuntimeError(`unhashable type: '${typeName(v)}'`);
  }
}

// ─────────────────────────────────────────────────────────────────
// Map / set / heap operations
// ─────────────────────────────────────────────────────────────────

export function mapGet(m: ValOf<"Map">, key: Val): Val | undefined {
  return m.entries.get(keyOf(key))?.value;
}

/** Re-inserting an existing key keeps its position. */
export function mapSet(m: ValOf<"Map">, key: Val, value: Val): void {
  const k = keyOf(key);
  const existing = m.entries.get(k);
  if (existing) existing.value = value;
  else m.entries.set(k, { key, value });
}

export function mapKeys(m: ValOf<"Map">): Val[] {
  return [...m.entries.values()].map(e => e.key);
}

export function setAdd(s: ValOf<"Set">, item: Val): void {
  const k = keyOf(item);
  if (!s.members.has(k)) s.members.set(k, item);
}

export function setHas(s: ValOf<"Set">, item: Val): boolean {
  return s.members.has(keyOf(item));
}

export function setRemove(s: ValOf<"Set">, item: Val): void {
  s.members.delete(keyOf(item));
}

/** Ordering for numeric/numeric and string/string pairs. */
export function compareOrder(a: Val, b: Val): number {
  if (a.tag === "Int" && b.tag === "Int") return a.n < b.n ? -1 : a.n > b.n ? 1 : 0;
  if (isNumeric(a) && isNumeric(b)) {
    const x = toNumber(a);
    const y = toNumber(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (a.tag === "Str" && b.tag === "Str") return a.s < b.s ? -1 : a.s > b.s ? 1 : 0;
  throw new CoreILRuntimeError(`cannot compare ${typeName(a)} and ${typeName(b)}`);
}

function heapLess(a: HeapEntry, b: HeapEntry): boolean {
  const c = compareOrder(a.priority, b.priority);
  return c < 0 || (c === 0 && a.seq < b.seq);
}

export function heapPush(h: ValOf<"Heap">, priority: Val, value: Val): void {
  const entries = h.entries;
  entries.push({ priority, seq: h.counter++, value });
  let i = entries.length - 1;
  while (i > 0) {
    const parent = (i - 1) >> 1;
    if (!heapLess(entries[i], entries[parent])) break;
    [entries[i], entries[parent]] = [entries[parent], entries[i]];
    i = parent;
  }
}

export function heapPop(h: ValOf<"Heap">): Val {
  const entries = h.entries;
  const top = entries[0];
  if (top === undefined) throw new CoreILRuntimeError("heap is empty");
  const last = entries.pop();
  if (last !== undefined && entries.length > 0) {
    entries[0] = last;
    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let smallest = i;
      if (l < entries.length && heapLess(entries[l], entries[smallest])) smallest = l;
      if (r < entries.length && heapLess(entries[r], entries[smallest])) smallest = r;
      if (smallest === i) break;
      [entries[i], entries[smallest]] = [entries[smallest], entries[i]];
      i = smallest;
    }
  }
  return top.value;
}

export function heapPeek(h: ValOf<"Heap">): Val {
  const top = h.entries[0];
  if (top === undefined) throw new CoreILRuntimeError("heap is empty");
  return top.value;
}

// ─────────────────────────────────────────────────────────────────
// Truthiness and equality
// ─────────────────────────────────────────────────────────────────

/** Only null, false and numeric zero are falsy. */
export function truthy(v: Val): boolean {
  switch (v.tag) {
    case "Null":
      return false;
    case "Bool":
      return v.b;
    case "Int":
      return v.n !== 0n;
    case "Float":
      return v.n !== 0;
    default:
      return true;
  }
}

export function valuesEqual(a: Val, b: Val): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    if (a.tag === "Int" && b.tag === "Int") return a.n === b.n;
    if (a.tag === "Int" && b.tag === "Float") return Number.isInteger(b.n) && BigInt(b.n) === a.n;
    if (a.tag === "Float" && b.tag === "Int") return Number.isInteger(a.n) && BigInt(a.n) === b.n;
    return toNumber(a) === toNumber(b);
  }
  switch (a.tag) {
    case "Null":
      return b.tag === "Null";
    case "Bool":
      return b.tag === "Bool" && a.b === b.b;
    case "Str":
      return b.tag === "Str" && a.s === b.s;
    case "Array":
    case "Tuple":
    case "Deque":
      return b.tag === a.tag && listsEqual(a.items, b.items);
    case "Map":
      if (b.tag !== "Map" || a.entries.size !== b.entries.size) return false;
      for (const [k, e] of a.entries) {
        const other = b.entries.get(k);
        if (!other || !valuesEqual(e.value, other.value)) return false;
      }
      return true;
    case "Set":
      if (b.tag !== "Set" || a.members.size !== b.members.size) return false;
      for (const k of a.members.keys()) if (!b.members.has(k)) return false;
      return true;
    case "Record":
      if (b.tag !== "Record" || a.fields.size !== b.fields.size) return false;
      for (const [k, v] of a.fields) {
        const other = b.fields.get(k);
        if (other === undefined || !valuesEqual(v, other)) return false;
      }
      return true;
    case "Heap":
      return a === b;
    default:
      return false;
  }
}

function listsEqual(a: readonly Val[], b: readonly Val[]): boolean {
  return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
}
