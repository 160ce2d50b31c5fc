// src/core/eval/containers.ts
// Container primitives. Operands arrive fully evaluated, so type checks run
// after every operand expression, the same order the generated code uses.

import { expectArray, expectDeque, expectHeap, expectInt, expectMap, expectRecord, expectSet, expectStr, resolveIndex } from "./builtins";
import { CoreILRuntimeError } from "./errors";
import {
  heapPop,
  heapPush,
  mapGet,
  mapKeys,
  mapSet,
  mkArray,
  mkBool,
  mkTuple,
  setAdd,
  setHas,
  setRemove,
  VNull,
  type Val,
} from "./values";

export function setIndex(base: Val, index: Val, value: Val): void {
  const list = expectArray(base, "SetIndex base");
  list.items[resolveIndex(list.items.length, expectInt(index, "index"))] = value;
}

export function mapPut(base: Val, key: Val, value: Val): void {
  mapSet(expectMap(base, "Set base"), key, value);
}

export function pushItem(base: Val, value: Val): void {
  expectArray(base, "Push base").items.push(value);
}

export function getKey(base: Val, key: Val): Val {
  return mapGet(expectMap(base, "Get base"), key) ?? VNull;
}

export function getKeyOr(base: Val, key: Val, fallback: Val): Val {
  return mapGet(expectMap(base, "GetDefault base"), key) ?? fallback;
}

export function keysOf(base: Val): Val {
  return mkArray(mapKeys(expectMap(base, "Keys base")));
}

export function entriesOf(base: Val): Val {
  return mkArray([...expectMap(base, "entries base").entries.values()].map(e => mkTuple([e.key, e.value])));
}

export function getField(base: Val, name: string): Val {
  const v = expectRecord(base, "GetField base").fields.get(name);
  if (v === undefined) throw new CoreILRuntimeError(`field '${name}' not found in record`);
  return v;
}

export function setField(base: Val, name: string, value: Val): void {
  expectRecord(base, "SetField base").fields.set(name, value);
}

export function setInsert(base: Val, value: Val): void {
  setAdd(expectSet(base, "SetAdd base"), value);
}

export function setDelete(base: Val, value: Val): void {
  setRemove(expectSet(base, "SetRemove base"), value);
}

export function setContains(base: Val, value: Val): Val {
  return mkBool(setHas(expectSet(base, "SetHas base"), value));
}

export function dequePush(base: Val, value: Val, front: boolean): void {
  const dq = expectDeque(base, front ? "PushFront base" : "PushBack base");
  if (front) dq.items.unshift(value);
  else dq.items.push(value);
}

export function dequePop(base: Val, front: boolean): Val {
  const dq = expectDeque(base, front ? "PopFront base" : "PopBack base");
  const v = front ? dq.items.shift() : dq.items.pop();
  if (v === undefined) throw new CoreILRuntimeError("deque is empty");
  return v;
}

export function heapInsert(base: Val, priority: Val, value: Val): void {
  heapPush(expectHeap(base, "HeapPush base"), priority, value);
}

export function heapRemove(base: Val): Val {
  return heapPop(expectHeap(base, "HeapPop base"));
}

export function stringTest(kind: "StringStartsWith" | "StringEndsWith" | "StringContains", base: Val, arg: Val): Val {
  const s = expectStr(base, `${kind} base`);
  switch (kind) {
    case "StringStartsWith":
      return mkBool(s.startsWith(expectStr(arg, "prefix")));
    case "StringEndsWith":
      return mkBool(s.endsWith(expectStr(arg, "suffix")));
    case "StringContains":
      return mkBool(s.includes(expectStr(arg, "substring")));
  }
}
