// src/core/eval/host.ts
// Tier-2 escape hatches: external module calls and OOP-style method/property
// access on core values. Only the interpreter and the JavaScript target run these.

import { expectStr } from "./builtins";
import { codePoints, lengthOf } from "./builtins";
import { CoreILRuntimeError } from "./errors";
import {
  mapGet,
  mapKeys,
  mkArray,
  mkFloat,
  mkInt,
  mkStr,
  mkTuple,
  typeName,
  valuesEqual,
  VNull,
  type Val,
} from "./values";

export type ExternalFn = (args: Val[]) => Val;

/** module name -> function name -> implementation */
export type ExternalTable = Record<string, Record<string, ExternalFn>>;

function arity(name: string, args: Val[], n: number): void {
  if (args.length !== n) {
    throw new CoreILRuntimeError(`${name}() takes ${n} argument${n === 1 ? "" : "s"} (${args.length} given)`);
  }
}

export const DEFAULT_EXTERNALS: ExternalTable = {
  time: {
    time: args => {
      arity("time.time", args, 0);
      return mkFloat(Date.now() / 1000);
    },
    monotonic: args => {
      arity("time.monotonic", args, 0);
      return mkFloat(performance.now() / 1000);
    },
  },
  os: {
    getenv: args => {
      arity("os.getenv", args, 1);
      const v = process.env[expectStr(args[0], "variable name")];
      return v === undefined ? VNull : mkStr(v);
    },
    cwd: args => {
      arity("os.cwd", args, 0);
      return mkStr(process.cwd());
    },
    platform: args => {
      arity("os.platform", args, 0);
      return mkStr(process.platform);
    },
  },
  math: {
    hypot: args => {
      arity("math.hypot", args, 2);
      const [a, b] = args;
      if ((a.tag !== "Int" && a.tag !== "Float") || (b.tag !== "Int" && b.tag !== "Float")) {
        throw new CoreILRuntimeError("math.hypot requires numbers");
      }
      return mkFloat(Math.hypot(Number(a.n), Number(b.n)));
    },
  },
};

export function callExternal(table: ExternalTable, module: string, fn: string, args: Val[]): Val {
  const impl = table[module]?.[fn];
  if (impl === undefined) throw new CoreILRuntimeError(`unknown external function '${module}.${fn}'`);
  return impl(args);
}

// ─────────────────────────────────────────────────────────────────
// Method calls
// ─────────────────────────────────────────────────────────────────

function countOccurrences(s: string, sub: string): number {
  if (sub === "") return codePoints(s).length + 1;
  return s.split(sub).length - 1;
}

export function callMethod(obj: Val, method: string, args: Val[]): Val {
  const noMethod = (): CoreILRuntimeError =>
    new CoreILRuntimeError(`'${typeName(obj)}' object has no method '${method}'`);

  switch (obj.tag) {
    case "Str": {
      const s = obj.s;
      switch (method) {
        case "upper":
          arity(method, args, 0);
          return mkStr(s.toUpperCase());
        case "lower":
          arity(method, args, 0);
          return mkStr(s.toLowerCase());
        case "strip":
          arity(method, args, 0);
          return mkStr(s.trim());
        case "split": {
          arity(method, args, 1);
          const sep = expectStr(args[0], "separator");
          if (sep === "") throw new CoreILRuntimeError("empty separator");
          return mkArray(s.split(sep).map(mkStr));
        }
        case "startswith":
          arity(method, args, 1);
          return { tag: "Bool", b: s.startsWith(expectStr(args[0], "prefix")) };
        case "endswith":
          arity(method, args, 1);
          return { tag: "Bool", b: s.endsWith(expectStr(args[0], "suffix")) };
        case "replace": {
          arity(method, args, 2);
          const neu = expectStr(args[1], "replacement");
          return mkStr(s.replaceAll(expectStr(args[0], "pattern"), () => neu));
        }
        case "find": {
          arity(method, args, 1);
          const idx = s.indexOf(expectStr(args[0], "substring"));
          return mkInt(BigInt(idx < 0 ? -1 : codePoints(s.slice(0, idx)).length));
        }
        case "count":
          arity(method, args, 1);
          return mkInt(BigInt(countOccurrences(s, expectStr(args[0], "substring"))));
        default:
          throw noMethod();
      }
    }
    case "Array":
      switch (method) {
        case "index": {
          arity(method, args, 1);
          const idx = obj.items.findIndex(item => valuesEqual(item, args[0]));
          if (idx < 0) throw new CoreILRuntimeError("value is not in list");
          return mkInt(BigInt(idx));
        }
        case "count":
          arity(method, args, 1);
          return mkInt(BigInt(obj.items.filter(item => valuesEqual(item, args[0])).length));
        case "copy":
          arity(method, args, 0);
          return mkArray([...obj.items]);
        default:
          throw noMethod();
      }
    case "Map":
      switch (method) {
        case "get":
          if (args.length !== 1 && args.length !== 2) {
            throw new CoreILRuntimeError(`get() takes 1 or 2 arguments (${args.length} given)`);
          }
          return mapGet(obj, args[0]) ?? args[1] ?? VNull;
        case "keys":
          arity(method, args, 0);
          return mkArray(mapKeys(obj));
        case "values":
          arity(method, args, 0);
          return mkArray([...obj.entries.values()].map(e => e.value));
        case "items":
          arity(method, args, 0);
          return mkArray([...obj.entries.values()].map(e => mkTuple([e.key, e.value])));
        default:
          throw noMethod();
      }
    default:
      throw noMethod();
  }
}

export function getProperty(obj: Val, property: string): Val {
  if (obj.tag === "Record") {
    const v = obj.fields.get(property);
    if (v !== undefined) return v;
  }
  const sized = obj.tag === "Str" || obj.tag === "Array" || obj.tag === "Tuple" || obj.tag === "Deque";
  if (property === "length" && sized) return lengthOf(obj);
  if (property === "size" && (obj.tag === "Map" || obj.tag === "Set" || obj.tag === "Heap")) return lengthOf(obj);
  throw new CoreILRuntimeError(`'${typeName(obj)}' object has no property '${property}'`);
}
