/**
 * State Serializer - interpreter values and statements to JSON for transport
 */

import type { Stmt } from "../core/ast";
import type { Env } from "../core/eval/interp";
import { formatValue } from "../core/eval/format";
import type { Val } from "../core/eval/values";
import type { SerializedBinding, SerializedValue } from "./debugService";

export const SUMMARY_LIMIT = 80;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function lengthOf(v: Val): number | undefined {
  switch (v.tag) {
    case "Array":
    case "Tuple":
    case "Deque":
      return v.items.length;
    case "Map":
      return v.entries.size;
    case "Set":
      return v.members.size;
    case "Record":
      return v.fields.size;
    case "Heap":
      return v.entries.length;
    default:
      return undefined;
  }
}

/**
 * Strings are quoted so `"1"` and `1` stay distinguishable.
 */
export function serializeValue(v: Val, max = SUMMARY_LIMIT): SerializedValue {
  const out: SerializedValue = { tag: v.tag, summary: truncate(formatValue(v, true), max) };
  const length = lengthOf(v);
  if (length !== undefined) out.length = length;
  return out;
}

export function serializeEnv(env: Env): SerializedBinding[] {
  return Array.from(env, ([name, value]) => ({ name, value: serializeValue(value) }));
}

/** One-line summary of a statement. */
export function summarizeStatement(stmt: Stmt): string {
  switch (stmt.type) {
    case "Let":
    case "Assign":
      return `${stmt.type} ${stmt.name} = ...`;
    case "Print": {
      const n = stmt.args.length;
      return `Print (${n} arg${n === 1 ? "" : "s"})`;
    }
    case "If":
    case "While":
    case "Return":
    case "Push":
    case "Throw":
      return `${stmt.type} ...`;
    case "For":
    case "ForEach":
      return `${stmt.type} ${stmt.var} in ...`;
    case "FuncDef":
      return `FuncDef ${stmt.name}(${stmt.params.join(", ")})`;
    case "Call":
      return `Call ${stmt.name}(...)`;
    case "Set":
      return "Set [key] = ...";
    case "SetIndex":
      return "SetIndex [i] = ...";
    case "SetField":
      return `SetField .${stmt.name} = ...`;
    case "TryCatch":
      return `TryCatch (catch_var=${stmt.catch_var})`;
    case "PopFront":
    case "PopBack":
    case "HeapPop":
      return `${stmt.type} -> ${stmt.target}`;
    case "Import":
      return `Import ${stmt.path}`;
    default:
      return stmt.type;
  }
}
