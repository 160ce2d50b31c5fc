// src/core/eval/format.ts
// Printed form of runtime values. Every generated runtime mirrors these rules.

import type { Val } from "./values";

/**
 * Shortest round-trip float text: integral values keep a trailing ".0",
 * scientific notation outside 1e-4 <= |x| < 1e16 with a two-digit exponent.
 */
export function formatFloat(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (n === 0) return Object.is(n, -0) ? "-0.0" : "0.0";

  const [mantissa, expText] = n.toExponential().split("e");
  const exp = parseInt(expText, 10);
  const negative = mantissa.startsWith("-");
  const digits = mantissa.replace("-", "").replace(".", "");

  let body: string;
  if (exp >= -4 && exp < 16) {
    if (exp >= 0) {
      const intPart = digits.length > exp + 1 ? digits.slice(0, exp + 1) : digits.padEnd(exp + 1, "0");
      const frac = digits.slice(exp + 1);
      body = `${intPart}.${frac || "0"}`;
    } else {
      body = `0.${"0".repeat(-exp - 1)}${digits}`;
    }
  } else {
    const m = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    body = `${m}e${exp < 0 ? "-" : "+"}${String(Math.abs(exp)).padStart(2, "0")}`;
  }
  return negative ? `-${body}` : body;
}

/** Quoted string as it appears inside a printed container. */
export function reprString(s: string): string {
  const quote = s.includes("'") && !s.includes('"') ? '"' : "'";
  let out = quote;
  for (const ch of s) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === quote || ch === "\\") out += `\\${ch}`;
    else if (ch === "\n") out += "\\n";
    else if (ch === "\r") out += "\\r";
    else if (ch === "\t") out += "\\t";
    else if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) out += `\\x${code.toString(16).padStart(2, "0")}`;
    else out += ch;
  }
  return out + quote;
}

/** Printed form; strings are raw at top level and quoted inside containers. */
export function formatValue(v: Val, nested = false): string {
  const inner = (x: Val): string => formatValue(x, true);
  switch (v.tag) {
    case "Null":
      return "None";
    case "Bool":
      return v.b ? "True" : "False";
    case "Int":
      return v.n.toString();
    case "Float":
      return formatFloat(v.n);
    case "Str":
      return nested ? reprString(v.s) : v.s;
    case "Array":
      return `[${v.items.map(inner).join(", ")}]`;
    case "Tuple":
      return v.items.length === 1 ? `(${inner(v.items[0])},)` : `(${v.items.map(inner).join(", ")})`;
    case "Map":
      return `{${[...v.entries.values()].map(e => `${inner(e.key)}: ${inner(e.value)}`).join(", ")}}`;
    case "Set":
      return v.members.size === 0 ? "set()" : `{${[...v.members.values()].map(inner).join(", ")}}`;
    case "Record":
      return `{${[...v.fields].map(([k, x]) => `${reprString(k)}: ${inner(x)}`).join(", ")}}`;
    case "Deque":
      return `deque([${v.items.map(inner).join(", ")}])`;
    case "Heap":
      return `<heap size=${v.entries.length}>`;
  }
}
