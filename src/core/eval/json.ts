// src/core/eval/json.ts
// JSON text <-> runtime values, and JSON text -> document data. Object key
// order is document order and number literals without a fraction or exponent
// become integers.

import { INT64_MAX, INT64_MIN } from "../constants";
import { CoreILRuntimeError } from "./errors";
import { formatFloat } from "./format";
import { mapSet, mkArray, mkFloat, mkInt, mkMap, mkStr, VFalse, VNull, VTrue, typeName, type Val } from "./values";

export function parseJson(text: string): Val {
  return parseWith(text, VALUE_BUILDER, () => new CoreILRuntimeError("invalid JSON"));
}

/**
 * Document text -> plain data for the validator. Numbers keep the kind they
 * were written with: `2` is an integer, `2.0` a float ({ float: 2 }), and
 * integers past 2^53 stay exact as bigints.
 */
export function parseDocumentJson(text: string): unknown {
  return parseWith(text, DOCUMENT_BUILDER, pos => new SyntaxError(`invalid JSON at position ${pos}`));
}

interface JsonBuilder<T> {
  object(entries: Array<[string, T]>): T;
  array(items: T[]): T;
  string(s: string): T;
  constant(word: "true" | "false" | "null"): T;
  /** `integral` when the token has no fraction and no exponent. */
  number(token: string, integral: boolean): T;
}

const VALUE_BUILDER: JsonBuilder<Val> = {
  object(entries) {
    const map = mkMap();
    for (const [k, v] of entries) mapSet(map, mkStr(k), v);
    return map;
  },
  array: items => mkArray(items),
  string: s => mkStr(s),
  constant: word => (word === "null" ? VNull : word === "true" ? VTrue : VFalse),
  number(token, integral) {
    if (integral) {
      const n = BigInt(token);
      if (n >= INT64_MIN && n <= INT64_MAX) return mkInt(n);
    }
    return mkFloat(parseFloat(token));
  },
};

const DOCUMENT_BUILDER: JsonBuilder<unknown> = {
  object: entries => Object.fromEntries(entries),
  array: items => items,
  string: s => s,
  constant: word => (word === "null" ? null : word === "true"),
  number(token, integral) {
    if (integral) {
      const n = BigInt(token);
      if (n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER)) return Number(n);
      if (n >= INT64_MIN && n <= INT64_MAX) return n;
    }
    const f = parseFloat(token);
    return Number.isInteger(f) ? { float: f } : f;
  },
};

function parseWith<T>(text: string, builder: JsonBuilder<T>, fail: (pos: number) => Error): T {
  const p = new JsonParser(text, builder, fail);
  const value = p.value();
  p.skipWs();
  if (!p.atEnd()) throw p.fail();
  return value;
}

class JsonParser<T> {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly build: JsonBuilder<T>,
    private readonly failAt: (pos: number) => Error,
  ) {}

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  fail(): Error {
    return this.failAt(this.pos);
  }

  skipWs(): void {
    while (!this.atEnd() && " \t\n\r".includes(this.text[this.pos])) this.pos++;
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) throw this.fail();
    this.pos++;
  }

  private keyword(word: "true" | "false" | "null"): T {
    if (!this.text.startsWith(word, this.pos)) throw this.fail();
    this.pos += word.length;
    return this.build.constant(word);
  }

  value(): T {
    this.skipWs();
    const ch = this.text[this.pos];
    switch (ch) {
      case "{":
        return this.object();
      case "[":
        return this.array();
      case '"':
        return this.build.string(this.string());
      case "t":
        return this.keyword("true");
      case "f":
        return this.keyword("false");
      case "n":
        return this.keyword("null");
      default:
        return this.number();
    }
  }

  private object(): T {
    this.expect("{");
    const entries: Array<[string, T]> = [];
    this.skipWs();
    if (this.text[this.pos] === "}") {
      this.pos++;
      return this.build.object(entries);
    }
    for (;;) {
      this.skipWs();
      const key = this.string();
      this.skipWs();
      this.expect(":");
      entries.push([key, this.value()]);
      this.skipWs();
      if (this.text[this.pos] === ",") {
        this.pos++;
        continue;
      }
      this.expect("}");
      return this.build.object(entries);
    }
  }

  private array(): T {
    this.expect("[");
    const items: T[] = [];
    this.skipWs();
    if (this.text[this.pos] === "]") {
      this.pos++;
      return this.build.array(items);
    }
    for (;;) {
      items.push(this.value());
      this.skipWs();
      if (this.text[this.pos] === ",") {
        this.pos++;
        continue;
      }
      this.expect("]");
      return this.build.array(items);
    }
  }

  private string(): string {
    this.expect('"');
    let out = "";
    for (;;) {
      if (this.atEnd()) throw this.fail();
      const ch = this.text[this.pos++];
      if (ch === '"') return out;
      if (ch < " ") throw this.fail();
      if (ch !== "\\") {
        out += ch;
        continue;
      }
      const esc = this.text[this.pos++];
      switch (esc) {
        case '"':
        case "\\":
        case "/":
          out += esc;
          break;
        case "b":
          out += "\b";
          break;
        case "f":
          out += "\f";
          break;
        case "n":
          out += "\n";
          break;
        case "r":
          out += "\r";
          break;
        case "t":
          out += "\t";
          break;
        case "u": {
          const hex = this.text.slice(this.pos, this.pos + 4);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw this.fail();
          out += String.fromCharCode(parseInt(hex, 16));
          this.pos += 4;
          break;
        }
        default:
          throw this.fail();
      }
    }
  }

  private number(): T {
    const m = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/.exec(this.text.slice(this.pos));
    if (!m) throw this.fail();
    this.pos += m[0].length;
    return this.build.number(m[0], m[2] === undefined && m[3] === undefined);
  }
}

// ─────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────

/** ASCII-only JSON string literal. */
export function jsonQuote(s: string): string {
  let out = '"';
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    const code = s.charCodeAt(i);
    if (ch === '"') out += '\\"';
    else if (ch === "\\") out += "\\\\";
    else if (ch === "\n") out += "\\n";
    else if (ch === "\r") out += "\\r";
    else if (ch === "\t") out += "\\t";
    else if (ch === "\b") out += "\\b";
    else if (ch === "\f") out += "\\f";
    else if (code < 0x20 || code > 0x7e) out += `\\u${code.toString(16).padStart(4, "0")}`;
    else out += ch;
  }
  return out + '"';
}

function jsonNumber(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "Infinity";
  if (n === -Infinity) return "-Infinity";
  return formatFloat(n);
}

function jsonKey(k: Val): string {
  switch (k.tag) {
    case "Str":
      return k.s;
    case "Int":
      return k.n.toString();
    case "Float":
      return jsonNumber(k.n);
    case "Bool":
      return k.b ? "true" : "false";
    case "Null":
      return "null";
    default:
      throw new CoreILRuntimeError(`keys must be str, int, float, bool or None, not ${typeName(k)}`);
  }
}

export function stringifyJson(v: Val, pretty: boolean): string {
  const write = (x: Val, depth: number): string => {
    const pad = pretty ? "\n" + "  ".repeat(depth + 1) : "";
    const close = pretty ? "\n" + "  ".repeat(depth) : "";
    const sep = pretty ? "," : ", ";
    switch (x.tag) {
      case "Null":
        return "null";
      case "Bool":
        return x.b ? "true" : "false";
      case "Int":
        return x.n.toString();
      case "Float":
        return jsonNumber(x.n);
      case "Str":
        return jsonQuote(x.s);
      case "Array":
      case "Tuple":
        if (x.items.length === 0) return "[]";
        return `[${x.items.map(item => pad + write(item, depth + 1)).join(sep)}${close}]`;
      case "Map": {
        if (x.entries.size === 0) return "{}";
        const parts = [...x.entries.values()].map(e => `${pad}${jsonQuote(jsonKey(e.key))}: ${write(e.value, depth + 1)}`);
        return `{${parts.join(sep)}${close}}`;
      }
      case "Record": {
        if (x.fields.size === 0) return "{}";
        const parts = [...x.fields].map(([k, fv]) => `${pad}${jsonQuote(k)}: ${write(fv, depth + 1)}`);
        return `{${parts.join(sep)}${close}}`;
      }
      default:
        throw new CoreILRuntimeError(`Object of type ${typeName(x)} is not JSON serializable`);
    }
  };
  return write(v, 0);
}
