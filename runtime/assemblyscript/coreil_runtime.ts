// Core IL runtime for the AssemblyScript backend.
//
// Errors are reported through the host's `coreil_fail` import and then trap,
// so a failed operation never returns. Output goes through the host's
// `print` import one line at a time.

@external("env", "print")
declare function hostPrint(line: string): void;

@external("env", "coreil_fail")
declare function hostFail(message: string): void;

export enum Kind {
  Undef,
  None,
  Bool,
  Int,
  Float,
  Str,
  List,
  Tuple,
  Map,
  Set,
  Record,
  Deque,
  Heap,
}

export class Value {
  kind: Kind;
  b: bool = false;
  i: i64 = 0;
  f: f64 = 0;
  s: string = "";
  // list, tuple and deque items; map values; heap values
  items: Array<Value> | null = null;
  // map, set and record keys; heap priorities
  keys: Array<Value> | null = null;
  index: Map<string, i32> | null = null;
  seqs: Array<i64> | null = null;
  counter: i64 = 0;

  constructor(kind: Kind) {
    this.kind = kind;
  }
}

export class Range {
  constructor(
    public start: i64,
    public stop: i64,
  ) {}
}

export const UNDEF = new Value(Kind.Undef);
export const NONE = new Value(Kind.None);

const MAX_CALL_DEPTH: i32 = 1000;
let depth: i32 = 0;

export function rt_fail(message: string): Value {
  hostFail(message);
  return unreachable();
}

export function rt_fail_with(args: Array<Value>, message: string): Value {
  return rt_fail(message);
}

// ── constructors ─────────────────────────────────────────────────

export function rt_bool(b: bool): Value {
  const v = new Value(Kind.Bool);
  v.b = b;
  return v;
}

export function rt_int(n: i64): Value {
  const v = new Value(Kind.Int);
  v.i = n;
  return v;
}

export function rt_float(x: f64): Value {
  const v = new Value(Kind.Float);
  v.f = x;
  return v;
}

export function rt_str(s: string): Value {
  const v = new Value(Kind.Str);
  v.s = s;
  return v;
}

function container(kind: Kind): Value {
  const v = new Value(kind);
  v.items = new Array<Value>();
  v.keys = new Array<Value>();
  v.index = new Map<string, i32>();
  v.seqs = new Array<i64>();
  return v;
}

function sequence(kind: Kind, items: Array<Value>): Value {
  const v = container(kind);
  v.items = items;
  return v;
}

// ── type checks ──────────────────────────────────────────────────

function typeName(v: Value): string {
  switch (v.kind) {
    case Kind.None: return "NoneType";
    case Kind.Bool: return "bool";
    case Kind.Int: return "int";
    case Kind.Float: return "float";
    case Kind.Str: return "str";
    case Kind.List: return "list";
    case Kind.Tuple: return "tuple";
    case Kind.Map: return "dict";
    case Kind.Set: return "set";
    case Kind.Record: return "record";
    case Kind.Deque: return "deque";
    case Kind.Heap: return "heap";
    default: return "undefined";
  }
}

function expect(v: Value, kind: Kind, what: string, article: string): Value {
  if (v.kind != kind) rt_fail(what + " must be " + article + ", got " + typeName(v));
  return v;
}

function expectStr(v: Value, what: string): string {
  return expect(v, Kind.Str, what, "a string").s;
}

function expectInt(v: Value, what: string): i64 {
  return expect(v, Kind.Int, what, "an integer").i;
}

function isNum(v: Value): bool {
  return v.kind == Kind.Int || v.kind == Kind.Float;
}

function toNum(v: Value): f64 {
  return v.kind == Kind.Int ? <f64>v.i : v.f;
}

// ── strings ──────────────────────────────────────────────────────

function codePoints(s: string): Array<string> {
  const out = new Array<string>();
  let k = 0;
  while (k < s.length) {
    const w = s.codePointAt(k) > 0xffff ? 2 : 1;
    out.push(s.substring(k, k + w));
    k += w;
  }
  return out;
}

function joinStrings(parts: Array<string>, sep: string): string {
  let out = "";
  for (let k = 0; k < parts.length; k++) {
    if (k > 0) out += sep;
    out += parts[k];
  }
  return out;
}

function hex(n: i32, width: i32): string {
  const digits = "0123456789abcdef";
  let out = "";
  for (let k = width - 1; k >= 0; k--) out += digits.charAt((n >> (k * 4)) & 0xf);
  return out;
}

function isSpace(c: i32): bool {
  return c == 0x20 || (c >= 0x09 && c <= 0x0d) || c == 0xa0 || c == 0x1680 || (c >= 0x2000 && c <= 0x200a) ||
    c == 0x2028 || c == 0x2029 || c == 0x202f || c == 0x205f || c == 0x3000 || c == 0xfeff;
}

function trimText(s: string): string {
  let a = 0;
  let b = s.length;
  while (a < b && isSpace(s.charCodeAt(a))) a++;
  while (b > a && isSpace(s.charCodeAt(b - 1))) b--;
  return s.substring(a, b);
}

// ── floats ───────────────────────────────────────────────────────

function parseSmallInt(s: string): i32 {
  let k = 0;
  let negative = false;
  if (s.charAt(0) == "-" || s.charAt(0) == "+") {
    negative = s.charAt(0) == "-";
    k = 1;
  }
  let n: i32 = 0;
  for (; k < s.length; k++) n = n * 10 + (s.charCodeAt(k) - 48);
  return negative ? -n : n;
}

export function formatFloat(n: f64): string {
  if (isNaN(n)) return "nan";
  if (!isFinite(n)) return n > 0 ? "inf" : "-inf";
  if (n == 0) return 1.0 / n < 0 ? "-0.0" : "0.0";
  const text = Math.abs(n).toString();
  let mantissa = text;
  let exp: i32 = 0;
  const e = text.indexOf("e");
  if (e >= 0) {
    mantissa = text.substring(0, e);
    exp = parseSmallInt(text.substring(e + 1));
  }
  const dot = mantissa.indexOf(".");
  const intPart = dot >= 0 ? mantissa.substring(0, dot) : mantissa;
  let digits = intPart + (dot >= 0 ? mantissa.substring(dot + 1) : "");
  exp += intPart.length - 1;
  let lead = 0;
  while (lead < digits.length - 1 && digits.charCodeAt(lead) == 48) lead++;
  digits = digits.substring(lead);
  exp -= lead;
  let end = digits.length;
  while (end > 1 && digits.charCodeAt(end - 1) == 48) end--;
  digits = digits.substring(0, end);

  let body: string;
  if (exp >= -4 && exp < 16) {
    if (exp >= 0) {
      const split = exp + 1;
      body = digits.length > split
        ? digits.substring(0, split) + "." + digits.substring(split)
        : digits + "0".repeat(split - digits.length) + ".0";
    } else {
      body = "0." + "0".repeat(-exp - 1) + digits;
    }
  } else {
    const m = digits.length > 1 ? digits.substring(0, 1) + "." + digits.substring(1) : digits;
    const magnitude = (exp < 0 ? -exp : exp).toString();
    body = m + "e" + (exp < 0 ? "-" : "+") + (magnitude.length < 2 ? "0" + magnitude : magnitude);
  }
  return n < 0 ? "-" + body : body;
}

// ── keys, equality, ordering ─────────────────────────────────────

function floatIsInt(f: f64): bool {
  return isFinite(f) && Math.floor(f) == f && f >= -9223372036854775808.0 && f < 9223372036854775808.0;
}

function keyOf(v: Value): string {
  switch (v.kind) {
    case Kind.None: return "n";
    case Kind.Bool: return v.b ? "b:1" : "b:0";
    case Kind.Int: return "i:" + v.i.toString();
    case Kind.Float:
      if (isNaN(v.f)) return "f:nan";
      if (floatIsInt(v.f)) return "i:" + (<i64>v.f).toString();
      return "f:" + formatFloat(v.f);
    case Kind.Str: return "s" + v.s.length.toString() + ":" + v.s;
    case Kind.Tuple: {
      let out = "t:(";
      const items = v.items!;
      for (let k = 0; k < items.length; k++) out += keyOf(items[k]) + ",";
      return out + ")";
    }
    default:
      rt_fail("unhashable type: '" + typeName(v) + "'");
      return "";
  }
}

function itemsEqual(a: Array<Value>, b: Array<Value>): bool {
  if (a.length != b.length) return false;
  for (let k = 0; k < a.length; k++) {
    if (!rt_equals(a[k], b[k])) return false;
  }
  return true;
}

function entriesEqual(a: Value, b: Value, values: bool): bool {
  const ak = a.keys!;
  if (ak.length != b.keys!.length) return false;
  const bi = b.index!;
  for (let k = 0; k < ak.length; k++) {
    const key = keyOf(ak[k]);
    if (!bi.has(key)) return false;
    if (values && !rt_equals(a.items![k], b.items![bi.get(key)])) return false;
  }
  return true;
}

export function rt_equals(a: Value, b: Value): bool {
  if (isNum(a) && isNum(b)) {
    if (a.kind == Kind.Int && b.kind == Kind.Int) return a.i == b.i;
    if (a.kind == Kind.Float && b.kind == Kind.Float) return a.f == b.f;
    const n = a.kind == Kind.Int ? a.i : b.i;
    const f = a.kind == Kind.Int ? b.f : a.f;
    return floatIsInt(f) && <i64>f == n;
  }
  if (a.kind != b.kind) return false;
  switch (a.kind) {
    case Kind.None: return true;
    case Kind.Bool: return a.b == b.b;
    case Kind.Str: return a.s == b.s;
    case Kind.List:
    case Kind.Tuple:
    case Kind.Deque: return itemsEqual(a.items!, b.items!);
    case Kind.Map:
    case Kind.Record: return entriesEqual(a, b, true);
    case Kind.Set: return entriesEqual(a, b, false);
    default: return a === b;
  }
}

function compare(a: Value, b: Value): i32 {
  if (a.kind == Kind.Int && b.kind == Kind.Int) return a.i < b.i ? -1 : a.i > b.i ? 1 : 0;
  if (isNum(a) && isNum(b)) {
    const x = toNum(a);
    const y = toNum(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (a.kind == Kind.Str && b.kind == Kind.Str) return a.s < b.s ? -1 : a.s > b.s ? 1 : 0;
  rt_fail("cannot compare " + typeName(a) + " and " + typeName(b));
  return 0;
}

export function rt_truthy(v: Value): bool {
  switch (v.kind) {
    case Kind.None: return false;
    case Kind.Bool: return v.b;
    case Kind.Int: return v.i != 0;
    case Kind.Float: return v.f != 0;
    default: return true;
  }
}

export function rt_not(v: Value): Value {
  return rt_bool(!rt_truthy(v));
}

// ── formatting ───────────────────────────────────────────────────

function reprString(s: string): string {
  const quote = s.includes("'") && !s.includes('"') ? '"' : "'";
  let out = quote;
  const cs = codePoints(s);
  for (let k = 0; k < cs.length; k++) {
    const ch = cs[k];
    const cp = ch.codePointAt(0);
    if (ch == quote || ch == "\\") out += "\\" + ch;
    else if (ch == "\n") out += "\\n";
    else if (ch == "\r") out += "\\r";
    else if (ch == "\t") out += "\\t";
    else if (cp < 0x20 || (cp >= 0x7f && cp <= 0x9f)) out += "\\x" + hex(cp, 2);
    else out += ch;
  }
  return out + quote;
}

function formatSeq(items: Array<Value>): string {
  const parts = new Array<string>();
  for (let k = 0; k < items.length; k++) parts.push(format(items[k], true));
  return joinStrings(parts, ", ");
}

function format(v: Value, nested: bool): string {
  switch (v.kind) {
    case Kind.None: return "None";
    case Kind.Bool: return v.b ? "True" : "False";
    case Kind.Int: return v.i.toString();
    case Kind.Float: return formatFloat(v.f);
    case Kind.Str: return nested ? reprString(v.s) : v.s;
    case Kind.List: return "[" + formatSeq(v.items!) + "]";
    case Kind.Tuple: {
      const items = v.items!;
      return items.length == 1 ? "(" + format(items[0], true) + ",)" : "(" + formatSeq(items) + ")";
    }
    case Kind.Map: {
      const parts = new Array<string>();
      const keys = v.keys!;
      for (let k = 0; k < keys.length; k++) parts.push(format(keys[k], true) + ": " + format(v.items![k], true));
      return "{" + joinStrings(parts, ", ") + "}";
    }
    case Kind.Set: {
      const keys = v.keys!;
      return keys.length == 0 ? "set()" : "{" + formatSeq(keys) + "}";
    }
    case Kind.Record: {
      const parts = new Array<string>();
      const keys = v.keys!;
      for (let k = 0; k < keys.length; k++) parts.push(reprString(keys[k].s) + ": " + format(v.items![k], true));
      return "{" + joinStrings(parts, ", ") + "}";
    }
    case Kind.Deque: return "deque([" + formatSeq(v.items!) + "])";
    case Kind.Heap: return "<heap size=" + v.items!.length.toString() + ">";
    default: return "undefined";
  }
}

// ── arithmetic ───────────────────────────────────────────────────

function overflow(): i64 {
  rt_fail("integer overflow");
  return 0;
}

function intArith(op: string, x: i64, y: i64): i64 {
  if (op == "+") {
    const r = x + y;
    return ((x ^ r) & (y ^ r)) < 0 ? overflow() : r;
  }
  if (op == "-") {
    const r = x - y;
    return ((x ^ y) & (x ^ r)) < 0 ? overflow() : r;
  }
  if (op == "*") {
    if (x == 0 || y == 0) return 0;
    if ((x == -1 && y == i64.MIN_VALUE) || (y == -1 && x == i64.MIN_VALUE)) return overflow();
    const r = x * y;
    return r / y != x ? overflow() : r;
  }
  if (op == "//") {
    if (y == 0) rt_fail("division by zero");
    if (x == i64.MIN_VALUE && y == -1) return overflow();
    const q = x / y;
    return x % y != 0 && (x < 0) != (y < 0) ? q - 1 : q;
  }
  if (y == 0) rt_fail("modulo by zero");
  if (y == -1) return 0;
  const m = x % y;
  return m != 0 && (m < 0) != (y < 0) ? m + y : m;
}

function arith(op: string, a: Value, b: Value): Value {
  if (!isNum(a) || !isNum(b)) {
    return rt_fail("unsupported operand types for " + op + ": '" + typeName(a) + "' and '" + typeName(b) + "'");
  }
  if (op == "/") {
    if (toNum(b) == 0) rt_fail("division by zero");
    return rt_float(toNum(a) / toNum(b));
  }
  if (a.kind == Kind.Int && b.kind == Kind.Int) return rt_int(intArith(op, a.i, b.i));
  const x = toNum(a);
  const y = toNum(b);
  if (op == "+") return rt_float(x + y);
  if (op == "-") return rt_float(x - y);
  if (op == "*") return rt_float(x * y);
  if (op == "//") {
    if (y == 0) rt_fail("division by zero");
    return rt_float(Math.floor(x / y));
  }
  if (y == 0) rt_fail("modulo by zero");
  const m = x % y;
  return rt_float(m != 0 && (m < 0) != (y < 0) ? m + y : m);
}

export function rt_add(a: Value, b: Value): Value {
  if (a.kind == Kind.Str && b.kind == Kind.Str) return rt_str(a.s + b.s);
  if ((a.kind == Kind.List && b.kind == Kind.List) || (a.kind == Kind.Tuple && b.kind == Kind.Tuple)) {
    return sequence(a.kind, a.items!.concat(b.items!));
  }
  return arith("+", a, b);
}

export function rt_sub(a: Value, b: Value): Value { return arith("-", a, b); }
export function rt_mul(a: Value, b: Value): Value { return arith("*", a, b); }
export function rt_div(a: Value, b: Value): Value { return arith("/", a, b); }
export function rt_floordiv(a: Value, b: Value): Value { return arith("//", a, b); }
export function rt_mod(a: Value, b: Value): Value { return arith("%", a, b); }
export function rt_eq(a: Value, b: Value): Value { return rt_bool(rt_equals(a, b)); }
export function rt_ne(a: Value, b: Value): Value { return rt_bool(!rt_equals(a, b)); }
export function rt_lt(a: Value, b: Value): Value { return rt_bool(compare(a, b) < 0); }
export function rt_le(a: Value, b: Value): Value { return rt_bool(compare(a, b) <= 0); }
export function rt_gt(a: Value, b: Value): Value { return rt_bool(compare(a, b) > 0); }
export function rt_ge(a: Value, b: Value): Value { return rt_bool(compare(a, b) >= 0); }

// ── sequences ────────────────────────────────────────────────────

function resolveIndex(length: i32, index: i64): i32 {
  const i = index < 0 ? index + <i64>length : index;
  if (i < 0 || i >= <i64>length) rt_fail("index out of range");
  return <i32>i;
}

function boundOf(v: Value, fallback: i64, n: i64): i64 {
  if (v.kind == Kind.None) return fallback;
  const x = expectInt(v, "slice bound");
  if (x < 0) return n + x < 0 ? 0 : n + x;
  return x < n ? x : n;
}

export function rt_list_of(items: Array<Value>): Value {
  return sequence(Kind.List, items);
}

export function rt_tuple_of(items: Array<Value>): Value {
  return sequence(Kind.Tuple, items);
}

export function rt_index(base: Value, i: Value): Value {
  const n = expectInt(i, "index");
  if (base.kind == Kind.List || base.kind == Kind.Tuple) {
    const items = base.items!;
    return items[resolveIndex(items.length, n)];
  }
  if (base.kind == Kind.Str) {
    const cs = codePoints(base.s);
    return rt_str(cs[resolveIndex(cs.length, n)]);
  }
  return rt_fail("'" + typeName(base) + "' object is not subscriptable");
}

export function rt_slice(base: Value, start: Value, end: Value): Value {
  if (base.kind == Kind.List || base.kind == Kind.Tuple) {
    const items = base.items!;
    const n = <i64>items.length;
    const s = boundOf(start, 0, n);
    const e = boundOf(end, n, n);
    return sequence(base.kind, items.slice(<i32>s, <i32>(e > s ? e : s)));
  }
  if (base.kind == Kind.Str) {
    const cs = codePoints(base.s);
    const n = <i64>cs.length;
    const s = boundOf(start, 0, n);
    const e = boundOf(end, n, n);
    return rt_str(joinStrings(cs.slice(<i32>s, <i32>(e > s ? e : s)), ""));
  }
  return rt_fail("'" + typeName(base) + "' object is not sliceable");
}

export function rt_length(v: Value): Value {
  switch (v.kind) {
    case Kind.List:
    case Kind.Tuple:
    case Kind.Deque:
    case Kind.Heap: return rt_int(v.items!.length);
    case Kind.Str: return rt_int(codePoints(v.s).length);
    case Kind.Map:
    case Kind.Set:
    case Kind.Record: return rt_int(v.keys!.length);
    default: return rt_fail("object of type '" + typeName(v) + "' has no len()");
  }
}

export function rt_iter(v: Value): Array<Value> {
  switch (v.kind) {
    case Kind.List:
    case Kind.Tuple:
    case Kind.Deque: return v.items!.slice(0);
    case Kind.Map:
    case Kind.Set:
    case Kind.Record: return v.keys!.slice(0);
    case Kind.Str: {
      const cs = codePoints(v.s);
      const out = new Array<Value>();
      for (let k = 0; k < cs.length; k++) out.push(rt_str(cs[k]));
      return out;
    }
    default:
      rt_fail("'" + typeName(v) + "' object is not iterable");
      return new Array<Value>();
  }
}

export function rt_range(from: Value, to: Value, inclusive: bool): Range {
  const start = expectInt(from, "range start");
  const end = expectInt(to, "range end");
  return new Range(start, inclusive && end < i64.MAX_VALUE ? end + 1 : end);
}

// ── containers ───────────────────────────────────────────────────

function putEntry(obj: Value, key: string, k: Value, v: Value): void {
  const index = obj.index!;
  if (index.has(key)) {
    obj.items![index.get(key)] = v;
    return;
  }
  index.set(key, obj.keys!.length);
  obj.keys!.push(k);
  obj.items!.push(v);
}

function findEntry(obj: Value, key: string): i32 {
  const index = obj.index!;
  return index.has(key) ? index.get(key) : -1;
}

export function rt_map_of(flat: Array<Value>): Value {
  const m = container(Kind.Map);
  for (let k = 0; k + 1 < flat.length; k += 2) putEntry(m, keyOf(flat[k]), flat[k], flat[k + 1]);
  return m;
}

export function rt_map_set(base: Value, key: Value, value: Value): void {
  putEntry(expect(base, Kind.Map, "Set base", "a map"), keyOf(key), key, value);
}

export function rt_get(base: Value, key: Value): Value {
  const m = expect(base, Kind.Map, "Get base", "a map");
  const at = findEntry(m, keyOf(key));
  return at < 0 ? NONE : m.items![at];
}

export function rt_get_default(base: Value, key: Value, fallback: Value): Value {
  const m = expect(base, Kind.Map, "GetDefault base", "a map");
  const at = findEntry(m, keyOf(key));
  return at < 0 ? fallback : m.items![at];
}

export function rt_keys(base: Value): Value {
  return sequence(Kind.List, expect(base, Kind.Map, "Keys base", "a map").keys!.slice(0));
}

export function rt_entries(base: Value): Value {
  const m = expect(base, Kind.Map, "entries base", "a map");
  const out = new Array<Value>();
  const keys = m.keys!;
  for (let k = 0; k < keys.length; k++) out.push(sequence(Kind.Tuple, [keys[k], m.items![k]]));
  return sequence(Kind.List, out);
}

export function rt_push(base: Value, value: Value): void {
  expect(base, Kind.List, "Push base", "a list").items!.push(value);
}

export function rt_append(base: Value, value: Value): Value {
  rt_push(base, value);
  return NONE;
}

export function rt_set_index(base: Value, i: Value, value: Value): void {
  const items = expect(base, Kind.List, "SetIndex base", "a list").items!;
  items[resolveIndex(items.length, expectInt(i, "index"))] = value;
}

export function rt_record_of(flat: Array<Value>): Value {
  const r = container(Kind.Record);
  for (let k = 0; k + 1 < flat.length; k += 2) putEntry(r, flat[k].s, flat[k], flat[k + 1]);
  return r;
}

export function rt_get_field(base: Value, name: string): Value {
  const r = expect(base, Kind.Record, "GetField base", "a record");
  const at = findEntry(r, name);
  if (at < 0) rt_fail("field '" + name + "' not found in record");
  return r.items![at];
}

export function rt_set_field(base: Value, name: string, value: Value): void {
  putEntry(expect(base, Kind.Record, "SetField base", "a record"), name, rt_str(name), value);
}

function setInsert(s: Value, item: Value): void {
  const key = keyOf(item);
  if (findEntry(s, key) < 0) putEntry(s, key, item, NONE);
}

export function rt_set_of(items: Array<Value>): Value {
  const s = container(Kind.Set);
  for (let k = 0; k < items.length; k++) setInsert(s, items[k]);
  return s;
}

export function rt_set_has(base: Value, v: Value): Value {
  return rt_bool(findEntry(expect(base, Kind.Set, "SetHas base", "a set"), keyOf(v)) >= 0);
}

export function rt_set_size(base: Value): Value {
  return rt_length(expect(base, Kind.Set, "SetSize base", "a set"));
}

export function rt_set_add(base: Value, v: Value): void {
  setInsert(expect(base, Kind.Set, "SetAdd base", "a set"), v);
}

export function rt_set_remove(base: Value, v: Value): void {
  const s = expect(base, Kind.Set, "SetRemove base", "a set");
  const at = findEntry(s, keyOf(v));
  if (at < 0) return;
  s.keys!.splice(at, 1);
  s.items!.splice(at, 1);
  const index = new Map<string, i32>();
  const keys = s.keys!;
  for (let k = 0; k < keys.length; k++) index.set(keyOf(keys[k]), k);
  s.index = index;
}

export function rt_deque_new(): Value {
  return container(Kind.Deque);
}

export function rt_deque_size(base: Value): Value {
  return rt_length(expect(base, Kind.Deque, "DequeSize base", "a deque"));
}

export function rt_push_back(base: Value, v: Value): void {
  expect(base, Kind.Deque, "PushBack base", "a deque").items!.push(v);
}

export function rt_push_front(base: Value, v: Value): void {
  expect(base, Kind.Deque, "PushFront base", "a deque").items!.unshift(v);
}

export function rt_pop_front(base: Value): Value {
  const items = expect(base, Kind.Deque, "PopFront base", "a deque").items!;
  if (items.length == 0) rt_fail("deque is empty");
  return items.shift();
}

export function rt_pop_back(base: Value): Value {
  const items = expect(base, Kind.Deque, "PopBack base", "a deque").items!;
  if (items.length == 0) rt_fail("deque is empty");
  return items.pop();
}

function heapLess(h: Value, a: i32, b: i32): bool {
  const c = compare(h.keys![a], h.keys![b]);
  return c < 0 || (c == 0 && h.seqs![a] < h.seqs![b]);
}

function heapSwap(h: Value, a: i32, b: i32): void {
  const keys = h.keys!;
  const items = h.items!;
  const seqs = h.seqs!;
  const k = keys[a];
  keys[a] = keys[b];
  keys[b] = k;
  const v = items[a];
  items[a] = items[b];
  items[b] = v;
  const s = seqs[a];
  seqs[a] = seqs[b];
  seqs[b] = s;
}

export function rt_heap_new(): Value {
  return container(Kind.Heap);
}

export function rt_heap_size(base: Value): Value {
  return rt_length(expect(base, Kind.Heap, "HeapSize base", "a heap"));
}

export function rt_heap_push(base: Value, priority: Value, value: Value): void {
  const h = expect(base, Kind.Heap, "HeapPush base", "a heap");
  h.keys!.push(priority);
  h.items!.push(value);
  h.seqs!.push(h.counter++);
  let i = h.items!.length - 1;
  while (i > 0) {
    const parent = (i - 1) / 2;
    if (!heapLess(h, i, parent)) break;
    heapSwap(h, i, parent);
    i = parent;
  }
}

export function rt_heap_pop(base: Value): Value {
  const h = expect(base, Kind.Heap, "HeapPop base", "a heap");
  const items = h.items!;
  if (items.length == 0) rt_fail("heap is empty");
  const top = items[0];
  const last = items.length - 1;
  heapSwap(h, 0, last);
  h.keys!.pop();
  items.pop();
  h.seqs!.pop();
  let i = 0;
  while (true) {
    const l = 2 * i + 1;
    const r = l + 1;
    let smallest = i;
    if (l < items.length && heapLess(h, l, smallest)) smallest = l;
    if (r < items.length && heapLess(h, r, smallest)) smallest = r;
    if (smallest == i) break;
    heapSwap(h, i, smallest);
    i = smallest;
  }
  return top;
}

export function rt_heap_peek(base: Value): Value {
  const items = expect(base, Kind.Heap, "HeapPeek base", "a heap").items!;
  if (items.length == 0) rt_fail("heap is empty");
  return items[0];
}

// ── string operations ────────────────────────────────────────────

function stringList(parts: Array<string>): Value {
  const out = new Array<Value>();
  for (let k = 0; k < parts.length; k++) out.push(rt_str(parts[k]));
  return sequence(Kind.List, out);
}

export function rt_string_length(base: Value): Value {
  return rt_length(expect(base, Kind.Str, "StringLength base", "a string"));
}

export function rt_substring(base: Value, start: Value, end: Value): Value {
  return rt_slice(expect(base, Kind.Str, "substring base", "a string"), start, end);
}

export function rt_char_at(base: Value, i: Value): Value {
  return rt_index(expect(base, Kind.Str, "char_at base", "a string"), i);
}

export function rt_join(sep: Value, items: Value): Value {
  const s = expectStr(sep, "join separator");
  if (items.kind != Kind.List && items.kind != Kind.Tuple && items.kind != Kind.Deque) {
    rt_fail("join items must be a list, got " + typeName(items));
  }
  const parts = new Array<string>();
  const list = items.items!;
  for (let k = 0; k < list.length; k++) parts.push(expectStr(list[k], "join item"));
  return rt_str(joinStrings(parts, s));
}

export function rt_split(base: Value, delimiter: Value): Value {
  const s = expectStr(base, "split base");
  const d = expectStr(delimiter, "split delimiter");
  if (d.length == 0) rt_fail("empty separator");
  return stringList(s.split(d));
}

export function rt_trim(base: Value): Value {
  return rt_str(trimText(expectStr(base, "StringTrim base")));
}

export function rt_upper(base: Value): Value {
  return rt_str(expectStr(base, "StringUpper base").toUpperCase());
}

export function rt_lower(base: Value): Value {
  return rt_str(expectStr(base, "StringLower base").toLowerCase());
}

export function rt_starts_with(base: Value, prefix: Value): Value {
  const s = expectStr(base, "StringStartsWith base");
  return rt_bool(s.startsWith(expectStr(prefix, "prefix")));
}

export function rt_ends_with(base: Value, suffix: Value): Value {
  const s = expectStr(base, "StringEndsWith base");
  return rt_bool(s.endsWith(expectStr(suffix, "suffix")));
}

export function rt_contains(base: Value, sub: Value): Value {
  const s = expectStr(base, "StringContains base");
  return rt_bool(s.includes(expectStr(sub, "substring")));
}

export function rt_replace(base: Value, old: Value, replacement: Value): Value {
  const s = expectStr(base, "replace base");
  const o = expectStr(old, "replace old");
  const r = expectStr(replacement, "replace new");
  if (o.length == 0) return rt_str(r + joinStrings(codePoints(s), r) + (s.length > 0 ? r : ""));
  return rt_str(joinStrings(s.split(o), r));
}

// ── math and conversion ──────────────────────────────────────────

function floatToInt(x: f64): Value {
  if (!isFinite(x)) rt_fail("cannot convert non-finite float to int");
  if (x < -9223372036854775808.0 || x >= 9223372036854775808.0) return rt_int(overflow());
  return rt_int(<i64>x);
}

export function rt_math(op: string, arg: Value): Value {
  if (!isNum(arg)) rt_fail("math." + op + " requires a number, got " + typeName(arg));
  const x = toNum(arg);
  if (op == "sqrt") return x < 0 ? rt_fail("math domain error") : rt_float(Math.sqrt(x));
  if (op == "log") return x <= 0 ? rt_fail("math domain error") : rt_float(Math.log(x));
  if (op == "floor") return arg.kind == Kind.Int ? arg : floatToInt(Math.floor(x));
  if (op == "ceil") return arg.kind == Kind.Int ? arg : floatToInt(Math.ceil(x));
  if (op == "abs") {
    if (arg.kind == Kind.Float) return rt_float(Math.abs(x));
    if (arg.i == i64.MIN_VALUE) return rt_int(overflow());
    return rt_int(arg.i < 0 ? -arg.i : arg.i);
  }
  if (op == "sin") return rt_float(Math.sin(x));
  if (op == "cos") return rt_float(Math.cos(x));
  if (op == "tan") return rt_float(Math.tan(x));
  return rt_float(Math.exp(x));
}

export function rt_pow(base: Value, exponent: Value): Value {
  if (!isNum(base) || !isNum(exponent)) {
    rt_fail("unsupported operand types for pow: '" + typeName(base) + "' and '" + typeName(exponent) + "'");
  }
  if (base.kind == Kind.Int && exponent.kind == Kind.Int && exponent.i >= 0) {
    const b = base.i;
    const e = exponent.i;
    if (b == 0) return rt_int(e == 0 ? 1 : 0);
    if (b == 1) return rt_int(1);
    if (b == -1) return rt_int(e % 2 == 0 ? 1 : -1);
    if (e > 64) return rt_int(overflow());
    let r: i64 = 1;
    for (let k: i64 = 0; k < e; k++) r = intArith("*", r, b);
    return rt_int(r);
  }
  const x = toNum(base);
  const y = toNum(exponent);
  if (x == 0 && y < 0) rt_fail("zero to a negative power");
  if (x < 0 && y != Math.floor(y)) rt_fail("math domain error");
  const r = Math.pow(x, y);
  if (!isFinite(r) && isFinite(x) && isFinite(y)) rt_fail("numeric result out of range");
  return rt_float(r);
}

export function rt_math_const(name: string): Value {
  return rt_float(name == "pi" ? Math.PI : Math.E);
}

function isDigit(c: i32): bool {
  return c >= 48 && c <= 57;
}

function allDigits(s: string): bool {
  if (s.length == 0) return false;
  for (let k = 0; k < s.length; k++) {
    if (!isDigit(s.charCodeAt(k))) return false;
  }
  return true;
}

function unsigned(s: string): string {
  return s.startsWith("+") || s.startsWith("-") ? s.substring(1) : s;
}

// Parses an optionally signed decimal integer; fails on overflow.
function parseInt64(t: string): i64 {
  const negative = t.startsWith("-");
  const digits = unsigned(t);
  let r: i64 = 0;
  for (let k = 0; k < digits.length; k++) {
    const d = <i64>(digits.charCodeAt(k) - 48);
    r = intArith("*", r, 10);
    r = negative ? intArith("-", r, d) : intArith("+", r, d);
  }
  return r;
}

function isFloatText(t: string): bool {
  let body = unsigned(t);
  let e = body.indexOf("e");
  if (e < 0) e = body.indexOf("E");
  if (e >= 0) {
    if (!allDigits(unsigned(body.substring(e + 1)))) return false;
    body = body.substring(0, e);
  }
  const dot = body.indexOf(".");
  if (dot < 0) return allDigits(body);
  const intPart = body.substring(0, dot);
  const frac = body.substring(dot + 1);
  if (intPart.length == 0 && frac.length == 0) return false;
  return (intPart.length == 0 || allDigits(intPart)) && (frac.length == 0 || allDigits(frac));
}

export function rt_to_int(v: Value): Value {
  switch (v.kind) {
    case Kind.Int: return v;
    case Kind.Float: return floatToInt(Math.trunc(v.f));
    case Kind.Bool: return rt_int(v.b ? 1 : 0);
    case Kind.Str: {
      const t = trimText(v.s);
      if (!allDigits(unsigned(t))) rt_fail("cannot convert '" + v.s + "' to int");
      return rt_int(parseInt64(t));
    }
    default: return rt_fail("cannot convert " + typeName(v) + " to int");
  }
}

export function rt_to_float(v: Value): Value {
  switch (v.kind) {
    case Kind.Int: return rt_float(<f64>v.i);
    case Kind.Float: return v;
    case Kind.Bool: return rt_float(v.b ? 1 : 0);
    case Kind.Str: {
      const t = trimText(v.s);
      if (isFloatText(t)) return rt_float(parseFloat(t));
      const word = unsigned(t).toLowerCase();
      const sign: f64 = t.startsWith("-") ? -1 : 1;
      if (word == "inf" || word == "infinity") return rt_float(sign * Infinity);
      if (word == "nan") return rt_float(NaN);
      return rt_fail("cannot convert '" + v.s + "' to float");
    }
    default: return rt_fail("cannot convert " + typeName(v) + " to float");
  }
}

export function rt_to_string(v: Value): Value {
  return v.kind == Kind.Str ? v : rt_str(format(v, false));
}

// ── JSON ─────────────────────────────────────────────────────────

class JsonReader {
  pos: i32 = 0;

  constructor(public text: string) {}

  bad(): Value {
    return rt_fail("invalid JSON");
  }

  peek(): i32 {
    return this.pos < this.text.length ? this.text.charCodeAt(this.pos) : -1;
  }

  ws(): void {
    let c = this.peek();
    while (c == 0x20 || c == 0x09 || c == 0x0a || c == 0x0d) {
      this.pos++;
      c = this.peek();
    }
  }

  expectChar(c: i32): void {
    if (this.peek() != c) this.bad();
    this.pos++;
  }

  keyword(word: string, v: Value): Value {
    if (this.text.substring(this.pos, this.pos + word.length) != word) this.bad();
    this.pos += word.length;
    return v;
  }

  hex4(): i32 {
    if (this.pos + 4 > this.text.length) this.bad();
    let cp = 0;
    for (let k = 0; k < 4; k++) {
      const c = this.text.charCodeAt(this.pos++);
      cp <<= 4;
      if (c >= 48 && c <= 57) cp |= c - 48;
      else if (c >= 97 && c <= 102) cp |= c - 87;
      else if (c >= 65 && c <= 70) cp |= c - 55;
      else this.bad();
    }
    return cp;
  }

  string(): string {
    this.expectChar(0x22);
    let out = "";
    while (true) {
      if (this.pos >= this.text.length) this.bad();
      const c = this.text.charCodeAt(this.pos++);
      if (c == 0x22) return out;
      if (c < 0x20) this.bad();
      if (c != 0x5c) {
        out += String.fromCharCode(c);
        continue;
      }
      if (this.pos >= this.text.length) this.bad();
      const esc = this.text.charCodeAt(this.pos++);
      if (esc == 0x22) out += '"';
      else if (esc == 0x5c) out += "\\";
      else if (esc == 0x2f) out += "/";
      else if (esc == 0x62) out += "\b";
      else if (esc == 0x66) out += "\f";
      else if (esc == 0x6e) out += "\n";
      else if (esc == 0x72) out += "\r";
      else if (esc == 0x74) out += "\t";
      else if (esc == 0x75) out += String.fromCharCode(this.hex4());
      else this.bad();
    }
    return out;
  }

  number(): Value {
    const start = this.pos;
    let integral = true;
    if (this.peek() == 0x2d) this.pos++;
    if (this.peek() == 0x30) {
      this.pos++;
    } else {
      if (!isDigit(this.peek())) return this.bad();
      while (isDigit(this.peek())) this.pos++;
    }
    if (this.peek() == 0x2e) {
      integral = false;
      this.pos++;
      if (!isDigit(this.peek())) return this.bad();
      while (isDigit(this.peek())) this.pos++;
    }
    if (this.peek() == 0x65 || this.peek() == 0x45) {
      integral = false;
      this.pos++;
      if (this.peek() == 0x2b || this.peek() == 0x2d) this.pos++;
      if (!isDigit(this.peek())) return this.bad();
      while (isDigit(this.peek())) this.pos++;
    }
    const lexeme = this.text.substring(start, this.pos);
    // 18 digits always fit in an i64
    if (integral && unsigned(lexeme).length <= 18) return rt_int(parseInt64(lexeme));
    return rt_float(parseFloat(lexeme));
  }

  value(): Value {
    this.ws();
    const c = this.peek();
    if (c == 0x7b) {
      this.pos++;
      const m = container(Kind.Map);
      this.ws();
      if (this.peek() == 0x7d) {
        this.pos++;
        return m;
      }
      while (true) {
        this.ws();
        const k = rt_str(this.string());
        this.ws();
        this.expectChar(0x3a);
        const v = this.value();
        putEntry(m, keyOf(k), k, v);
        this.ws();
        if (this.peek() == 0x2c) {
          this.pos++;
          continue;
        }
        this.expectChar(0x7d);
        return m;
      }
    }
    if (c == 0x5b) {
      this.pos++;
      const list = container(Kind.List);
      this.ws();
      if (this.peek() == 0x5d) {
        this.pos++;
        return list;
      }
      while (true) {
        list.items!.push(this.value());
        this.ws();
        if (this.peek() == 0x2c) {
          this.pos++;
          continue;
        }
        this.expectChar(0x5d);
        return list;
      }
    }
    if (c == 0x22) return rt_str(this.string());
    if (c == 0x74) return this.keyword("true", rt_bool(true));
    if (c == 0x66) return this.keyword("false", rt_bool(false));
    if (c == 0x6e) return this.keyword("null", NONE);
    return this.number();
  }
}

export function rt_json_parse(source: Value): Value {
  const reader = new JsonReader(expectStr(source, "JsonParse source"));
  const v = reader.value();
  reader.ws();
  if (reader.pos < reader.text.length) reader.bad();
  return v;
}

function jsonQuote(s: string): string {
  let out = '"';
  for (let k = 0; k < s.length; k++) {
    const c = s.charCodeAt(k);
    if (c == 0x22) out += '\\"';
    else if (c == 0x5c) out += "\\\\";
    else if (c == 0x0a) out += "\\n";
    else if (c == 0x0d) out += "\\r";
    else if (c == 0x09) out += "\\t";
    else if (c == 0x08) out += "\\b";
    else if (c == 0x0c) out += "\\f";
    else if (c < 0x20 || c > 0x7e) out += "\\u" + hex(c, 4);
    else out += String.fromCharCode(c);
  }
  return out + '"';
}

function jsonNumber(n: f64): string {
  if (isNaN(n)) return "NaN";
  if (!isFinite(n)) return n > 0 ? "Infinity" : "-Infinity";
  return formatFloat(n);
}

function jsonKey(k: Value): string {
  switch (k.kind) {
    case Kind.Str: return k.s;
    case Kind.Int: return k.i.toString();
    case Kind.Float: return jsonNumber(k.f);
    case Kind.Bool: return k.b ? "true" : "false";
    case Kind.None: return "null";
    default:
      rt_fail("keys must be str, int, float, bool or None, not " + typeName(k));
      return "";
  }
}

function jsonWrite(x: Value, pretty: bool, depth: i32): string {
  const pad = pretty ? "\n" + "  ".repeat(depth + 1) : "";
  const close = pretty ? "\n" + "  ".repeat(depth) : "";
  const sep = pretty ? "," : ", ";
  switch (x.kind) {
    case Kind.None: return "null";
    case Kind.Bool: return x.b ? "true" : "false";
    case Kind.Int: return x.i.toString();
    case Kind.Float: return jsonNumber(x.f);
    case Kind.Str: return jsonQuote(x.s);
    case Kind.List:
    case Kind.Tuple: {
      const items = x.items!;
      if (items.length == 0) return "[]";
      const parts = new Array<string>();
      for (let k = 0; k < items.length; k++) parts.push(pad + jsonWrite(items[k], pretty, depth + 1));
      return "[" + joinStrings(parts, sep) + close + "]";
    }
    case Kind.Map:
    case Kind.Record: {
      const keys = x.keys!;
      if (keys.length == 0) return "{}";
      const parts = new Array<string>();
      for (let k = 0; k < keys.length; k++) {
        const key = x.kind == Kind.Map ? jsonKey(keys[k]) : keys[k].s;
        parts.push(pad + jsonQuote(key) + ": " + jsonWrite(x.items![k], pretty, depth + 1));
      }
      return "{" + joinStrings(parts, sep) + close + "}";
    }
    default:
      rt_fail("Object of type " + typeName(x) + " is not JSON serializable");
      return "";
  }
}

export function rt_json_stringify(v: Value, pretty: Value): Value {
  return rt_str(jsonWrite(v, rt_truthy(pretty), 0));
}

// ── program support ──────────────────────────────────────────────

export function rt_format_parts(parts: Array<Value>): Value {
  let out = "";
  for (let k = 0; k < parts.length; k++) out += format(parts[k], false);
  return rt_str(out);
}

export function rt_print(args: Array<Value>): void {
  const parts = new Array<string>();
  for (let k = 0; k < args.length; k++) parts.push(format(args[k], false));
  hostPrint(joinStrings(parts, " "));
}

export function rt_read(v: Value, name: string): Value {
  if (v.kind == Kind.Undef) rt_fail("variable '" + name + "' is not defined");
  return v;
}

export function rt_enter(): void {
  if (depth >= MAX_CALL_DEPTH) rt_fail("maximum call depth exceeded");
  depth++;
}

export function rt_leave(result: Value): Value {
  depth--;
  return result;
}
