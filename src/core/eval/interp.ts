// src/core/eval/interp.ts
// Reference interpreter. Every backend's observable behaviour is measured
// against this module.
//
// Control flow travels as a Completion value; runtime faults are raised as
// CoreILRuntimeError and turned into a Thrown completion at the statement
// that raised them.

import type { Document, Expr, ExprOf, RangeExpr, Stmt, StmtOf } from "../ast";
import { collectBoundNames, isRange } from "../ast";
import { MAX_CALL_DEPTH } from "../constants";
import {
  charAt,
  expectDeque,
  expectHeap,
  expectInt,
  expectSet,
  expectStr,
  indexValue,
  iterationItems,
  joinStrings,
  lengthOf,
  mathConst,
  mathOp,
  mathPow,
  replaceString,
  sliceValue,
  splitString,
  substring,
  toFloat,
  toInt,
  toStr,
} from "./builtins";
import {
  dequePop,
  dequePush,
  entriesOf,
  getField,
  getKey,
  getKeyOr,
  heapInsert,
  heapRemove,
  keysOf,
  mapPut,
  pushItem,
  setContains,
  setDelete,
  setField,
  setIndex,
  setInsert,
  stringTest,
} from "./containers";
import { CoreILRuntimeError, errorMessage } from "./errors";
import { formatValue } from "./format";
import { callExternal, callMethod, DEFAULT_EXTERNALS, getProperty, type ExternalTable } from "./host";
import { parseJson, stringifyJson } from "./json";
import { binaryOp } from "./ops";
import { regexFindAll, regexMatch, regexReplace, regexSplit } from "./regex";
import {
  fromLiteral,
  heapPeek,
  mkArray,
  mkBool,
  mkDeque,
  mkHeap,
  mkInt,
  mkMap,
  mkRecord,
  mkSet,
  mkStr,
  mkTuple,
  truthy,
  valuesEqual,
  VNull,
  type Val,
} from "./values";

// ─────────────────────────────────────────────────────────────────
// Public types
// ─────────────────────────────────────────────────────────────────

export type Completion =
  | { kind: "normal" }
  | { kind: "break" }
  | { kind: "continue" }
  | { kind: "return"; value: Val }
  | { kind: "thrown"; message: string };

export type Env = Map<string, Val>;
export type FunctionTable = Map<string, StmtOf<"FuncDef">>;

/**
 * Fires before every statement at every nesting level. `locals` is null at
 * the top level.
 */
export type StepHook = (
  stmt: Stmt,
  index: number,
  locals: Env | null,
  globals: Env,
  functions: FunctionTable,
  callDepth: number,
) => void;

export interface RunOptions {
  stepHook?: StepHook;
  /** Receives the failure text in place of the default `runtime error:` line. */
  errorCallback?: (message: string) => void;
  out?: (line: string) => void;
  externals?: ExternalTable;
  maxCallDepth?: number;
}

export type ExitCode = 0 | 1;

const NORMAL: Completion = { kind: "normal" };
const BREAK: Completion = { kind: "break" };
const CONTINUE: Completion = { kind: "continue" };

type Frame = {
  locals: Env | null;
  /** Names that are local for the whole function body; null at top level. */
  localNames: ReadonlySet<string> | null;
  depth: number;
};

// ─────────────────────────────────────────────────────────────────
// Interpreter
// ─────────────────────────────────────────────────────────────────

export class Interpreter {
  readonly globals: Env = new Map();
  readonly functions: FunctionTable = new Map();
  private readonly localNameCache = new Map<StmtOf<"FuncDef">, ReadonlySet<string>>();
  private readonly out: (line: string) => void;
  private readonly externals: ExternalTable;
  private readonly maxCallDepth: number;

  constructor(private readonly options: RunOptions = {}) {
    this.out = options.out ?? (line => console.log(line));
    this.externals = options.externals ?? DEFAULT_EXTERNALS;
    this.maxCallDepth = options.maxCallDepth ?? MAX_CALL_DEPTH;
  }

  /** Runs a whole document body; the completion is Normal or Thrown. */
  execute(doc: Document): Completion {
    this.hoist(doc.body);
    const top: Frame = { locals: null, localNames: null, depth: 0 };
    return this.execBlock(doc.body, top);
  }

  private hoist(body: Stmt[]): void {
    for (const stmt of body) {
      if (stmt.type === "FuncDef") this.functions.set(stmt.name, stmt);
    }
  }

  private localNamesOf(fn: StmtOf<"FuncDef">): ReadonlySet<string> {
    let names = this.localNameCache.get(fn);
    if (!names) {
      names = new Set([...fn.params, ...collectBoundNames(fn.body)]);
      this.localNameCache.set(fn, names);
    }
    return names;
  }

  // ── variables ──────────────────────────────────────────────────

  private lookup(name: string, frame: Frame): Val {
    const scope = frame.locals && frame.localNames?.has(name) ? frame.locals : this.globals;
    const v = scope.get(name);
    if (v === undefined) throw new CoreILRuntimeError(`variable '${name}' is not defined`);
    return v;
  }

  private bind(name: string, value: Val, frame: Frame): void {
    if (frame.locals && frame.localNames?.has(name)) frame.locals.set(name, value);
    else this.globals.set(name, value);
  }

  // ── statements ─────────────────────────────────────────────────

  private execBlock(body: readonly Stmt[], frame: Frame): Completion {
    for (let i = 0; i < body.length; i++) {
      const stmt = body[i];
      this.options.stepHook?.(stmt, i, frame.locals, this.globals, this.functions, frame.depth);
      const c = this.guarded(stmt, frame);
      if (c.kind !== "normal") return c;
    }
    return NORMAL;
  }

  private guarded(stmt: Stmt, frame: Frame): Completion {
    try {
      return this.execStmt(stmt, frame);
    } catch (e) {
      if (e instanceof CoreILRuntimeError) return { kind: "thrown", message: e.message };
      if (e instanceof RangeError && /call stack/i.test(e.message)) {
        return { kind: "thrown", message: "maximum call depth exceeded" };
      }
      throw e;
    }
  }

  private execStmt(stmt: Stmt, frame: Frame): Completion {
    switch (stmt.type) {
      case "Let":
      case "Assign":
        this.bind(stmt.name, this.eval(stmt.value, frame), frame);
        return NORMAL;

      case "If":
        if (truthy(this.eval(stmt.test, frame))) return this.execBlock(stmt.then, frame);
        return stmt.else ? this.execBlock(stmt.else, frame) : NORMAL;

      case "While":
        while (truthy(this.eval(stmt.test, frame))) {
          const c = this.execBlock(stmt.body, frame);
          if (c.kind === "break") break;
          if (c.kind === "return" || c.kind === "thrown") return c;
        }
        return NORMAL;

      case "For":
        return this.loop(stmt.var, this.forItems(stmt.iter, frame), stmt.body, frame);

      case "ForEach":
        return this.loop(stmt.var, iterationItems(this.eval(stmt.iter, frame)), stmt.body, frame);

      case "Switch": {
        const test = this.eval(stmt.test, frame);
        for (const c of stmt.cases) {
          if (valuesEqual(test, this.eval(c.value, frame))) return this.execBlock(c.body, frame);
        }
        return stmt.default ? this.execBlock(stmt.default, frame) : NORMAL;
      }

      case "Break":
        return BREAK;
      case "Continue":
        return CONTINUE;

      case "Print":
        this.out(stmt.args.map(a => formatValue(this.eval(a, frame))).join(" "));
        return NORMAL;

      case "Call":
        this.call(stmt, frame);
        return NORMAL;

      case "FuncDef":
        // Registered before execution starts.
        return NORMAL;

      case "Return":
        return { kind: "return", value: stmt.value ? this.eval(stmt.value, frame) : VNull };

      case "SetIndex": {
        const base = this.eval(stmt.base, frame);
        const index = this.eval(stmt.index, frame);
        setIndex(base, index, this.eval(stmt.value, frame));
        return NORMAL;
      }

      case "Set": {
        const base = this.eval(stmt.base, frame);
        const key = this.eval(stmt.key, frame);
        mapPut(base, key, this.eval(stmt.value, frame));
        return NORMAL;
      }

      case "Push": {
        const base = this.eval(stmt.base, frame);
        pushItem(base, this.eval(stmt.value, frame));
        return NORMAL;
      }

      case "SetField": {
        const base = this.eval(stmt.base, frame);
        setField(base, stmt.name, this.eval(stmt.value, frame));
        return NORMAL;
      }

      case "SetAdd":
      case "SetRemove": {
        const base = this.eval(stmt.base, frame);
        const value = this.eval(stmt.value, frame);
        if (stmt.type === "SetAdd") setInsert(base, value);
        else setDelete(base, value);
        return NORMAL;
      }

      case "PushBack":
      case "PushFront": {
        const base = this.eval(stmt.base, frame);
        dequePush(base, this.eval(stmt.value, frame), stmt.type === "PushFront");
        return NORMAL;
      }

      case "PopFront":
      case "PopBack":
        this.bind(stmt.target, dequePop(this.eval(stmt.base, frame), stmt.type === "PopFront"), frame);
        return NORMAL;

      case "HeapPush": {
        const base = this.eval(stmt.base, frame);
        const priority = this.eval(stmt.priority, frame);
        heapInsert(base, priority, this.eval(stmt.value, frame));
        return NORMAL;
      }

      case "HeapPop":
        this.bind(stmt.target, heapRemove(this.eval(stmt.base, frame)), frame);
        return NORMAL;

      case "TryCatch":
        return this.tryCatch(stmt, frame);

      case "Throw": {
        const msg = this.eval(stmt.message, frame);
        return { kind: "thrown", message: msg.tag === "Str" ? msg.s : formatValue(msg) };
      }

      case "Import":
        // Resolved ahead of execution by the module loader.
        return NORMAL;
    }
  }

  private forItems(iter: Expr | RangeExpr, frame: Frame): Iterable<Val> {
    if (!isRange(iter)) return iterationItems(this.eval(iter, frame));
    const from = expectInt(this.eval(iter.from, frame), "range start");
    const to = expectInt(this.eval(iter.to, frame), "range end");
    const stop = iter.inclusive ? to + 1n : to;
    return (function* () {
      for (let i = from; i < stop; i++) yield mkInt(i);
    })();
  }

  private loop(name: string, items: Iterable<Val>, body: Stmt[], frame: Frame): Completion {
    for (const item of items) {
      this.bind(name, item, frame);
      const c = this.execBlock(body, frame);
      if (c.kind === "break") break;
      if (c.kind === "return" || c.kind === "thrown") return c;
    }
    return NORMAL;
  }

  private tryCatch(stmt: StmtOf<"TryCatch">, frame: Frame): Completion {
    let result = this.execBlock(stmt.body, frame);
    if (result.kind === "thrown") {
      this.bind(stmt.catch_var, mkStr(result.message), frame);
      result = this.execBlock(stmt.catch_body, frame);
    }
    if (stmt.finally_body) {
      const fin = this.execBlock(stmt.finally_body, frame);
      if (fin.kind !== "normal") return fin;
    }
    return result;
  }

  // ── calls ──────────────────────────────────────────────────────

  private call(node: ExprOf<"Call"> | StmtOf<"Call">, frame: Frame): Val {
    const args = node.args.map(a => this.eval(a, frame));
    const fn = this.functions.get(node.name);
    if (fn) return this.invoke(fn, args, frame.depth);
    return this.legacyHelper(node.name, args);
  }

  private invoke(fn: StmtOf<"FuncDef">, args: Val[], depth: number): Val {
    if (depth >= this.maxCallDepth) throw new CoreILRuntimeError("maximum call depth exceeded");
    if (args.length !== fn.params.length) {
      throw new CoreILRuntimeError(
        `function '${fn.name}' expects ${fn.params.length} argument${fn.params.length === 1 ? "" : "s"}, got ${args.length}`,
      );
    }
    const locals: Env = new Map(fn.params.map((p, i) => [p, args[i]]));
    const frame: Frame = { locals, localNames: this.localNamesOf(fn), depth: depth + 1 };
    const c = this.execBlock(fn.body, frame);
    switch (c.kind) {
      case "return":
        return c.value;
      case "thrown":
        throw new CoreILRuntimeError(c.message);
      default:
        return VNull;
    }
  }

  /** Pre-1.0 helper calls, shadowed by any user function of the same name. */
  private legacyHelper(name: string, args: Val[]): Val {
    const want = (n: number): void => {
      if (args.length !== n) throw new CoreILRuntimeError(`${name} expects ${n} argument${n === 1 ? "" : "s"}`);
    };
    switch (name) {
      case "get_or_default":
        want(3);
        return getKeyOr(args[0], args[1], args[2]);
      case "keys":
        want(1);
        return keysOf(args[0]);
      case "entries":
        want(1);
        return entriesOf(args[0]);
      case "append":
        want(2);
        pushItem(args[0], args[1]);
        return VNull;
      default:
        throw new CoreILRuntimeError(`unknown function '${name}'`);
    }
  }

  // ── expressions ────────────────────────────────────────────────

  private eval(e: Expr, frame: Frame): Val {
    switch (e.type) {
      case "Literal":
        return fromLiteral(e.value);
      case "Var":
        return this.lookup(e.name, frame);
      case "Binary": {
        const left = this.eval(e.left, frame);
        if (e.op === "and") return truthy(left) ? this.eval(e.right, frame) : left;
        if (e.op === "or") return truthy(left) ? left : this.eval(e.right, frame);
        return binaryOp(e.op, left, this.eval(e.right, frame));
      }
      case "Not":
        return mkBool(!truthy(this.eval(e.arg, frame)));
      case "Call":
        return this.call(e, frame);
      case "Ternary":
        return truthy(this.eval(e.test, frame)) ? this.eval(e.consequent, frame) : this.eval(e.alternate, frame);
      case "StringFormat":
        return mkStr(e.parts.map(p => formatValue(this.eval(p, frame))).join(""));

      case "Array":
        return mkArray(e.items.map(i => this.eval(i, frame)));
      case "Tuple":
        return mkTuple(e.items.map(i => this.eval(i, frame)));
      case "Index":
        return indexValue(this.eval(e.base, frame), this.eval(e.index, frame));
      case "Slice":
        return sliceValue(this.eval(e.base, frame), this.eval(e.start, frame), this.eval(e.end, frame));
      case "Length":
        return lengthOf(this.eval(e.base, frame));

      case "Map":
        return mkMap(e.items.map(({ key, value }): [Val, Val] => [this.eval(key, frame), this.eval(value, frame)]));
      case "Get": {
        const base = this.eval(e.base, frame);
        return getKey(base, this.eval(e.key, frame));
      }
      case "GetDefault": {
        const base = this.eval(e.base, frame);
        const key = this.eval(e.key, frame);
        return getKeyOr(base, key, this.eval(e.default, frame));
      }
      case "Keys":
        return keysOf(this.eval(e.base, frame));
      case "Record":
        return mkRecord(e.fields.map(({ name, value }): [string, Val] => [name, this.eval(value, frame)]));
      case "GetField":
        return getField(this.eval(e.base, frame), e.name);

      case "Set":
        return mkSet(e.items.map(i => this.eval(i, frame)));
      case "SetHas": {
        const base = this.eval(e.base, frame);
        return setContains(base, this.eval(e.value, frame));
      }
      case "SetSize":
        return lengthOf(expectSet(this.eval(e.base, frame), "SetSize base"));
      case "DequeNew":
        return mkDeque();
      case "DequeSize":
        return lengthOf(expectDeque(this.eval(e.base, frame), "DequeSize base"));
      case "HeapNew":
        return mkHeap();
      case "HeapSize":
        return lengthOf(expectHeap(this.eval(e.base, frame), "HeapSize base"));
      case "HeapPeek":
        return heapPeek(expectHeap(this.eval(e.base, frame), "HeapPeek base"));

      case "StringLength":
        return lengthOf(mkStr(expectStr(this.eval(e.base, frame), "StringLength base")));
      case "Substring":
        return substring(this.eval(e.base, frame), this.eval(e.start, frame), this.eval(e.end, frame));
      case "CharAt":
        return charAt(this.eval(e.base, frame), this.eval(e.index, frame));
      case "Join":
        return joinStrings(this.eval(e.sep, frame), this.eval(e.items, frame));
      case "StringSplit":
        return splitString(this.eval(e.base, frame), this.eval(e.delimiter, frame));
      case "StringTrim":
        return mkStr(expectStr(this.eval(e.base, frame), "StringTrim base").trim());
      case "StringUpper":
        return mkStr(expectStr(this.eval(e.base, frame), "StringUpper base").toUpperCase());
      case "StringLower":
        return mkStr(expectStr(this.eval(e.base, frame), "StringLower base").toLowerCase());
      case "StringStartsWith": {
        const base = this.eval(e.base, frame);
        return stringTest(e.type, base, this.eval(e.prefix, frame));
      }
      case "StringEndsWith": {
        const base = this.eval(e.base, frame);
        return stringTest(e.type, base, this.eval(e.suffix, frame));
      }
      case "StringContains": {
        const base = this.eval(e.base, frame);
        return stringTest(e.type, base, this.eval(e.substring, frame));
      }
      case "StringReplace":
        return replaceString(this.eval(e.base, frame), this.eval(e.old, frame), this.eval(e.new, frame));

      case "Math":
        return mathOp(e.op, this.eval(e.arg, frame));
      case "MathPow":
        return mathPow(this.eval(e.base, frame), this.eval(e.exponent, frame));
      case "MathConst":
        return mathConst(e.name);

      case "JsonParse":
        return parseJson(expectStr(this.eval(e.source, frame), "JsonParse source"));
      case "JsonStringify": {
        const value = this.eval(e.value, frame);
        const pretty = e.pretty ? truthy(this.eval(e.pretty, frame)) : false;
        return mkStr(stringifyJson(value, pretty));
      }
      case "RegexMatch":
        return regexMatch(this.eval(e.string, frame), this.eval(e.pattern, frame), this.optional(e.flags, frame));
      case "RegexFindAll":
        return regexFindAll(this.eval(e.string, frame), this.eval(e.pattern, frame), this.optional(e.flags, frame));
      case "RegexReplace":
        return regexReplace(
          this.eval(e.string, frame),
          this.eval(e.pattern, frame),
          this.eval(e.replacement, frame),
          this.optional(e.flags, frame),
        );
      case "RegexSplit":
        return regexSplit(
          this.eval(e.string, frame),
          this.eval(e.pattern, frame),
          this.optional(e.flags, frame),
          this.optional(e.maxsplit, frame),
        );

      case "ToInt":
        return toInt(this.eval(e.value, frame));
      case "ToFloat":
        return toFloat(this.eval(e.value, frame));
      case "ToString":
        return toStr(this.eval(e.value, frame));

      case "ExternalCall":
        return callExternal(this.externals, e.module, e.function, e.args.map(a => this.eval(a, frame)));
      case "MethodCall": {
        const obj = this.eval(e.object, frame);
        return callMethod(obj, e.method, e.args.map(a => this.eval(a, frame)));
      }
      case "PropertyGet":
        return getProperty(this.eval(e.object, frame), e.property);
    }
  }

  private optional(e: Expr | undefined, frame: Frame): Val | undefined {
    return e === undefined ? undefined : this.eval(e, frame);
  }
}

// ─────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────

/**
 * Executes a validated document. Returns 0 on success and 1 when an error
 * escapes to the top level.
 */
export function run(doc: Document, options: RunOptions = {}): ExitCode {
  const interp = new Interpreter(options);
  let message: string | undefined;
  try {
    const c = interp.execute(doc);
    if (c.kind === "thrown") message = c.message;
  } catch (e) {
    message = errorMessage(e);
  }
  if (message === undefined) return 0;
  if (options.errorCallback) options.errorCallback(message);
  else (options.out ?? (line => console.log(line)))(`runtime error: ${message}`);
  return 1;
}
