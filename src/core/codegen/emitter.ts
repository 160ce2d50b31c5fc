// src/core/codegen/emitter.ts
// Shared machinery for every backend.
//
// A backend is a pair of handler tables typed as total records over the node
// unions, so adding a node type without a handler is a compile error. Most
// data nodes lower to a call into the target's runtime library; the base
// class supplies those handlers and each backend fills in literals,
// variables, calls and control flow.

import type { Document, Expr, ExprOf, ExprType, Stmt, StmtOf, StmtType } from "../ast";
import { collectBoundNames } from "../ast";
import type { LineMap } from "../compiler/sourcemap";
import { UnsupportedOperationError, type UnsupportedCategory } from "./errors";

export type ExprMap = { [K in ExprType]: ExprOf<K> };
export type StmtMap = { [K in StmtType]: StmtOf<K> };
export type ExprHandlers = { [K in ExprType]: (e: ExprMap[K]) => string };
export type StmtHandlers = { [K in StmtType]: (s: StmtMap[K]) => void };

export interface RuntimeFile {
  name: string;
  content: string;
}

export interface EmitResult {
  target: string;
  code: string;
  fileName: string;
  runtimeFiles: RuntimeFile[];
  /** top-level statement index -> first generated line */
  lineMap: LineMap;
}

export type JumpKind = "break" | "continue" | "return";

/** Completion codes carried out of a try region; 0 is normal completion. */
export const FLOW_CODE: Record<JumpKind, number> = { break: 1, continue: 2, return: 3 };

type ControlFrame =
  | { kind: "function" }
  | { kind: "loop" }
  /** try region compiled to a closure; jumps out of it travel as flow codes */
  | { kind: "region"; label: string; escapes: Set<JumpKind> };

export type VarScope = "local" | "global" | "unbound";

function dispatchExpr<K extends ExprType>(table: ExprHandlers, type: K, e: ExprMap[K]): string {
  return table[type](e);
}

function dispatchStmt<K extends StmtType>(table: StmtHandlers, type: K, s: StmtMap[K]): void {
  table[type](s);
}

/** Operator -> runtime function name. */
export const BINARY_RUNTIME: Record<Exclude<ExprOf<"Binary">["op"], "and" | "or">, string> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "//": "floordiv",
  "%": "mod",
  "==": "eq",
  "!=": "ne",
  "<": "lt",
  "<=": "le",
  ">": "gt",
  ">=": "ge",
};

export abstract class BaseEmitter {
  abstract readonly target: string;
  abstract readonly fileName: string;
  protected readonly indentUnit: string = "  ";

  protected lines: string[] = [];
  protected depth = 0;
  protected lineMap: LineMap = {};
  protected control: ControlFrame[] = [];
  protected functions = new Map<string, StmtOf<"FuncDef">>();
  protected globalNames: string[] = [];
  protected localNames: ReadonlySet<string> | null = null;
  private tempCounter = 0;

  protected abstract readonly exprHandlers: ExprHandlers;
  protected abstract readonly stmtHandlers: StmtHandlers;

  emit(doc: Document): EmitResult {
    this.lines = [];
    this.depth = 0;
    this.lineMap = {};
    this.control = [];
    this.tempCounter = 0;
    this.functions = new Map(doc.body.flatMap(s => (s.type === "FuncDef" ? [[s.name, s] as const] : [])));
    this.globalNames = collectBoundNames(doc.body);
    this.localNames = null;
    this.emitProgram(doc);
    return {
      target: this.target,
      code: this.lines.join("\n") + "\n",
      fileName: this.fileName,
      runtimeFiles: this.runtimeFiles(),
      lineMap: this.lineMap,
    };
  }

  protected abstract emitProgram(doc: Document): void;
  protected abstract runtimeFiles(): RuntimeFile[];

  // ── output ─────────────────────────────────────────────────────

  protected line(text = ""): void {
    this.lines.push(text ? this.indentUnit.repeat(this.depth) + text : "");
  }

  protected indented(fn: () => void): void {
    this.depth++;
    try {
      fn();
    } finally {
      this.depth--;
    }
  }

  /** Next output line number (1-based). */
  protected get nextLine(): number {
    return this.lines.length + 1;
  }

  protected temp(prefix = "t"): string {
    return `${prefix}${this.tempCounter++}_`;
  }

  protected unsupported(nodeType: string, category: UnsupportedCategory): never {
    throw new UnsupportedOperationError(this.target, nodeType, category);
  }

  // ── dispatch ───────────────────────────────────────────────────

  protected expr(e: Expr): string {
    return dispatchExpr(this.exprHandlers, e.type, e);
  }

  protected stmt(s: Stmt): void {
    dispatchStmt(this.stmtHandlers, s.type, s);
  }

  protected block(body: readonly Stmt[]): void {
    for (const s of body) this.stmt(s);
  }

  /**
   * Emits the top-level statements of a program body, recording where each
   * one starts. FuncDefs are emitted separately; their entry is set by
   * `markFunction`.
   */
  protected topLevel(body: readonly Stmt[]): void {
    body.forEach((s, i) => {
      if (s.type === "FuncDef") return;
      this.lineMap[i] = this.nextLine;
      this.stmt(s);
    });
  }

  protected markFunction(doc: Document, fn: StmtOf<"FuncDef">): void {
    const i = doc.body.indexOf(fn);
    if (i >= 0) this.lineMap[i] = this.nextLine;
  }

  /** The last definition of each name wins. */
  protected functionDefs(): StmtOf<"FuncDef">[] {
    return [...this.functions.values()];
  }

  // ── scopes ─────────────────────────────────────────────────────

  protected scopeOf(name: string): VarScope {
    if (this.localNames?.has(name)) return "local";
    return this.globalNames.includes(name) ? "global" : "unbound";
  }

  protected functionLocals(fn: StmtOf<"FuncDef">): string[] {
    return collectBoundNames(fn.body).filter(n => !fn.params.includes(n));
  }

  protected withFunction(fn: StmtOf<"FuncDef">, emitBody: () => void): void {
    const saved = this.localNames;
    this.localNames = new Set([...fn.params, ...collectBoundNames(fn.body)]);
    this.withControl({ kind: "function" }, emitBody);
    this.localNames = saved;
  }

  protected withControl(frame: ControlFrame, fn: () => void): void {
    this.control.push(frame);
    try {
      fn();
    } finally {
      this.control.pop();
    }
  }

  protected withLoop(fn: () => void): void {
    this.withControl({ kind: "loop" }, fn);
  }

  /** Runs `fn` inside a try region and reports which jumps escaped it. */
  protected withRegion(label: string, fn: () => void): Set<JumpKind> {
    const escapes = new Set<JumpKind>();
    this.withControl({ kind: "region", label, escapes }, fn);
    return escapes;
  }

  /**
   * Label of the try region a jump of this kind leaves before reaching its
   * target, if any. The innermost region records the escape.
   */
  protected jumpLeavesRegion(kind: JumpKind): string | undefined {
    for (let i = this.control.length - 1; i >= 0; i--) {
      const frame = this.control[i];
      if (frame.kind === "region") {
        frame.escapes.add(kind);
        return frame.label;
      }
      if (frame.kind === "function") return undefined;
      if (frame.kind === "loop" && kind !== "return") return undefined;
    }
    return undefined;
  }

  protected inFunction(): boolean {
    return this.control.some(f => f.kind === "function");
  }

  protected inLoop(): boolean {
    for (let i = this.control.length - 1; i >= 0; i--) {
      const kind = this.control[i].kind;
      if (kind === "loop") return true;
      if (kind === "function") return false;
    }
    return false;
  }

  // ── backend primitives ─────────────────────────────────────────

  /** Call of a runtime library function, as an expression. */
  protected abstract rt(fn: string, args: string[]): string;
  /** Native sequence of runtime values, as passed to list-taking runtime functions. */
  protected abstract list(items: string[]): string;
  /** Native string literal. */
  protected abstract quote(s: string): string;
  /** Call of a user function with evaluated argument expressions. */
  protected abstract userCall(fn: StmtOf<"FuncDef">, args: string[]): string;
  /** Expression that raises a runtime error with a fixed message. */
  protected fail(message: string): string {
    return this.rt("fail", [this.quote(message)]);
  }

  /** Evaluates `args` for their effects, then raises. */
  protected failAfter(args: string[], message: string): string {
    return args.length === 0 ? this.fail(message) : this.rt("fail_with", [this.list(args), this.quote(message)]);
  }

  protected none(): string {
    return this.expr({ type: "Literal", value: null });
  }

  protected optional(e: Expr | undefined): string {
    return e === undefined ? this.none() : this.expr(e);
  }

  protected call(e: ExprOf<"Call"> | StmtOf<"Call">): string {
    const fn = this.functions.get(e.name);
    const args = e.args.map(a => this.expr(a));
    if (fn) {
      const n = fn.params.length;
      if (args.length !== n) {
        return this.failAfter(args, `function '${fn.name}' expects ${n} argument${n === 1 ? "" : "s"}, got ${args.length}`);
      }
      return this.userCall(fn, args);
    }
    const helper = LEGACY_RUNTIME[e.name];
    if (helper) {
      const [name, n] = helper;
      if (args.length !== n) return this.failAfter(args, `${e.name} expects ${n} argument${n === 1 ? "" : "s"}`);
      return this.rt(name, args);
    }
    return this.failAfter(args, `unknown function '${e.name}'`);
  }

  // ── shared handlers ────────────────────────────────────────────

  /** Handlers for every node that maps onto one runtime call. */
  protected runtimeExprHandlers() {
    const x = (e: Expr): string => this.expr(e);
    const rt = (fn: string, ...args: string[]): string => this.rt(fn, args);
    const tier2 = (e: Expr): string => this.unsupported(e.type, "tier2");
    return {
      Not: (e: ExprOf<"Not">) => rt("not_", x(e.arg)),
      Call: (e: ExprOf<"Call">) => this.call(e),
      StringFormat: (e: ExprOf<"StringFormat">) => rt("format_parts", this.list(e.parts.map(x))),
      Array: (e: ExprOf<"Array">) => rt("list_of", this.list(e.items.map(x))),
      Tuple: (e: ExprOf<"Tuple">) => rt("tuple_of", this.list(e.items.map(x))),
      Index: (e: ExprOf<"Index">) => rt("index", x(e.base), x(e.index)),
      Slice: (e: ExprOf<"Slice">) => rt("slice", x(e.base), x(e.start), x(e.end)),
      Length: (e: ExprOf<"Length">) => rt("length", x(e.base)),
      Map: (e: ExprOf<"Map">) => rt("map_of", this.list(e.items.flatMap(i => [x(i.key), x(i.value)]))),
      Get: (e: ExprOf<"Get">) => rt("get", x(e.base), x(e.key)),
      GetDefault: (e: ExprOf<"GetDefault">) => rt("get_default", x(e.base), x(e.key), x(e.default)),
      Keys: (e: ExprOf<"Keys">) => rt("keys", x(e.base)),
      Record: (e: ExprOf<"Record">) =>
        rt("record_of", this.list(e.fields.flatMap(f => [this.expr({ type: "Literal", value: f.name }), x(f.value)]))),
      GetField: (e: ExprOf<"GetField">) => rt("get_field", x(e.base), this.quote(e.name)),
      Set: (e: ExprOf<"Set">) => rt("set_of", this.list(e.items.map(x))),
      SetHas: (e: ExprOf<"SetHas">) => rt("set_has", x(e.base), x(e.value)),
      SetSize: (e: ExprOf<"SetSize">) => rt("set_size", x(e.base)),
      DequeNew: () => rt("deque_new"),
      DequeSize: (e: ExprOf<"DequeSize">) => rt("deque_size", x(e.base)),
      HeapNew: () => rt("heap_new"),
      HeapSize: (e: ExprOf<"HeapSize">) => rt("heap_size", x(e.base)),
      HeapPeek: (e: ExprOf<"HeapPeek">) => rt("heap_peek", x(e.base)),
      StringLength: (e: ExprOf<"StringLength">) => rt("string_length", x(e.base)),
      Substring: (e: ExprOf<"Substring">) => rt("substring", x(e.base), x(e.start), x(e.end)),
      CharAt: (e: ExprOf<"CharAt">) => rt("char_at", x(e.base), x(e.index)),
      Join: (e: ExprOf<"Join">) => rt("join", x(e.sep), x(e.items)),
      StringSplit: (e: ExprOf<"StringSplit">) => rt("split", x(e.base), x(e.delimiter)),
      StringTrim: (e: ExprOf<"StringTrim">) => rt("trim", x(e.base)),
      StringUpper: (e: ExprOf<"StringUpper">) => rt("upper", x(e.base)),
      StringLower: (e: ExprOf<"StringLower">) => rt("lower", x(e.base)),
      StringStartsWith: (e: ExprOf<"StringStartsWith">) => rt("starts_with", x(e.base), x(e.prefix)),
      StringEndsWith: (e: ExprOf<"StringEndsWith">) => rt("ends_with", x(e.base), x(e.suffix)),
      StringContains: (e: ExprOf<"StringContains">) => rt("contains", x(e.base), x(e.substring)),
      StringReplace: (e: ExprOf<"StringReplace">) => rt("replace", x(e.base), x(e.old), x(e.new)),
      Math: (e: ExprOf<"Math">) => rt("math", this.quote(e.op), x(e.arg)),
      MathPow: (e: ExprOf<"MathPow">) => rt("pow", x(e.base), x(e.exponent)),
      MathConst: (e: ExprOf<"MathConst">) => rt("math_const", this.quote(e.name)),
      JsonParse: (e: ExprOf<"JsonParse">) => rt("json_parse", x(e.source)),
      JsonStringify: (e: ExprOf<"JsonStringify">) =>
        rt("json_stringify", x(e.value), e.pretty ? x(e.pretty) : this.expr({ type: "Literal", value: false })),
      RegexMatch: (e: ExprOf<"RegexMatch">) => rt("regex_match", x(e.string), x(e.pattern), this.optional(e.flags)),
      RegexFindAll: (e: ExprOf<"RegexFindAll">) =>
        rt("regex_findall", x(e.string), x(e.pattern), this.optional(e.flags)),
      RegexReplace: (e: ExprOf<"RegexReplace">) =>
        rt("regex_replace", x(e.string), x(e.pattern), x(e.replacement), this.optional(e.flags)),
      RegexSplit: (e: ExprOf<"RegexSplit">) =>
        rt("regex_split", x(e.string), x(e.pattern), this.optional(e.flags), this.optional(e.maxsplit)),
      ToInt: (e: ExprOf<"ToInt">) => rt("to_int", x(e.value)),
      ToFloat: (e: ExprOf<"ToFloat">) => rt("to_float", x(e.value)),
      ToString: (e: ExprOf<"ToString">) => rt("to_string", x(e.value)),
      ExternalCall: tier2,
      MethodCall: tier2,
      PropertyGet: tier2,
    } satisfies Partial<ExprHandlers>;
  }

  /** Statement form of an expression. */
  protected abstract exprStatement(code: string): string;
  /** Assignment to a named variable in the current scope. */
  protected abstract assign(name: string, value: string): void;

  /** Handlers for statements that are one runtime call or one assignment. */
  protected runtimeStmtHandlers() {
    const x = (e: Expr): string => this.expr(e);
    const run = (fn: string, ...args: string[]): void => this.line(this.exprStatement(this.rt(fn, args)));
    return {
      Let: (s: StmtOf<"Let">) => this.assign(s.name, x(s.value)),
      Assign: (s: StmtOf<"Assign">) => this.assign(s.name, x(s.value)),
      Print: (s: StmtOf<"Print">) => run("print", this.list(s.args.map(x))),
      Call: (s: StmtOf<"Call">) => this.line(this.exprStatement(this.call(s))),
      SetIndex: (s: StmtOf<"SetIndex">) => run("set_index", x(s.base), x(s.index), x(s.value)),
      Set: (s: StmtOf<"Set">) => run("map_set", x(s.base), x(s.key), x(s.value)),
      Push: (s: StmtOf<"Push">) => run("push", x(s.base), x(s.value)),
      SetField: (s: StmtOf<"SetField">) => run("set_field", x(s.base), this.quote(s.name), x(s.value)),
      SetAdd: (s: StmtOf<"SetAdd">) => run("set_add", x(s.base), x(s.value)),
      SetRemove: (s: StmtOf<"SetRemove">) => run("set_remove", x(s.base), x(s.value)),
      PushBack: (s: StmtOf<"PushBack">) => run("push_back", x(s.base), x(s.value)),
      PushFront: (s: StmtOf<"PushFront">) => run("push_front", x(s.base), x(s.value)),
      PopFront: (s: StmtOf<"PopFront">) => this.assign(s.target, this.rt("pop_front", [x(s.base)])),
      PopBack: (s: StmtOf<"PopBack">) => this.assign(s.target, this.rt("pop_back", [x(s.base)])),
      HeapPush: (s: StmtOf<"HeapPush">) => run("heap_push", x(s.base), x(s.priority), x(s.value)),
      HeapPop: (s: StmtOf<"HeapPop">) => this.assign(s.target, this.rt("heap_pop", [x(s.base)])),
      // Functions are emitted ahead of the program body.
      FuncDef: () => {},
      // Imports are resolved before emission.
      Import: () => {},
    } satisfies Partial<StmtHandlers>;
  }
}

/** Legacy helper name -> [runtime function, arity]. */
const LEGACY_RUNTIME: Record<string, readonly [string, number] | undefined> = {
  get_or_default: ["get_default", 3],
  keys: ["keys", 1],
  entries: ["entries", 1],
  append: ["append", 2],
};
