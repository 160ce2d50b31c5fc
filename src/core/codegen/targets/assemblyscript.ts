// src/core/codegen/targets/assemblyscript.ts
// AssemblyScript backend, compiled to WebAssembly with asc and run by the
// bundled run.mjs host.
//
// AssemblyScript has neither closures nor exceptions, so short-circuit
// operators go through module-level temporaries and try/throw are rejected.

import { isRange, numericOf, type Document, type ExprOf, type LiteralValue, type Stmt, type StmtOf } from "../../ast";
import { INT64_MIN } from "../../constants";
import { BaseEmitter, BINARY_RUNTIME, type ExprHandlers, type RuntimeFile, type StmtHandlers } from "../emitter";
import { floatLiteral, quoteJs } from "../format";
import { runtimeFilesFor } from "../runtimeFiles";

const v = (name: string): string => `v_${name}`;
const f = (name: string): string => `fn_${name}`;

/** `not_` -> `rt_not` */
export function asRuntimeName(fn: string): string {
  return `rt_${fn.replace(/_$/, "")}`;
}

export function asLiteral(value: LiteralValue): string {
  if (value === null) return "NONE";
  if (typeof value === "boolean") return `rt_bool(${value})`;
  if (typeof value === "string") return `rt_str(${quoteJs(value)})`;
  const num = numericOf(value);
  if (num.kind === "float") return `rt_float(${floatLiteral(num.n)})`;
  return `rt_int(${num.n === INT64_MIN ? "i64.MIN_VALUE" : num.n})`;
}

export class AssemblyScriptEmitter extends BaseEmitter {
  readonly target = "assemblyscript";
  readonly fileName = "main.ts";

  private imports = new Set<string>();
  private temps: string[] = [];

  protected readonly exprHandlers: ExprHandlers = {
    ...this.runtimeExprHandlers(),
    Literal: e => this.literal(e.value),
    Var: e => this.variable(e.name),
    Binary: e => this.binary(e),
    Ternary: e => `(${this.truthy(this.expr(e.test))} ? ${this.expr(e.consequent)} : ${this.expr(e.alternate)})`,
    RegexMatch: e => this.unsupported(e.type, "regex"),
    RegexFindAll: e => this.unsupported(e.type, "regex"),
    RegexReplace: e => this.unsupported(e.type, "regex"),
    RegexSplit: e => this.unsupported(e.type, "regex"),
  };

  protected readonly stmtHandlers: StmtHandlers = {
    ...this.runtimeStmtHandlers(),
    If: s => {
      this.line(`if (${this.truthy(this.expr(s.test))}) {`);
      this.indented(() => this.block(s.then));
      const otherwise = s.else;
      if (otherwise && otherwise.length > 0) {
        this.line("} else {");
        this.indented(() => this.block(otherwise));
      }
      this.line("}");
    },
    While: s => {
      this.line(`while (${this.truthy(this.expr(s.test))}) {`);
      this.loopBody(s.body);
    },
    For: s => {
      if (!isRange(s.iter)) {
        this.forEach(s.var, this.expr(s.iter), s.body);
        return;
      }
      const r = this.temp("r");
      const i = this.temp("i");
      const bounds = this.rt("range", [this.expr(s.iter.from), this.expr(s.iter.to), String(s.iter.inclusive === true)]);
      this.line("{");
      this.indented(() => {
        this.line(`const ${r} = ${bounds};`);
        this.line(`for (let ${i}: i64 = ${r}.start; ${i} < ${r}.stop; ${i}++) {`);
        this.indented(() => this.assign(s.var, this.rt("int", [i])));
        this.loopBody(s.body);
      });
      this.line("}");
    },
    ForEach: s => this.forEach(s.var, this.expr(s.iter), s.body),
    Switch: s => this.switchChain(s),
    Break: () => this.line("break;"),
    Continue: () => this.line("continue;"),
    Return: s => this.line(`return ${this.rt("leave", [s.value ? this.expr(s.value) : this.none()])};`),
    TryCatch: s => this.unsupported(s.type, "construct"),
    Throw: s => this.unsupported(s.type, "construct"),
  };

  emit(doc: Document) {
    this.imports = new Set(["Value", "UNDEF", "NONE"]);
    this.temps = [];
    return super.emit(doc);
  }

  // ── primitives ─────────────────────────────────────────────────

  protected rt(fn: string, args: string[]): string {
    const name = asRuntimeName(fn);
    this.imports.add(name);
    return `${name}(${args.join(", ")})`;
  }

  protected list(items: string[]): string {
    return `[${items.join(", ")}]`;
  }

  protected quote(s: string): string {
    return quoteJs(s);
  }

  protected userCall(fn: StmtOf<"FuncDef">, args: string[]): string {
    return `${f(fn.name)}(${args.join(", ")})`;
  }

  protected exprStatement(code: string): string {
    return `${code};`;
  }

  protected assign(name: string, value: string): void {
    this.line(`${v(name)} = ${value};`);
  }

  private literal(value: LiteralValue): string {
    const code = asLiteral(value);
    const call = /^(rt_\w+)\(/.exec(code);
    if (call) this.imports.add(call[1]);
    return code;
  }

  private truthy(code: string): string {
    this.imports.add("rt_truthy");
    return `rt_truthy(${code})`;
  }

  private variable(name: string): string {
    if (this.scopeOf(name) === "unbound") return this.fail(`variable '${name}' is not defined`);
    return this.rt("read", [v(name), quoteJs(name)]);
  }

  /** `t = L` is tested and read back with no call in between, so one module-level slot per site is enough. */
  private binary(e: ExprOf<"Binary">): string {
    const left = this.expr(e.left);
    const right = this.expr(e.right);
    if (e.op === "and" || e.op === "or") {
      const t = this.temp("t");
      this.temps.push(t);
      const pick = e.op === "and" ? `${right} : ${t}` : `${t} : ${right}`;
      return `(${this.truthy(`${t} = ${left}`)} ? ${pick})`;
    }
    return this.rt(BINARY_RUNTIME[e.op], [left, right]);
  }

  // ── control flow ───────────────────────────────────────────────

  private loopBody(body: readonly Stmt[]): void {
    this.indented(() => this.withLoop(() => this.block(body)));
    this.line("}");
  }

  private forEach(name: string, items: string, body: readonly Stmt[]): void {
    const list = this.temp("l");
    const k = this.temp("k");
    this.line("{");
    this.indented(() => {
      this.line(`const ${list} = ${this.rt("iter", [items])};`);
      this.line(`for (let ${k} = 0; ${k} < ${list}.length; ${k}++) {`);
      this.indented(() => this.assign(name, `${list}[${k}]`));
      this.loopBody(body);
    });
    this.line("}");
  }

  private switchChain(s: StmtOf<"Switch">): void {
    const subject = this.temp("s");
    this.imports.add("rt_equals");
    this.line("{");
    this.indented(() => {
      this.line(`const ${subject} = ${this.expr(s.test)};`);
      s.cases.forEach((c, i) => {
        this.line(`${i === 0 ? "if" : "} else if"} (rt_equals(${subject}, ${this.expr(c.value)})) {`);
        this.indented(() => this.block(c.body));
      });
      const otherwise = s.default;
      if (s.cases.length === 0) {
        if (otherwise) this.block(otherwise);
        return;
      }
      if (otherwise && otherwise.length > 0) {
        this.line("} else {");
        this.indented(() => this.block(otherwise));
      }
      this.line("}");
    });
    this.line("}");
  }

  // ── program ────────────────────────────────────────────────────

  protected emitProgram(doc: Document): void {
    this.line(`// Generated from Core IL (${doc.version}).`);
    const header = this.lines.length;
    for (const name of this.globalNames) this.line(`let ${v(name)}: Value = UNDEF;`);
    for (const fn of this.functionDefs()) {
      this.line();
      this.markFunction(doc, fn);
      this.func(fn);
    }
    this.line();
    this.line("export function main(): void {");
    this.indented(() => this.topLevel(doc.body));
    this.line("}");

    const prelude = [
      "",
      `import { ${[...this.imports].join(", ")} } from "./coreil_runtime";`,
      "",
      ...this.temps.map(t => `let ${t}: Value = NONE;`),
    ];
    this.insertLines(header, prelude);
  }

  /** Inserts lines after the body is written, shifting recorded positions. */
  private insertLines(at: number, inserted: string[]): void {
    this.lines.splice(at, 0, ...inserted);
    for (const [key, line] of Object.entries(this.lineMap)) {
      if (line > at) this.lineMap[Number(key)] = line + inserted.length;
    }
  }

  private func(fn: StmtOf<"FuncDef">): void {
    const params = fn.params.map(p => `${v(p)}: Value`).join(", ");
    this.line(`function ${f(fn.name)}(${params}): Value {`);
    this.indented(() =>
      this.withFunction(fn, () => {
        this.line(`${this.rt("enter", [])};`);
        for (const name of this.functionLocals(fn)) this.line(`let ${v(name)}: Value = UNDEF;`);
        this.block(fn.body);
        this.line(`return ${this.rt("leave", [this.none()])};`);
      }),
    );
    this.line("}");
  }

  protected runtimeFiles(): RuntimeFile[] {
    return runtimeFilesFor(this.target, ["coreil_runtime.ts", "run.mjs"]);
  }
}
