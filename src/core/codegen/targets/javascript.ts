// src/core/codegen/targets/javascript.ts
// JavaScript backend: one self-contained script with the runtime prelude inlined.
// Control flow maps onto native statements, including try/catch/finally.

import { isRange, numericOf, type Document, type ExprOf, type LiteralValue, type Stmt, type StmtOf } from "../../ast";
import { BaseEmitter, BINARY_RUNTIME, type ExprHandlers, type RuntimeFile, type StmtHandlers } from "../emitter";
import { floatLiteral, quoteJs } from "../format";
import { readRuntimeFile } from "../runtimeFiles";

const v = (name: string): string => `v_${name}`;
const f = (name: string): string => `fn_${name}`;

export function jsLiteral(value: LiteralValue): string {
  if (value === null) return "null";
  if (typeof value === "boolean") return String(value);
  if (typeof value === "string") return quoteJs(value);
  const num = numericOf(value);
  return num.kind === "int" ? `${num.n}n` : floatLiteral(num.n);
}

export class JavaScriptEmitter extends BaseEmitter {
  readonly target = "javascript";
  readonly fileName = "main.js";

  protected readonly exprHandlers: ExprHandlers = {
    ...this.runtimeExprHandlers(),
    Literal: e => jsLiteral(e.value),
    Var: e => this.variable(e.name),
    Binary: e => this.binary(e),
    Ternary: e => `(rt.truthy(${this.expr(e.test)}) ? ${this.expr(e.consequent)} : ${this.expr(e.alternate)})`,
    ExternalCall: e => this.rt("external", [quoteJs(e.module), quoteJs(e.function), this.list(e.args.map(a => this.expr(a)))]),
    MethodCall: e => {
      const obj = this.expr(e.object);
      return this.rt("method", [obj, quoteJs(e.method), this.list(e.args.map(a => this.expr(a)))]);
    },
    PropertyGet: e => this.rt("property", [this.expr(e.object), quoteJs(e.property)]),
  };

  protected readonly stmtHandlers: StmtHandlers = {
    ...this.runtimeStmtHandlers(),
    If: s => {
      this.line(`if (rt.truthy(${this.expr(s.test)})) {`);
      this.indented(() => this.block(s.then));
      if (s.else && s.else.length > 0) {
        const otherwise = s.else;
        this.line("} else {");
        this.indented(() => this.block(otherwise));
      }
      this.line("}");
    },
    While: s => {
      this.line(`while (rt.truthy(${this.expr(s.test)})) {`);
      this.loopBody(s.body);
    },
    For: s => {
      const items = isRange(s.iter)
        ? this.rt("range", [this.expr(s.iter.from), this.expr(s.iter.to), String(s.iter.inclusive === true)])
        : this.rt("iter", [this.expr(s.iter)]);
      this.forOf(s.var, items, s.body);
    },
    ForEach: s => this.forOf(s.var, this.rt("iter", [this.expr(s.iter)]), s.body),
    Switch: s => this.switchChain(s),
    Break: () => this.line("break;"),
    Continue: () => this.line("continue;"),
    Return: s => this.line(`return ${s.value ? this.expr(s.value) : "null"};`),
    TryCatch: s => this.tryCatch(s),
    Throw: s => this.line(`throw rt.error(${this.expr(s.message)});`),
  };

  // ── primitives ─────────────────────────────────────────────────

  protected rt(fn: string, args: string[]): string {
    return `rt.${fn}(${args.join(", ")})`;
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

  private variable(name: string): string {
    if (this.scopeOf(name) === "unbound") return this.fail(`variable '${name}' is not defined`);
    return `rt.read(${v(name)}, ${quoteJs(name)})`;
  }

  private binary(e: ExprOf<"Binary">): string {
    const left = this.expr(e.left);
    const right = this.expr(e.right);
    if (e.op === "and") return `((t_) => (rt.truthy(t_) ? ${right} : t_))(${left})`;
    if (e.op === "or") return `((t_) => (rt.truthy(t_) ? t_ : ${right}))(${left})`;
    return this.rt(BINARY_RUNTIME[e.op], [left, right]);
  }

  // ── control flow ───────────────────────────────────────────────

  private loopBody(body: readonly Stmt[]): void {
    this.indented(() => this.withLoop(() => this.block(body)));
    this.line("}");
  }

  private forOf(name: string, items: string, body: readonly Stmt[]): void {
    const item = this.temp("i");
    this.line(`for (const ${item} of ${items}) {`);
    this.indented(() => this.line(`${v(name)} = ${item};`));
    this.loopBody(body);
  }

  private switchChain(s: StmtOf<"Switch">): void {
    const subject = this.temp("s");
    this.line(`const ${subject} = ${this.expr(s.test)};`);
    if (s.cases.length === 0) {
      if (s.default) this.block(s.default);
      return;
    }
    s.cases.forEach((c, i) => {
      this.line(`${i === 0 ? "if" : "} else if"} (rt.equals(${subject}, ${this.expr(c.value)})) {`);
      this.indented(() => this.block(c.body));
    });
    const otherwise = s.default;
    if (otherwise && otherwise.length > 0) {
      this.line("} else {");
      this.indented(() => this.block(otherwise));
    }
    this.line("}");
  }

  private tryCatch(s: StmtOf<"TryCatch">): void {
    const err = this.temp("e");
    this.line("try {");
    this.indented(() => this.block(s.body));
    this.line(`} catch (${err}) {`);
    this.indented(() => {
      this.assign(s.catch_var, `rt.caught(${err})`);
      this.block(s.catch_body);
    });
    if (s.finally_body) {
      this.line("} finally {");
      const fin = s.finally_body;
      this.indented(() => this.block(fin));
    }
    this.line("}");
  }

  // ── program ────────────────────────────────────────────────────

  protected emitProgram(doc: Document): void {
    this.line(`// Generated from Core IL (${doc.version}).`);
    this.line('"use strict";');
    for (const l of readRuntimeFile(this.target, "coreil_runtime.js").trimEnd().split("\n")) this.lines.push(l);
    this.line();
    if (this.globalNames.length > 0) this.line(`let ${this.globalNames.map(v).join(", ")};`);
    for (const fn of this.functionDefs()) {
      this.line();
      this.markFunction(doc, fn);
      this.func(fn);
    }
    this.line();
    this.line("rt.main(() => {");
    this.indented(() => this.topLevel(doc.body));
    this.line("});");
  }

  private func(fn: StmtOf<"FuncDef">): void {
    this.line(`function ${f(fn.name)}(${fn.params.map(v).join(", ")}) {`);
    this.indented(() => {
      this.line("rt.enter();");
      this.line("try {");
      this.indented(() =>
        this.withFunction(fn, () => {
          const locals = this.functionLocals(fn);
          if (locals.length > 0) this.line(`let ${locals.map(v).join(", ")};`);
          this.block(fn.body);
          this.line("return null;");
        }),
      );
      this.line("} finally {");
      this.indented(() => this.line("rt.leave();"));
      this.line("}");
    });
    this.line("}");
  }

  protected runtimeFiles(): RuntimeFile[] {
    return [];
  }
}
