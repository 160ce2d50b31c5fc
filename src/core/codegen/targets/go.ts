// src/core/codegen/targets/go.ts
// Go backend. The program and its runtime share package main, so the two
// files build together with `go run .` or `go build`.
//
// Go has no exceptions. Runtime errors are panics, and a try statement runs
// its blocks as closures under rtTry, which recovers. Jumps out of those
// closures return a flow code that is re-issued once rtTry comes back.

import { isRange, numericOf, type Document, type ExprOf, type LiteralValue, type Stmt, type StmtOf } from "../../ast";
import {
  BaseEmitter,
  BINARY_RUNTIME,
  FLOW_CODE,
  type ExprHandlers,
  type JumpKind,
  type RuntimeFile,
  type StmtHandlers,
} from "../emitter";
import { floatLiteral, quoteGo } from "../format";
import { runtimeFilesFor } from "../runtimeFiles";

const v = (name: string): string => `v_${name}`;
const f = (name: string): string => `fn_${name}`;

/** `format_parts` -> `rtFormatParts` */
export function goRuntimeName(fn: string): string {
  const parts = fn.split("_").filter(p => p.length > 0);
  return "rt" + parts.map(p => p[0].toUpperCase() + p.slice(1)).join("");
}

export function goLiteral(value: LiteralValue): string {
  if (value === null) return "nil";
  if (typeof value === "boolean") return String(value);
  if (typeof value === "string") return quoteGo(value);
  const num = numericOf(value);
  if (num.kind === "int") return `int64(${num.n})`;
  return Object.is(num.n, -0) ? "rtNegZero" : `float64(${floatLiteral(num.n)})`;
}

export class GoEmitter extends BaseEmitter {
  readonly target = "go";
  readonly fileName = "main.go";
  protected readonly indentUnit = "\t";

  protected readonly exprHandlers: ExprHandlers = {
    ...this.runtimeExprHandlers(),
    Literal: e => goLiteral(e.value),
    Var: e => this.variable(e.name),
    Binary: e => this.binary(e),
    Ternary: e =>
      `func() Value { if rtTruthy(${this.expr(e.test)}) { return ${this.expr(e.consequent)} }; return ${this.expr(e.alternate)} }()`,
  };

  protected readonly stmtHandlers: StmtHandlers = {
    ...this.runtimeStmtHandlers(),
    If: s => {
      this.line(`if rtTruthy(${this.expr(s.test)}) {`);
      this.indented(() => this.block(s.then));
      const otherwise = s.else;
      if (otherwise && otherwise.length > 0) {
        this.line("} else {");
        this.indented(() => this.block(otherwise));
      }
      this.line("}");
    },
    While: s => {
      this.line(`for rtTruthy(${this.expr(s.test)}) {`);
      this.loopBody(s.body);
    },
    For: s => {
      if (!isRange(s.iter)) {
        this.forEach(s.var, this.expr(s.iter), s.body);
        return;
      }
      const i = this.temp("i");
      const stop = this.temp("s");
      const bounds = this.rt("range", [this.expr(s.iter.from), this.expr(s.iter.to), String(s.iter.inclusive === true)]);
      this.line(`for ${i}, ${stop} := ${bounds}; ${i} < ${stop}; ${i}++ {`);
      this.indented(() => this.line(`${v(s.var)} = ${i}`));
      this.loopBody(s.body);
    },
    ForEach: s => this.forEach(s.var, this.expr(s.iter), s.body),
    Switch: s => this.switchChain(s),
    Break: () => this.jump("break"),
    Continue: () => this.jump("continue"),
    Return: s => this.jump("return", s.value ? this.expr(s.value) : "nil"),
    TryCatch: s => this.tryCatch(s),
    Throw: s => this.line(`rtThrow(${this.expr(s.message)})`),
  };

  // ── primitives ─────────────────────────────────────────────────

  protected rt(fn: string, args: string[]): string {
    return `${goRuntimeName(fn)}(${args.join(", ")})`;
  }

  protected list(items: string[]): string {
    return `[]Value{${items.join(", ")}}`;
  }

  protected quote(s: string): string {
    return quoteGo(s);
  }

  protected userCall(fn: StmtOf<"FuncDef">, args: string[]): string {
    return `${f(fn.name)}(${args.join(", ")})`;
  }

  protected exprStatement(code: string): string {
    return code;
  }

  protected assign(name: string, value: string): void {
    this.line(`${v(name)} = ${value}`);
  }

  private variable(name: string): string {
    if (this.scopeOf(name) === "unbound") return this.fail(`variable '${name}' is not defined`);
    return `rtRead(${v(name)}, ${quoteGo(name)})`;
  }

  private binary(e: ExprOf<"Binary">): string {
    const left = this.expr(e.left);
    const right = this.expr(e.right);
    if (e.op === "and" || e.op === "or") {
      const t = this.temp("t");
      const test = e.op === "and" ? `rtTruthy(${t})` : `!rtTruthy(${t})`;
      return `func() Value { ${t} := ${left}; if ${test} { return ${right} }; return ${t} }()`;
    }
    return this.rt(BINARY_RUNTIME[e.op], [left, right]);
  }

  // ── control flow ───────────────────────────────────────────────

  private loopBody(body: readonly Stmt[]): void {
    this.indented(() => this.withLoop(() => this.block(body)));
    this.line("}");
  }

  private forEach(name: string, items: string, body: readonly Stmt[]): void {
    const item = this.temp("i");
    this.line(`for _, ${item} := range rtIter(${items}) {`);
    this.indented(() => this.line(`${v(name)} = ${item}`));
    this.loopBody(body);
  }

  private switchChain(s: StmtOf<"Switch">): void {
    const subject = this.temp("s");
    this.line("{");
    this.indented(() => {
      this.line(`${subject} := ${this.expr(s.test)}`);
      this.line(`_ = ${subject}`);
      s.cases.forEach((c, i) => {
        this.line(`${i === 0 ? "if" : "} else if"} rtEquals(${subject}, ${this.expr(c.value)}) {`);
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

  private jump(kind: JumpKind, value?: string): void {
    const region = this.jumpLeavesRegion(kind);
    if (region !== undefined) {
      this.line(`return ${FLOW_CODE[kind]}, ${value ?? "nil"}`);
      return;
    }
    this.line(kind === "return" ? `return ${value ?? "nil"}` : kind);
  }

  private closureBody(body: readonly Stmt[], prologue?: () => void): void {
    this.indented(() => {
      prologue?.();
      this.block(body);
      this.line("return 0, nil");
    });
  }

  private tryCatch(s: StmtOf<"TryCatch">): void {
    const region = this.temp("r");
    const flow = `${region}flow`;
    const ret = `${region}ret`;
    const msg = `${region}msg`;
    const fin = s.finally_body;
    this.line(`${flow}, ${ret} := rtTry(func() (int, Value) {`);
    const escapes = this.withRegion(region, () => {
      this.closureBody(s.body);
      this.line(`}, func(${msg} string) (int, Value) {`);
      this.closureBody(s.catch_body, () => this.assign(s.catch_var, msg));
      if (fin) {
        this.line("}, func() (int, Value) {");
        this.closureBody(fin);
        this.line("})");
      } else {
        this.line("}, nil)");
      }
    });
    this.line(`_, _ = ${flow}, ${ret}`);
    for (const kind of escapes) {
      this.line(`if ${flow} == ${FLOW_CODE[kind]} {`);
      this.indented(() => this.jump(kind, kind === "return" ? ret : undefined));
      this.line("}");
    }
  }

  // ── program ────────────────────────────────────────────────────

  protected emitProgram(doc: Document): void {
    this.line(`// Generated from Core IL (${doc.version}).`);
    this.line("package main");
    if (this.globalNames.length > 0) {
      this.line();
      for (const name of this.globalNames) this.line(`var ${v(name)} Value = rtUndef`);
    }
    for (const fn of this.functionDefs()) {
      this.line();
      this.markFunction(doc, fn);
      this.func(fn);
    }
    this.line();
    this.line("func program() {");
    this.indented(() => this.topLevel(doc.body));
    this.line("}");
    this.line();
    this.line("func main() {");
    this.indented(() => this.line("rtRunMain(program)"));
    this.line("}");
  }

  private func(fn: StmtOf<"FuncDef">): void {
    const params = fn.params.map(p => `${v(p)} Value`).join(", ");
    this.line(`func ${f(fn.name)}(${params}) Value {`);
    this.indented(() =>
      this.withFunction(fn, () => {
        this.line("rtEnter()");
        this.line("defer rtLeave()");
        for (const name of this.functionLocals(fn)) {
          this.line(`var ${v(name)} Value = rtUndef`);
          this.line(`_ = ${v(name)}`);
        }
        this.block(fn.body);
        this.line("return nil");
      }),
    );
    this.line("}");
  }

  protected runtimeFiles(): RuntimeFile[] {
    return runtimeFilesFor(this.target, ["coreil_runtime.go", "go.mod"]);
  }
}
