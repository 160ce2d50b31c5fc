// src/core/codegen/targets/rust.ts
// Rust backend, emitted as a Cargo project.
//
// Every runtime call returns a Result and is followed by `?`. Globals live
// in an `Env` struct passed to each function as `g`. A try statement runs
// its blocks as immediately-invoked closures returning `Result<Flow, String>`,
// and a jump out of one becomes a Flow value that is re-issued afterwards.

import { isRange, numericOf, type Document, type ExprOf, type LiteralValue, type Stmt, type StmtOf } from "../../ast";
import {
  BaseEmitter,
  BINARY_RUNTIME,
  type ExprHandlers,
  type JumpKind,
  type RuntimeFile,
  type StmtHandlers,
} from "../emitter";
import { floatLiteral, quoteRust } from "../format";
import { readRuntimeFile } from "../runtimeFiles";

const v = (name: string): string => `v_${name}`;
const f = (name: string): string => `fn_${name}`;

/** Runtime names that collide with Rust keywords. */
const RENAMED: Record<string, string | undefined> = { mod: "mod_" };

const FLOW_VARIANT: Record<JumpKind, string> = { break: "Flow::Break", continue: "Flow::Continue", return: "Flow::Return" };

const REGION_TYPE = "Result<Flow, String>";

export function rustLiteral(value: LiteralValue): string {
  if (value === null) return "Value::None";
  if (typeof value === "boolean") return `Value::Bool(${value})`;
  if (typeof value === "string") return `rt::text(${quoteRust(value)})`;
  const num = numericOf(value);
  return num.kind === "int" ? `Value::Int(${num.n})` : `Value::Float(${floatLiteral(num.n)})`;
}

export class RustEmitter extends BaseEmitter {
  readonly target = "rust";
  readonly fileName = "src/main.rs";
  protected readonly indentUnit = "    ";

  protected readonly exprHandlers: ExprHandlers = {
    ...this.runtimeExprHandlers(),
    Literal: e => rustLiteral(e.value),
    Var: e => this.variable(e.name),
    Binary: e => this.binary(e),
    Ternary: e =>
      `(if rt::truthy(&${this.expr(e.test)}) { ${this.expr(e.consequent)} } else { ${this.expr(e.alternate)} })`,
  };

  protected readonly stmtHandlers: StmtHandlers = {
    ...this.runtimeStmtHandlers(),
    If: s => {
      this.line(`if rt::truthy(&${this.expr(s.test)}) {`);
      this.indented(() => this.block(s.then));
      const otherwise = s.else;
      if (otherwise && otherwise.length > 0) {
        this.line("} else {");
        this.indented(() => this.block(otherwise));
      }
      this.line("}");
    },
    While: s => {
      this.line(`while rt::truthy(&${this.expr(s.test)}) {`);
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
        this.line(`let (${r}lo, ${r}hi) = ${bounds};`);
        this.line(`for ${i} in ${r}lo..${r}hi {`);
        this.indented(() => this.assign(s.var, `Value::Int(${i})`));
        this.loopBody(s.body);
      });
      this.line("}");
    },
    ForEach: s => this.forEach(s.var, this.expr(s.iter), s.body),
    Switch: s => this.switchChain(s),
    Break: () => this.jump("break"),
    Continue: () => this.jump("continue"),
    Return: s => this.jump("return", s.value ? this.expr(s.value) : "Value::None"),
    TryCatch: s => this.tryCatch(s),
    Throw: s => this.line(`return Err(rt::thrown(${this.expr(s.message)}));`),
  };

  // ── primitives ─────────────────────────────────────────────────

  protected rt(fn: string, args: string[]): string {
    return `rt::${RENAMED[fn] ?? fn}(${args.join(", ")})?`;
  }

  protected list(items: string[]): string {
    return `vec![${items.join(", ")}]`;
  }

  protected quote(s: string): string {
    return quoteRust(s);
  }

  /** Arguments that touch `g` are bound first so the call's own borrow of `g` does not overlap them. */
  protected userCall(fn: StmtOf<"FuncDef">, args: string[]): string {
    if (!args.some(a => /\bg\b/.test(a))) return `${f(fn.name)}(${["g", ...args].join(", ")})?`;
    const names = args.map(() => this.temp("a"));
    const binds = args.map((a, k) => `let ${names[k]} = ${a};`).join(" ");
    return `{ ${binds} ${f(fn.name)}(${["g", ...names].join(", ")})? }`;
  }

  protected exprStatement(code: string): string {
    return `${code};`;
  }

  private place(name: string): string {
    return this.scopeOf(name) === "local" ? v(name) : `g.${v(name)}`;
  }

  protected assign(name: string, value: string): void {
    this.line(`${this.place(name)} = ${value};`);
  }

  private variable(name: string): string {
    if (this.scopeOf(name) === "unbound") return this.fail(`variable '${name}' is not defined`);
    return `rt::read(&${this.place(name)}, ${quoteRust(name)})?`;
  }

  private binary(e: ExprOf<"Binary">): string {
    const left = this.expr(e.left);
    const right = this.expr(e.right);
    if (e.op === "and" || e.op === "or") {
      const t = this.temp("t");
      const pick = e.op === "and" ? `{ ${right} } else { ${t} }` : `{ ${t} } else { ${right} }`;
      return `{ let ${t} = ${left}; if rt::truthy(&${t}) ${pick} }`;
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
    this.line(`for ${item} in rt::iter(${items})? {`);
    this.indented(() => this.assign(name, item));
    this.loopBody(body);
  }

  private switchChain(s: StmtOf<"Switch">): void {
    const subject = this.temp("s");
    this.line("{");
    this.indented(() => {
      this.line(`let ${subject} = ${this.expr(s.test)};`);
      s.cases.forEach((c, i) => {
        this.line(`${i === 0 ? "if" : "} else if"} rt::equals(&${subject}, &${this.expr(c.value)}) {`);
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
    if (this.jumpLeavesRegion(kind) !== undefined) {
      const flow = kind === "return" ? `Flow::Return(${value ?? "Value::None"})` : FLOW_VARIANT[kind];
      this.line(`return Ok(${flow});`);
      return;
    }
    this.line(kind === "return" ? `return Ok(${value ?? "Value::None"});` : `${kind};`);
  }

  /** `(|| -> Result<Flow, String> { ... })()`, opened on the current line. */
  private closure(head: string, body: readonly Stmt[], tail: string, prologue?: () => void): void {
    this.line(`${head}(|| -> ${REGION_TYPE} {`);
    this.indented(() => {
      prologue?.();
      this.block(body);
      this.line("Ok(Flow::Normal)");
    });
    this.line(`})()${tail}`);
  }

  private tryCatch(s: StmtOf<"TryCatch">): void {
    const region = this.temp("r");
    const body = `${region}body`;
    const res = `${region}res`;
    const msg = `${region}msg`;
    const fin = s.finally_body;
    this.line("{");
    this.indented(() => {
      const escapes = this.withRegion(region, () => {
        this.closure(`let ${body}: ${REGION_TYPE} = `, s.body, ";");
        this.line(`let ${res}: ${REGION_TYPE} = match ${body} {`);
        this.indented(() => {
          this.closure(`Err(${msg}) => `, s.catch_body, ",", () => this.assign(s.catch_var, `rt::text(&${msg})`));
          this.line("done => done,");
        });
        this.line("};");
        if (fin) {
          this.closure(`let ${res}: ${REGION_TYPE} = match `, fin, "? {");
          this.indented(() => {
            this.line(`Flow::Normal => ${res},`);
            this.line("jump => Ok(jump),");
          });
          this.line("};");
        }
      });
      this.line(`match ${res}? {`);
      this.indented(() => {
        for (const kind of escapes) {
          this.line(`${FLOW_VARIANT[kind]}${kind === "return" ? `(${region}ret)` : ""} => {`);
          this.indented(() => this.jump(kind, kind === "return" ? `${region}ret` : undefined));
          this.line("}");
        }
        this.line("_ => {}");
      });
      this.line("}");
    });
    this.line("}");
  }

  // ── program ────────────────────────────────────────────────────

  protected emitProgram(doc: Document): void {
    this.line(`// Generated from Core IL (${doc.version}).`);
    this.line("#![allow(unused, unreachable_code, unreachable_patterns)]");
    this.line();
    this.line("mod coreil_runtime;");
    this.line();
    this.line("use crate::coreil_runtime as rt;");
    this.line("use rt::{Flow, Value};");
    this.line();
    this.line("struct Env {");
    this.indented(() => {
      for (const name of this.globalNames) this.line(`${v(name)}: Value,`);
    });
    this.line("}");
    for (const fn of this.functionDefs()) {
      this.line();
      this.markFunction(doc, fn);
      this.func(fn);
    }
    this.line();
    this.line("fn program() -> Result<(), String> {");
    this.indented(() => {
      const fields = this.globalNames.map(name => `${v(name)}: Value::Undef`).join(", ");
      this.line(`let mut env = Env { ${fields} };`);
      this.line("let g = &mut env;");
      this.topLevel(doc.body);
      this.line("Ok(())");
    });
    this.line("}");
    this.line();
    this.line("fn main() {");
    this.indented(() => this.line("rt::run_main(program);"));
    this.line("}");
  }

  private func(fn: StmtOf<"FuncDef">): void {
    const params = ["g: &mut Env", ...fn.params.map(p => `mut ${v(p)}: Value`)].join(", ");
    this.line(`fn ${f(fn.name)}(${params}) -> Result<Value, String> {`);
    this.indented(() =>
      this.withFunction(fn, () => {
        this.line("let _guard = rt::enter()?;");
        for (const name of this.functionLocals(fn)) this.line(`let mut ${v(name)} = Value::Undef;`);
        this.block(fn.body);
        this.line("Ok(Value::None)");
      }),
    );
    this.line("}");
  }

  protected runtimeFiles(): RuntimeFile[] {
    return [
      { name: "Cargo.toml", content: readRuntimeFile(this.target, "Cargo.toml") },
      { name: "src/coreil_runtime.rs", content: readRuntimeFile(this.target, "coreil_runtime.rs") },
    ];
  }
}
