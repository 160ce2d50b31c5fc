// src/core/codegen/targets/python.ts
// Python backend: main.py beside an importable runtime module. The program
// body runs inside main_() with every top-level variable declared global.

import { isRange, numericOf, type Document, type ExprOf, type LiteralValue, type Stmt, type StmtOf } from "../../ast";
import { BaseEmitter, BINARY_RUNTIME, type ExprHandlers, type RuntimeFile, type StmtHandlers } from "../emitter";
import { floatLiteral, quotePython } from "../format";
import { runtimeFilesFor } from "../runtimeFiles";

const v = (name: string): string => `v_${name}`;
const f = (name: string): string => `fn_${name}`;

/** Runtime functions whose plain name is a Python builtin. */
const RENAMED: Record<string, string | undefined> = {
  print: "print_",
  range: "range_",
  iter: "iter_",
  pow: "pow_",
  slice: "slice_",
  property: "property_",
  math: "math_",
};

export function pyLiteral(value: LiteralValue): string {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "string") return quotePython(value);
  const num = numericOf(value);
  return num.kind === "int" ? String(num.n) : floatLiteral(num.n);
}

export class PythonEmitter extends BaseEmitter {
  readonly target = "python";
  readonly fileName = "main.py";
  protected readonly indentUnit = "    ";

  protected readonly exprHandlers: ExprHandlers = {
    ...this.runtimeExprHandlers(),
    Literal: e => pyLiteral(e.value),
    Var: e => this.variable(e.name),
    Binary: e => this.binary(e),
    Ternary: e => `(${this.expr(e.consequent)} if rt.truthy(${this.expr(e.test)}) else ${this.expr(e.alternate)})`,
    ExternalCall: e =>
      this.rt("external", [quotePython(e.module), quotePython(e.function), this.list(e.args.map(a => this.expr(a)))]),
    MethodCall: e => {
      const obj = this.expr(e.object);
      return this.rt("method", [obj, quotePython(e.method), this.list(e.args.map(a => this.expr(a)))]);
    },
    PropertyGet: e => this.rt("property", [this.expr(e.object), quotePython(e.property)]),
  };

  protected readonly stmtHandlers: StmtHandlers = {
    ...this.runtimeStmtHandlers(),
    If: s => {
      this.line(`if rt.truthy(${this.expr(s.test)}):`);
      this.suite(s.then);
      if (s.else && s.else.length > 0) {
        this.line("else:");
        this.suite(s.else);
      }
    },
    While: s => {
      this.line(`while rt.truthy(${this.expr(s.test)}):`);
      this.withLoop(() => this.suite(s.body));
    },
    For: s => {
      const items = isRange(s.iter)
        ? this.rt("range", [this.expr(s.iter.from), this.expr(s.iter.to), s.iter.inclusive === true ? "True" : "False"])
        : this.rt("iter", [this.expr(s.iter)]);
      this.forIn(s.var, items, s.body);
    },
    ForEach: s => this.forIn(s.var, this.rt("iter", [this.expr(s.iter)]), s.body),
    Switch: s => this.switchChain(s),
    Break: () => this.line("break"),
    Continue: () => this.line("continue"),
    Return: s => this.line(`return ${s.value ? this.expr(s.value) : "None"}`),
    TryCatch: s => this.tryExcept(s),
    Throw: s => this.line(`raise rt.error(${this.expr(s.message)})`),
  };

  // ── primitives ─────────────────────────────────────────────────

  protected rt(fn: string, args: string[]): string {
    return `rt.${RENAMED[fn] ?? fn}(${args.join(", ")})`;
  }

  protected list(items: string[]): string {
    return `[${items.join(", ")}]`;
  }

  protected quote(s: string): string {
    return quotePython(s);
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
    return `rt.read(${v(name)}, ${quotePython(name)})`;
  }

  private binary(e: ExprOf<"Binary">): string {
    const left = this.expr(e.left);
    const right = this.expr(e.right);
    if (e.op === "and") return `(lambda t_: ${right} if rt.truthy(t_) else t_)(${left})`;
    if (e.op === "or") return `(lambda t_: t_ if rt.truthy(t_) else ${right})(${left})`;
    return this.rt(BINARY_RUNTIME[e.op], [left, right]);
  }

  // ── control flow ───────────────────────────────────────────────

  /** Indented block that is never empty. */
  private suite(body: readonly Stmt[]): void {
    this.indented(() => {
      const before = this.lines.length;
      this.block(body);
      if (this.lines.length === before) this.line("pass");
    });
  }

  private forIn(name: string, items: string, body: readonly Stmt[]): void {
    const item = this.temp("i");
    this.line(`for ${item} in ${items}:`);
    this.indented(() => this.line(`${v(name)} = ${item}`));
    this.withLoop(() => this.indented(() => this.block(body)));
  }

  private switchChain(s: StmtOf<"Switch">): void {
    const subject = this.temp("s");
    this.line(`${subject} = ${this.expr(s.test)}`);
    if (s.cases.length === 0) {
      if (s.default) this.block(s.default);
      return;
    }
    s.cases.forEach((c, i) => {
      this.line(`${i === 0 ? "if" : "elif"} rt.equals(${subject}, ${this.expr(c.value)}):`);
      this.suite(c.body);
    });
    if (s.default && s.default.length > 0) {
      this.line("else:");
      this.suite(s.default);
    }
  }

  private tryExcept(s: StmtOf<"TryCatch">): void {
    const err = this.temp("e");
    this.line("try:");
    this.suite(s.body);
    this.line(`except Exception as ${err}:`);
    this.indented(() => {
      this.assign(s.catch_var, `rt.caught(${err})`);
      this.block(s.catch_body);
    });
    if (s.finally_body) {
      this.line("finally:");
      this.suite(s.finally_body);
    }
  }

  // ── program ────────────────────────────────────────────────────

  protected emitProgram(doc: Document): void {
    this.line(`# Generated from Core IL (${doc.version}).`);
    this.line("import coreil_runtime as rt");
    this.line();
    for (const name of this.globalNames) this.line(`${v(name)} = rt.UNDEF`);
    for (const fn of this.functionDefs()) {
      this.line();
      this.line();
      this.markFunction(doc, fn);
      this.func(fn);
    }
    this.line();
    this.line();
    this.line("def main_():");
    this.indented(() => {
      if (this.globalNames.length > 0) this.line(`global ${this.globalNames.map(v).join(", ")}`);
      const before = this.lines.length;
      this.topLevel(doc.body);
      if (this.lines.length === before) this.line("pass");
    });
    this.line();
    this.line();
    this.line("rt.main(main_)");
  }

  private func(fn: StmtOf<"FuncDef">): void {
    this.line(`def ${f(fn.name)}(${fn.params.map(v).join(", ")}):`);
    this.indented(() => {
      this.line("rt.enter()");
      this.line("try:");
      this.indented(() =>
        this.withFunction(fn, () => {
          for (const name of this.functionLocals(fn)) this.line(`${v(name)} = rt.UNDEF`);
          this.block(fn.body);
          this.line("return None");
        }),
      );
      this.line("finally:");
      this.indented(() => this.line("rt.leave()"));
    });
  }

  protected runtimeFiles(): RuntimeFile[] {
    return runtimeFilesFor(this.target, ["coreil_runtime.py"]);
  }
}
