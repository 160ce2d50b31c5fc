// src/core/codegen/targets/cpp.ts
// C++17 backend over the header-only runtime.
//
// Argument evaluation order is unspecified in C++, so a call with more than
// one argument that could fail or have effects binds its arguments to
// sequenced locals inside an immediately-invoked lambda. A try with a finally
// block is a region: jumps leave it through a goto to the finally code and
// are re-issued afterwards.

import { isRange, numericOf, type Document, type ExprOf, type LiteralValue, type Stmt, type StmtOf } from "../../ast";
import { INT64_MIN } from "../../constants";
import {
  BaseEmitter,
  BINARY_RUNTIME,
  FLOW_CODE,
  type ExprHandlers,
  type JumpKind,
  type RuntimeFile,
  type StmtHandlers,
} from "../emitter";
import { floatLiteral, quoteCpp } from "../format";
import { runtimeFilesFor } from "../runtimeFiles";

const v = (name: string): string => `v_${name}`;
const f = (name: string): string => `fn_${name}`;

export function cppLiteral(value: LiteralValue): string {
  if (value === null) return "Value::none()";
  if (typeof value === "boolean") return `Value::boolean(${value})`;
  if (typeof value === "string") return `Value::str(${quoteCpp(value)}s)`;
  const num = numericOf(value);
  if (num.kind === "float") return `Value::real(${floatLiteral(num.n)})`;
  // The literal 9223372036854775808 does not fit long long.
  return `Value::integer(${num.n === INT64_MIN ? "INT64_MIN" : num.n})`;
}

export class CppEmitter extends BaseEmitter {
  readonly target = "cpp";
  readonly fileName = "main.cpp";

  /** Generated expressions that cannot fail and have no effects. */
  private constants = new Set<string>(["true", "false"]);

  protected readonly exprHandlers: ExprHandlers = {
    ...this.runtimeExprHandlers(),
    Literal: e => this.constant(cppLiteral(e.value)),
    Var: e => this.variable(e.name),
    Binary: e => this.binary(e),
    Ternary: e => `(coreil::truthy(${this.expr(e.test)}) ? ${this.expr(e.consequent)} : ${this.expr(e.alternate)})`,
  };

  protected readonly stmtHandlers: StmtHandlers = {
    ...this.runtimeStmtHandlers(),
    If: s => {
      this.line(`if (coreil::truthy(${this.expr(s.test)})) {`);
      this.indented(() => this.block(s.then));
      const otherwise = s.else;
      if (otherwise && otherwise.length > 0) {
        this.line("} else {");
        this.indented(() => this.block(otherwise));
      }
      this.line("}");
    },
    While: s => {
      this.line(`while (coreil::truthy(${this.expr(s.test)})) {`);
      this.loopBody(s.body);
    },
    For: s => {
      if (!isRange(s.iter)) {
        this.forEach(s.var, this.expr(s.iter), s.body);
        return;
      }
      const range = this.temp("r");
      const i = this.temp("i");
      const bounds = this.rt("range", [this.expr(s.iter.from), this.expr(s.iter.to), String(s.iter.inclusive === true)]);
      this.line("{");
      this.indented(() => {
        this.line(`const coreil::Range ${range} = ${bounds};`);
        this.line(`for (int64_t ${i} = ${range}.start; ${i} < ${range}.stop; ++${i}) {`);
        this.indented(() => this.line(`${v(s.var)} = Value::integer(${i});`));
        this.loopBody(s.body);
      });
      this.line("}");
    },
    ForEach: s => this.forEach(s.var, this.expr(s.iter), s.body),
    Switch: s => this.switchChain(s),
    Break: () => this.jump("break"),
    Continue: () => this.jump("continue"),
    Return: s => this.jump("return", s.value ? this.expr(s.value) : "Value::none()"),
    TryCatch: s => this.tryCatch(s),
    Throw: s => this.line(`throw coreil::error(${this.expr(s.message)});`),
  };

  emit(doc: Document) {
    this.constants = new Set(["true", "false"]);
    return super.emit(doc);
  }

  // ── primitives ─────────────────────────────────────────────────

  private constant(code: string): string {
    this.constants.add(code);
    return code;
  }

  /** Binds effectful arguments in order when more than one could run. */
  private sequenced(args: string[], build: (args: string[]) => string): string {
    const effectful = args.filter(a => !this.constants.has(a));
    if (effectful.length < 2) return build(args);
    const decls: string[] = [];
    const names = args.map(a => {
      if (this.constants.has(a)) return a;
      const name = this.temp("a");
      decls.push(`auto ${name} = ${a};`);
      return name;
    });
    return `[&] { ${decls.join(" ")} return ${build(names)}; }()`;
  }

  protected rt(fn: string, args: string[]): string {
    return this.sequenced(args, xs => `coreil::${fn}(${xs.join(", ")})`);
  }

  protected list(items: string[]): string {
    return `std::vector<Value>{${items.join(", ")}}`;
  }

  protected quote(s: string): string {
    return this.constant(`${quoteCpp(s)}s`);
  }

  protected userCall(fn: StmtOf<"FuncDef">, args: string[]): string {
    return this.sequenced(args, xs => `${f(fn.name)}(${xs.join(", ")})`);
  }

  protected exprStatement(code: string): string {
    return `${code};`;
  }

  protected assign(name: string, value: string): void {
    this.line(`${v(name)} = ${value};`);
  }

  private variable(name: string): string {
    if (this.scopeOf(name) === "unbound") return this.fail(`variable '${name}' is not defined`);
    return `coreil::read(${v(name)}, ${quoteCpp(name)})`;
  }

  private binary(e: ExprOf<"Binary">): string {
    const left = this.expr(e.left);
    const right = this.expr(e.right);
    if (e.op === "and" || e.op === "or") {
      const t = this.temp("t");
      const pick = e.op === "and" ? `${right} : ${t}` : `${t} : ${right}`;
      return `[&] { Value ${t} = ${left}; return coreil::truthy(${t}) ? ${pick}; }()`;
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
    this.line(`for (const Value& ${item} : coreil::iter(${items})) {`);
    this.indented(() => this.line(`${v(name)} = ${item};`));
    this.loopBody(body);
  }

  private switchChain(s: StmtOf<"Switch">): void {
    const subject = this.temp("s");
    this.line("{");
    this.indented(() => {
      this.line(`const Value ${subject} = ${this.expr(s.test)};`);
      s.cases.forEach((c, i) => {
        this.line(`${i === 0 ? "if" : "} else if"} (coreil::equals(${subject}, ${this.expr(c.value)})) {`);
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
    if (region === undefined) {
      this.line(kind === "return" ? `return ${value ?? "Value::none()"};` : `${kind};`);
      return;
    }
    this.line("{");
    this.indented(() => {
      if (value !== undefined) this.line(`${region}ret = ${value};`);
      this.line(`${region}flow = ${FLOW_CODE[kind]};`);
      this.line(`goto ${region}fin;`);
    });
    this.line("}");
  }

  private catchClause(s: StmtOf<"TryCatch">): void {
    const err = this.temp("e");
    this.line(`} catch (const std::exception& ${err}) {`);
    this.indented(() => {
      this.assign(s.catch_var, `coreil::caught(${err})`);
      this.block(s.catch_body);
    });
    this.line("}");
  }

  private tryCatch(s: StmtOf<"TryCatch">): void {
    const fin = s.finally_body;
    if (!fin) {
      this.line("try {");
      this.indented(() => this.block(s.body));
      this.catchClause(s);
      return;
    }
    const region = this.temp("r");
    this.line("{");
    this.indented(() => {
      this.line(`int ${region}flow = 0;`);
      this.line(`Value ${region}ret;`);
      this.line(`std::exception_ptr ${region}err;`);
      this.line("try {");
      let escapes = new Set<JumpKind>();
      this.indented(() => {
        escapes = this.withRegion(region, () => {
          this.line("try {");
          this.indented(() => this.block(s.body));
          this.catchClause(s);
        });
      });
      this.line("} catch (...) {");
      this.indented(() => this.line(`${region}err = std::current_exception();`));
      this.line("}");
      this.line(`${region}fin:;`);
      this.block(fin);
      this.line(`if (${region}err) std::rethrow_exception(${region}err);`);
      for (const kind of escapes) {
        this.line(`if (${region}flow == ${FLOW_CODE[kind]}) {`);
        this.indented(() => this.jump(kind, kind === "return" ? `${region}ret` : undefined));
        this.line("}");
      }
    });
    this.line("}");
  }

  // ── program ────────────────────────────────────────────────────

  protected emitProgram(doc: Document): void {
    this.line(`// Generated from Core IL (${doc.version}).`);
    this.line('#include "coreil_runtime.hpp"');
    this.line();
    this.line("using coreil::Value;");
    this.line("using namespace std::string_literals;");
    if (this.globalNames.length > 0) {
      this.line();
      for (const name of this.globalNames) this.line(`Value ${v(name)};`);
    }
    const fns = this.functionDefs();
    if (fns.length > 0) {
      this.line();
      for (const fn of fns) this.line(`${this.signature(fn)};`);
    }
    for (const fn of fns) {
      this.line();
      this.markFunction(doc, fn);
      this.func(fn);
    }
    this.line();
    this.line("static void program_() {");
    this.indented(() => this.topLevel(doc.body));
    this.line("}");
    this.line();
    this.line("int main() { return coreil::run_main(program_); }");
  }

  private signature(fn: StmtOf<"FuncDef">): string {
    return `Value ${f(fn.name)}(${fn.params.map(p => `Value ${v(p)}`).join(", ")})`;
  }

  private func(fn: StmtOf<"FuncDef">): void {
    this.line(`${this.signature(fn)} {`);
    this.indented(() =>
      this.withFunction(fn, () => {
        this.line("coreil::CallGuard guard_;");
        for (const name of this.functionLocals(fn)) this.line(`Value ${v(name)};`);
        this.block(fn.body);
        this.line("return Value::none();");
      }),
    );
    this.line("}");
  }

  protected runtimeFiles(): RuntimeFile[] {
    return runtimeFilesFor(this.target, ["coreil_runtime.hpp"]);
  }
}
