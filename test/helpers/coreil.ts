// test/helpers/coreil.ts
// Builders for Core IL documents and an output-capturing interpreter run.

import type { Document, Expr, LiteralValue, Stmt } from "../../src/core/ast";
import { run, type RunOptions } from "../../src/core/eval/interp";
import { COREIL_VERSION } from "../../src/core/versions";

export const lit = (value: LiteralValue): Expr => ({ type: "Literal", value });
export const v = (name: string): Expr => ({ type: "Var", name });
export const bin = (op: Extract<Expr, { type: "Binary" }>["op"], left: Expr, right: Expr): Expr => ({
  type: "Binary",
  op,
  left,
  right,
});
export const arr = (...items: Expr[]): Expr => ({ type: "Array", items });
export const call = (name: string, ...args: Expr[]): Expr => ({ type: "Call", name, args });

export const print = (...args: Expr[]): Stmt => ({ type: "Print", args });
export const let_ = (name: string, value: Expr): Stmt => ({ type: "Let", name, value });
export const assign = (name: string, value: Expr): Stmt => ({ type: "Assign", name, value });
export const ret = (value?: Expr): Stmt => (value ? { type: "Return", value } : { type: "Return" });
export const fn = (name: string, params: string[], body: Stmt[]): Stmt => ({ type: "FuncDef", name, params, body });
export const if_ = (test: Expr, then: Stmt[], otherwise?: Stmt[]): Stmt =>
  otherwise ? { type: "If", test, then, else: otherwise } : { type: "If", test, then };
export const forRange = (name: string, from: number, to: number, body: Stmt[]): Stmt => ({
  type: "For",
  var: name,
  iter: { type: "Range", from: lit(from), to: lit(to) },
  body,
});

export function doc(body: Stmt[], version: string = COREIL_VERSION): Document {
  return { version, body };
}

/** Runs `d` on the interpreter and returns the printed lines and exit code. */
export function runLines(d: Document, options: Omit<RunOptions, "out"> = {}): { lines: string[]; exitCode: number } {
  const lines: string[] = [];
  const exitCode = run(d, { ...options, out: line => lines.push(line) });
  return { lines, exitCode };
}
