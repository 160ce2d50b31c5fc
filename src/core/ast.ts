// src/core/ast.ts
// Core IL document model: expression and statement unions keyed by `type`.

/** A float written with an integral value (`2.0`), kept apart from the integer `2`. */
export type FloatLiteral = { float: number };

/**
 * Plain numbers are integers when integral and floats otherwise. Integers
 * outside the 2^53 range are bigints.
 */
export type LiteralValue = number | bigint | FloatLiteral | string | boolean | null;

export type NumericLiteral = { kind: "int"; n: bigint } | { kind: "float"; n: number };

export type BinaryOp =
  | "+" | "-" | "*" | "/" | "//" | "%"
  | "==" | "!=" | "<" | "<=" | ">" | ">="
  | "and" | "or";

export type MathOp = "sin" | "cos" | "tan" | "sqrt" | "floor" | "ceil" | "abs" | "log" | "exp";

export type MathConstName = "pi" | "e";

export type RangeExpr = { type: "Range"; from: Expr; to: Expr; inclusive?: boolean };

export type Expr =
  | { type: "Literal"; value: LiteralValue }
  | { type: "Var"; name: string }
  | { type: "Binary"; op: BinaryOp; left: Expr; right: Expr }
  | { type: "Not"; arg: Expr }
  | { type: "Call"; name: string; args: Expr[] }
  | { type: "Ternary"; test: Expr; consequent: Expr; alternate: Expr }
  | { type: "StringFormat"; parts: Expr[] }
  // Arrays and tuples
  | { type: "Array"; items: Expr[] }
  | { type: "Tuple"; items: Expr[] }
  | { type: "Index"; base: Expr; index: Expr }
  | { type: "Slice"; base: Expr; start: Expr; end: Expr }
  | { type: "Length"; base: Expr }
  // Maps and records
  | { type: "Map"; items: Array<{ key: Expr; value: Expr }> }
  | { type: "Get"; base: Expr; key: Expr }
  | { type: "GetDefault"; base: Expr; key: Expr; default: Expr }
  | { type: "Keys"; base: Expr }
  | { type: "Record"; fields: Array<{ name: string; value: Expr }> }
  | { type: "GetField"; base: Expr; name: string }
  // Sets, deques, heaps
  | { type: "Set"; items: Expr[] }
  | { type: "SetHas"; base: Expr; value: Expr }
  | { type: "SetSize"; base: Expr }
  | { type: "DequeNew" }
  | { type: "DequeSize"; base: Expr }
  | { type: "HeapNew" }
  | { type: "HeapSize"; base: Expr }
  | { type: "HeapPeek"; base: Expr }
  // Strings
  | { type: "StringLength"; base: Expr }
  | { type: "Substring"; base: Expr; start: Expr; end: Expr }
  | { type: "CharAt"; base: Expr; index: Expr }
  | { type: "Join"; sep: Expr; items: Expr }
  | { type: "StringSplit"; base: Expr; delimiter: Expr }
  | { type: "StringTrim"; base: Expr }
  | { type: "StringUpper"; base: Expr }
  | { type: "StringLower"; base: Expr }
  | { type: "StringStartsWith"; base: Expr; prefix: Expr }
  | { type: "StringEndsWith"; base: Expr; suffix: Expr }
  | { type: "StringContains"; base: Expr; substring: Expr }
  | { type: "StringReplace"; base: Expr; old: Expr; new: Expr }
  // Math
  | { type: "Math"; op: MathOp; arg: Expr }
  | { type: "MathPow"; base: Expr; exponent: Expr }
  | { type: "MathConst"; name: MathConstName }
  // JSON and regex
  | { type: "JsonParse"; source: Expr }
  | { type: "JsonStringify"; value: Expr; pretty?: Expr }
  | { type: "RegexMatch"; string: Expr; pattern: Expr; flags?: Expr }
  | { type: "RegexFindAll"; string: Expr; pattern: Expr; flags?: Expr }
  | { type: "RegexReplace"; string: Expr; pattern: Expr; replacement: Expr; flags?: Expr }
  | { type: "RegexSplit"; string: Expr; pattern: Expr; flags?: Expr; maxsplit?: Expr }
  // Conversions
  | { type: "ToInt"; value: Expr }
  | { type: "ToFloat"; value: Expr }
  | { type: "ToString"; value: Expr }
  // Tier-2 escape hatches
  | { type: "ExternalCall"; module: string; function: string; args: Expr[] }
  | { type: "MethodCall"; object: Expr; method: string; args: Expr[] }
  | { type: "PropertyGet"; object: Expr; property: string };

export type SwitchCase = { value: Expr; body: Stmt[] };

export type Stmt =
  | { type: "Let"; name: string; value: Expr }
  | { type: "Assign"; name: string; value: Expr }
  | { type: "If"; test: Expr; then: Stmt[]; else?: Stmt[] }
  | { type: "While"; test: Expr; body: Stmt[] }
  | { type: "For"; var: string; iter: Expr | RangeExpr; body: Stmt[] }
  | { type: "ForEach"; var: string; iter: Expr; body: Stmt[] }
  | { type: "Switch"; test: Expr; cases: SwitchCase[]; default?: Stmt[] }
  | { type: "Break" }
  | { type: "Continue" }
  | { type: "Print"; args: Expr[] }
  | { type: "Call"; name: string; args: Expr[] }
  | { type: "FuncDef"; name: string; params: string[]; body: Stmt[] }
  | { type: "Return"; value?: Expr }
  | { type: "SetIndex"; base: Expr; index: Expr; value: Expr }
  | { type: "Set"; base: Expr; key: Expr; value: Expr }
  | { type: "Push"; base: Expr; value: Expr }
  | { type: "SetField"; base: Expr; name: string; value: Expr }
  | { type: "SetAdd"; base: Expr; value: Expr }
  | { type: "SetRemove"; base: Expr; value: Expr }
  | { type: "PushBack"; base: Expr; value: Expr }
  | { type: "PushFront"; base: Expr; value: Expr }
  | { type: "PopFront"; base: Expr; target: string }
  | { type: "PopBack"; base: Expr; target: string }
  | { type: "HeapPush"; base: Expr; priority: Expr; value: Expr }
  | { type: "HeapPop"; base: Expr; target: string }
  | { type: "TryCatch"; body: Stmt[]; catch_var: string; catch_body: Stmt[]; finally_body?: Stmt[] }
  | { type: "Throw"; message: Expr }
  | { type: "Import"; path: string; alias?: string };

export type ExprType = Expr["type"];
export type StmtType = Stmt["type"];

export type ExprOf<T extends ExprType> = Extract<Expr, { type: T }>;
export type StmtOf<T extends StmtType> = Extract<Stmt, { type: T }>;

export type Ambiguity = { question: string; options: string[]; default: number };

/** english line (decimal string) -> body statement indices */
export type SourceMapping = Record<string, number[]>;

export type Document = {
  version: string;
  body: Stmt[];
  ambiguities?: Ambiguity[];
  source_map?: SourceMapping;
};

// ─────────────────────────────────────────────────────────────────
// Structural helpers
// ─────────────────────────────────────────────────────────────────

export function lit(value: LiteralValue): Expr {
  return { type: "Literal", value };
}

export function isLiteral(e: Expr): e is ExprOf<"Literal"> {
  return e.type === "Literal";
}

export function isFloatLiteral(value: unknown): value is FloatLiteral {
  return typeof value === "object" && value !== null && "float" in value && typeof value.float === "number";
}

export function numericOf(value: number | bigint | FloatLiteral): NumericLiteral {
  if (typeof value === "bigint") return { kind: "int", n: value };
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? { kind: "int", n: BigInt(value) } : { kind: "float", n: value };
  }
  return { kind: "float", n: value.float };
}

/** Numeric reading of a literal; undefined for null, booleans and strings. */
export function numericLiteral(value: LiteralValue): NumericLiteral | undefined {
  if (value === null || typeof value === "boolean" || typeof value === "string") return undefined;
  return numericOf(value);
}

export function isRange(e: Expr | RangeExpr): e is RangeExpr {
  return e.type === "Range";
}

export function cloneDocument(doc: Document): Document {
  return structuredClone(doc);
}

/** Child statement lists of a statement, in source order. */
export function childBlocks(stmt: Stmt): Stmt[][] {
  switch (stmt.type) {
    case "If":
      return stmt.else ? [stmt.then, stmt.else] : [stmt.then];
    case "While":
    case "For":
    case "ForEach":
    case "FuncDef":
      return [stmt.body];
    case "Switch":
      return [...stmt.cases.map(c => c.body), ...(stmt.default ? [stmt.default] : [])];
    case "TryCatch":
      return [stmt.body, stmt.catch_body, ...(stmt.finally_body ? [stmt.finally_body] : [])];
    default:
      return [];
  }
}

/** Names a statement binds in the enclosing scope. */
export function boundNames(stmt: Stmt): string[] {
  switch (stmt.type) {
    case "Let":
    case "Assign":
      return [stmt.name];
    case "For":
    case "ForEach":
      return [stmt.var];
    case "PopFront":
    case "PopBack":
    case "HeapPop":
      return [stmt.target];
    case "TryCatch":
      return [stmt.catch_var];
    default:
      return [];
  }
}

/**
 * Every name a block binds, descending into nested blocks but not into
 * function bodies. Order of first appearance.
 */
export function collectBoundNames(body: Stmt[], into: string[] = []): string[] {
  for (const stmt of body) {
    if (stmt.type === "FuncDef") continue;
    for (const name of boundNames(stmt)) {
      if (!into.includes(name)) into.push(name);
    }
    for (const block of childBlocks(stmt)) collectBoundNames(block, into);
  }
  return into;
}
