import { describe, it, expect } from "vitest";
import { formatValidationErrors, isValidDocument, validate } from "../../src/core/validate/validate";
import { versionErrorMessage } from "../../src/core/versions";
import { arr, bin, call, doc, fn, let_, lit, print, ret, v } from "../helpers/coreil";

describe("validate", () => {
  it("accepts a well-formed document", () => {
    const d = doc([let_("x", lit(1)), fn("double", ["n"], [ret(bin("*", v("n"), lit(2)))]), print(call("double", v("x")))]);
    expect(validate(d)).toEqual([]);
    expect(isValidDocument(d)).toBe(true);
  });

  it("rejects a non-object document", () => {
    expect(validate([1, 2])).toEqual([{ path: "$", message: "document must be an object" }]);
  });

  it("rejects an unknown version", () => {
    expect(validate({ version: "coreil-9", body: [] })).toEqual([{ path: "$.version", message: versionErrorMessage() }]);
  });

  it("reports a variable read before its definition", () => {
    expect(validate(doc([print(v("x")), let_("x", lit(1))]))).toEqual([
      { path: "$.body[0].args[0].name", message: "variable 'x' used before definition" },
    ]);
  });

  it("does not let a function read a global it later rebinds", () => {
    const d = doc([let_("x", lit(1)), fn("f", [], [print(v("x")), let_("x", lit(2))])]);
    expect(validate(d)).toEqual([{ path: "$.body[1].body[0].args[0].name", message: "variable 'x' used before definition" }]);
  });

  it("restricts Break, Return and FuncDef placement", () => {
    const d = doc([
      { type: "Break" },
      ret(lit(1)),
      { type: "If", test: lit(true), then: [fn("inner", [], [])] },
    ]);
    expect(validate(d)).toEqual([
      { path: "$.body[0]", message: "Break is only allowed inside a loop" },
      { path: "$.body[1]", message: "Return is only allowed inside FuncDef" },
      { path: "$.body[2].then[0]", message: "FuncDef is only allowed at the top level" },
    ]);
  });

  it("gates node types on the declared version", () => {
    const d = doc([let_("x", { type: "Ternary", test: lit(true), consequent: lit(1), alternate: lit(2) })], "coreil-1.0");
    expect(validate(d)).toEqual([{ path: "$.body[0].value.type", message: "'Ternary' requires coreil-1.10 or later" }]);
  });

  it("allows negative literal indices only from 1.5 on", () => {
    const body = [let_("xs", arr(lit(1))), print({ type: "Index" as const, base: v("xs"), index: lit(-1) })];
    expect(validate(doc(body, "coreil-1.4"))).toEqual([
      { path: "$.body[1].args[0].index", message: "index must be a non-negative integer" },
    ]);
    expect(validate(doc(body, "coreil-1.5"))).toEqual([]);
  });

  it("accepts float literals and int64 bigints but nothing wider", () => {
    expect(validate(doc([print(lit({ float: 2 }), lit(-(2n ** 63n)), lit(9007199254740993n))]))).toEqual([]);
    expect(validate(doc([print(lit(2n ** 63n), lit({ float: Infinity }))]))).toEqual([
      { path: "$.body[0].args[0].value", message: "invalid literal value" },
      { path: "$.body[0].args[1].value", message: "invalid literal value" },
    ]);
    const { version } = doc([]);
    expect(validate({ version, body: [{ type: "Print", args: [{ type: "Literal", value: { float: "2" } }] }] })).toEqual([
      { path: "$.body[0].args[0].value", message: "invalid literal value" },
    ]);
  });

  it("forbids legacy helpers in sealed versions", () => {
    const body = [
      let_("m", { type: "Map" as const, items: [] }),
      { type: "Call" as const, name: "get_or_default", args: [v("m"), lit("k"), lit(0)] },
    ];
    expect(validate(doc(body, "coreil-0.4"))).toEqual([]);
    expect(validate(doc(body, "coreil-1.0"))).toEqual([
      {
        path: "$.body[1].name",
        message:
          "helper function 'get_or_default' is not allowed in coreil-1.0; use explicit primitives (GetDefault, Keys, Push, Tuple)",
      },
    ]);
  });

  it("rejects duplicate function names", () => {
    const d = doc([fn("f", [], []), fn("f", [], [])]);
    expect(validate(d)).toEqual([{ path: "$.body[1].name", message: "duplicate function 'f'" }]);
  });

  it("checks source_map indices against the body", () => {
    const d = { ...doc([print(lit(1))]), source_map: { "1": [0], "2": [3] } };
    expect(validate(d)).toEqual([
      { path: "$.source_map.2[0]", message: "body index 3 is out of range (body has 1 statements)" },
    ]);
  });

  it("formats errors one per line", () => {
    const text = formatValidationErrors([
      { path: "$.body[0]", message: "first" },
      { path: "$.body[1]", message: "second" },
    ]);
    expect(text).toBe("$.body[0]: first\n$.body[1]: second");
  });
});
