import { describe, it, expect } from "vitest";
import { parseDocumentJson, parseJson } from "../../src/core/eval/json";
import { formatValue } from "../../src/core/eval/format";
import { run } from "../../src/core/eval/interp";
import { isValidDocument, validate } from "../../src/core/validate/validate";
import { COREIL_VERSION } from "../../src/core/versions";

describe("parseDocumentJson", () => {
  it("keeps the number kind each literal was written with", () => {
    const data = parseDocumentJson('{"a": 2.0, "b": 2, "c": 9007199254740993, "d": 1.5, "e": 1e2, "f": [true, null, "x"]}');
    expect(data).toEqual({ a: { float: 2 }, b: 2, c: 9007199254740993n, d: 1.5, e: { float: 100 }, f: [true, null, "x"] });
  });

  it("reads an integer past the int64 range as a float", () => {
    expect(parseDocumentJson("99999999999999999999")).toEqual({ float: 1e20 });
  });

  it("reports the position of a syntax error", () => {
    expect(() => parseDocumentJson('{"a": }')).toThrow(SyntaxError);
    expect(() => parseDocumentJson('{"a": }')).toThrow("invalid JSON at position 6");
    expect(() => parseDocumentJson("[1] x")).toThrow("invalid JSON at position 4");
  });

  it("produces documents that validate and print floats as floats", () => {
    const text = `{"version": "${COREIL_VERSION}", "body": [
      {"type": "Print", "args": [
        {"type": "Literal", "value": 2.0},
        {"type": "Binary", "op": "//", "left": {"type": "Literal", "value": 7.0}, "right": {"type": "Literal", "value": 2}}
      ]}
    ]}`;
    const d = parseDocumentJson(text);
    expect(validate(d)).toEqual([]);
    if (!isValidDocument(d)) throw new Error("expected a valid document");
    const lines: string[] = [];
    expect(run(d, { out: l => lines.push(l) })).toBe(0);
    expect(lines).toEqual(["2.0 3.0"]);
  });
});

describe("parseJson", () => {
  it("reads runtime values with integer and float kinds", () => {
    expect(formatValue(parseJson('{"n": 1, "x": 1.0, "big": 9223372036854775808}'))).toBe(
      "{'n': 1, 'x': 1.0, 'big': 9.223372036854776e+18}",
    );
  });
});
