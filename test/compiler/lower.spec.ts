import { describe, it, expect } from "vitest";
import { lower } from "../../src/core/compiler/lower";
import { arr, call, doc, fn, let_, lit, print, ret, v } from "../helpers/coreil";

describe("lower", () => {
  it("rewrites legacy helper calls into primitives", () => {
    const input = doc(
      [
        let_("m", { type: "Map", items: [] }),
        let_("xs", arr()),
        print(call("get_or_default", v("m"), lit("k"), lit(0))),
        print(call("keys", v("m"))),
        { type: "Call", name: "append", args: [v("xs"), lit(1)] },
      ],
      "coreil-0.4",
    );
    const out = lower(input);
    expect(out.body.slice(2)).toEqual([
      print({ type: "GetDefault", base: v("m"), key: lit("k"), default: lit(0) }),
      print({ type: "Keys", base: v("m") }),
      { type: "Push", base: v("xs"), value: lit(1) },
    ]);
  });

  it("leaves a call alone when a user function has the helper's name", () => {
    const input = doc([fn("keys", ["m"], [ret(lit(0))]), print(call("keys", lit(1)))], "coreil-0.4");
    expect(lower(input).body[1]).toEqual(print(call("keys", lit(1))));
  });

  it("turns an empty StringFormat into an empty string literal", () => {
    const out = lower(doc([print({ type: "StringFormat", parts: [] })]));
    expect(out.body).toEqual([print(lit(""))]);
  });

  it("does not mutate its input", () => {
    const input = doc([print({ type: "StringFormat", parts: [] })]);
    lower(input);
    expect(input.body).toEqual([print({ type: "StringFormat", parts: [] })]);
  });
});
