import { describe, expect, it } from "vitest";
import { coerceString, coerceTrimmedString, escapeRegExp, formatUnknown, nonEmptyRecord } from "../src/lib/strings.js";

describe("strings", () => {
  it("coerces primitives only", () => {
    expect(coerceString(12)).toBe("12");
    expect(coerceString(false)).toBe("false");
    expect(coerceString({})).toBe("");
    expect(coerceTrimmedString("  x ")).toBe("x");
  });

  it("formats unknown thrown values", () => {
    expect(formatUnknown(new Error(" boom "))).toBe("boom");
    expect(formatUnknown("plain")).toBe("plain");
    expect(formatUnknown({ code: 7 })).toBe('{"code":7}');
    expect(formatUnknown(new Error(""), "fallback")).toBe("fallback");
    const circular: Record<string, unknown> = {};
    circular["self"] = circular;
    expect(formatUnknown(circular, "fallback")).toBe("fallback");
  });

  it("escapes regular expression syntax", () => {
    expect(escapeRegExp("a.b*c")).toBe("a\\.b\\*c");
    expect(new RegExp(`^${escapeRegExp("node(1)")}$`).test("node(1)")).toBe(true);
  });

  it("drops blank keys from records", () => {
    expect(nonEmptyRecord({ " a ": "1", "": "2", b: "" })).toEqual({ a: "1", b: "" });
    expect(nonEmptyRecord(undefined)).toEqual({});
  });
});
