import { describe, expect, it } from "vitest";
import { safeStringify } from "../json.ts";

describe("safeStringify", () => {
  it("quotes strings", () => {
    expect(safeStringify("")).toBe('""');
    expect(safeStringify("a b")).toBe('"a b"');
  });

  it("prints other primitives as-is", () => {
    expect(safeStringify(1.5)).toBe("1.5");
    expect(safeStringify(true)).toBe("true");
    expect(safeStringify(null)).toBe("null");
    expect(safeStringify(undefined)).toBe("undefined");
    expect(safeStringify(10n)).toBe("10");
  });

  it("renders objects as single-line JSON", () => {
    expect(safeStringify({ a: [1, 2], b: { c: "d" } })).toBe(
      '{"a":[1,2],"b":{"c":"d"}}',
    );
  });

  it("marks cycles", () => {
    const value: Record<string, unknown> = { name: "loop" };
    value.self = value;
    expect(safeStringify(value)).toBe('{"name":"loop","self":"[Circular]"}');
  });

  it("falls back to String for values JSON cannot represent", () => {
    expect(safeStringify(Symbol("tag"))).toBe("Symbol(tag)");
  });
});
