import { describe, expect, it } from "vitest";
import {
  listOf,
  mapOf,
  objectOf,
  WIRE_BOOL,
  WIRE_NUMBER,
  WIRE_STRING,
  wireTypeEquals,
  wireTypeToString,
} from "../wire_type.ts";

describe("wireTypeToString", () => {
  it("renders primitives", () => {
    expect(wireTypeToString(WIRE_STRING)).toBe("String");
    expect(wireTypeToString(WIRE_NUMBER)).toBe("Number");
    expect(wireTypeToString(WIRE_BOOL)).toBe("Bool");
  });

  it("renders nested collections", () => {
    expect(wireTypeToString(listOf(mapOf(WIRE_BOOL)))).toBe("List[Map[Bool]]");
  });

  it("renders object attributes sorted by name", () => {
    const type = objectOf({ name: WIRE_STRING, age: WIRE_NUMBER });
    expect(wireTypeToString(type)).toBe('Object["age":Number, "name":String]');
  });

  it("renders an empty object", () => {
    expect(wireTypeToString(objectOf({}))).toBe("Object[]");
  });
});

describe("wireTypeEquals", () => {
  it("compares primitives by kind", () => {
    expect(wireTypeEquals(WIRE_STRING, { kind: "string" })).toBe(true);
    expect(wireTypeEquals(WIRE_STRING, WIRE_NUMBER)).toBe(false);
  });

  it("compares collection element types", () => {
    expect(wireTypeEquals(listOf(WIRE_STRING), listOf(WIRE_STRING))).toBe(true);
    expect(wireTypeEquals(listOf(WIRE_STRING), listOf(WIRE_NUMBER))).toBe(
      false,
    );
    expect(wireTypeEquals(listOf(WIRE_STRING), mapOf(WIRE_STRING))).toBe(false);
  });

  it("compares object attributes structurally", () => {
    const a = objectOf({ x: WIRE_STRING, y: listOf(WIRE_NUMBER) });
    expect(
      wireTypeEquals(a, objectOf({ y: listOf(WIRE_NUMBER), x: WIRE_STRING })),
    ).toBe(true);
    expect(wireTypeEquals(a, objectOf({ x: WIRE_STRING }))).toBe(false);
    expect(
      wireTypeEquals(a, objectOf({ x: WIRE_STRING, z: listOf(WIRE_NUMBER) })),
    ).toBe(false);
    expect(
      wireTypeEquals(a, objectOf({ x: WIRE_BOOL, y: listOf(WIRE_NUMBER) })),
    ).toBe(false);
  });

  it("copies the attribute record passed to objectOf", () => {
    const attrs: Record<string, typeof WIRE_STRING> = { a: WIRE_STRING };
    const type = objectOf(attrs);
    attrs.b = WIRE_STRING;
    expect(Object.keys(type.attributeTypes)).toEqual(["a"]);
  });
});
