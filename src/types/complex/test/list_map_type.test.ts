import { describe, expect, it } from "vitest";
import { BACKGROUND } from "../../../attr/context.ts";
import { listOf, mapOf, WIRE_NUMBER, WIRE_STRING } from "../../../wire/wire_type.ts";
import {
  wireList,
  wireMap,
  wireNull,
  wireNumber,
  wireString,
  wireValueEquals,
} from "../../../wire/wire_value.ts";
import { NumberType, numberValue } from "../../primitive/number_type.ts";
import { StringType, stringValue } from "../../primitive/string_type.ts";
import { ListType, listNull, listValue } from "../list_type.ts";
import { MapType, mapUnknown, mapValue } from "../map_type.ts";

describe("ListType", () => {
  const type = new ListType({ elementType: new StringType() });

  it("exposes its element type", () => {
    expect(type.elementType().equals(new StringType())).toBe(true);
    expect(type.toString()).toBe("ListType[StringType]");
  });

  it("converts wire lists element by element", () => {
    const value = type.valueFromWire(
      BACKGROUND,
      wireList(listOf(WIRE_STRING), [wireString("a"), wireString("b")]),
    );
    expect(value.toString()).toBe('["a","b"]');
    expect(value.equals(listValue(new StringType(), [
      stringValue("a"),
      stringValue("b"),
    ]))).toBe(true);
  });

  it("rejects wire values of another type", () => {
    expect(() =>
      type.valueFromWire(
        BACKGROUND,
        wireList(listOf(WIRE_NUMBER), [wireNumber(1)]),
      )
    ).toThrow("can't use List[Number] as List[String]");
  });

  it("rejects elements of the wrong type", () => {
    expect(() => listValue(new StringType(), [numberValue(1)])).toThrow(
      "list element 0 is NumberType, expected StringType",
    );
  });

  it("keeps null lists typed", () => {
    const wire = listNull(new NumberType()).toWireValue(BACKGROUND);
    expect(wireValueEquals(wire, wireNull(listOf(WIRE_NUMBER)))).toBe(true);
  });
});

describe("MapType", () => {
  const type = new MapType({ elementType: new NumberType() });

  it("converts wire maps entry by entry", () => {
    const value = type.valueFromWire(
      BACKGROUND,
      wireMap(mapOf(WIRE_NUMBER), { b: wireNumber(2), a: wireNumber(1) }),
    );
    expect(value.toString()).toBe('{"a":1,"b":2}');
    expect([...value.entries().keys()]).toEqual(["b", "a"]);
  });

  it("compares entries regardless of order", () => {
    const a = mapValue(new NumberType(), { x: numberValue(1), y: numberValue(2) });
    const b = mapValue(
      new NumberType(),
      new Map([["y", numberValue(2)], ["x", numberValue(1)]]),
    );
    expect(a.equals(b)).toBe(true);
    expect(a.equals(mapUnknown(new NumberType()))).toBe(false);
  });

  it("rejects entries of the wrong type", () => {
    expect(() => mapValue(new NumberType(), { k: stringValue("v") })).toThrow(
      'map element "k" is StringType, expected NumberType',
    );
  });

  it("is not equal to a list type with the same element", () => {
    expect(type.equals(new ListType({ elementType: new NumberType() }))).toBe(
      false,
    );
  });
});
