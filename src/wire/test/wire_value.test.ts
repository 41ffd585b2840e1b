import { describe, expect, it } from "vitest";
import {
  listOf,
  mapOf,
  objectOf,
  WIRE_NUMBER,
  WIRE_STRING,
} from "../wire_type.ts";
import {
  describeWireValue,
  isKnown,
  objectAttributes,
  wireBool,
  wireList,
  wireMap,
  wireNull,
  wireNumber,
  wireObject,
  wireString,
  wireUnknown,
  wireValueEquals,
} from "../wire_value.ts";

describe("wire values", () => {
  describe("constructors", () => {
    it("rejects NaN numbers", () => {
      expect(() => wireNumber(Number.NaN)).toThrow(
        "NaN is not a valid Number value",
      );
    });

    it("rejects list elements of the wrong type", () => {
      expect(() =>
        wireList(listOf(WIRE_STRING), [wireString("a"), wireNumber(1)])
      ).toThrow("list element 1 has type Number, expected String");
    });

    it("rejects a list built with a non-list type", () => {
      expect(() => wireList(WIRE_STRING, [])).toThrow(
        "cannot build a list value with type String",
      );
    });

    it("builds maps from records and maps", () => {
      const fromRecord = wireMap(mapOf(WIRE_NUMBER), { a: wireNumber(1) });
      const fromMap = wireMap(
        mapOf(WIRE_NUMBER),
        new Map([["a", wireNumber(1)]]),
      );
      expect(wireValueEquals(fromRecord, fromMap)).toBe(true);
    });

    it("rejects map entries of the wrong type", () => {
      expect(() => wireMap(mapOf(WIRE_NUMBER), { k: wireString("v") }))
        .toThrow('map element "k" has type String, expected Number');
    });

    it("requires every declared object attribute", () => {
      const type = objectOf({ name: WIRE_STRING, age: WIRE_NUMBER });
      expect(() => wireObject(type, { name: wireString("Ana") })).toThrow(
        'object is missing attribute "age"',
      );
    });

    it("rejects undeclared object attributes", () => {
      const type = objectOf({ name: WIRE_STRING });
      expect(() =>
        wireObject(type, { name: wireString("Ana"), extra: wireBool(true) })
      ).toThrow('object has undeclared attribute "extra"');
    });

    it("rejects object attributes of the wrong type", () => {
      const type = objectOf({ name: WIRE_STRING });
      expect(() => wireObject(type, { name: wireNumber(3) })).toThrow(
        'attribute "name" has type Number, expected String',
      );
    });
  });

  describe("objectAttributes", () => {
    it("returns the attributes of an object", () => {
      const value = wireObject(objectOf({ a: WIRE_STRING }), {
        a: wireString("x"),
      });
      expect([...objectAttributes(value).keys()]).toEqual(["a"]);
    });

    it("rejects null objects", () => {
      const value = wireNull(objectOf({ a: WIRE_STRING }));
      expect(() => objectAttributes(value)).toThrow(
        `can't unmarshal null Object["a":String] into attribute map`,
      );
    });
  });

  describe("describeWireValue", () => {
    it("prefixes null and unknown values", () => {
      expect(describeWireValue(wireNull(WIRE_STRING))).toBe("null String");
      expect(describeWireValue(wireUnknown(listOf(WIRE_NUMBER)))).toBe(
        "unknown List[Number]",
      );
      expect(describeWireValue(wireString("x"))).toBe("String");
    });
  });

  describe("isKnown", () => {
    it("is false only for null and unknown", () => {
      expect(isKnown(wireNull(WIRE_STRING))).toBe(false);
      expect(isKnown(wireUnknown(WIRE_STRING))).toBe(false);
      expect(isKnown(wireBool(false))).toBe(true);
    });
  });

  describe("wireValueEquals", () => {
    it("distinguishes null from unknown", () => {
      expect(wireValueEquals(wireNull(WIRE_STRING), wireNull(WIRE_STRING)))
        .toBe(true);
      expect(wireValueEquals(wireNull(WIRE_STRING), wireUnknown(WIRE_STRING)))
        .toBe(false);
    });

    it("compares list elements in order", () => {
      const type = listOf(WIRE_NUMBER);
      const a = wireList(type, [wireNumber(1), wireNumber(2)]);
      const b = wireList(type, [wireNumber(2), wireNumber(1)]);
      expect(wireValueEquals(a, a)).toBe(true);
      expect(wireValueEquals(a, b)).toBe(false);
    });

    it("compares types before values", () => {
      expect(wireValueEquals(wireNull(WIRE_STRING), wireNull(WIRE_NUMBER)))
        .toBe(false);
    });
  });
});
