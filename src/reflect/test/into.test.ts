import { describe, expect, it } from "vitest";
import { BACKGROUND } from "../../attr/context.ts";
import { Path } from "../../path/path.ts";
import { ListType } from "../../types/complex/list_type.ts";
import { MapType } from "../../types/complex/map_type.ts";
import { NumberType } from "../../types/primitive/number_type.ts";
import { StringType, StringValue } from "../../types/primitive/string_type.ts";
import {
  listOf,
  mapOf,
  WIRE_NUMBER,
  WIRE_STRING,
} from "../../wire/wire_type.ts";
import {
  wireList,
  wireMap,
  wireNull,
  wireNumber,
  wireString,
  wireUnknown,
} from "../../wire/wire_value.ts";
import { into, zeroValue } from "../into.ts";
import { t } from "../target.ts";
import { PersonShape, personType } from "./reflect_test_utils.ts";

const REPORT =
  "This is always an error in the plugin. Please report the following to the plugin developer:";

describe("into", () => {
  describe("attribute value target", () => {
    it("keeps null values as attribute values", () => {
      const result = into(
        BACKGROUND,
        new StringType(),
        wireNull(WIRE_STRING),
        t.value(),
      );
      const value = result.value;
      expect(value instanceof StringValue && value.isNull()).toBe(true);
    });

    it("reports values the type cannot read", () => {
      const result = into(
        BACKGROUND,
        new NumberType(),
        wireString("x"),
        t.value(),
        {},
        Path.root("count"),
      );
      const [error] = result.diags.errors();
      expect(error.path?.toString()).toBe("count");
      expect(error.detail).toBe(
        `An unexpected error was encountered trying to convert String into attribute value. ${REPORT}\n\ncan't use String as NumberType`,
      );
    });
  });

  describe("unknown values", () => {
    it("are rejected by native targets", () => {
      const result = into(
        BACKGROUND,
        new StringType(),
        wireUnknown(WIRE_STRING),
        t.string(),
        {},
        Path.root("name"),
      );
      expect(result.value).toBeUndefined();
      expect(result.diags.errors()[0].detail).toBe(
        `An unexpected error was encountered trying to build a value. ${REPORT}\n\nReceived unknown value, however the target type cannot handle unknown values. Use the attribute value target instead.\n\nPath: name\nTarget Type: string\nSchema Type: StringType`,
      );
    });

    it("become the zero value when allowed", () => {
      const result = into(
        BACKGROUND,
        new StringType(),
        wireUnknown(WIRE_STRING),
        t.string(),
        { unhandledUnknownAsEmpty: true },
      );
      expect(result.diags.length).toBe(0);
      expect(result.value).toBe("");
    });
  });

  describe("null values", () => {
    it("become null for nullable targets", () => {
      const result = into(
        BACKGROUND,
        new StringType(),
        wireNull(WIRE_STRING),
        t.nullable(t.string()),
      );
      expect(result.value).toBeNull();
      expect(result.diags.hasError()).toBe(false);
    });

    it("are rejected by other targets", () => {
      const result = into(
        BACKGROUND,
        new NumberType(),
        wireNull(WIRE_NUMBER),
        t.number(),
        {},
        Path.root("age"),
      );
      expect(result.diags.errors()[0].detail).toBe(
        `An unexpected error was encountered trying to build a value. ${REPORT}\n\nReceived null value, however the target type cannot handle null values. Use a nullable target or the attribute value target instead.\n\nPath: age\nTarget Type: number\nSchema Type: NumberType`,
      );
    });

    it("become the zero value when allowed", () => {
      const result = into(
        BACKGROUND,
        new NumberType(),
        wireNull(WIRE_NUMBER),
        t.number(),
        { unhandledNullAsEmpty: true },
      );
      expect(result.value).toBe(0);
    });

    it("become a zero record for struct targets when allowed", () => {
      const result = into(
        BACKGROUND,
        personType(),
        wireNull(personType().wireType()),
        t.struct(PersonShape),
        { unhandledNullAsEmpty: true },
      );
      expect(result.value).toEqual({ name: "", age: 0 });
    });
  });

  describe("primitives", () => {
    it("unwraps nullable targets for known values", () => {
      const result = into(
        BACKGROUND,
        new StringType(),
        wireString("Ana"),
        t.nullable(t.string()),
      );
      expect(result.value).toBe("Ana");
    });

    it("rejects a wire value of another kind", () => {
      const result = into(
        BACKGROUND,
        new StringType(),
        wireString("x"),
        t.number(),
      );
      expect(result.diags.errors()[0].detail).toBe(
        `An unexpected error was encountered trying to convert String into number. ${REPORT}\n\ncan't unmarshal String into number`,
      );
    });

    it("rejects fractional numbers for integer targets", () => {
      const result = into(
        BACKGROUND,
        new NumberType(),
        wireNumber(2.5),
        t.integer(),
      );
      expect(result.value).toBeUndefined();
      expect(result.diags.errors()[0].detail).toBe(
        `An unexpected error was encountered trying to convert Number into integer. ${REPORT}\n\ncannot store 2.5 in an integer without rounding`,
      );
    });

    it("truncates fractional numbers when rounding is allowed", () => {
      const opts = { allowRoundingNumbers: true };
      expect(
        into(BACKGROUND, new NumberType(), wireNumber(2.5), t.integer(), opts)
          .value,
      ).toBe(2);
      expect(
        into(BACKGROUND, new NumberType(), wireNumber(-2.5), t.integer(), opts)
          .value,
      ).toBe(-2);
    });
  });

  describe("lists", () => {
    const type = new ListType({ elementType: new StringType() });

    it("converts each element", () => {
      const result = into(
        BACKGROUND,
        type,
        wireList(listOf(WIRE_STRING), [wireString("a"), wireString("b")]),
        t.list(t.string()),
      );
      expect(result.value).toEqual(["a", "b"]);
    });

    it("reports element failures at their index", () => {
      const result = into(
        BACKGROUND,
        type,
        wireList(listOf(WIRE_STRING), [wireString("a"), wireNull(WIRE_STRING)]),
        t.list(t.string()),
        {},
        Path.root("tags"),
      );
      expect(result.value).toBeUndefined();
      expect(result.diags.errors()[0].path?.toString()).toBe("tags[1]");
    });

    it("passes nullable element targets through", () => {
      const result = into(
        BACKGROUND,
        type,
        wireList(listOf(WIRE_STRING), [wireNull(WIRE_STRING), wireString("b")]),
        t.list(t.nullable(t.string())),
      );
      expect(result.value).toEqual([null, "b"]);
    });

    it("rejects a list for a map target", () => {
      const result = into(
        BACKGROUND,
        type,
        wireList(listOf(WIRE_STRING), []),
        t.map(t.string()),
      );
      expect(result.diags.errors()[0].detail).toBe(
        `An unexpected error was encountered trying to convert List[String] into map of string. ${REPORT}\n\ncan't unmarshal List[String] into a map`,
      );
    });
  });

  describe("maps", () => {
    const type = new MapType({ elementType: new NumberType() });

    it("converts each entry", () => {
      const result = into(
        BACKGROUND,
        type,
        wireMap(mapOf(WIRE_NUMBER), { a: wireNumber(1), b: wireNumber(2) }),
        t.map(t.number()),
      );
      expect(result.value).toEqual({ a: 1, b: 2 });
    });

    it("keeps unusual keys as own properties", () => {
      const result = into(
        BACKGROUND,
        type,
        wireMap(mapOf(WIRE_NUMBER), new Map([["__proto__", wireNumber(1)]])),
        t.map(t.number()),
      );
      const value = result.value;
      expect(
        typeof value === "object" && value !== null &&
          Object.hasOwn(value, "__proto__") &&
          Object.getPrototypeOf(value) === Object.prototype,
      ).toBe(true);
    });

    it("reports entry failures at their key", () => {
      const result = into(
        BACKGROUND,
        type,
        wireMap(mapOf(WIRE_NUMBER), {
          a: wireNumber(1),
          b: wireNumber(1.5),
        }),
        t.map(t.integer()),
        {},
        Path.root("limits"),
      );
      expect(result.diags.errors()[0].path?.toString()).toBe('limits["b"]');
    });
  });

  describe("nesting depth", () => {
    it("rejects paths deeper than the limit", () => {
      const result = into(
        BACKGROUND,
        new StringType(),
        wireString("x"),
        t.string(),
        { maxDepth: 1 },
        Path.root("a").atName("b"),
      );
      const [error] = result.diags.errors();
      expect(error.summary).toBe("Maximum Nesting Depth Exceeded");
      expect(error.detail).toBe(
        "The value is nested more than 1 levels deep.",
      );
    });
  });
});

describe("zeroValue", () => {
  it("returns the empty value of each target", () => {
    expect(zeroValue(t.string())).toBe("");
    expect(zeroValue(t.integer())).toBe(0);
    expect(zeroValue(t.boolean())).toBe(false);
    expect(zeroValue(t.list(t.string()))).toEqual([]);
    expect(zeroValue(t.map(t.string()))).toEqual({});
    expect(zeroValue(t.nullable(t.string()))).toBeNull();
    expect(zeroValue(t.struct(PersonShape))).toEqual({ name: "", age: 0 });
  });
});
