import {
  type BoolWireType,
  type ListWireType,
  type MapWireType,
  type NumberWireType,
  type ObjectWireType,
  type StringWireType,
  WIRE_BOOL,
  WIRE_NUMBER,
  WIRE_STRING,
  type WireType,
  wireTypeEquals,
  wireTypeToString,
} from "./wire_type.ts";

/**
 * A dynamically typed value as exchanged with the configuration system.
 *
 * Every variant carries its {@link WireType}. `null` and `unknown` values keep
 * the type they were declared with, so a null list is still a list.
 */
export type WireValue =
  | NullWireValue
  | UnknownWireValue
  | StringWireValue
  | NumberWireValue
  | BoolWireValue
  | ListWireValue
  | MapWireValue
  | ObjectWireValue;

export interface NullWireValue {
  readonly kind: "null";
  readonly type: WireType;
}

export interface UnknownWireValue {
  readonly kind: "unknown";
  readonly type: WireType;
}

export interface StringWireValue {
  readonly kind: "string";
  readonly type: StringWireType;
  readonly value: string;
}

export interface NumberWireValue {
  readonly kind: "number";
  readonly type: NumberWireType;
  readonly value: number;
}

export interface BoolWireValue {
  readonly kind: "bool";
  readonly type: BoolWireType;
  readonly value: boolean;
}

export interface ListWireValue {
  readonly kind: "list";
  readonly type: ListWireType;
  readonly elements: readonly WireValue[];
}

export interface MapWireValue {
  readonly kind: "map";
  readonly type: MapWireType;
  readonly entries: ReadonlyMap<string, WireValue>;
}

export interface ObjectWireValue {
  readonly kind: "object";
  readonly type: ObjectWireType;
  readonly attributes: ReadonlyMap<string, WireValue>;
}

/** A wire value that is neither null nor unknown. */
export type KnownWireValue = Exclude<
  WireValue,
  NullWireValue | UnknownWireValue
>;

export function wireNull(type: WireType): NullWireValue {
  return { kind: "null", type };
}

export function wireUnknown(type: WireType): UnknownWireValue {
  return { kind: "unknown", type };
}

export function wireString(value: string): StringWireValue {
  return { kind: "string", type: WIRE_STRING, value };
}

export function wireNumber(value: number): NumberWireValue {
  if (Number.isNaN(value)) {
    throw new Error("NaN is not a valid Number value");
  }
  return { kind: "number", type: WIRE_NUMBER, value };
}

export function wireBool(value: boolean): BoolWireValue {
  return { kind: "bool", type: WIRE_BOOL, value };
}

/**
 * Builds a list value. Every element must carry the list's element type.
 */
export function wireList(
  type: WireType,
  elements: readonly WireValue[],
): ListWireValue {
  if (type.kind !== "list") {
    throw new Error(
      `cannot build a list value with type ${wireTypeToString(type)}`,
    );
  }
  elements.forEach((element, index) => {
    if (!wireTypeEquals(element.type, type.element)) {
      throw new Error(
        `list element ${index} has type ${
          wireTypeToString(element.type)
        }, expected ${wireTypeToString(type.element)}`,
      );
    }
  });
  return { kind: "list", type, elements: elements.slice() };
}

/**
 * Builds a map value. Every entry must carry the map's element type.
 */
export function wireMap(
  type: WireType,
  entries: Readonly<Record<string, WireValue>> | ReadonlyMap<string, WireValue>,
): MapWireValue {
  if (type.kind !== "map") {
    throw new Error(
      `cannot build a map value with type ${wireTypeToString(type)}`,
    );
  }
  const copy = toMap(entries);
  for (const [key, entry] of copy) {
    if (!wireTypeEquals(entry.type, type.element)) {
      throw new Error(
        `map element ${JSON.stringify(key)} has type ${
          wireTypeToString(entry.type)
        }, expected ${wireTypeToString(type.element)}`,
      );
    }
  }
  return { kind: "map", type, entries: copy };
}

/**
 * Builds an object value. The attribute names must be exactly the names the
 * object type declares and each attribute must carry its declared type.
 */
export function wireObject(
  type: WireType,
  attributes:
    | Readonly<Record<string, WireValue>>
    | ReadonlyMap<string, WireValue>,
): ObjectWireValue {
  if (type.kind !== "object") {
    throw new Error(
      `cannot build an object value with type ${wireTypeToString(type)}`,
    );
  }
  const copy = toMap(attributes);
  for (const name of Object.keys(type.attributeTypes)) {
    if (!copy.has(name)) {
      throw new Error(`object is missing attribute ${JSON.stringify(name)}`);
    }
  }
  for (const [name, attribute] of copy) {
    const declared = Object.hasOwn(type.attributeTypes, name)
      ? type.attributeTypes[name]
      : undefined;
    if (declared === undefined) {
      throw new Error(
        `object has undeclared attribute ${JSON.stringify(name)}`,
      );
    }
    if (!wireTypeEquals(attribute.type, declared)) {
      throw new Error(
        `attribute ${JSON.stringify(name)} has type ${
          wireTypeToString(attribute.type)
        }, expected ${wireTypeToString(declared)}`,
      );
    }
  }
  return { kind: "object", type, attributes: copy };
}

/** True when the value is neither null nor unknown. */
export function isKnown(value: WireValue): value is KnownWireValue {
  return value.kind !== "null" && value.kind !== "unknown";
}

/**
 * Reads the attribute map out of an object value.
 *
 * @throws Error if the value is not a known object.
 */
export function objectAttributes(
  value: WireValue,
): ReadonlyMap<string, WireValue> {
  if (value.kind !== "object") {
    throw new Error(
      `can't unmarshal ${describeWireValue(value)} into attribute map`,
    );
  }
  return value.attributes;
}

/**
 * Deep equality between two wire values, including their types.
 */
export function wireValueEquals(a: WireValue, b: WireValue): boolean {
  if (!wireTypeEquals(a.type, b.type)) {
    return false;
  }
  switch (a.kind) {
    case "null":
    case "unknown":
      return a.kind === b.kind;
    case "string":
    case "number":
    case "bool":
      return b.kind === a.kind && a.value === b.value;
    case "list":
      return b.kind === "list" &&
        a.elements.length === b.elements.length &&
        a.elements.every((element, i) =>
          wireValueEquals(element, b.elements[i])
        );
    case "map":
      return b.kind === "map" && entriesEqual(a.entries, b.entries);
    case "object":
      return b.kind === "object" && entriesEqual(a.attributes, b.attributes);
  }
}

/**
 * Short description of a value for error messages, e.g. `null String`.
 */
export function describeWireValue(value: WireValue): string {
  const type = wireTypeToString(value.type);
  return value.kind === "null" || value.kind === "unknown"
    ? `${value.kind} ${type}`
    : type;
}

function toMap(
  input: Readonly<Record<string, WireValue>> | ReadonlyMap<string, WireValue>,
): Map<string, WireValue> {
  if (isMap(input)) {
    return new Map(input);
  }
  return new Map(Object.entries(input));
}

function isMap(
  input: Readonly<Record<string, WireValue>> | ReadonlyMap<string, WireValue>,
): input is ReadonlyMap<string, WireValue> {
  return input instanceof Map;
}

function entriesEqual(
  a: ReadonlyMap<string, WireValue>,
  b: ReadonlyMap<string, WireValue>,
): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [key, value] of a) {
    const other = b.get(key);
    if (other === undefined || !wireValueEquals(value, other)) {
      return false;
    }
  }
  return true;
}
