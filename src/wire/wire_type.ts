/**
 * Wire types describe the shape of values exchanged with the configuration
 * system. They form a closed union so that every consumer can switch on
 * `kind` exhaustively.
 */
export type WireType =
  | StringWireType
  | NumberWireType
  | BoolWireType
  | ListWireType
  | MapWireType
  | ObjectWireType;

export interface StringWireType {
  readonly kind: "string";
}

export interface NumberWireType {
  readonly kind: "number";
}

export interface BoolWireType {
  readonly kind: "bool";
}

export interface ListWireType {
  readonly kind: "list";
  readonly element: WireType;
}

export interface MapWireType {
  readonly kind: "map";
  readonly element: WireType;
}

export interface ObjectWireType {
  readonly kind: "object";
  readonly attributeTypes: Readonly<Record<string, WireType>>;
}

export const WIRE_STRING: StringWireType = Object.freeze({ kind: "string" });
export const WIRE_NUMBER: NumberWireType = Object.freeze({ kind: "number" });
export const WIRE_BOOL: BoolWireType = Object.freeze({ kind: "bool" });

/** Builds a list wire type. */
export function listOf(element: WireType): ListWireType {
  return { kind: "list", element };
}

/** Builds a map wire type. Map keys are always strings. */
export function mapOf(element: WireType): MapWireType {
  return { kind: "map", element };
}

/** Builds an object wire type from its attribute types. */
export function objectOf(
  attributeTypes: Readonly<Record<string, WireType>>,
): ObjectWireType {
  return { kind: "object", attributeTypes: { ...attributeTypes } };
}

/**
 * Structural equality between two wire types.
 */
export function wireTypeEquals(a: WireType, b: WireType): boolean {
  switch (a.kind) {
    case "string":
    case "number":
    case "bool":
      return a.kind === b.kind;
    case "list":
      return b.kind === "list" && wireTypeEquals(a.element, b.element);
    case "map":
      return b.kind === "map" && wireTypeEquals(a.element, b.element);
    case "object": {
      if (b.kind !== "object") {
        return false;
      }
      const aNames = Object.keys(a.attributeTypes);
      if (aNames.length !== Object.keys(b.attributeTypes).length) {
        return false;
      }
      for (const name of aNames) {
        const other = Object.hasOwn(b.attributeTypes, name)
          ? b.attributeTypes[name]
          : undefined;
        if (other === undefined || !wireTypeEquals(a.attributeTypes[name], other)) {
          return false;
        }
      }
      return true;
    }
  }
}

/**
 * Renders a wire type for diagnostics, e.g. `List[String]` or
 * `Object["age":Number, "name":String]`.
 */
export function wireTypeToString(type: WireType): string {
  switch (type.kind) {
    case "string":
      return "String";
    case "number":
      return "Number";
    case "bool":
      return "Bool";
    case "list":
      return `List[${wireTypeToString(type.element)}]`;
    case "map":
      return `Map[${wireTypeToString(type.element)}]`;
    case "object": {
      const parts = Object.keys(type.attributeTypes).sort().map((name) =>
        `${JSON.stringify(name)}:${wireTypeToString(type.attributeTypes[name])}`
      );
      return `Object[${parts.join(", ")}]`;
    }
  }
}
