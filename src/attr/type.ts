import type { Diagnostics } from "../diag/diagnostics.ts";
import type { Path } from "../path/path.ts";
import type { WireType } from "../wire/wire_type.ts";
import type { WireValue } from "../wire/wire_value.ts";
import type { ConversionContext } from "./context.ts";
import type { AttrValue } from "./value.ts";

/**
 * Abstract base class for all attribute types.
 *
 * A type knows its wire representation and how to turn a wire value back into
 * one of its attribute values. Optional behaviour (attribute types, element
 * types, validation) is exposed through the capability interfaces below and
 * detected with the matching guards.
 */
export abstract class AttrType<V extends AttrValue = AttrValue> {
  /**
   * Returns the wire type values of this type are exchanged as.
   */
  public abstract wireType(): WireType;

  /**
   * Converts a wire value into an attribute value of this type.
   * @throws Error if the wire value does not have this type's wire type.
   */
  public abstract valueFromWire(ctx: ConversionContext, value: WireValue): V;

  /**
   * Returns true if the other type is the same type.
   */
  public abstract equals(other: AttrType): boolean;

  /**
   * Human readable name, used in diagnostics.
   */
  public abstract toString(): string;
}

/**
 * Object-like types that expose a name → type directory for their attributes.
 */
export interface TypeWithAttributeTypes {
  attributeTypes(): Readonly<Record<string, AttrType>>;
  withAttributeTypes(
    types: Readonly<Record<string, AttrType>>,
  ): AttrType & TypeWithAttributeTypes;
}

/**
 * Collection types whose elements all share one type.
 */
export interface TypeWithElementType {
  elementType(): AttrType;
}

/**
 * Types that check values beyond their wire shape.
 */
export interface TypeWithValidate {
  validate(ctx: ConversionContext, value: WireValue, path: Path): Diagnostics;
}

export function hasAttributeTypes(
  type: AttrType,
): type is AttrType & TypeWithAttributeTypes {
  return "attributeTypes" in type &&
    typeof type.attributeTypes === "function" &&
    "withAttributeTypes" in type &&
    typeof type.withAttributeTypes === "function";
}

export function hasElementType(
  type: AttrType,
): type is AttrType & TypeWithElementType {
  return "elementType" in type && typeof type.elementType === "function";
}

export function hasValidate(
  type: AttrType,
): type is AttrType & TypeWithValidate {
  return "validate" in type && typeof type.validate === "function";
}

/**
 * Looks up an attribute type by name without consulting the prototype chain.
 */
export function lookupAttributeType(
  types: Readonly<Record<string, AttrType>>,
  name: string,
): AttrType | undefined {
  return Object.hasOwn(types, name) ? types[name] : undefined;
}
