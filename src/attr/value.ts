import type { WireValue } from "../wire/wire_value.ts";
import type { ConversionContext } from "./context.ts";
import type { AttrType } from "./type.ts";

/**
 * An attribute value produced by an {@link AttrType}.
 */
export interface AttrValue {
  type(): AttrType;
  /**
   * Converts the value into its canonical wire form.
   * @throws Error if the value cannot be represented on the wire.
   */
  toWireValue(ctx: ConversionContext): WireValue;
  isNull(): boolean;
  isUnknown(): boolean;
  equals(other: AttrValue): boolean;
  toString(): string;
}

/**
 * Known, null or unknown: the three states every attribute value can be in.
 */
export type ValueState<T> =
  | { readonly kind: "known"; readonly value: T }
  | { readonly kind: "null" }
  | { readonly kind: "unknown" };

/**
 * Runtime check for values that implement {@link AttrValue}.
 */
export function isAttrValue(value: unknown): value is AttrValue {
  return typeof value === "object" && value !== null &&
    "toWireValue" in value && typeof value.toWireValue === "function" &&
    "type" in value && typeof value.type === "function";
}
