import type { AttrType } from "../../attr/type.ts";
import type { ValueState } from "../../attr/value.ts";
import { WIRE_BOOL, type WireType } from "../../wire/wire_type.ts";
import {
  type KnownWireValue,
  type WireValue,
  wireBool,
} from "../../wire/wire_value.ts";
import { PrimitiveType, PrimitiveValue } from "./primitive_type.ts";

/**
 * Boolean attribute value.
 */
export class BoolValue extends PrimitiveValue<boolean> {
  constructor(state: ValueState<boolean>) {
    super(state);
  }

  public override type(): AttrType {
    return new BoolType();
  }

  protected override knownToWire(value: boolean): WireValue {
    return wireBool(value);
  }
}

/**
 * Boolean attribute type.
 */
export class BoolType extends PrimitiveType<BoolValue> {
  public override wireType(): WireType {
    return WIRE_BOOL;
  }

  protected override nullValue(): BoolValue {
    return boolNull();
  }

  protected override unknownValue(): BoolValue {
    return boolUnknown();
  }

  protected override knownValue(value: KnownWireValue): BoolValue | undefined {
    return value.kind === "bool" ? boolValue(value.value) : undefined;
  }

  public override toString(): string {
    return "BoolType";
  }
}

export function boolValue(value: boolean): BoolValue {
  return new BoolValue({ kind: "known", value });
}

export function boolNull(): BoolValue {
  return new BoolValue({ kind: "null" });
}

export function boolUnknown(): BoolValue {
  return new BoolValue({ kind: "unknown" });
}
