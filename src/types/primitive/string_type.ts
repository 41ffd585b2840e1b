import type { AttrType } from "../../attr/type.ts";
import type { ValueState } from "../../attr/value.ts";
import { WIRE_STRING, type WireType } from "../../wire/wire_type.ts";
import {
  type KnownWireValue,
  type WireValue,
  wireString,
} from "../../wire/wire_value.ts";
import { PrimitiveType, PrimitiveValue } from "./primitive_type.ts";

/**
 * String attribute value.
 */
export class StringValue extends PrimitiveValue<string> {
  constructor(state: ValueState<string>) {
    super(state);
  }

  public override type(): AttrType {
    return new StringType();
  }

  protected override knownToWire(value: string): WireValue {
    return wireString(value);
  }
}

/**
 * String attribute type.
 */
export class StringType extends PrimitiveType<StringValue> {
  public override wireType(): WireType {
    return WIRE_STRING;
  }

  protected override nullValue(): StringValue {
    return stringNull();
  }

  protected override unknownValue(): StringValue {
    return stringUnknown();
  }

  protected override knownValue(
    value: KnownWireValue,
  ): StringValue | undefined {
    return value.kind === "string" ? stringValue(value.value) : undefined;
  }

  public override toString(): string {
    return "StringType";
  }
}

export function stringValue(value: string): StringValue {
  return new StringValue({ kind: "known", value });
}

export function stringNull(): StringValue {
  return new StringValue({ kind: "null" });
}

export function stringUnknown(): StringValue {
  return new StringValue({ kind: "unknown" });
}
