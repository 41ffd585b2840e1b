import type { AttrType } from "../../attr/type.ts";
import type { ValueState } from "../../attr/value.ts";
import { WIRE_NUMBER, type WireType } from "../../wire/wire_type.ts";
import {
  type KnownWireValue,
  type WireValue,
  wireNumber,
} from "../../wire/wire_value.ts";
import { PrimitiveType, PrimitiveValue } from "./primitive_type.ts";

/**
 * Number attribute value. Numbers are carried as IEEE-754 doubles.
 */
export class NumberValue extends PrimitiveValue<number> {
  constructor(state: ValueState<number>) {
    super(state);
  }

  public override type(): AttrType {
    return new NumberType();
  }

  protected override knownToWire(value: number): WireValue {
    return wireNumber(value);
  }
}

/**
 * Number attribute type.
 */
export class NumberType extends PrimitiveType<NumberValue> {
  public override wireType(): WireType {
    return WIRE_NUMBER;
  }

  protected override nullValue(): NumberValue {
    return numberNull();
  }

  protected override unknownValue(): NumberValue {
    return numberUnknown();
  }

  protected override knownValue(
    value: KnownWireValue,
  ): NumberValue | undefined {
    return value.kind === "number" ? numberValue(value.value) : undefined;
  }

  public override toString(): string {
    return "NumberType";
  }
}

export function numberValue(value: number): NumberValue {
  return new NumberValue({ kind: "known", value });
}

export function numberNull(): NumberValue {
  return new NumberValue({ kind: "null" });
}

export function numberUnknown(): NumberValue {
  return new NumberValue({ kind: "unknown" });
}
