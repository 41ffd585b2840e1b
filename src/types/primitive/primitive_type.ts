import type { ConversionContext } from "../../attr/context.ts";
import { AttrType } from "../../attr/type.ts";
import type { AttrValue, ValueState } from "../../attr/value.ts";
import {
  describeWireValue,
  type KnownWireValue,
  type WireValue,
  wireNull,
  wireUnknown,
} from "../../wire/wire_value.ts";

type Primitive = string | number | boolean;

/**
 * Abstract base class for primitive attribute values.
 */
export abstract class PrimitiveValue<T extends Primitive> implements AttrValue {
  readonly #state: ValueState<T>;

  protected constructor(state: ValueState<T>) {
    this.#state = state;
  }

  public abstract type(): AttrType;

  /** Builds the wire form of a known value. */
  protected abstract knownToWire(value: T): WireValue;

  public isNull(): boolean {
    return this.#state.kind === "null";
  }

  public isUnknown(): boolean {
    return this.#state.kind === "unknown";
  }

  /**
   * Returns the underlying value, or undefined when null or unknown.
   */
  public getValue(): T | undefined {
    const state = this.#state;
    return state.kind === "known" ? state.value : undefined;
  }

  public toWireValue(_ctx: ConversionContext): WireValue {
    const state = this.#state;
    switch (state.kind) {
      case "null":
        return wireNull(this.type().wireType());
      case "unknown":
        return wireUnknown(this.type().wireType());
      case "known":
        return this.knownToWire(state.value);
    }
  }

  public equals(other: AttrValue): boolean {
    if (
      !(other instanceof PrimitiveValue) ||
      other.constructor !== this.constructor
    ) {
      return false;
    }
    const a = this.#state;
    const b = other.#state;
    if (a.kind === "known" && b.kind === "known") {
      return a.value === b.value;
    }
    return a.kind === b.kind;
  }

  public toString(): string {
    const state = this.#state;
    switch (state.kind) {
      case "null":
        return "<null>";
      case "unknown":
        return "<unknown>";
      case "known":
        return typeof state.value === "string"
          ? JSON.stringify(state.value)
          : String(state.value);
    }
  }
}

/**
 * Abstract base class for primitive attribute types.
 */
export abstract class PrimitiveType<V extends AttrValue> extends AttrType<V> {
  /** Builds the null value of this type. */
  protected abstract nullValue(): V;

  /** Builds the unknown value of this type. */
  protected abstract unknownValue(): V;

  /**
   * Builds a known value from a wire value of the right kind, or returns
   * undefined when the kind does not match.
   */
  protected abstract knownValue(value: KnownWireValue): V | undefined;

  public override valueFromWire(
    _ctx: ConversionContext,
    value: WireValue,
  ): V {
    if (value.kind === "null" || value.kind === "unknown") {
      if (value.type.kind !== this.wireType().kind) {
        throw new Error(this.#mismatch(value));
      }
      return value.kind === "null" ? this.nullValue() : this.unknownValue();
    }
    const result = this.knownValue(value);
    if (result === undefined) {
      throw new Error(this.#mismatch(value));
    }
    return result;
  }

  /** Primitive types are equal when they are of the same class. */
  public override equals(other: AttrType): boolean {
    return other.constructor === this.constructor;
  }

  #mismatch(value: WireValue): string {
    return `can't use ${describeWireValue(value)} as ${this.toString()}`;
  }
}
