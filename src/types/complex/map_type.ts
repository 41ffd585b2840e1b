import type { ConversionContext } from "../../attr/context.ts";
import { AttrType, type TypeWithElementType } from "../../attr/type.ts";
import type { AttrValue, ValueState } from "../../attr/value.ts";
import {
  mapOf,
  type WireType,
  wireTypeEquals,
  wireTypeToString,
} from "../../wire/wire_type.ts";
import {
  describeWireValue,
  type WireValue,
  wireMap,
  wireNull,
  wireUnknown,
} from "../../wire/wire_value.ts";

export interface MapTypeParams {
  elementType: AttrType;
}

/**
 * String-keyed map of values sharing one element type.
 */
export class MapType extends AttrType<MapValue> implements TypeWithElementType {
  readonly #elementType: AttrType;

  constructor(params: MapTypeParams) {
    super();
    this.#elementType = params.elementType;
  }

  public elementType(): AttrType {
    return this.#elementType;
  }

  public override wireType(): WireType {
    return mapOf(this.#elementType.wireType());
  }

  public override valueFromWire(
    ctx: ConversionContext,
    value: WireValue,
  ): MapValue {
    if (!wireTypeEquals(value.type, this.wireType())) {
      throw new Error(
        `can't use ${describeWireValue(value)} as ${
          wireTypeToString(this.wireType())
        }`,
      );
    }
    switch (value.kind) {
      case "null":
        return mapNull(this.#elementType);
      case "unknown":
        return mapUnknown(this.#elementType);
      case "map": {
        const entries = new Map<string, AttrValue>();
        for (const [key, entry] of value.entries) {
          entries.set(key, this.#elementType.valueFromWire(ctx, entry));
        }
        return mapValue(this.#elementType, entries);
      }
      default:
        throw new Error(`can't use ${describeWireValue(value)} as a map`);
    }
  }

  public override equals(other: AttrType): boolean {
    return other instanceof MapType &&
      this.#elementType.equals(other.elementType());
  }

  public override toString(): string {
    return `MapType[${this.#elementType.toString()}]`;
  }
}

/**
 * Map attribute value.
 */
export class MapValue implements AttrValue {
  readonly #elementType: AttrType;
  readonly #state: ValueState<ReadonlyMap<string, AttrValue>>;

  /**
   * @throws Error if an entry's type differs from the element type.
   */
  constructor(
    elementType: AttrType,
    state: ValueState<ReadonlyMap<string, AttrValue>>,
  ) {
    if (state.kind === "known") {
      for (const [key, entry] of state.value) {
        if (!entry.type().equals(elementType)) {
          throw new Error(
            `map element ${JSON.stringify(key)} is ${entry.type().toString()}, expected ${elementType.toString()}`,
          );
        }
      }
      state = { kind: "known", value: new Map(state.value) };
    }
    this.#elementType = elementType;
    this.#state = state;
  }

  public type(): MapType {
    return new MapType({ elementType: this.#elementType });
  }

  public elementType(): AttrType {
    return this.#elementType;
  }

  /** The entries of a known map; empty when null or unknown. */
  public entries(): ReadonlyMap<string, AttrValue> {
    const state = this.#state;
    return state.kind === "known" ? state.value : new Map();
  }

  public isNull(): boolean {
    return this.#state.kind === "null";
  }

  public isUnknown(): boolean {
    return this.#state.kind === "unknown";
  }

  public toWireValue(ctx: ConversionContext): WireValue {
    const wireType = this.type().wireType();
    const state = this.#state;
    switch (state.kind) {
      case "null":
        return wireNull(wireType);
      case "unknown":
        return wireUnknown(wireType);
      case "known": {
        const entries = new Map<string, WireValue>();
        for (const [key, entry] of state.value) {
          entries.set(key, entry.toWireValue(ctx));
        }
        return wireMap(wireType, entries);
      }
    }
  }

  public equals(other: AttrValue): boolean {
    if (!(other instanceof MapValue) || !other.type().equals(this.type())) {
      return false;
    }
    const a = this.#state;
    const b = other.#state;
    if (a.kind !== "known" || b.kind !== "known") {
      return a.kind === b.kind;
    }
    if (a.value.size !== b.value.size) {
      return false;
    }
    for (const [key, entry] of a.value) {
      const match = b.value.get(key);
      if (match === undefined || !entry.equals(match)) {
        return false;
      }
    }
    return true;
  }

  public toString(): string {
    const state = this.#state;
    if (state.kind !== "known") {
      return `<${state.kind}>`;
    }
    const parts = [...state.value.keys()].sort().map((key) =>
      `${JSON.stringify(key)}:${state.value.get(key)?.toString() ?? ""}`
    );
    return `{${parts.join(",")}}`;
  }
}

export function mapValue(
  elementType: AttrType,
  entries: Readonly<Record<string, AttrValue>> | ReadonlyMap<string, AttrValue>,
): MapValue {
  return new MapValue(elementType, { kind: "known", value: toMap(entries) });
}

export function mapNull(elementType: AttrType): MapValue {
  return new MapValue(elementType, { kind: "null" });
}

export function mapUnknown(elementType: AttrType): MapValue {
  return new MapValue(elementType, { kind: "unknown" });
}

/** @internal */
export function toMap(
  entries: Readonly<Record<string, AttrValue>> | ReadonlyMap<string, AttrValue>,
): Map<string, AttrValue> {
  if (isMap(entries)) {
    return new Map(entries);
  }
  return new Map(Object.entries(entries));
}

function isMap(
  entries: Readonly<Record<string, AttrValue>> | ReadonlyMap<string, AttrValue>,
): entries is ReadonlyMap<string, AttrValue> {
  return entries instanceof Map;
}
