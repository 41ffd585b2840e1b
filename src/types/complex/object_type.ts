import type { ConversionContext } from "../../attr/context.ts";
import {
  AttrType,
  lookupAttributeType,
  type TypeWithAttributeTypes,
} from "../../attr/type.ts";
import type { AttrValue, ValueState } from "../../attr/value.ts";
import { Diagnostics } from "../../diag/diagnostics.ts";
import { Path } from "../../path/path.ts";
import {
  CONVERSION_ERROR_SUMMARY,
  toWireValueErrorDiag,
} from "../../reflect/diags.ts";
import type { Converted } from "../../reflect/dispatcher.ts";
import { fromStruct } from "../../reflect/from_value.ts";
import { intoStruct } from "../../reflect/into.ts";
import type { ReflectOptions } from "../../reflect/options.ts";
import type { StructShape } from "../../reflect/struct_shape.ts";
import {
  objectOf,
  type WireType,
  wireTypeEquals,
  wireTypeToString,
} from "../../wire/wire_type.ts";
import {
  describeWireValue,
  type WireValue,
  wireNull,
  wireObject,
  wireUnknown,
} from "../../wire/wire_value.ts";
import { toMap } from "./map_type.ts";

export interface ObjectTypeParams {
  attributeTypes: Readonly<Record<string, AttrType>>;
}

/**
 * Fixed set of named attributes, each with its own type.
 */
export class ObjectType extends AttrType<ObjectValue>
  implements TypeWithAttributeTypes {
  readonly #attributeTypes: Readonly<Record<string, AttrType>>;

  constructor(params: ObjectTypeParams) {
    super();
    this.#attributeTypes = Object.freeze({ ...params.attributeTypes });
  }

  public attributeTypes(): Readonly<Record<string, AttrType>> {
    return this.#attributeTypes;
  }

  public withAttributeTypes(
    types: Readonly<Record<string, AttrType>>,
  ): ObjectType {
    return new ObjectType({ attributeTypes: types });
  }

  public override wireType(): WireType {
    const wireTypes: Record<string, WireType> = {};
    for (const [name, type] of Object.entries(this.#attributeTypes)) {
      wireTypes[name] = type.wireType();
    }
    return objectOf(wireTypes);
  }

  public override valueFromWire(
    ctx: ConversionContext,
    value: WireValue,
  ): ObjectValue {
    if (!wireTypeEquals(value.type, this.wireType())) {
      throw new Error(
        `can't use ${describeWireValue(value)} as ${
          wireTypeToString(this.wireType())
        }`,
      );
    }
    switch (value.kind) {
      case "null":
        return objectNull(this.#attributeTypes);
      case "unknown":
        return objectUnknown(this.#attributeTypes);
      case "object": {
        const attributes = new Map<string, AttrValue>();
        for (const [name, attribute] of value.attributes) {
          const type = lookupAttributeType(this.#attributeTypes, name);
          if (type === undefined) {
            throw new Error(`object has undeclared attribute ${JSON.stringify(name)}`);
          }
          attributes.set(name, type.valueFromWire(ctx, attribute));
        }
        return objectValue(this.#attributeTypes, attributes);
      }
      default:
        throw new Error(`can't use ${describeWireValue(value)} as an object`);
    }
  }

  public override equals(other: AttrType): boolean {
    if (!(other instanceof ObjectType)) {
      return false;
    }
    const mine = Object.keys(this.#attributeTypes);
    const theirs = other.attributeTypes();
    return mine.length === Object.keys(theirs).length &&
      mine.every((name) => {
        const otherType = lookupAttributeType(theirs, name);
        return otherType !== undefined &&
          this.#attributeTypes[name].equals(otherType);
      });
  }

  public override toString(): string {
    const parts = Object.keys(this.#attributeTypes).sort().map((name) =>
      `${JSON.stringify(name)}:${this.#attributeTypes[name].toString()}`
    );
    return `ObjectType[${parts.join(", ")}]`;
  }
}

/**
 * Object attribute value.
 */
export class ObjectValue implements AttrValue {
  readonly #attributeTypes: Readonly<Record<string, AttrType>>;
  readonly #state: ValueState<ReadonlyMap<string, AttrValue>>;

  /**
   * @throws Error if the attribute names differ from the declared names or an
   * attribute has the wrong type.
   */
  constructor(
    attributeTypes: Readonly<Record<string, AttrType>>,
    state: ValueState<ReadonlyMap<string, AttrValue>>,
  ) {
    if (state.kind === "known") {
      for (const name of Object.keys(attributeTypes)) {
        if (!state.value.has(name)) {
          throw new Error(`missing value for attribute ${JSON.stringify(name)}`);
        }
      }
      for (const [name, attribute] of state.value) {
        const type = lookupAttributeType(attributeTypes, name);
        if (type === undefined) {
          throw new Error(`undeclared attribute ${JSON.stringify(name)}`);
        }
        if (!attribute.type().equals(type)) {
          throw new Error(
            `attribute ${JSON.stringify(name)} is ${attribute.type().toString()}, expected ${type.toString()}`,
          );
        }
      }
      state = { kind: "known", value: new Map(state.value) };
    }
    this.#attributeTypes = Object.freeze({ ...attributeTypes });
    this.#state = state;
  }

  public type(): ObjectType {
    return new ObjectType({ attributeTypes: this.#attributeTypes });
  }

  public attributeTypes(): Readonly<Record<string, AttrType>> {
    return this.#attributeTypes;
  }

  /** The attributes of a known object; empty when null or unknown. */
  public attributes(): ReadonlyMap<string, AttrValue> {
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
        const attributes = new Map<string, WireValue>();
        for (const [name, attribute] of state.value) {
          attributes.set(name, attribute.toWireValue(ctx));
        }
        return wireObject(wireType, attributes);
      }
    }
  }

  /**
   * Decodes this object into a new record of `shape`.
   */
  public as<T extends object>(
    ctx: ConversionContext,
    shape: StructShape<T>,
    opts: ReflectOptions = {},
  ): Converted<T> {
    let wire: WireValue;
    try {
      wire = this.toWireValue(ctx);
    } catch (err) {
      const diags = new Diagnostics();
      diags.add(toWireValueErrorDiag(err, Path.empty()));
      return { value: undefined, diags };
    }
    return intoStruct(ctx, this.type(), wire, shape, opts);
  }

  public equals(other: AttrValue): boolean {
    if (!(other instanceof ObjectValue) || !other.type().equals(this.type())) {
      return false;
    }
    const a = this.#state;
    const b = other.#state;
    if (a.kind !== "known" || b.kind !== "known") {
      return a.kind === b.kind;
    }
    for (const [name, attribute] of a.value) {
      const theirs = b.value.get(name);
      if (theirs === undefined || !attribute.equals(theirs)) {
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
    const parts = [...state.value.keys()].sort().map((name) =>
      `${JSON.stringify(name)}:${state.value.get(name)?.toString() ?? ""}`
    );
    return `{${parts.join(",")}}`;
  }
}

export function objectValue(
  attributeTypes: Readonly<Record<string, AttrType>>,
  attributes:
    | Readonly<Record<string, AttrValue>>
    | ReadonlyMap<string, AttrValue>,
): ObjectValue {
  return new ObjectValue(attributeTypes, {
    kind: "known",
    value: toMap(attributes),
  });
}

export function objectNull(
  attributeTypes: Readonly<Record<string, AttrType>>,
): ObjectValue {
  return new ObjectValue(attributeTypes, { kind: "null" });
}

export function objectUnknown(
  attributeTypes: Readonly<Record<string, AttrType>>,
): ObjectValue {
  return new ObjectValue(attributeTypes, { kind: "unknown" });
}

/**
 * Encodes a record of `shape` as an object value with the given attribute
 * types.
 */
export function objectValueFrom<T extends object>(
  ctx: ConversionContext,
  attributeTypes: Readonly<Record<string, AttrType>>,
  shape: StructShape<T>,
  record: T,
  opts: ReflectOptions = {},
): Converted<ObjectValue> {
  const result = fromStruct(
    ctx,
    new ObjectType({ attributeTypes }),
    record,
    shape,
    opts,
  );
  if (result.diags.hasError()) {
    return { value: undefined, diags: result.diags };
  }
  if (!(result.value instanceof ObjectValue)) {
    result.diags.addError(
      CONVERSION_ERROR_SUMMARY,
      `expected an object value, got ${String(result.value)}`,
    );
    return { value: undefined, diags: result.diags };
  }
  return { value: result.value, diags: result.diags };
}
