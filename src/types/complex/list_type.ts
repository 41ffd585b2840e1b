import type { ConversionContext } from "../../attr/context.ts";
import { AttrType, type TypeWithElementType } from "../../attr/type.ts";
import type { AttrValue, ValueState } from "../../attr/value.ts";
import {
  listOf,
  type WireType,
  wireTypeEquals,
  wireTypeToString,
} from "../../wire/wire_type.ts";
import {
  describeWireValue,
  type WireValue,
  wireList,
  wireNull,
  wireUnknown,
} from "../../wire/wire_value.ts";

export interface ListTypeParams {
  elementType: AttrType;
}

/**
 * Ordered list of values sharing one element type.
 */
export class ListType extends AttrType<ListValue>
  implements TypeWithElementType {
  readonly #elementType: AttrType;

  constructor(params: ListTypeParams) {
    super();
    this.#elementType = params.elementType;
  }

  public elementType(): AttrType {
    return this.#elementType;
  }

  public override wireType(): WireType {
    return listOf(this.#elementType.wireType());
  }

  public override valueFromWire(
    ctx: ConversionContext,
    value: WireValue,
  ): ListValue {
    if (!wireTypeEquals(value.type, this.wireType())) {
      throw new Error(
        `can't use ${describeWireValue(value)} as ${
          wireTypeToString(this.wireType())
        }`,
      );
    }
    switch (value.kind) {
      case "null":
        return listNull(this.#elementType);
      case "unknown":
        return listUnknown(this.#elementType);
      case "list":
        return listValue(
          this.#elementType,
          value.elements.map((element) =>
            this.#elementType.valueFromWire(ctx, element)
          ),
        );
      default:
        throw new Error(`can't use ${describeWireValue(value)} as a list`);
    }
  }

  public override equals(other: AttrType): boolean {
    return other instanceof ListType &&
      this.#elementType.equals(other.elementType());
  }

  public override toString(): string {
    return `ListType[${this.#elementType.toString()}]`;
  }
}

/**
 * List attribute value.
 */
export class ListValue implements AttrValue {
  readonly #elementType: AttrType;
  readonly #state: ValueState<readonly AttrValue[]>;

  /**
   * @throws Error if an element's type differs from the element type.
   */
  constructor(elementType: AttrType, state: ValueState<readonly AttrValue[]>) {
    if (state.kind === "known") {
      state.value.forEach((element, index) => {
        if (!element.type().equals(elementType)) {
          throw new Error(
            `list element ${index} is ${element.type().toString()}, expected ${elementType.toString()}`,
          );
        }
      });
      state = { kind: "known", value: state.value.slice() };
    }
    this.#elementType = elementType;
    this.#state = state;
  }

  public type(): ListType {
    return new ListType({ elementType: this.#elementType });
  }

  public elementType(): AttrType {
    return this.#elementType;
  }

  /** The elements of a known list; empty when null or unknown. */
  public elements(): readonly AttrValue[] {
    const state = this.#state;
    return state.kind === "known" ? state.value : [];
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
      case "known":
        return wireList(
          wireType,
          state.value.map((element) => element.toWireValue(ctx)),
        );
    }
  }

  public equals(other: AttrValue): boolean {
    if (!(other instanceof ListValue) || !other.type().equals(this.type())) {
      return false;
    }
    const a = this.#state;
    const b = other.#state;
    if (a.kind !== "known" || b.kind !== "known") {
      return a.kind === b.kind;
    }
    return a.value.length === b.value.length &&
      a.value.every((element, i) => element.equals(b.value[i]));
  }

  public toString(): string {
    const state = this.#state;
    if (state.kind !== "known") {
      return `<${state.kind}>`;
    }
    return `[${state.value.map((element) => element.toString()).join(",")}]`;
  }
}

export function listValue(
  elementType: AttrType,
  elements: readonly AttrValue[],
): ListValue {
  return new ListValue(elementType, { kind: "known", value: elements });
}

export function listNull(elementType: AttrType): ListValue {
  return new ListValue(elementType, { kind: "null" });
}

export function listUnknown(elementType: AttrType): ListValue {
  return new ListValue(elementType, { kind: "unknown" });
}
