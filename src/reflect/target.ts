import type { StructShape } from "./struct_shape.ts";

/**
 * Native shape a converted value takes on the record side.
 *
 * Targets stand in for the field types a record would otherwise expose only
 * at compile time: the dispatchers switch on `kind` to decide how a wire value
 * becomes a native value and back.
 */
export type Target =
  | StringTarget
  | NumberTarget
  | IntegerTarget
  | BooleanTarget
  | ListTarget
  | MapTarget
  | NullableTarget
  | StructTarget
  | ValueTarget;

export interface StringTarget {
  readonly kind: "string";
}

export interface NumberTarget {
  readonly kind: "number";
}

/** A `number` that must hold an integer. */
export interface IntegerTarget {
  readonly kind: "integer";
}

export interface BooleanTarget {
  readonly kind: "boolean";
}

/** An array whose elements have the element target. */
export interface ListTarget {
  readonly kind: "list";
  readonly element: Target;
}

/** A string-keyed plain object whose values have the element target. */
export interface MapTarget {
  readonly kind: "map";
  readonly element: Target;
}

/** The inner target, or `null` for a null value. */
export interface NullableTarget {
  readonly kind: "nullable";
  readonly inner: Target;
}

export interface StructTarget {
  readonly kind: "struct";
  readonly shape: StructShape<object>;
}

/** Keeps the attribute value object itself. */
export interface ValueTarget {
  readonly kind: "value";
}

/**
 * Builders for {@link Target} descriptors.
 */
export const t = {
  string: (): StringTarget => ({ kind: "string" }),
  number: (): NumberTarget => ({ kind: "number" }),
  integer: (): IntegerTarget => ({ kind: "integer" }),
  boolean: (): BooleanTarget => ({ kind: "boolean" }),
  list: (element: Target): ListTarget => ({ kind: "list", element }),
  map: (element: Target): MapTarget => ({ kind: "map", element }),
  nullable: (inner: Target): NullableTarget => ({ kind: "nullable", inner }),
  struct: (shape: StructShape<object>): StructTarget => ({
    kind: "struct",
    shape,
  }),
  value: (): ValueTarget => ({ kind: "value" }),
} as const;

/**
 * Renders a target for diagnostics, e.g. `list of string`.
 */
export function describeTarget(target: Target): string {
  switch (target.kind) {
    case "string":
    case "number":
    case "integer":
    case "boolean":
      return target.kind;
    case "list":
      return `list of ${describeTarget(target.element)}`;
    case "map":
      return `map of ${describeTarget(target.element)}`;
    case "nullable":
      return `nullable ${describeTarget(target.inner)}`;
    case "struct":
      return `struct ${target.shape.name}`;
    case "value":
      return "attribute value";
  }
}
