import type { Target } from "./target.ts";

/**
 * Tag value that marks a property as not part of the schema.
 */
export const OPT_OUT_TAG = "-";

/**
 * How one record property relates to the schema.
 */
export type FieldTag =
  | { readonly kind: "tag"; readonly name: string; readonly target: Target }
  | { readonly kind: "ignore" }
  | { readonly kind: "embed"; readonly shape: StructShape<object> };

/** Property names of `T` that hold data rather than functions. */
export type DataKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? never
    : K extends string ? K
    : never;
}[keyof T];

/**
 * A field tag for every data property of `T`.
 */
export type StructFields<T> = { readonly [K in DataKeys<T>]: FieldTag };

export interface StructShapeParams<T extends object> {
  /** Name used in diagnostics. */
  name: string;
  /** Returns a new, zero-valued record. */
  create: () => T;
  fields: StructFields<T> & Readonly<Record<string, FieldTag>>;
}

/**
 * Registration of a native record type: how to allocate one and how each of
 * its properties maps onto schema attributes.
 */
export interface StructShape<T extends object> {
  readonly name: string;
  create(): T;
  readonly fields: Readonly<Record<string, FieldTag>>;
}

/**
 * Maps a property onto the attribute `name`. The name {@link OPT_OUT_TAG}
 * opts the property out instead.
 */
export function tag(name: string, target: Target): FieldTag {
  return { kind: "tag", name, target };
}

/** Opts a property out of the schema. */
export function ignore(): FieldTag {
  return { kind: "ignore" };
}

/**
 * Promotes the tagged fields of an embedded record into the parent.
 */
export function embed(shape: StructShape<object>): FieldTag {
  return { kind: "embed", shape };
}

export function defineStruct<T extends object>(
  params: StructShapeParams<T>,
): StructShape<T> {
  const fields: Record<string, FieldTag> = {};
  for (const [property, fieldTag] of Object.entries(params.fields)) {
    fields[property] = fieldTag;
  }
  return Object.freeze({
    name: params.name,
    create: params.create,
    fields: Object.freeze(fields),
  });
}

/**
 * Runtime check for values built by {@link defineStruct}.
 */
export function isStructShape(value: unknown): value is StructShape<object> {
  return typeof value === "object" && value !== null &&
    "name" in value && typeof value.name === "string" &&
    "create" in value && typeof value.create === "function" &&
    "fields" in value && typeof value.fields === "object" &&
    value.fields !== null;
}

/**
 * Creates a zero-valued record, allocating embedded records the factory left
 * unset.
 */
export function allocateStruct<T extends object>(shape: StructShape<T>): T {
  const record = shape.create();
  for (const [property, fieldTag] of Object.entries(shape.fields)) {
    if (fieldTag.kind !== "embed") {
      continue;
    }
    const current = readProperty(record, property);
    if (typeof current !== "object" || current === null) {
      Reflect.set(record, property, allocateStruct(fieldTag.shape));
    }
  }
  return record;
}

/**
 * Reads the value at a property path, undefined if any step is missing.
 */
export function readFieldPath(
  record: object,
  path: readonly string[],
): unknown {
  let current: unknown = record;
  for (const property of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = readProperty(current, property);
  }
  return current;
}

/**
 * Writes a value at a property path.
 * @throws Error if an intermediate step is not an object.
 */
export function writeFieldPath(
  record: object,
  path: readonly string[],
  value: unknown,
): void {
  let current: object = record;
  for (let i = 0; i < path.length - 1; i++) {
    const next = readProperty(current, path[i]);
    if (typeof next !== "object" || next === null) {
      throw new Error(
        `cannot set ${path.join(".")}: ${path.slice(0, i + 1).join(".")} is not an object`,
      );
    }
    current = next;
  }
  Reflect.set(current, path[path.length - 1], value);
}

function readProperty(record: object, property: string): unknown {
  return Object.hasOwn(record, property)
    ? Reflect.get(record, property)
    : undefined;
}
