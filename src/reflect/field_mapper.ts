import { isValidFieldName } from "./helpers.ts";
import {
  type FieldTag,
  OPT_OUT_TAG,
  type StructShape,
} from "./struct_shape.ts";
import type { Target } from "./target.ts";

/**
 * An attribute name and where its value lives in the record.
 */
export interface FieldDescriptor {
  readonly name: string;
  /** Property chain from the record root, through embedded records. */
  readonly path: readonly string[];
  readonly target: Target;
}

/**
 * The tagged fields of a record type in declaration order.
 */
export interface StructFieldMap {
  readonly list: readonly FieldDescriptor[];
  readonly nameIndex: ReadonlyMap<string, FieldDescriptor>;
}

/**
 * Thrown when a record type's tags are incomplete or inconsistent.
 */
export class StructTagError extends Error {
  /** Name of the record type whose tags are invalid. */
  public readonly structName: string;

  constructor(structName: string, message: string) {
    super(message);
    this.name = "StructTagError";
    this.structName = structName;
  }
}

/**
 * Collects the tagged fields of a record type.
 *
 * Every data property of the zero-valued record must be declared. Properties
 * tagged with {@link OPT_OUT_TAG} or `ignore()` are skipped, and embedded
 * records contribute their own fields with composed paths.
 *
 * @throws StructTagError if a property is untagged, a tag is invalid, or two
 *   fields resolve to the same name.
 */
export function typeFields(shape: StructShape<object>): StructFieldMap {
  const list: FieldDescriptor[] = [];
  const nameIndex = new Map<string, FieldDescriptor>();
  collectFields(shape, [], list, nameIndex, [shape]);
  return { list, nameIndex };
}

function collectFields(
  shape: StructShape<object>,
  prefix: readonly string[],
  list: FieldDescriptor[],
  nameIndex: Map<string, FieldDescriptor>,
  lineage: readonly StructShape<object>[],
): void {
  const zero = shape.create();
  const declared = Object.keys(shape.fields);

  for (const property of Object.keys(zero)) {
    const value: unknown = Reflect.get(zero, property);
    if (typeof value === "function" || declared.includes(property)) {
      continue;
    }
    throw new StructTagError(
      shape.name,
      `${shape.name}.${property} needs a tag; use ignore() to opt it out of the schema`,
    );
  }

  for (const property of declared) {
    const fieldTag: FieldTag = shape.fields[property];
    const path = [...prefix, property];

    switch (fieldTag.kind) {
      case "ignore":
        break;
      case "embed": {
        const embedded = fieldTag.shape;
        if (lineage.includes(embedded)) {
          throw new StructTagError(
            shape.name,
            `${shape.name}.${property} embeds ${embedded.name}, which already encloses it`,
          );
        }
        collectFields(embedded, path, list, nameIndex, [
          ...lineage,
          embedded,
        ]);
        break;
      }
      case "tag": {
        if (fieldTag.name === OPT_OUT_TAG) {
          break;
        }
        if (!Object.hasOwn(zero, property)) {
          throw new StructTagError(
            shape.name,
            `${shape.name} declares a tag for ${property}, which its records do not have`,
          );
        }
        if (!isValidFieldName(fieldTag.name)) {
          throw new StructTagError(
            shape.name,
            `${shape.name}.${property} has invalid tag ${
              JSON.stringify(fieldTag.name)
            }: names must start with a lowercase letter and contain only lowercase letters, numbers, and underscores`,
          );
        }
        const existing = nameIndex.get(fieldTag.name);
        if (existing !== undefined) {
          throw new StructTagError(
            shape.name,
            `${path.join(".")} and ${
              existing.path.join(".")
            } are both tagged ${JSON.stringify(fieldTag.name)}`,
          );
        }
        const descriptor: FieldDescriptor = {
          name: fieldTag.name,
          path,
          target: fieldTag.target,
        };
        list.push(descriptor);
        nameIndex.set(descriptor.name, descriptor);
        break;
      }
    }
  }
}
