import { cancellationReason, type ConversionContext } from "../attr/context.ts";
import {
  type AttrType,
  hasAttributeTypes,
  hasValidate,
  lookupAttributeType,
} from "../attr/type.ts";
import type { AttrValue } from "../attr/value.ts";
import { withPath } from "../diag/diagnostic.ts";
import { Diagnostics } from "../diag/diagnostics.ts";
import { safeStringify } from "../internal/json.ts";
import { createLogger } from "../internal/logging.ts";
import type { Path } from "../path/path.ts";
import { objectOf, type WireType } from "../wire/wire_type.ts";
import {
  describeWireValue,
  objectAttributes,
  type WireValue,
  wireObject,
} from "../wire/wire_value.ts";
import {
  cancelledDiag,
  CONVERSION_ERROR_SUMMARY,
  depthExceededDiag,
  diagFromIncompatibleType,
  diagIntoIncompatibleType,
  toWireValueErrorDiag,
  valueFromWireErrorDiag,
} from "./diags.ts";
import {
  type Converted,
  failed,
  type FromDispatcher,
  type IntoDispatcher,
  succeeded,
} from "./dispatcher.ts";
import {
  type StructFieldMap,
  StructTagError,
  typeFields,
} from "./field_mapper.ts";
import { type ReflectOptions, resolveMaxDepth } from "./options.ts";
import { describeMismatch, reconcileFields } from "./reconcile.ts";
import {
  allocateStruct,
  isStructShape,
  readFieldPath,
  type StructShape,
  writeFieldPath,
} from "./struct_shape.ts";

const log = createLogger("reflect:struct");

/**
 * Builds a new record of `shape` from the attributes of a wire object.
 *
 * The record's tagged fields and the object's attributes must match exactly;
 * any difference is reported in one diagnostic before conversion starts.
 * Fields are then converted in declaration order through `dispatcher`, and
 * the first field error ends the call. No record is returned unless every
 * field converted.
 */
export function decodeStruct<T extends object>(
  ctx: ConversionContext,
  type: AttrType,
  object: WireValue,
  shape: StructShape<T>,
  opts: ReflectOptions,
  path: Path,
  dispatcher: IntoDispatcher,
): Converted<T> {
  const diags = new Diagnostics();
  // Untyped callers can reach here with any value.
  const declared: unknown = shape;
  const into = isStructShape(declared) ? `struct ${declared.name}` : "struct";
  const incompatible = (err: unknown): Converted<T> => {
    diags.add(
      withPath(path, diagIntoIncompatibleType(describeWireValue(object), into, err)),
    );
    log.debug("struct decode aborted", { struct: into, path: path.toString() });
    return failed(diags);
  };

  if (!isStructShape(declared)) {
    return incompatible(new Error("expected a struct type"));
  }
  const maxDepth = resolveMaxDepth(opts);
  if (path.length > maxDepth) {
    diags.add(depthExceededDiag(maxDepth, path));
    return failed(diags);
  }
  if (object.type.kind !== "object") {
    return incompatible(
      new Error(
        `cannot reflect ${describeWireValue(object)} into a struct, must be an object`,
      ),
    );
  }
  if (!hasAttributeTypes(type)) {
    return incompatible(
      new Error(
        `cannot reflect object using type information provided by ${type.toString()}, it must expose attribute types`,
      ),
    );
  }

  let objectFields: ReadonlyMap<string, WireValue>;
  try {
    objectFields = objectAttributes(object);
  } catch (err) {
    return incompatible(err);
  }

  let targetFields: StructFieldMap;
  try {
    targetFields = typeFields(shape);
  } catch (err) {
    if (err instanceof StructTagError) {
      return incompatible(err);
    }
    throw err;
  }

  const mismatch = reconcileFields(
    targetFields.nameIndex.keys(),
    objectFields.keys(),
  );
  if (mismatch !== undefined) {
    return incompatible(new Error(describeMismatch(mismatch, "object")));
  }

  log.debug("decoding struct", {
    struct: shape.name,
    path: path.toString(),
    fields: targetFields.list.length,
  });

  const attrTypes = type.attributeTypes();
  const result = allocateStruct(shape);
  const converted: unknown[] = [];
  for (const field of targetFields.list) {
    const reason = cancellationReason(ctx);
    if (reason !== undefined) {
      diags.add(cancelledDiag(reason, path));
      return failed(diags);
    }

    const attrType = lookupAttributeType(attrTypes, field.name);
    if (attrType === undefined) {
      return incompatible(
        new Error(
          `could not find type information for attribute ${
            JSON.stringify(field.name)
          } in supplied type ${type.toString()}`,
        ),
      );
    }
    // Unreachable after reconciliation; narrows the lookup.
    const fieldValue = objectFields.get(field.name);
    if (fieldValue === undefined) {
      return incompatible(
        new Error(`object is missing attribute ${JSON.stringify(field.name)}`),
      );
    }

    const fieldResult = dispatcher.into(
      ctx,
      attrType,
      fieldValue,
      field.target,
      opts,
      path.atName(field.name),
    );
    diags.append(fieldResult.diags);
    if (diags.hasError()) {
      log.debug("struct decode aborted", {
        struct: shape.name,
        path: path.atName(field.name).toString(),
      });
      return failed(diags);
    }
    converted.push(fieldResult.value);
  }

  targetFields.list.forEach((field, i) => {
    writeFieldPath(result, field.path, converted[i]);
  });
  return succeeded(result, diags);
}

/**
 * Builds an attribute value of `type` from the tagged fields of a record.
 *
 * The record's tagged fields must match the type's attribute types exactly.
 * Each field is converted through `dispatcher` in declaration order, the
 * assembled wire object is passed to the type's validation hook when it has
 * one, and the final value comes from the type's own `valueFromWire`.
 */
export function encodeStruct<T extends object>(
  ctx: ConversionContext,
  type: AttrType,
  record: T,
  shape: StructShape<T>,
  opts: ReflectOptions,
  path: Path,
  dispatcher: FromDispatcher,
): Converted<AttrValue> {
  const diags = new Diagnostics();
  // Untyped callers can reach here with any value.
  const declared: unknown = shape;
  const from = isStructShape(declared) ? `struct ${declared.name}` : "struct";
  const incompatible = (err: unknown): Converted<AttrValue> => {
    diags.add(withPath(path, diagFromIncompatibleType(from, type, err)));
    log.debug("struct encode aborted", { struct: from, path: path.toString() });
    return failed(diags);
  };

  if (!isStructShape(declared)) {
    return incompatible(new Error("expected a struct type"));
  }
  const maxDepth = resolveMaxDepth(opts);
  if (path.length > maxDepth) {
    diags.add(depthExceededDiag(maxDepth, path));
    return failed(diags);
  }
  const candidate: unknown = record;
  if (typeof candidate !== "object" || candidate === null) {
    return incompatible(
      new Error(`expected a struct value, got ${safeStringify(candidate)}`),
    );
  }
  if (!hasAttributeTypes(type)) {
    return incompatible(
      new Error(
        `cannot build an object using type information provided by ${type.toString()}, it must expose attribute types`,
      ),
    );
  }

  let valFields: StructFieldMap;
  try {
    valFields = typeFields(shape);
  } catch (err) {
    if (err instanceof StructTagError) {
      return incompatible(err);
    }
    throw err;
  }

  const attrTypes = type.attributeTypes();
  const mismatch = reconcileFields(
    valFields.nameIndex.keys(),
    Object.keys(attrTypes),
  );
  if (mismatch !== undefined) {
    return incompatible(new Error(describeMismatch(mismatch, "attributes")));
  }

  log.debug("encoding struct", {
    struct: shape.name,
    path: path.toString(),
    fields: valFields.list.length,
  });

  const objTypes: Record<string, WireType> = {};
  const objValues = new Map<string, WireValue>();
  for (const field of valFields.list) {
    const reason = cancellationReason(ctx);
    if (reason !== undefined) {
      diags.add(cancelledDiag(reason, path));
      return failed(diags);
    }

    const fieldPath = path.atName(field.name);
    const attrType = lookupAttributeType(attrTypes, field.name);
    if (attrType === undefined) {
      diags.addAttributeError(
        fieldPath,
        CONVERSION_ERROR_SUMMARY,
        `An unexpected error was encountered trying to convert from struct value. This is always an error in the plugin. Please report the following to the plugin developer:\n\ncouldn't find type information for attribute at ${fieldPath.toString()} in supplied type ${type.toString()}`,
      );
      return failed(diags);
    }

    const fieldValue = readFieldPath(record, field.path);
    const attrVal = dispatcher.fromValue(
      ctx,
      attrType,
      fieldValue,
      field.target,
      opts,
      fieldPath,
    );
    diags.append(attrVal.diags);
    if (diags.hasError()) {
      log.debug("struct encode aborted", {
        struct: shape.name,
        path: fieldPath.toString(),
      });
      return failed(diags);
    }
    if (attrVal.value === undefined) {
      return incompatible(
        new Error(`no value was produced for attribute ${fieldPath.toString()}`),
      );
    }

    objTypes[field.name] = attrType.wireType();
    try {
      objValues.set(field.name, attrVal.value.toWireValue(ctx));
    } catch (err) {
      diags.add(toWireValueErrorDiag(err, fieldPath));
      return failed(diags);
    }
  }

  let wireVal: WireValue;
  try {
    wireVal = wireObject(objectOf(objTypes), objValues);
  } catch (err) {
    diags.add(toWireValueErrorDiag(err, path));
    return failed(diags);
  }

  if (hasValidate(type)) {
    diags.append(type.validate(ctx, wireVal, path));
    if (diags.hasError()) {
      return failed(diags);
    }
  }

  try {
    const retType = type.withAttributeTypes(attrTypes);
    return succeeded(retType.valueFromWire(ctx, wireVal), diags);
  } catch (err) {
    diags.add(valueFromWireErrorDiag(err, path));
    return failed(diags);
  }
}
