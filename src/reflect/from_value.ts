import type { ConversionContext } from "../attr/context.ts";
import type { AttrType } from "../attr/type.ts";
import { type AttrValue, isAttrValue } from "../attr/value.ts";
import { withPath } from "../diag/diagnostic.ts";
import { Diagnostics } from "../diag/diagnostics.ts";
import { safeStringify } from "../internal/json.ts";
import { Path } from "../path/path.ts";
import { wireNull } from "../wire/wire_value.ts";
import { assembleValue } from "./assemble.ts";
import { fromList, fromMap } from "./collection.ts";
import {
  depthExceededDiag,
  diagFromIncompatibleType,
  diagNewAttributeValueIntoWrongType,
} from "./diags.ts";
import {
  type Converted,
  failed,
  type FromDispatcher,
  succeeded,
} from "./dispatcher.ts";
import { type ReflectOptions, resolveMaxDepth } from "./options.ts";
import { fromPrimitive } from "./primitive.ts";
import { encodeStruct } from "./struct.ts";
import type { StructShape } from "./struct_shape.ts";
import { describeTarget, type Target } from "./target.ts";

/**
 * Converts a native value, described by `target`, into an attribute value of
 * `type`.
 *
 * `null` and `undefined` are only accepted by `nullable` targets, which turn
 * them into the type's null value. A `value` target passes an attribute value
 * through once its type matches `type`.
 */
export function fromValue(
  ctx: ConversionContext,
  type: AttrType,
  value: unknown,
  target: Target,
  opts: ReflectOptions = {},
  path: Path = Path.empty(),
): Converted<AttrValue> {
  const diags = new Diagnostics();
  const maxDepth = resolveMaxDepth(opts);
  if (path.length > maxDepth) {
    diags.add(depthExceededDiag(maxDepth, path));
    return failed(diags);
  }

  switch (target.kind) {
    case "value": {
      if (!isAttrValue(value)) {
        diags.add(
          withPath(
            path,
            diagFromIncompatibleType(
              describeTarget(target),
              type,
              new Error(`${safeStringify(value)} is not an attribute value`),
            ),
          ),
        );
        return failed(diags);
      }
      if (!value.type().equals(type)) {
        diags.add(
          withPath(path, diagNewAttributeValueIntoWrongType(value.type(), type)),
        );
        return failed(diags);
      }
      return succeeded(value, diags);
    }
    case "nullable":
      if (value === null || value === undefined) {
        return assembleValue(ctx, type, wireNull(type.wireType()), path, diags);
      }
      return fromValue(ctx, type, value, target.inner, opts, path);
    case "string":
    case "number":
    case "integer":
    case "boolean":
      return fromPrimitive(ctx, type, value, target, opts, path);
    case "list":
      return fromList(ctx, type, value, target, opts, path, fromDispatcher);
    case "map":
      return fromMap(ctx, type, value, target, opts, path, fromDispatcher);
    case "struct":
      if (typeof value !== "object" || value === null) {
        diags.add(
          withPath(
            path,
            diagFromIncompatibleType(
              describeTarget(target),
              type,
              new Error(`expected a struct value, got ${safeStringify(value)}`),
            ),
          ),
        );
        return failed(diags);
      }
      return encodeStruct(
        ctx,
        type,
        value,
        target.shape,
        opts,
        path,
        fromDispatcher,
      );
  }
}

export const fromDispatcher: FromDispatcher = { fromValue };

/**
 * Encodes a record of `shape` as an attribute value of `type`.
 */
export function fromStruct<T extends object>(
  ctx: ConversionContext,
  type: AttrType,
  record: T,
  shape: StructShape<T>,
  opts: ReflectOptions = {},
  path: Path = Path.empty(),
): Converted<AttrValue> {
  return encodeStruct(ctx, type, record, shape, opts, path, fromDispatcher);
}
