import type { ConversionContext } from "../attr/context.ts";
import type { AttrType } from "../attr/type.ts";
import { withPath } from "../diag/diagnostic.ts";
import { Diagnostics } from "../diag/diagnostics.ts";
import { Path } from "../path/path.ts";
import { describeWireValue, type WireValue } from "../wire/wire_value.ts";
import { intoList, intoMap } from "./collection.ts";
import {
  depthExceededDiag,
  diagIntoIncompatibleType,
  unhandledNullDiag,
  unhandledUnknownDiag,
} from "./diags.ts";
import {
  type Converted,
  failed,
  type IntoDispatcher,
  succeeded,
} from "./dispatcher.ts";
import { type ReflectOptions, resolveMaxDepth } from "./options.ts";
import { intoPrimitive } from "./primitive.ts";
import { decodeStruct } from "./struct.ts";
import { allocateStruct, type StructShape } from "./struct_shape.ts";
import { describeTarget, type Target } from "./target.ts";

/**
 * Converts a wire value of `type` into the native shape `target` describes.
 *
 * Null and unknown values are resolved here, before the value reaches the
 * primitive, collection or struct converters: a `nullable` target takes null,
 * a `value` target keeps either as an attribute value, and the
 * `unhandled*AsEmpty` options substitute the target's zero value.
 */
export function into(
  ctx: ConversionContext,
  type: AttrType,
  value: WireValue,
  target: Target,
  opts: ReflectOptions = {},
  path: Path = Path.empty(),
): Converted<unknown> {
  const diags = new Diagnostics();
  const maxDepth = resolveMaxDepth(opts);
  if (path.length > maxDepth) {
    diags.add(depthExceededDiag(maxDepth, path));
    return failed(diags);
  }

  if (target.kind === "value") {
    try {
      return succeeded(type.valueFromWire(ctx, value), diags);
    } catch (err) {
      diags.add(
        withPath(
          path,
          diagIntoIncompatibleType(
            describeWireValue(value),
            describeTarget(target),
            err,
          ),
        ),
      );
      return failed(diags);
    }
  }

  if (value.kind === "unknown") {
    if (opts.unhandledUnknownAsEmpty) {
      return succeeded(zeroValue(target), diags);
    }
    diags.add(unhandledUnknownDiag(path, describeTarget(target), type));
    return failed(diags);
  }

  if (value.kind === "null") {
    if (target.kind === "nullable") {
      return succeeded(null, diags);
    }
    if (opts.unhandledNullAsEmpty) {
      return succeeded(zeroValue(target), diags);
    }
    diags.add(unhandledNullDiag(path, describeTarget(target), type));
    return failed(diags);
  }

  switch (target.kind) {
    case "nullable":
      return into(ctx, type, value, target.inner, opts, path);
    case "string":
    case "number":
    case "integer":
    case "boolean":
      return intoPrimitive(value, target, opts, path);
    case "list":
      return intoList(ctx, type, value, target, opts, path, intoDispatcher);
    case "map":
      return intoMap(ctx, type, value, target, opts, path, intoDispatcher);
    case "struct":
      return decodeStruct(
        ctx,
        type,
        value,
        target.shape,
        opts,
        path,
        intoDispatcher,
      );
  }
}

/**
 * The zero value stored for a target when a null or unknown value is
 * substituted.
 */
export function zeroValue(target: Target): unknown {
  switch (target.kind) {
    case "string":
      return "";
    case "number":
    case "integer":
      return 0;
    case "boolean":
      return false;
    case "list":
      return [];
    case "map":
      return {};
    case "nullable":
    case "value":
      return null;
    case "struct":
      return allocateStruct(target.shape);
  }
}

export const intoDispatcher: IntoDispatcher = { into };

/**
 * Decodes an object wire value into a new record of `shape`.
 *
 * @example
 * ```ts
 * const result = intoStruct(BACKGROUND, personType, wire, Person);
 * if (!result.diags.hasError()) {
 *   console.log(result.value?.name);
 * }
 * ```
 */
export function intoStruct<T extends object>(
  ctx: ConversionContext,
  type: AttrType,
  value: WireValue,
  shape: StructShape<T>,
  opts: ReflectOptions = {},
  path: Path = Path.empty(),
): Converted<T> {
  return decodeStruct(ctx, type, value, shape, opts, path, intoDispatcher);
}
