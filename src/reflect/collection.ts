import { cancellationReason, type ConversionContext } from "../attr/context.ts";
import { type AttrType, hasElementType } from "../attr/type.ts";
import type { AttrValue } from "../attr/value.ts";
import { withPath } from "../diag/diagnostic.ts";
import { Diagnostics } from "../diag/diagnostics.ts";
import { safeStringify } from "../internal/json.ts";
import type { Path } from "../path/path.ts";
import { listOf, mapOf } from "../wire/wire_type.ts";
import {
  describeWireValue,
  type KnownWireValue,
  type WireValue,
  wireList,
  wireMap,
} from "../wire/wire_value.ts";
import { assembleValue } from "./assemble.ts";
import {
  cancelledDiag,
  diagFromIncompatibleType,
  diagIntoIncompatibleType,
  toWireValueErrorDiag,
} from "./diags.ts";
import {
  type Converted,
  failed,
  type FromDispatcher,
  type IntoDispatcher,
  succeeded,
} from "./dispatcher.ts";
import type { ReflectOptions } from "./options.ts";
import { describeTarget, type ListTarget, type MapTarget } from "./target.ts";

/**
 * Reads a known list wire value into an array, one element at a time.
 */
export function intoList(
  ctx: ConversionContext,
  type: AttrType,
  value: KnownWireValue,
  target: ListTarget,
  opts: ReflectOptions,
  path: Path,
  dispatcher: IntoDispatcher,
): Converted<unknown[]> {
  const diags = new Diagnostics();
  const incompatible = (message: string) => {
    diags.add(
      withPath(
        path,
        diagIntoIncompatibleType(
          describeWireValue(value),
          describeTarget(target),
          message,
        ),
      ),
    );
    return failed<unknown[]>(diags);
  };

  if (value.kind !== "list") {
    return incompatible(
      `can't unmarshal ${describeWireValue(value)} into an array`,
    );
  }
  if (!hasElementType(type)) {
    return incompatible(
      `cannot reflect list using type information provided by ${type.toString()}, it must expose an element type`,
    );
  }

  const elementType = type.elementType();
  const result: unknown[] = [];
  for (const [i, element] of value.elements.entries()) {
    const reason = cancellationReason(ctx);
    if (reason !== undefined) {
      diags.add(cancelledDiag(reason, path));
      return failed(diags);
    }
    const converted = dispatcher.into(
      ctx,
      elementType,
      element,
      target.element,
      opts,
      path.atListIndex(i),
    );
    diags.append(converted.diags);
    if (diags.hasError()) {
      return failed(diags);
    }
    result.push(converted.value);
  }
  return succeeded(result, diags);
}

/**
 * Reads a known map wire value into a plain object keyed by the map's keys.
 */
export function intoMap(
  ctx: ConversionContext,
  type: AttrType,
  value: KnownWireValue,
  target: MapTarget,
  opts: ReflectOptions,
  path: Path,
  dispatcher: IntoDispatcher,
): Converted<Record<string, unknown>> {
  const diags = new Diagnostics();
  const incompatible = (message: string) => {
    diags.add(
      withPath(
        path,
        diagIntoIncompatibleType(
          describeWireValue(value),
          describeTarget(target),
          message,
        ),
      ),
    );
    return failed<Record<string, unknown>>(diags);
  };

  if (value.kind !== "map") {
    return incompatible(
      `can't unmarshal ${describeWireValue(value)} into a map`,
    );
  }
  if (!hasElementType(type)) {
    return incompatible(
      `cannot reflect map using type information provided by ${type.toString()}, it must expose an element type`,
    );
  }

  const elementType = type.elementType();
  const result: Record<string, unknown> = {};
  for (const [key, element] of value.entries) {
    const reason = cancellationReason(ctx);
    if (reason !== undefined) {
      diags.add(cancelledDiag(reason, path));
      return failed(diags);
    }
    const converted = dispatcher.into(
      ctx,
      elementType,
      element,
      target.element,
      opts,
      path.atMapKey(key),
    );
    diags.append(converted.diags);
    if (diags.hasError()) {
      return failed(diags);
    }
    // defineProperty keeps keys like "__proto__" as plain data.
    Object.defineProperty(result, key, {
      value: converted.value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return succeeded(result, diags);
}

/**
 * Builds a list attribute value from an array.
 */
export function fromList(
  ctx: ConversionContext,
  type: AttrType,
  value: unknown,
  target: ListTarget,
  opts: ReflectOptions,
  path: Path,
  dispatcher: FromDispatcher,
): Converted<AttrValue> {
  const diags = new Diagnostics();
  const incompatible = (message: string) => {
    diags.add(
      withPath(
        path,
        diagFromIncompatibleType(describeTarget(target), type, message),
      ),
    );
    return failed<AttrValue>(diags);
  };

  if (!Array.isArray(value)) {
    return incompatible(`cannot use ${safeStringify(value)} as an array`);
  }
  if (!hasElementType(type)) {
    return incompatible(
      `cannot build a list using type information provided by ${type.toString()}, it must expose an element type`,
    );
  }

  const elementType = type.elementType();
  const elements: WireValue[] = [];
  for (const [i, element] of value.entries()) {
    const reason = cancellationReason(ctx);
    if (reason !== undefined) {
      diags.add(cancelledDiag(reason, path));
      return failed(diags);
    }
    const elementPath = path.atListIndex(i);
    const converted = dispatcher.fromValue(
      ctx,
      elementType,
      element,
      target.element,
      opts,
      elementPath,
    );
    diags.append(converted.diags);
    if (diags.hasError()) {
      return failed(diags);
    }
    if (converted.value === undefined) {
      return incompatible(`no value was produced for ${elementPath.toString()}`);
    }
    try {
      elements.push(converted.value.toWireValue(ctx));
    } catch (err) {
      diags.add(toWireValueErrorDiag(err, elementPath));
      return failed(diags);
    }
  }

  let wire: WireValue;
  try {
    wire = wireList(listOf(elementType.wireType()), elements);
  } catch (err) {
    diags.add(toWireValueErrorDiag(err, path));
    return failed(diags);
  }
  return assembleValue(ctx, type, wire, path, diags);
}

/**
 * Builds a map attribute value from the own enumerable properties of a plain
 * object.
 */
export function fromMap(
  ctx: ConversionContext,
  type: AttrType,
  value: unknown,
  target: MapTarget,
  opts: ReflectOptions,
  path: Path,
  dispatcher: FromDispatcher,
): Converted<AttrValue> {
  const diags = new Diagnostics();
  const incompatible = (message: string) => {
    diags.add(
      withPath(
        path,
        diagFromIncompatibleType(describeTarget(target), type, message),
      ),
    );
    return failed<AttrValue>(diags);
  };

  if (!isPlainObject(value)) {
    return incompatible(`cannot use ${safeStringify(value)} as a map`);
  }
  if (!hasElementType(type)) {
    return incompatible(
      `cannot build a map using type information provided by ${type.toString()}, it must expose an element type`,
    );
  }

  const elementType = type.elementType();
  const entries = new Map<string, WireValue>();
  for (const [key, element] of Object.entries(value)) {
    const reason = cancellationReason(ctx);
    if (reason !== undefined) {
      diags.add(cancelledDiag(reason, path));
      return failed(diags);
    }
    const elementPath = path.atMapKey(key);
    const converted = dispatcher.fromValue(
      ctx,
      elementType,
      element,
      target.element,
      opts,
      elementPath,
    );
    diags.append(converted.diags);
    if (diags.hasError()) {
      return failed(diags);
    }
    if (converted.value === undefined) {
      return incompatible(`no value was produced for ${elementPath.toString()}`);
    }
    try {
      entries.set(key, converted.value.toWireValue(ctx));
    } catch (err) {
      diags.add(toWireValueErrorDiag(err, elementPath));
      return failed(diags);
    }
  }

  let wire: WireValue;
  try {
    wire = wireMap(mapOf(elementType.wireType()), entries);
  } catch (err) {
    diags.add(toWireValueErrorDiag(err, path));
    return failed(diags);
  }
  return assembleValue(ctx, type, wire, path, diags);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
