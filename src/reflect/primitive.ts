import type { ConversionContext } from "../attr/context.ts";
import type { AttrType } from "../attr/type.ts";
import type { AttrValue } from "../attr/value.ts";
import { withPath } from "../diag/diagnostic.ts";
import { Diagnostics } from "../diag/diagnostics.ts";
import { safeStringify } from "../internal/json.ts";
import type { Path } from "../path/path.ts";
import { wireTypeToString } from "../wire/wire_type.ts";
import {
  describeWireValue,
  type KnownWireValue,
  type WireValue,
  wireBool,
  wireNumber,
  wireString,
} from "../wire/wire_value.ts";
import { assembleValue } from "./assemble.ts";
import { diagFromIncompatibleType, diagIntoIncompatibleType } from "./diags.ts";
import { type Converted, failed, succeeded } from "./dispatcher.ts";
import type { ReflectOptions } from "./options.ts";
import type {
  BooleanTarget,
  IntegerTarget,
  NumberTarget,
  StringTarget,
} from "./target.ts";

export type PrimitiveTarget =
  | StringTarget
  | NumberTarget
  | IntegerTarget
  | BooleanTarget;

/**
 * Reads a known string, number or bool wire value into a native primitive.
 */
export function intoPrimitive(
  value: KnownWireValue,
  target: PrimitiveTarget,
  opts: ReflectOptions,
  path: Path,
): Converted<string | number | boolean> {
  const diags = new Diagnostics();
  const incompatible = (message: string) => {
    diags.add(
      withPath(
        path,
        diagIntoIncompatibleType(describeWireValue(value), target.kind, message),
      ),
    );
    return failed<string | number | boolean>(diags);
  };

  switch (target.kind) {
    case "string":
      return value.kind === "string"
        ? succeeded(value.value, diags)
        : incompatible(`can't unmarshal ${describeWireValue(value)} into string`);
    case "boolean":
      return value.kind === "bool"
        ? succeeded(value.value, diags)
        : incompatible(`can't unmarshal ${describeWireValue(value)} into boolean`);
    case "number":
      return value.kind === "number"
        ? succeeded(value.value, diags)
        : incompatible(`can't unmarshal ${describeWireValue(value)} into number`);
    case "integer": {
      if (value.kind !== "number") {
        return incompatible(
          `can't unmarshal ${describeWireValue(value)} into integer`,
        );
      }
      if (Number.isInteger(value.value)) {
        return succeeded(value.value, diags);
      }
      if (opts.allowRoundingNumbers) {
        return succeeded(Math.trunc(value.value), diags);
      }
      return incompatible(
        `cannot store ${value.value} in an integer without rounding`,
      );
    }
  }
}

/**
 * Builds an attribute value of `type` from a native primitive.
 */
export function fromPrimitive(
  ctx: ConversionContext,
  type: AttrType,
  value: unknown,
  target: PrimitiveTarget,
  opts: ReflectOptions,
  path: Path,
): Converted<AttrValue> {
  const diags = new Diagnostics();
  const incompatible = (message: string) => {
    diags.add(
      withPath(path, diagFromIncompatibleType(target.kind, type, message)),
    );
    return failed<AttrValue>(diags);
  };

  let wire: WireValue;
  switch (target.kind) {
    case "string":
      if (typeof value !== "string") {
        return incompatible(`cannot use ${safeStringify(value)} as string`);
      }
      wire = wireString(value);
      break;
    case "boolean":
      if (typeof value !== "boolean") {
        return incompatible(`cannot use ${safeStringify(value)} as boolean`);
      }
      wire = wireBool(value);
      break;
    case "number":
      if (typeof value !== "number" || Number.isNaN(value)) {
        return incompatible(`cannot use ${safeStringify(value)} as number`);
      }
      wire = wireNumber(value);
      break;
    case "integer":
      if (typeof value !== "number" || Number.isNaN(value)) {
        return incompatible(`cannot use ${safeStringify(value)} as integer`);
      }
      if (!Number.isInteger(value) && !opts.allowRoundingNumbers) {
        return incompatible(
          `cannot store ${value} in an integer without rounding`,
        );
      }
      wire = wireNumber(Math.trunc(value));
      break;
  }

  if (type.wireType().kind !== wire.type.kind) {
    return incompatible(
      `${type.toString()} is exchanged as ${
        wireTypeToString(type.wireType())
      }, not ${wireTypeToString(wire.type)}`,
    );
  }
  return assembleValue(ctx, type, wire, path, diags);
}
