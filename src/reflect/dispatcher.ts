import type { ConversionContext } from "../attr/context.ts";
import type { AttrType } from "../attr/type.ts";
import type { AttrValue } from "../attr/value.ts";
import { Diagnostics } from "../diag/diagnostics.ts";
import type { Path } from "../path/path.ts";
import type { WireValue } from "../wire/wire_value.ts";
import type { ReflectOptions } from "./options.ts";
import type { Target } from "./target.ts";

/**
 * Result of a conversion. `value` is undefined whenever `diags` holds an
 * error; callers gate on `diags.hasError()`.
 */
export interface Converted<T> {
  readonly value: T | undefined;
  readonly diags: Diagnostics;
}

/**
 * Converts one wire value into its native target. Implementations decide by
 * the declared attribute type and the target, never by the wire value alone.
 */
export interface IntoDispatcher {
  into(
    ctx: ConversionContext,
    type: AttrType,
    value: WireValue,
    target: Target,
    opts: ReflectOptions,
    path: Path,
  ): Converted<unknown>;
}

/**
 * Converts one native value into an attribute value of the declared type.
 */
export interface FromDispatcher {
  fromValue(
    ctx: ConversionContext,
    type: AttrType,
    value: unknown,
    target: Target,
    opts: ReflectOptions,
    path: Path,
  ): Converted<AttrValue>;
}

export function succeeded<T>(
  value: T,
  diags: Diagnostics = new Diagnostics(),
): Converted<T> {
  return { value, diags };
}

export function failed<T>(diags: Diagnostics): Converted<T> {
  return { value: undefined, diags };
}
