import type { ConversionContext } from "../attr/context.ts";
import { type AttrType, hasValidate } from "../attr/type.ts";
import type { AttrValue } from "../attr/value.ts";
import { Diagnostics } from "../diag/diagnostics.ts";
import type { Path } from "../path/path.ts";
import type { WireValue } from "../wire/wire_value.ts";
import { valueFromWireErrorDiag } from "./diags.ts";
import { type Converted, failed, succeeded } from "./dispatcher.ts";

/**
 * Turns a freshly built wire value into an attribute value of `type`, running
 * the type's validation hook first when it has one.
 */
export function assembleValue(
  ctx: ConversionContext,
  type: AttrType,
  wire: WireValue,
  path: Path,
  diags: Diagnostics = new Diagnostics(),
): Converted<AttrValue> {
  if (hasValidate(type)) {
    diags.append(type.validate(ctx, wire, path));
    if (diags.hasError()) {
      return failed(diags);
    }
  }
  try {
    return succeeded(type.valueFromWire(ctx, wire), diags);
  } catch (err) {
    diags.add(valueFromWireErrorDiag(err, path));
    return failed(diags);
  }
}
