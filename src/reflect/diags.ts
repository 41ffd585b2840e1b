import type { AttrType } from "../attr/type.ts";
import {
  type Diagnostic,
  errorDiagnostic,
  withPath,
} from "../diag/diagnostic.ts";
import type { Path } from "../path/path.ts";

export const CONVERSION_ERROR_SUMMARY = "Value Conversion Error";
export const CANCELLED_SUMMARY = "Conversion Cancelled";
export const DEPTH_EXCEEDED_SUMMARY = "Maximum Nesting Depth Exceeded";

const REPORT_TO_DEVELOPER =
  "This is always an error in the plugin. Please report the following to the plugin developer:";

/**
 * Extracts a message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * A wire value could not be converted into the requested native target.
 *
 * @param from Description of the wire value.
 * @param into Description of the native target.
 */
export function diagIntoIncompatibleType(
  from: string,
  into: string,
  err: unknown,
): Diagnostic {
  return errorDiagnostic(
    CONVERSION_ERROR_SUMMARY,
    `An unexpected error was encountered trying to convert ${from} into ${into}. ${REPORT_TO_DEVELOPER}\n\n${
      errorMessage(err)
    }`,
  );
}

/**
 * A native value could not be converted into a value of the schema type.
 *
 * @param from Description of the native target.
 */
export function diagFromIncompatibleType(
  from: string,
  type: AttrType,
  err: unknown,
): Diagnostic {
  return errorDiagnostic(
    CONVERSION_ERROR_SUMMARY,
    `An unexpected error was encountered trying to convert ${from} into ${type.toString()}. ${REPORT_TO_DEVELOPER}\n\n${
      errorMessage(err)
    }`,
  );
}

/**
 * An attribute value of one type was supplied where the schema declares
 * another.
 */
export function diagNewAttributeValueIntoWrongType(
  valueType: AttrType,
  schemaType: AttrType,
): Diagnostic {
  return errorDiagnostic(
    CONVERSION_ERROR_SUMMARY,
    `An unexpected error was encountered trying to convert into an attribute value. ${REPORT_TO_DEVELOPER}\n\nCannot use attribute value of type ${valueType.toString()}, only ${schemaType.toString()} is supported because it is the type in the schema`,
  );
}

export function toWireValueErrorDiag(err: unknown, path: Path): Diagnostic {
  return withPath(
    path,
    errorDiagnostic(
      CONVERSION_ERROR_SUMMARY,
      `An unexpected error was encountered trying to convert into a wire value. ${REPORT_TO_DEVELOPER}\n\n${
        errorMessage(err)
      }`,
    ),
  );
}

export function valueFromWireErrorDiag(err: unknown, path: Path): Diagnostic {
  return withPath(
    path,
    errorDiagnostic(
      CONVERSION_ERROR_SUMMARY,
      `An unexpected error was encountered trying to convert the wire value. ${REPORT_TO_DEVELOPER}\n\n${
        errorMessage(err)
      }`,
    ),
  );
}

/**
 * A null value reached a target that cannot hold null.
 */
export function unhandledNullDiag(
  path: Path,
  target: string,
  type: AttrType,
): Diagnostic {
  return withPath(
    path,
    errorDiagnostic(
      CONVERSION_ERROR_SUMMARY,
      `An unexpected error was encountered trying to build a value. ${REPORT_TO_DEVELOPER}\n\nReceived null value, however the target type cannot handle null values. Use a nullable target or the attribute value target instead.\n\nPath: ${path.toString()}\nTarget Type: ${target}\nSchema Type: ${type.toString()}`,
    ),
  );
}

/**
 * An unknown value reached a target that cannot hold unknown values.
 */
export function unhandledUnknownDiag(
  path: Path,
  target: string,
  type: AttrType,
): Diagnostic {
  return withPath(
    path,
    errorDiagnostic(
      CONVERSION_ERROR_SUMMARY,
      `An unexpected error was encountered trying to build a value. ${REPORT_TO_DEVELOPER}\n\nReceived unknown value, however the target type cannot handle unknown values. Use the attribute value target instead.\n\nPath: ${path.toString()}\nTarget Type: ${target}\nSchema Type: ${type.toString()}`,
    ),
  );
}

export function cancelledDiag(reason: string, path: Path): Diagnostic {
  return withPath(
    path,
    errorDiagnostic(
      CANCELLED_SUMMARY,
      `The conversion was cancelled before it completed: ${reason}`,
    ),
  );
}

export function depthExceededDiag(maxDepth: number, path: Path): Diagnostic {
  return withPath(
    path,
    errorDiagnostic(
      DEPTH_EXCEEDED_SUMMARY,
      `The value is nested more than ${maxDepth} levels deep.`,
    ),
  );
}
