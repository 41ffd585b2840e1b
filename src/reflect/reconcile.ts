import { commaSeparatedString } from "./helpers.ts";

/**
 * Names present on only one side of a record/object pairing. Both lists are
 * sorted.
 */
export interface FieldMismatch {
  readonly recordOnly: readonly string[];
  readonly objectOnly: readonly string[];
}

/**
 * What the record is being matched against: the attributes of a wire object
 * (decoding) or the attribute types of a schema (encoding).
 */
export type Counterpart = "object" | "attributes";

/**
 * Compares the record's field names with the counterpart's names.
 * @returns The mismatch, or undefined when both sets are equal.
 */
export function reconcileFields(
  recordNames: Iterable<string>,
  objectNames: Iterable<string>,
): FieldMismatch | undefined {
  const record = new Set(recordNames);
  const object = new Set(objectNames);
  const recordOnly = [...record].filter((name) => !object.has(name)).sort();
  const objectOnly = [...object].filter((name) => !record.has(name)).sort();
  if (recordOnly.length === 0 && objectOnly.length === 0) {
    return undefined;
  }
  return { recordOnly, objectOnly };
}

/**
 * Renders a mismatch as a single message covering both directions.
 */
export function describeMismatch(
  mismatch: FieldMismatch,
  counterpart: Counterpart,
): string {
  const missing: string[] = [];
  if (mismatch.recordOnly.length > 0) {
    missing.push(
      `Struct defines fields not found in ${counterpart}: ${
        commaSeparatedString(mismatch.recordOnly)
      }.`,
    );
  }
  if (mismatch.objectOnly.length > 0) {
    const subject = counterpart === "object"
      ? "Object defines"
      : "Attributes define";
    missing.push(
      `${subject} fields not found in struct: ${
        commaSeparatedString(mismatch.objectOnly)
      }.`,
    );
  }
  return `mismatch between struct and ${counterpart}: ${missing.join(" ")}`;
}
