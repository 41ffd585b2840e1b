/** @internal */
export function _safeJSONStringify(obj: unknown): string | undefined {
  const cache: unknown[] = [];
  const retVal = JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === "bigint") return String(value);
    if (typeof value === "object" && value !== null) {
      if (cache.includes(value)) return "[Circular]";
      cache.push(value);
    }
    return value;
  });
  cache.length = 0;
  return retVal;
}

/**
 * Renders a native value on one line for diagnostics.
 */
export function safeStringify(value: unknown): string {
  // Strings are quoted so that "" and " " stay visible; other primitives are
  // printed as-is. Objects go through JSON with cycle and bigint handling.
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (
    typeof value === "bigint" || typeof value === "number" ||
    typeof value === "boolean" || value === null ||
    typeof value === "undefined"
  ) {
    return String(value);
  }
  const jsonStr = _safeJSONStringify(value);
  if (jsonStr === undefined) {
    return String(value);
  }
  return jsonStr;
}
