const FIELD_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Attribute names start with a lowercase letter and contain only lowercase
 * letters, digits and underscores.
 */
export function isValidFieldName(name: string): boolean {
  return FIELD_NAME_PATTERN.test(name);
}

/**
 * Sorts the names and joins them as `a`, `a and b` or `a, b, and c`.
 */
export function commaSeparatedString(names: readonly string[]): string {
  const sorted = [...names].sort();
  switch (sorted.length) {
    case 0:
      return "";
    case 1:
      return sorted[0];
    case 2:
      return sorted.join(" and ");
    default:
      sorted[sorted.length - 1] = "and " + sorted[sorted.length - 1];
      return sorted.join(", ");
  }
}
