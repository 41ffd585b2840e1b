import type { Path } from "../path/path.ts";

/**
 * Severity of a diagnostic. Only errors mark an operation as failed.
 */
export type Severity = "error" | "warning";

/**
 * A single conversion finding, optionally attributed to a path.
 */
export interface Diagnostic {
  readonly severity: Severity;
  readonly summary: string;
  readonly detail: string;
  readonly path?: Path;
}

export function errorDiagnostic(summary: string, detail: string): Diagnostic {
  return { severity: "error", summary, detail };
}

export function warningDiagnostic(summary: string, detail: string): Diagnostic {
  return { severity: "warning", summary, detail };
}

/**
 * Returns a copy of the diagnostic attributed to the given path.
 */
export function withPath(path: Path, diagnostic: Diagnostic): Diagnostic {
  return { ...diagnostic, path };
}

export function diagnosticEquals(a: Diagnostic, b: Diagnostic): boolean {
  if (
    a.severity !== b.severity || a.summary !== b.summary ||
    a.detail !== b.detail
  ) {
    return false;
  }
  if (a.path === undefined || b.path === undefined) {
    return a.path === b.path;
  }
  return a.path.equals(b.path);
}

/**
 * Renders a diagnostic on one line, prefixed with its path when it has one.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.path && !diagnostic.path.isEmpty()
    ? ` at ${diagnostic.path.toString()}`
    : "";
  return `${diagnostic.severity}${where}: ${diagnostic.summary}: ${diagnostic.detail}`;
}
