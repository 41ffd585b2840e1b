import type { Path } from "../path/path.ts";
import {
  type Diagnostic,
  diagnosticEquals,
  errorDiagnostic,
  warningDiagnostic,
  withPath,
} from "./diagnostic.ts";

/**
 * Ordered collection of diagnostics accumulated during a conversion.
 *
 * Appending a diagnostic equal to one already collected is a no-op, so nested
 * conversions can forward their findings without duplicating them.
 */
export class Diagnostics implements Iterable<Diagnostic> {
  #items: Diagnostic[] = [];

  constructor(items: Iterable<Diagnostic> = []) {
    this.append(items);
  }

  /**
   * Appends diagnostics, skipping those already present.
   */
  public append(items: Iterable<Diagnostic>): this {
    for (const item of items) {
      if (!this.#items.some((existing) => diagnosticEquals(existing, item))) {
        this.#items.push(item);
      }
    }
    return this;
  }

  public add(diagnostic: Diagnostic): this {
    return this.append([diagnostic]);
  }

  public addError(summary: string, detail: string): this {
    return this.add(errorDiagnostic(summary, detail));
  }

  public addWarning(summary: string, detail: string): this {
    return this.add(warningDiagnostic(summary, detail));
  }

  public addAttributeError(path: Path, summary: string, detail: string): this {
    return this.add(withPath(path, errorDiagnostic(summary, detail)));
  }

  public addAttributeWarning(
    path: Path,
    summary: string,
    detail: string,
  ): this {
    return this.add(withPath(path, warningDiagnostic(summary, detail)));
  }

  /** True when at least one diagnostic has error severity. */
  public hasError(): boolean {
    return this.#items.some((item) => item.severity === "error");
  }

  public errors(): Diagnostic[] {
    return this.#items.filter((item) => item.severity === "error");
  }

  public warnings(): Diagnostic[] {
    return this.#items.filter((item) => item.severity === "warning");
  }

  public get length(): number {
    return this.#items.length;
  }

  public toArray(): Diagnostic[] {
    return this.#items.slice();
  }

  public [Symbol.iterator](): Iterator<Diagnostic> {
    return this.#items[Symbol.iterator]();
  }
}
