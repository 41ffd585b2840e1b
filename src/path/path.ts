/**
 * A single step in a {@link Path}.
 */
export type PathStep =
  | { readonly kind: "attribute"; readonly name: string }
  | { readonly kind: "index"; readonly index: number }
  | { readonly kind: "key"; readonly key: string };

/**
 * Immutable location of a value relative to the root of a conversion.
 *
 * Every `at*` method returns a new path; the receiver is never modified, so a
 * path can be shared between sibling conversions.
 */
export class Path {
  static readonly #EMPTY = new Path([]);

  readonly #steps: readonly PathStep[];

  private constructor(steps: readonly PathStep[]) {
    this.#steps = steps;
  }

  /** The root path. */
  public static empty(): Path {
    return Path.#EMPTY;
  }

  /** A path rooted at the named attribute. */
  public static root(name: string): Path {
    return Path.#EMPTY.atName(name);
  }

  /** Extends the path with an attribute name step. */
  public atName(name: string): Path {
    return new Path([...this.#steps, { kind: "attribute", name }]);
  }

  /** Extends the path with a list index step. */
  public atListIndex(index: number): Path {
    return new Path([...this.#steps, { kind: "index", index }]);
  }

  /** Extends the path with a map key step. */
  public atMapKey(key: string): Path {
    return new Path([...this.#steps, { kind: "key", key }]);
  }

  /** The path without its last step. The root is its own parent. */
  public parent(): Path {
    if (this.#steps.length === 0) {
      return this;
    }
    return new Path(this.#steps.slice(0, -1));
  }

  public steps(): readonly PathStep[] {
    return this.#steps;
  }

  public get length(): number {
    return this.#steps.length;
  }

  public isEmpty(): boolean {
    return this.#steps.length === 0;
  }

  public equals(other: Path): boolean {
    const steps = other.steps();
    if (steps.length !== this.#steps.length) {
      return false;
    }
    return this.#steps.every((step, i) => stepEquals(step, steps[i]));
  }

  /**
   * Renders the path as `name.nested[0]["key"]`.
   */
  public toString(): string {
    let out = "";
    for (const step of this.#steps) {
      switch (step.kind) {
        case "attribute":
          out += out === "" ? step.name : `.${step.name}`;
          break;
        case "index":
          out += `[${step.index}]`;
          break;
        case "key":
          out += `[${JSON.stringify(step.key)}]`;
          break;
      }
    }
    return out;
  }
}

function stepEquals(a: PathStep, b: PathStep): boolean {
  switch (a.kind) {
    case "attribute":
      return b.kind === "attribute" && a.name === b.name;
    case "index":
      return b.kind === "index" && a.index === b.index;
    case "key":
      return b.kind === "key" && a.key === b.key;
  }
}
