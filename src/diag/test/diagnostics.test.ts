import { describe, expect, it } from "vitest";
import { Path } from "../../path/path.ts";
import {
  errorDiagnostic,
  formatDiagnostic,
  warningDiagnostic,
  withPath,
} from "../diagnostic.ts";
import { Diagnostics } from "../diagnostics.ts";

describe("Diagnostics", () => {
  it("has no error when empty", () => {
    const diags = new Diagnostics();
    expect(diags.hasError()).toBe(false);
    expect(diags.length).toBe(0);
  });

  it("does not count warnings as errors", () => {
    const diags = new Diagnostics().addWarning("Heads up", "detail");
    expect(diags.hasError()).toBe(false);
    expect(diags.warnings()).toHaveLength(1);
  });

  it("detects errors", () => {
    const diags = new Diagnostics()
      .addWarning("Heads up", "detail")
      .addError("Broken", "detail");
    expect(diags.hasError()).toBe(true);
    expect(diags.errors().map((d) => d.summary)).toEqual(["Broken"]);
  });

  it("skips diagnostics equal to one already present", () => {
    const diags = new Diagnostics();
    diags.addAttributeError(Path.root("a"), "Broken", "detail");
    diags.addAttributeError(Path.root("a"), "Broken", "detail");
    diags.addAttributeError(Path.root("b"), "Broken", "detail");
    diags.addError("Broken", "detail");
    expect(diags.length).toBe(3);
  });

  it("appends the contents of another collection in order", () => {
    const first = new Diagnostics().addError("One", "1");
    const second = new Diagnostics().addError("Two", "2").addError("One", "1");
    first.append(second);
    expect(first.toArray().map((d) => d.summary)).toEqual(["One", "Two"]);
  });

  it("is iterable", () => {
    const diags = new Diagnostics([
      errorDiagnostic("A", "a"),
      warningDiagnostic("B", "b"),
    ]);
    expect([...diags].map((d) => d.severity)).toEqual(["error", "warning"]);
  });
});

describe("formatDiagnostic", () => {
  it("includes the path when present", () => {
    const diag = withPath(
      Path.root("items").atListIndex(2),
      errorDiagnostic("Broken", "it broke"),
    );
    expect(formatDiagnostic(diag)).toBe(
      "error at items[2]: Broken: it broke",
    );
  });

  it("omits an empty path", () => {
    const diag = withPath(Path.empty(), warningDiagnostic("Careful", "hm"));
    expect(formatDiagnostic(diag)).toBe("warning: Careful: hm");
  });
});
