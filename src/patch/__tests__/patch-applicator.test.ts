import { describe, it, expect } from "vitest";
import { applyOperation, applyPatch } from "../patch-applicator.js";
import { InvalidPointerError, InvariantViolationError, PatchTestFailedError, PointerNotFoundError } from "../../errors.js";
import type { JsonValue } from "../../domain/json.js";

const doc: JsonValue = { a: { b: 1 }, list: ["x", "y"] };

describe("applyOperation", () => {
  it("copies values by value", () => {
    const next = applyOperation(doc, { op: "copy", from: "/a", path: "/c" });
    expect(next).toEqual({ a: { b: 1 }, list: ["x", "y"], c: { b: 1 } });
  });

  it("moves values", () => {
    expect(applyOperation(doc, { op: "move", from: "/list/0", path: "/list/-" })).toEqual({
      a: { b: 1 },
      list: ["y", "x"],
    });
  });

  it("treats a move onto itself as a no-op that still requires the source", () => {
    expect(applyOperation(doc, { op: "move", from: "/a", path: "/a" })).toBe(doc);
    expect(() => applyOperation(doc, { op: "move", from: "/z", path: "/z" })).toThrow(PointerNotFoundError);
  });

  it("refuses to move a value into its own child", () => {
    expect(() => applyOperation(doc, { op: "move", from: "/a", path: "/a/b/c" })).toThrow(InvalidPointerError);
  });

  it("tests deep equality without changing the document", () => {
    expect(applyOperation(doc, { op: "test", path: "/a", value: { b: 1 } })).toBe(doc);
    expect(() => applyOperation(doc, { op: "test", path: "/a", value: { b: 2 } })).toThrow(PatchTestFailedError);
  });
});

describe("applyPatch", () => {
  it("applies operations in order", () => {
    const next = applyPatch(doc, [
      { op: "add", path: "/list/-", value: "z" },
      { op: "replace", path: "/a/b", value: 2 },
      { op: "remove", path: "/list/0" },
    ]);
    expect(next).toEqual({ a: { b: 2 }, list: ["y", "z"] });
    expect(doc).toEqual({ a: { b: 1 }, list: ["x", "y"] });
  });

  it("reports failures as invariant violations", () => {
    expect(() => applyPatch(doc, [{ op: "remove", path: "/missing" }])).toThrow(InvariantViolationError);
    expect(() => applyPatch(doc, [{ op: "remove", path: "/missing" }])).toThrow(
      "Validated operation 0 (remove /missing) failed",
    );
  });
});
