import { describe, it, expect } from "vitest";
import { PatchValidator, validatePatch } from "../patch-validator.js";
import { applyPatch } from "../patch-applicator.js";
import { isJsonObject, type JsonValue } from "../../domain/json.js";
import type { SchemaValidatorPort } from "../../ports/schema-validator.port.js";

const staff: JsonValue = { employees: [{ name: "A" }, { name: "B" }, { name: "C" }] };

function reject(doc: JsonValue, batch: unknown[], schema?: JsonValue) {
  const outcome = validatePatch(doc, schema, batch);
  if (outcome.ok) throw new Error("expected the batch to be rejected");
  return outcome.errors;
}

describe("PatchValidator — structural guards", () => {
  it("blocks an add that would replace an existing array with an object", () => {
    const [error] = reject(staff, [{ op: "add", path: "/employees", value: { name: "D" } }]);
    expect(error).toMatchObject({
      kind: "DestructiveOverwrite",
      opIndex: 0,
      path: "/employees",
      expected: '"/employees/-"',
      actual: '"/employees"',
    });
    expect(error.reason).toBe(
      'DESTRUCTIVE OVERWRITE BLOCKED: "/employees" currently holds an array with 3 items. ' +
        'Your "add" would REPLACE the entire array with an object with 1 key. ' +
        'To APPEND an item, use "/employees/-"; to replace one element, use "/employees/<i>".',
    );
  });

  it("blocks an add that would replace an existing array with a new array", () => {
    const [error] = reject(staff, [{ op: "add", path: "/employees", value: [{ name: "D" }] }]);
    expect(error.kind).toBe("DestructiveOverwrite");
    expect(error.reason).toContain("with a new array of 1 items");
  });

  it("accepts appends and returns the simulated document", () => {
    const outcome = validatePatch(staff, undefined, [{ op: "add", path: "/employees/-", value: { name: "D" } }]);
    expect(outcome).toEqual({
      ok: true,
      document: { employees: [{ name: "A" }, { name: "B" }, { name: "C" }, { name: "D" }] },
      operations: [{ op: "add", path: "/employees/-", value: { name: "D" } }],
    });
  });

  it("blocks replacing a non-empty array as a whole", () => {
    const [error] = reject(staff, [{ op: "replace", path: "/employees", value: [] }]);
    expect(error.kind).toBe("DestructiveOverwrite");
    expect(validatePatch({ tags: [] }, undefined, [{ op: "replace", path: "/tags", value: ["a"] }]).ok).toBe(true);
  });

  it("blocks an add at the root of a non-empty document", () => {
    const [error] = reject(staff, [{ op: "add", path: "", value: {} }]);
    expect(error.kind).toBe("DestructiveOverwrite");
    expect(validatePatch({}, undefined, [{ op: "add", path: "", value: { a: 1 } }])).toMatchObject({
      ok: true,
      document: { a: 1 },
    });
  });

  it("blocks type downgrades", () => {
    const [error] = reject({ address: { city: "Turin" } }, [{ op: "replace", path: "/address", value: "Turin" }]);
    expect(error).toMatchObject({ kind: "TypeDowngrade", expected: "object", actual: "string" });
    expect(error.reason).toBe(
      'TYPE DOWNGRADE BLOCKED: "/address" holds an object with 1 key; your "replace" would replace it with a string. ' +
        'Write to a field inside it instead, e.g. "/address/<key>".',
    );
  });

  it("rejects exact duplicates and accepts near-duplicates", () => {
    const [error] = reject(staff, [{ op: "add", path: "/employees/-", value: { name: "A" } }]);
    expect(error).toMatchObject({ kind: "DuplicateItem", opIndex: 0 });
    expect(error.reason).toBe(
      'Duplicate item: the array at "/employees" already holds an identical element at index 0. ' +
        'Skip it, or modify the existing element through "/employees/0".',
    );
    expect(validatePatch(staff, undefined, [{ op: "add", path: "/employees/-", value: { name: "A", age: 3 } }]).ok).toBe(
      true,
    );
  });

  it("compares duplicates independently of key order", () => {
    const doc: JsonValue = { rows: [{ a: 1, b: 2 }] };
    expect(reject(doc, [{ op: "add", path: "/rows/-", value: { b: 2, a: 1 } }])[0].kind).toBe("DuplicateItem");
  });

  it("rejects an add under a missing parent and lists the keys that exist", () => {
    const [error] = reject({}, [{ op: "add", path: "/address/city", value: "Turin" }]);
    expect(error.kind).toBe("PointerNotFound");
    expect(error.reason).toBe(
      'add failed: parent path "/address" does not exist. Use inspect_keys to verify the parent exists, or add it first. ' +
        'Available keys at "/": (none)',
    );
  });

  it("rejects invalid array indices", () => {
    const [error] = reject(staff, [{ op: "add", path: "/employees/9", value: { name: "Z" } }]);
    expect(error.kind).toBe("PointerNotFound");
    expect(error.reason).toContain('Use "/employees/-" to append to the end.');
    expect(reject(staff, [{ op: "add", path: "/employees/first", value: {} }])[0].kind).toBe("InvalidPointer");
  });

  it("rejects malformed operations with their index", () => {
    const errors = reject(staff, [{ op: "add", path: "/x", value: 1 }, { op: "merge", path: "/y" }]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ kind: "InvalidOperation", opIndex: 1, path: "/y" });
    expect(errors[0].reason.startsWith("Operation 1 is malformed: ")).toBe(true);
  });

  it("rejects values that are not JSON", () => {
    expect(reject(staff, [{ op: "add", path: "/x", value: Number.NaN }])[0].reason).toBe(
      'Operation 0 is malformed: "value": Expected a JSON value (no undefined, functions or non-finite numbers)',
    );
  });

  it("rejects pointers without a leading slash", () => {
    expect(reject(staff, [{ op: "add", path: "name", value: "x" }])[0].kind).toBe("InvalidPointer");
  });

  it("reports every failing operation of the batch", () => {
    const errors = reject(staff, [
      { op: "replace", path: "/missing", value: 1 },
      { op: "add", path: "/employees/-", value: { name: "E" } },
      { op: "remove", path: "/gone" },
    ]);
    expect(errors.map((e) => [e.kind, e.opIndex])).toEqual([
      ["PointerNotFound", 0],
      ["PointerNotFound", 2],
    ]);
  });

  it("checks later operations against the effect of earlier ones", () => {
    const outcome = validatePatch({}, undefined, [
      { op: "add", path: "/items", value: [] },
      { op: "add", path: "/items/-", value: "a" },
      { op: "add", path: "/items/-", value: "a" },
    ]);
    expect(outcome.ok).toBe(false);
    expect(outcome.ok ? [] : outcome.errors.map((e) => [e.kind, e.opIndex])).toEqual([["DuplicateItem", 2]]);
  });

  it("reads copy and move sources from the state left by earlier operations", () => {
    const batch = [
      { op: "add", path: "/draft", value: { name: "A" } },
      { op: "copy", from: "/draft", path: "/final" },
      { op: "replace", path: "/draft/name", value: "B" },
      { op: "move", from: "/draft", path: "/archived" },
    ];
    const outcome = validatePatch({}, undefined, batch);
    expect(outcome).toMatchObject({ ok: true, document: { final: { name: "A" }, archived: { name: "B" } } });
    expect(outcome.ok ? applyPatch({}, outcome.operations) : undefined).toEqual({
      final: { name: "A" },
      archived: { name: "B" },
    });
  });

  it("moves an element appended earlier in the same batch", () => {
    const batch = [
      { op: "add", path: "/list/-", value: "x" },
      { op: "move", from: "/list/0", path: "/first" },
    ];
    const outcome = validatePatch({ list: [] }, undefined, batch);
    expect(outcome).toMatchObject({ ok: true, document: { list: [], first: "x" } });
    expect(outcome.ok ? applyPatch({ list: [] }, outcome.operations) : undefined).toEqual({ list: [], first: "x" });
  });

  it("treats '/' as the member with the empty key", () => {
    expect(validatePatch({ a: "xxxxxxxxxx" }, undefined, [{ op: "add", path: "/", value: 5 }])).toEqual({
      ok: true,
      document: { a: "xxxxxxxxxx", "": 5 },
      operations: [{ op: "add", path: "/", value: 5 }],
    });
  });

  it("keeps __proto__ keys inside patch values", () => {
    const value: unknown = JSON.parse('{"__proto__":{"x":1},"a":1}');
    const outcome = validatePatch({}, undefined, [{ op: "add", path: "/p", value }]);
    if (!outcome.ok) throw new Error("expected the batch to be accepted");
    const added = isJsonObject(outcome.document) ? outcome.document["p"] : undefined;
    expect(isJsonObject(added) ? Object.keys(added) : []).toEqual(["__proto__", "a"]);
    expect(added).not.toBe(value);
    expect(Object.prototype.hasOwnProperty.call(Object.prototype, "x")).toBe(false);
  });

  it("evaluates test operations", () => {
    expect(validatePatch(staff, undefined, [{ op: "test", path: "/employees/0", value: { name: "A" } }]).ok).toBe(true);
    expect(reject(staff, [{ op: "test", path: "/employees/0", value: { name: "B" } }])[0].kind).toBe("TestFailed");
  });

  it("rejects batches that shrink a large document below half its size", () => {
    const doc: JsonValue = { keep: "k", big: "x".repeat(100) };
    const [error] = reject(doc, [{ op: "remove", path: "/big" }]);
    expect(error).toEqual({
      kind: "ShrinkageExceeded",
      opIndex: -1,
      path: "",
      reason:
        "The batch would shrink the document from 121 to 12 characters (below 50% of its size). " +
        "Remove or replace specific elements instead of rewriting large parts of the document.",
      expected: ">= 61 characters",
      actual: "12 characters",
    });
  });

  it("exempts small documents from the shrinkage guard", () => {
    expect(validatePatch({ a: "x" }, undefined, [{ op: "remove", path: "/a" }]).ok).toBe(true);
  });

  it("honours a custom shrinkage ratio", () => {
    const doc: JsonValue = { keep: "k", big: "x".repeat(100) };
    const validator = new PatchValidator({ shrinkageRatio: 0.05 });
    expect(validator.validate(doc, [{ op: "remove", path: "/big" }]).ok).toBe(true);
  });

  it("never modifies the input document", () => {
    const doc: JsonValue = { items: ["a"] };
    validatePatch(doc, undefined, [{ op: "add", path: "/items/-", value: "b" }]);
    expect(doc).toEqual({ items: ["a"] });
  });
});

const schema: JsonValue = {
  type: "object",
  properties: {
    name: { type: "string" },
    age: { type: "integer" },
    employees: {
      type: "array",
      items: {
        type: "object",
        properties: { name: { type: "string" }, role: { type: "string" } },
        required: ["name"],
      },
    },
  },
  required: ["employees"],
  additionalProperties: false,
};

describe("PatchValidator — schema checks", () => {
  it("rejects items missing a required property", () => {
    const [error] = reject({ employees: [] }, [{ op: "add", path: "/employees/-", value: { role: "dev" } }], schema);
    expect(error).toMatchObject({
      kind: "SchemaViolation",
      path: "/employees/-",
      field: "name",
      expected: "present",
      actual: "missing",
    });
    expect(error.reason).toBe(
      "value incompatible with schema at \"/employees/-\": /employees/-: must have required property 'name'",
    );
  });

  it("rejects properties the parent schema does not allow", () => {
    const [error] = reject({ employees: [] }, [{ op: "add", path: "/nickname", value: "x" }], schema);
    expect(error).toMatchObject({ kind: "SchemaViolation", field: "nickname" });
    expect(error.reason).toBe(
      'add invalid: property "nickname" is not allowed by the parent schema. Allowed keys here: name, age, employees.',
    );
  });

  it("reports expected and actual types", () => {
    const [error] = reject({ employees: [] }, [{ op: "add", path: "/age", value: "thirty" }], schema);
    expect(error).toMatchObject({ kind: "SchemaViolation", field: "age", expected: "integer", actual: "string" });
    expect(error.reason).toBe('value incompatible with schema at "/age": /age: must be integer');
  });

  it("hints at appending when an object is written where an array belongs", () => {
    const [error] = reject({}, [{ op: "add", path: "/employees", value: { name: "A" } }], schema);
    expect(error.hint).toBe('The schema expects an array at "/employees"; append the item with "/employees/-" instead.');
  });

  it("blocks removal of required keys", () => {
    const [error] = reject({ employees: [], name: "Acme" }, [{ op: "remove", path: "/employees" }], schema);
    expect(error).toMatchObject({ kind: "SchemaViolation", field: "employees" });
    expect(error.reason).toBe('remove invalid: "employees" is required by the parent schema');
  });

  it("accepts conforming operations", () => {
    const outcome = validatePatch({ employees: [] }, schema, [
      { op: "add", path: "/name", value: "Acme" },
      { op: "add", path: "/employees/-", value: { name: "Ada", role: "engineer" } },
    ]);
    expect(outcome).toMatchObject({ ok: true, document: { employees: [{ name: "Ada", role: "engineer" }], name: "Acme" } });
  });

  it("resolves $ref into definitions", () => {
    const withRefs: JsonValue = {
      definitions: {
        person: { type: "object", properties: { name: { type: "string" } }, required: ["name"] },
      },
      type: "object",
      properties: { people: { type: "array", items: { $ref: "#/definitions/person" } } },
    };
    expect(reject({ people: [] }, [{ op: "add", path: "/people/-", value: {} }], withRefs)[0].kind).toBe(
      "SchemaViolation",
    );
    const [error] = reject({ people: [{ name: "A" }] }, [{ op: "replace", path: "/people/0/name", value: 5 }], withRefs);
    expect(error).toMatchObject({ kind: "SchemaViolation", expected: "string", actual: "integer" });
  });

  it("accepts a value matching any anyOf branch", () => {
    const union: JsonValue = {
      type: "object",
      properties: { id: { anyOf: [{ type: "string" }, { type: "integer" }] } },
    };
    expect(validatePatch({}, union, [{ op: "add", path: "/id", value: 7 }]).ok).toBe(true);
    expect(validatePatch({}, union, [{ op: "add", path: "/id", value: "x7" }]).ok).toBe(true);
    expect(reject({}, [{ op: "add", path: "/id", value: true }], union)[0].kind).toBe("SchemaViolation");
  });

  it("uses an injected schema validator", () => {
    const seen: string[] = [];
    const port: SchemaValidatorPort = {
      validateAt(pointer) {
        seen.push(pointer);
        return [{ instancePath: "", keyword: "custom", message: "always fails", params: {} }];
      },
    };
    const validator = new PatchValidator({
      schema: { type: "object", properties: { x: { type: "integer" } } },
      schemaValidatorFactory: () => port,
    });
    const outcome = validator.validate({}, [{ op: "add", path: "/x", value: 1 }]);
    expect(outcome.ok ? [] : outcome.errors.map((e) => [e.kind, e.expected, e.actual])).toEqual([
      ["SchemaViolation", "always fails", "1"],
    ]);
    expect(seen).toEqual(["/properties/x"]);
  });
});
