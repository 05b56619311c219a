// =============================================================================
// Patch validator — schema-aware checks and anti-hallucination guards
//
// Operations are simulated in order on a scratch copy. A failing operation is
// not simulated, but later operations are still checked so the caller sees
// every mistake of the batch at once. The batch is accepted or rejected as a
// whole.
// =============================================================================

import { DocweaveError, InvalidPointerError, PatchTestFailedError } from "../errors.js";
import {
  canonicalize,
  cloneJson,
  describeValue,
  isContainer,
  isJsonObject,
  jsonTypeOf,
  serializedSize,
  type JsonValue,
} from "../domain/json.js";
import { describeOperationIssue, PatchOperationSchema, type PatchOperation } from "../domain/patch.schema.js";
import {
  APPEND_TOKEN,
  formatPointer,
  isArrayIndexToken,
  parsePointer,
  remove,
  tryResolve,
} from "../pointer/json-pointer.js";
import type { SchemaIssue, SchemaValidatorFactory, SchemaValidatorPort } from "../ports/schema-validator.port.js";
import { createAjvSchemaValidator } from "../adapters/validation/ajv-schema-validator.adapter.js";
import { applyOperation } from "./patch-applicator.js";
import {
  declaredPropertyNames,
  declaredType,
  locateSchemas,
  requiredKeys,
  type ContainerKind,
  type SchemaAlternative,
} from "./schema-locations.js";

export type RejectionKind =
  | "InvalidOperation"
  | "InvalidPointer"
  | "PointerNotFound"
  | "TestFailed"
  | "DestructiveOverwrite"
  | "TypeDowngrade"
  | "DuplicateItem"
  | "SchemaViolation"
  | "ShrinkageExceeded";

export interface PatchError {
  kind: RejectionKind;
  /** Index of the offending operation; -1 for batch-level rejections. */
  opIndex: number;
  path: string;
  reason: string;
  field?: string;
  expected?: string;
  actual?: string;
  hint?: string;
}

export type ValidationOutcome =
  | { ok: true; document: JsonValue; operations: PatchOperation[] }
  | { ok: false; errors: PatchError[] };

export interface PatchValidatorOptions {
  schema?: JsonValue;
  /** Builds the schema validator for `schema`; Ajv by default. */
  schemaValidatorFactory?: SchemaValidatorFactory;
  /** Reject batches leaving less than this share of the serialized document. */
  shrinkageRatio?: number;
  /** Documents smaller than this many characters are exempt from the shrinkage guard. */
  shrinkageMinSize?: number;
}

export const DEFAULT_SHRINKAGE_RATIO = 0.5;
export const DEFAULT_SHRINKAGE_MIN_SIZE = 64;

type CheckResult = Omit<PatchError, "opIndex"> | null;

function isEmptyDocument(doc: JsonValue): boolean {
  if (doc === null) return true;
  if (Array.isArray(doc)) return doc.length === 0;
  if (isJsonObject(doc)) return Object.keys(doc).length === 0;
  return false;
}

function rawPath(raw: unknown): string {
  return isJsonObject(raw) && typeof raw["path"] === "string" ? raw["path"] : "";
}

function containerKinds(doc: JsonValue, tokens: ReadonlyArray<string>): ContainerKind[] {
  const kinds: ContainerKind[] = [];
  for (let depth = 0; depth < tokens.length; depth++) {
    const node = tryResolve(doc, formatPointer(tokens.slice(0, depth)));
    kinds.push(node.found && Array.isArray(node.value) ? "array" : "object");
  }
  return kinds;
}

function issueField(issue: SchemaIssue, path: string): string {
  const missing = issue.params["missingProperty"];
  if (issue.keyword === "required" && typeof missing === "string") return missing;
  const extra = issue.params["additionalProperty"];
  if (issue.keyword === "additionalProperties" && typeof extra === "string") return extra;
  const tokens = parsePointer(path + issue.instancePath);
  return tokens.length > 0 ? tokens[tokens.length - 1] : "";
}

function issueExpectation(issue: SchemaIssue, value: JsonValue): { expected: string; actual: string } {
  const at = tryResolve(value, issue.instancePath);
  const actual = at.found ? jsonTypeOf(at.value) : "missing";
  switch (issue.keyword) {
    case "type": {
      const type = issue.params["type"];
      return { expected: Array.isArray(type) ? type.join(" | ") : String(type), actual };
    }
    case "required":
      return { expected: "present", actual: "missing" };
    case "additionalProperties":
      return { expected: "no additional properties", actual: "present" };
    case "enum": {
      const allowed = issue.params["allowedValues"];
      return { expected: `one of ${JSON.stringify(allowed)}`, actual: at.found ? JSON.stringify(at.value) : actual };
    }
    default:
      return { expected: issue.message, actual: at.found ? JSON.stringify(at.value) : actual };
  }
}

function typeHint(expectedType: string | undefined, value: JsonValue, path: string): string | undefined {
  const actual = jsonTypeOf(value);
  if (expectedType === "array" && actual !== "array") {
    return `The schema expects an array at "${path}"; append the item with "${path}/-" instead.`;
  }
  if (expectedType === "object" && actual === "array") {
    return `The schema expects an object at "${path}", but you provided an array. Pass a single object as the value.`;
  }
  return undefined;
}

export class PatchValidator {
  private readonly schema: JsonValue | undefined;
  private readonly schemaValidator: SchemaValidatorPort | undefined;
  private readonly shrinkageRatio: number;
  private readonly shrinkageMinSize: number;

  constructor(options: PatchValidatorOptions = {}) {
    this.schema = options.schema;
    const factory = options.schemaValidatorFactory ?? createAjvSchemaValidator;
    this.schemaValidator = options.schema === undefined ? undefined : factory(options.schema);
    this.shrinkageRatio = options.shrinkageRatio ?? DEFAULT_SHRINKAGE_RATIO;
    this.shrinkageMinSize = options.shrinkageMinSize ?? DEFAULT_SHRINKAGE_MIN_SIZE;
  }

  validate(doc: JsonValue, batch: ReadonlyArray<unknown>): ValidationOutcome {
    const errors: PatchError[] = [];
    const operations: PatchOperation[] = [];
    let scratch = doc;

    batch.forEach((raw, opIndex) => {
      const parsed = PatchOperationSchema.safeParse(raw);
      if (!parsed.success) {
        errors.push({
          kind: "InvalidOperation",
          opIndex,
          path: rawPath(raw),
          reason: `Operation ${opIndex} is malformed: ${describeOperationIssue(parsed.error)}`,
        });
        return;
      }
      // The document must not share objects with the request.
      const op: PatchOperation = "value" in parsed.data ? { ...parsed.data, value: cloneJson(parsed.data.value) } : parsed.data;
      const failure = this.check(scratch, op);
      if (failure) {
        errors.push({ ...failure, opIndex });
        return;
      }
      try {
        scratch = applyOperation(scratch, op);
        operations.push(op);
      } catch (err) {
        if (!(err instanceof DocweaveError)) throw err;
        const kind: RejectionKind =
          err instanceof InvalidPointerError ? "InvalidPointer" : err instanceof PatchTestFailedError ? "TestFailed" : "PointerNotFound";
        errors.push({ kind, opIndex, path: op.path, reason: err.message });
      }
    });

    if (errors.length > 0) return { ok: false, errors };

    const before = serializedSize(doc);
    const after = serializedSize(scratch);
    if (before >= this.shrinkageMinSize && after < before * this.shrinkageRatio) {
      return {
        ok: false,
        errors: [
          {
            kind: "ShrinkageExceeded",
            opIndex: -1,
            path: "",
            reason:
              `The batch would shrink the document from ${before} to ${after} characters ` +
              `(below ${Math.round(this.shrinkageRatio * 100)}% of its size). ` +
              "Remove or replace specific elements instead of rewriting large parts of the document.",
            expected: `>= ${Math.ceil(before * this.shrinkageRatio)} characters`,
            actual: `${after} characters`,
          },
        ],
      };
    }
    return { ok: true, document: scratch, operations };
  }

  private check(doc: JsonValue, op: PatchOperation): CheckResult {
    let tokens: string[];
    try {
      tokens = parsePointer(op.path);
      if (op.op === "move" || op.op === "copy") parsePointer(op.from);
    } catch (err) {
      if (err instanceof InvalidPointerError) return { kind: "InvalidPointer", path: op.path, reason: err.message };
      throw err;
    }

    switch (op.op) {
      case "add":
        return this.checkInsert(doc, op.path, tokens, op.value);
      case "replace":
        return this.checkReplace(doc, op.path, tokens, op.value);
      case "remove":
        return this.checkRemove(doc, op.path, tokens, "remove");
      case "test": {
        const target = tryResolve(doc, op.path);
        if (!target.found) return this.missing(doc, op.path, `test failed: "${op.path}" does not exist`);
        if (canonicalize(target.value) !== canonicalize(op.value)) {
          return { kind: "TestFailed", path: op.path, reason: `test failed: the value at "${op.path}" differs from the expected value` };
        }
        return null;
      }
      case "copy": {
        const source = tryResolve(doc, op.from);
        if (!source.found) return this.missing(doc, op.from, `copy failed: from "${op.from}" does not exist`);
        return this.checkInsert(doc, op.path, tokens, source.value);
      }
      case "move": {
        const source = tryResolve(doc, op.from);
        if (!source.found) return this.missing(doc, op.from, `move failed: from "${op.from}" does not exist`);
        if (op.from === op.path) return null;
        const fromTokens = parsePointer(op.from);
        if (fromTokens.length === 0 || op.path.startsWith(`${op.from}/`)) {
          return { kind: "InvalidPointer", path: op.path, reason: `move failed: "${op.from}" cannot be moved into itself or its children` };
        }
        const removal = this.checkRemove(doc, op.from, fromTokens, "move");
        if (removal) return removal;
        return this.checkInsert(remove(doc, op.from), op.path, tokens, source.value);
      }
    }
  }

  private missing(doc: JsonValue, path: string, reason: string): CheckResult {
    const tokens = parsePointer(path);
    const parent = tryResolve(doc, formatPointer(tokens.slice(0, -1)));
    if (parent.found && isJsonObject(parent.value) && tokens.length > 0) {
      const keys = Object.keys(parent.value);
      return {
        kind: "PointerNotFound",
        path,
        reason: `${reason}. Available keys at "${formatPointer(tokens.slice(0, -1)) || "/"}": ${keys.length > 0 ? keys.join(", ") : "(none)"}`,
      };
    }
    return { kind: "PointerNotFound", path, reason };
  }

  /** add / copy / move destination. */
  private checkInsert(doc: JsonValue, path: string, tokens: string[], value: JsonValue): CheckResult {
    if (tokens.length === 0) {
      if (!isEmptyDocument(doc)) {
        return {
          kind: "DestructiveOverwrite",
          path,
          reason:
            `DESTRUCTIVE OVERWRITE BLOCKED: an "add" at the root would replace the whole document (${describeValue(doc)}). ` +
            'Add keys or items under it instead, e.g. "/name" or "/items/-".',
        };
      }
      return this.checkSchemaValue(doc, path, tokens, value);
    }

    const parentPath = formatPointer(tokens.slice(0, -1));
    const key = tokens[tokens.length - 1];
    const parent = tryResolve(doc, parentPath);
    if (!parent.found) {
      return this.missing(
        doc,
        parentPath,
        `add failed: parent path "${parentPath}" does not exist. Use inspect_keys to verify the parent exists, or add it first`,
      );
    }
    if (!isContainer(parent.value)) {
      return {
        kind: "PointerNotFound",
        path,
        reason: `add failed: the parent "${parentPath || "/"}" is ${describeValue(parent.value)}, not an object or array`,
      };
    }

    if (Array.isArray(parent.value)) {
      const items = parent.value;
      if (key !== APPEND_TOKEN && !(isArrayIndexToken(key) && Number(key) <= items.length)) {
        return {
          kind: isArrayIndexToken(key) ? "PointerNotFound" : "InvalidPointer",
          path,
          reason:
            `add in array: invalid index '${key}'. The array has ${items.length} items ` +
            `(valid indices: 0..${items.length}, or '-' to append). Use "${parentPath}/-" to append to the end.`,
        };
      }
      const canonical = canonicalize(value);
      const duplicateAt = items.findIndex((item) => canonicalize(item) === canonical);
      if (duplicateAt !== -1) {
        return {
          kind: "DuplicateItem",
          path,
          reason:
            `Duplicate item: the array at "${parentPath}" already holds an identical element at index ${duplicateAt}. ` +
            `Skip it, or modify the existing element through "${parentPath}/${duplicateAt}".`,
        };
      }
      return this.checkSchemaValue(doc, path, tokens, value);
    }

    const target = tryResolve(doc, path);
    if (target.found) {
      const existing = target.value;
      if (Array.isArray(existing)) {
        const reason = Array.isArray(value)
          ? `DESTRUCTIVE OVERWRITE BLOCKED: "${path}" currently holds an array with ${existing.length} items. ` +
            `Your "add" would REPLACE all existing data with a new array of ${value.length} items. ` +
            `To APPEND items, use separate operations with "${path}/-" for each item.`
          : `DESTRUCTIVE OVERWRITE BLOCKED: "${path}" currently holds an array with ${existing.length} items. ` +
            `Your "add" would REPLACE the entire array with ${describeValue(value)}. ` +
            `To APPEND an item, use "${path}/-"; to replace one element, use "${path}/<i>".`;
        return { kind: "DestructiveOverwrite", path, reason, expected: `"${path}/-"`, actual: `"${path}"` };
      }
      const downgrade = this.checkDowngrade(path, existing, value, "add");
      if (downgrade) return downgrade;
    }
    return this.checkSchemaValue(doc, path, tokens, value);
  }

  private checkReplace(doc: JsonValue, path: string, tokens: string[], value: JsonValue): CheckResult {
    const target = tryResolve(doc, path);
    if (!target.found) return this.missing(doc, path, `replace failed: "${path}" does not exist; use "add" to create it`);
    const existing = target.value;
    if (Array.isArray(existing) && existing.length > 0) {
      return {
        kind: "DestructiveOverwrite",
        path,
        reason:
          `DESTRUCTIVE OVERWRITE BLOCKED: "${path}" holds an array with ${existing.length} items and cannot be replaced as a whole. ` +
          `Replace single elements with "${path}/<i>" or append with "${path}/-".`,
        expected: `"${path}/<i>"`,
        actual: `"${path}"`,
      };
    }
    const downgrade = this.checkDowngrade(path, existing, value, "replace");
    if (downgrade) return downgrade;
    return this.checkSchemaValue(doc, path, tokens, value);
  }

  private checkDowngrade(path: string, existing: JsonValue, value: JsonValue, op: "add" | "replace"): CheckResult {
    if (!isContainer(existing) || isContainer(value)) return null;
    return {
      kind: "TypeDowngrade",
      path,
      reason:
        `TYPE DOWNGRADE BLOCKED: "${path}" holds ${describeValue(existing)}; your "${op}" would replace it with ${describeValue(value)}. ` +
        `Write to a field inside it instead, e.g. "${path}/<key>".`,
      expected: jsonTypeOf(existing),
      actual: jsonTypeOf(value),
    };
  }

  private checkRemove(doc: JsonValue, path: string, tokens: string[], op: "remove" | "move"): CheckResult {
    if (tokens.length === 0) {
      return { kind: "InvalidPointer", path, reason: `${op} at the root would leave the document undefined` };
    }
    const target = tryResolve(doc, path);
    if (!target.found) return this.missing(doc, path, `${op} failed: "${path}" does not exist`);
    if (!this.schema) return null;

    const parentTokens = tokens.slice(0, -1);
    const parent = tryResolve(doc, formatPointer(parentTokens));
    if (!parent.found || !isJsonObject(parent.value)) return null;
    const key = tokens[tokens.length - 1];
    const alternatives = locateSchemas(this.schema, parentTokens, containerKinds(doc, parentTokens));
    const schema = this.schema;
    const required =
      alternatives.length > 0 &&
      alternatives.every((alternative) => alternative.some((pointer) => requiredKeys(schema, pointer).has(key)));
    if (!required) return null;
    return {
      kind: "SchemaViolation",
      path,
      reason: `${op} invalid: "${key}" is required by the parent schema`,
      field: key,
      expected: "present",
      actual: "removed",
    };
  }

  private checkSchemaValue(doc: JsonValue, path: string, tokens: string[], value: JsonValue): CheckResult {
    if (this.schema === undefined || this.schemaValidator === undefined) return null;
    const schema = this.schema;
    const alternatives = locateSchemas(schema, tokens, containerKinds(doc, tokens));

    if (alternatives.length === 0) {
      const parentTokens = tokens.slice(0, -1);
      const key = tokens[tokens.length - 1];
      const parentAlternatives = locateSchemas(schema, parentTokens, containerKinds(doc, parentTokens));
      const allowed = [...new Set(parentAlternatives.flat().flatMap((pointer) => declaredPropertyNames(schema, pointer)))];
      return {
        kind: "SchemaViolation",
        path,
        reason:
          `add invalid: property "${key}" is not allowed by the parent schema. ` +
          (allowed.length > 0 ? `Allowed keys here: ${allowed.join(", ")}.` : "Check the target schema for the keys allowed at this level."),
        field: key,
        expected: allowed.length > 0 ? `one of: ${allowed.join(", ")}` : "no additional properties",
        actual: key,
      };
    }

    let best: { alternative: SchemaAlternative; issues: SchemaIssue[] } | undefined;
    for (const alternative of alternatives) {
      const issues = alternative.flatMap((pointer) => this.validateAt(pointer, value));
      if (issues.length === 0) return null;
      if (!best || issues.length < best.issues.length) best = { alternative, issues };
    }
    if (!best) return null;

    const [first] = best.issues;
    const { expected, actual } = issueExpectation(first, value);
    const expectedType = best.alternative.map((pointer) => declaredType(schema, pointer)).find((t) => t !== undefined);
    const hint = typeHint(expectedType, value, path);
    const details = best.issues.map((issue) => `${path}${issue.instancePath || ""}: ${issue.message}`).join(" | ");
    return {
      kind: "SchemaViolation",
      path,
      reason: `value incompatible with schema at "${path}": ${details}${hint ? ` HINT: ${hint}` : ""}`,
      field: issueField(first, path),
      expected,
      actual,
      hint,
    };
  }

  private validateAt(pointer: string, value: JsonValue): SchemaIssue[] {
    if (!this.schemaValidator) return [];
    return this.schemaValidator.validateAt(pointer, value);
  }
}

/** One-shot validation; builds a fresh validator for `schema`. */
export function validatePatch(
  doc: JsonValue,
  schema: JsonValue | undefined,
  batch: ReadonlyArray<unknown>,
  options: Omit<PatchValidatorOptions, "schema"> = {},
): ValidationOutcome {
  return new PatchValidator({ ...options, schema }).validate(doc, batch);
}
