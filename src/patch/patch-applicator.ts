// =============================================================================
// Patch applicator — sequential RFC 6902 application
// =============================================================================

import { DocweaveError, InvalidPointerError, InvariantViolationError, PatchTestFailedError } from "../errors.js";
import { cloneJson, deepEqual, type JsonValue } from "../domain/json.js";
import type { PatchOperation } from "../domain/patch.schema.js";
import { add, remove, replace, resolve } from "../pointer/json-pointer.js";

/**
 * Applies one operation and returns the new document. Pointer failures
 * surface as the pointer engine's errors; `test` mismatches as
 * {@link PatchTestFailedError}.
 */
export function applyOperation(doc: JsonValue, op: PatchOperation): JsonValue {
  switch (op.op) {
    case "add":
      return add(doc, op.path, op.value);
    case "replace":
      return replace(doc, op.path, op.value);
    case "remove":
      return remove(doc, op.path);
    case "copy":
      return add(doc, op.path, cloneJson(resolve(doc, op.from)));
    case "move": {
      if (op.from === op.path) {
        resolve(doc, op.from);
        return doc;
      }
      if (op.path.startsWith(`${op.from}/`)) {
        throw new InvalidPointerError(op.path, `Cannot move "${op.from}" into its own child "${op.path}"`);
      }
      const value = resolve(doc, op.from);
      return add(remove(doc, op.from), op.path, value);
    }
    case "test": {
      const actual = resolve(doc, op.path);
      if (!deepEqual(actual, op.value)) {
        throw new PatchTestFailedError(op.path, `test failed: the value at "${op.path}" differs from the expected value`);
      }
      return doc;
    }
  }
}

/**
 * Applies a batch the validator accepted. Any failure here means validation
 * and application disagree, and is reported as {@link InvariantViolationError}.
 */
export function applyPatch(doc: JsonValue, batch: ReadonlyArray<PatchOperation>): JsonValue {
  let current = doc;
  batch.forEach((op, index) => {
    try {
      current = applyOperation(current, op);
    } catch (err) {
      if (err instanceof DocweaveError) {
        throw new InvariantViolationError(`Validated operation ${index} (${op.op} ${op.path}) failed: ${err.message}`, err);
      }
      throw err;
    }
  });
  return current;
}
