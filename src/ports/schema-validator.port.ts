// =============================================================================
// SchemaValidatorPort — validates values against locations inside one schema
// =============================================================================

import type { JsonValue } from "../domain/json.js";

export interface SchemaIssue {
  /** Pointer inside the validated value; "" for the value itself. */
  readonly instancePath: string;
  readonly keyword: string;
  readonly message: string;
  readonly params: Readonly<Record<string, unknown>>;
}

export interface SchemaValidatorPort {
  /**
   * Validates `value` against the subschema at `schemaPointer` (a JSON
   * Pointer into the registered root schema, "" for the root). `$ref`s inside
   * the subschema resolve against the root. Returns no issues when valid.
   */
  validateAt(schemaPointer: string, value: JsonValue): SchemaIssue[];
}

export type SchemaValidatorFactory = (schema: JsonValue) => SchemaValidatorPort;
