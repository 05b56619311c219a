// =============================================================================
// AjvSchemaValidator — Ajv (JSON Schema 2020-12) implementation of SchemaValidatorPort
// =============================================================================

import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { ConfigurationError } from "../../errors.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../../domain/json.js";
import { encodeToken, parsePointer } from "../../pointer/json-pointer.js";
import type { SchemaIssue, SchemaValidatorPort } from "../../ports/schema-validator.port.js";

// ajv-formats is CommonJS; its callable export is the module object's `default`.
const addFormats = addFormatsModule.default;

const DEFAULT_SCHEMA_ID = "docweave://target";

function toIssue(error: ErrorObject): SchemaIssue {
  return {
    instancePath: error.instancePath,
    keyword: error.keyword,
    message: error.message ?? `failed "${error.keyword}"`,
    params: error.params,
  };
}

function prepareRoot(schema: JsonValue): { root: JsonValue; id: string } {
  if (!isJsonObject(schema)) return { root: schema, id: DEFAULT_SCHEMA_ID };
  const root: JsonObject = {};
  for (const key of Object.keys(schema)) {
    // The dialect is fixed to 2020-12; a draft-07 `$schema` would fail meta-schema lookup.
    if (key !== "$schema") root[key] = schema[key];
  }
  const declared = schema["$id"];
  const id = typeof declared === "string" && declared.length > 0 ? declared : DEFAULT_SCHEMA_ID;
  root["$id"] = id;
  return { root, id };
}

export class AjvSchemaValidator implements SchemaValidatorPort {
  private readonly ajv: Ajv2020;
  private readonly id: string;
  private readonly compiled = new Map<string, ValidateFunction>();

  constructor(schema: JsonValue) {
    this.ajv = new Ajv2020({ allErrors: true, strict: false });
    addFormats(this.ajv);
    const { root, id } = prepareRoot(schema);
    this.id = id;
    try {
      if (typeof root === "boolean" || isJsonObject(root)) {
        this.ajv.addSchema(root, id);
      } else {
        throw new Error(`a schema must be an object or a boolean, got ${root === null ? "null" : typeof root}`);
      }
      this.validatorFor("");
    } catch (err) {
      throw new ConfigurationError(err instanceof Error ? err.message : String(err), "schema");
    }
  }

  validateAt(schemaPointer: string, value: JsonValue): SchemaIssue[] {
    const validate = this.validatorFor(schemaPointer);
    if (validate(value)) return [];
    return (validate.errors ?? []).map(toIssue);
  }

  private validatorFor(schemaPointer: string): ValidateFunction {
    const cached = this.compiled.get(schemaPointer);
    if (cached) return cached;
    const fragment = parsePointer(schemaPointer)
      .map((token) => `/${encodeURIComponent(encodeToken(token))}`)
      .join("");
    const ref = fragment === "" ? this.id : `${this.id}#${fragment}`;
    const validate = this.ajv.getSchema(ref);
    if (!validate) {
      throw new ConfigurationError(`no subschema at "${schemaPointer}"`, "schema");
    }
    this.compiled.set(schemaPointer, validate);
    return validate;
  }
}

export function createAjvSchemaValidator(schema: JsonValue): SchemaValidatorPort {
  return new AjvSchemaValidator(schema);
}
