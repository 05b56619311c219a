// =============================================================================
// OperationExecutor — runs one decision-maker request against the document
//
// User mistakes (bad arguments, unknown operations, rejected patches) come
// back as error results the decision-maker can read. Only defects throw.
// =============================================================================

import type { ZodError } from "zod";
import type { JsonValue } from "../domain/json.js";
import { createGuidance, type Guidance } from "../domain/guidance.schema.js";
import {
  ApplyPatchesArgsSchema,
  FinalizeGuidanceArgsSchema,
  InspectKeysArgsSchema,
  OperationNameSchema,
  ReadValueArgsSchema,
  SearchPointerArgsSchema,
  type OperationRequest,
} from "../domain/operation.schema.js";
import type { OperationResult } from "../ports/decision-maker.port.js";
import { inspect } from "../inspect/inspector.js";
import { applyPatch } from "../patch/patch-applicator.js";
import type { PatchError, PatchValidator } from "../patch/patch-validator.js";
import { search } from "../search/searcher.js";
import { renderCompact } from "../view/compact-renderer.js";
import { readValue } from "../view/read-value.js";

export interface OperationExecutorOptions {
  validator: PatchValidator;
  schema?: JsonValue;
  /** Character budget of the document view returned after a patch (default: 6000). */
  documentViewLimit?: number;
  /** Character budget of a read_value result (default: 6000). */
  readValueLimit?: number;
}

export interface ExecutionOutcome {
  result: OperationResult;
  /** The document after the request; the input document unless a patch was applied. */
  document: JsonValue;
  /** Present when the request finalized the chunk. */
  guidance?: Guidance;
  /** Present for apply_patches requests that reached the validator. */
  patch?: { applied: number; errors: PatchError[] };
}

const EMPTY_PATCH_EXAMPLE = '{"patches": [{"op": "add", "path": "/items/-", "value": {"name": "..."}}]}';

function describeArgsIssue(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(arguments)"}: ${issue.message}`)
    .join("; ");
}

export class OperationExecutor {
  private readonly validator: PatchValidator;
  private readonly schema: JsonValue | undefined;
  private readonly documentViewLimit: number;
  private readonly readValueLimit: number;

  constructor(options: OperationExecutorOptions) {
    this.validator = options.validator;
    this.schema = options.schema;
    this.documentViewLimit = options.documentViewLimit ?? 6000;
    this.readValueLimit = options.readValueLimit ?? 6000;
  }

  renderDocument(document: JsonValue): string {
    return renderCompact(document, this.documentViewLimit);
  }

  execute(request: OperationRequest, document: JsonValue): ExecutionOutcome {
    const name = OperationNameSchema.safeParse(request.name);
    if (!name.success) {
      return this.fail(request, document, {
        error: `Unknown operation "${request.name}". Available operations: ${OperationNameSchema.options.join(", ")}.`,
      });
    }

    switch (name.data) {
      case "inspect_keys": {
        const args = InspectKeysArgsSchema.safeParse(request.args ?? {});
        if (!args.success) return this.malformed(request, document, args.error);
        const source = this.sourceValue(args.data.source, document);
        if (source === undefined) return this.noSchema(request, document);
        const result = inspect(source, args.data.path);
        return this.done(request, document, result.ok, { source: args.data.source, ...result });
      }

      case "read_value": {
        const args = ReadValueArgsSchema.safeParse(request.args ?? {});
        if (!args.success) return this.malformed(request, document, args.error);
        const { source: sourceName, path, ...limits } = args.data;
        const source = this.sourceValue(sourceName, document);
        if (source === undefined) return this.noSchema(request, document);
        const result = readValue(source, path, limits);
        if (!result.found) return this.done(request, document, false, { source: sourceName, ...result });
        return this.done(request, document, true, {
          source: sourceName,
          ...result,
          value: renderCompact(result.value, this.readValueLimit),
        });
      }

      case "search_pointer": {
        const args = SearchPointerArgsSchema.safeParse(request.args ?? {});
        if (!args.success) return this.malformed(request, document, args.error);
        const { source: sourceName, query, fuzzy, ...options } = args.data;
        const source = this.sourceValue(sourceName, document);
        if (source === undefined) return this.noSchema(request, document);
        const result = search(source, query, { ...options, mode: fuzzy ? "fuzzy" : "exact" });
        return this.done(request, document, true, { source: sourceName, query, ...result });
      }

      case "apply_patches":
        return this.applyPatches(request, document);

      case "finalize_guidance": {
        const args = FinalizeGuidanceArgsSchema.safeParse(request.args ?? {});
        if (!args.success) return this.malformed(request, document, args.error);
        const guidance = createGuidance(args.data);
        return {
          result: this.result(request, true, {
            message: "Guidance recorded. The chunk is finalized; no further operations run for it.",
          }),
          document,
          guidance,
        };
      }
    }
  }

  private applyPatches(request: OperationRequest, document: JsonValue): ExecutionOutcome {
    const args = ApplyPatchesArgsSchema.safeParse(request.args ?? {});
    if (!args.success) return this.malformed(request, document, args.error);
    if (args.data.patches.length === 0) {
      return this.fail(request, document, {
        error: `The patch list is empty. Send at least one operation, for example ${EMPTY_PATCH_EXAMPLE}.`,
      });
    }

    const outcome = this.validator.validate(document, args.data.patches);
    if (!outcome.ok) {
      return {
        result: this.result(request, false, {
          message: `Batch rejected: ${outcome.errors.length} operation(s) failed validation and nothing was applied. Fix them and resend the whole batch.`,
          errors: outcome.errors,
        }),
        document,
        patch: { applied: 0, errors: outcome.errors },
      };
    }

    const next = applyPatch(document, outcome.operations);
    return {
      result: this.result(request, true, {
        applied: outcome.operations.length,
        documentView: this.renderDocument(next),
      }),
      document: next,
      patch: { applied: outcome.operations.length, errors: [] },
    };
  }

  private sourceValue(source: "document" | "schema", document: JsonValue): JsonValue | undefined {
    return source === "schema" ? this.schema : document;
  }

  private noSchema(request: OperationRequest, document: JsonValue): ExecutionOutcome {
    return this.fail(request, document, {
      error: 'No target schema was provided for this run, so source "schema" is unavailable. Use source "document".',
    });
  }

  private malformed(request: OperationRequest, document: JsonValue, error: ZodError): ExecutionOutcome {
    return this.fail(request, document, {
      error: `Invalid arguments for ${request.name}: ${describeArgsIssue(error)}`,
    });
  }

  private fail(request: OperationRequest, document: JsonValue, output: Record<string, unknown>): ExecutionOutcome {
    return { result: this.result(request, false, output), document };
  }

  private done(request: OperationRequest, document: JsonValue, ok: boolean, output: Record<string, unknown>): ExecutionOutcome {
    return { result: this.result(request, ok, output), document };
  }

  private result(request: OperationRequest, ok: boolean, output: Record<string, unknown>): OperationResult {
    return { requestId: request.id, name: request.name, ok, output: { ok, ...output } };
  }
}
