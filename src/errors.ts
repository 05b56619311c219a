/**
 * Structured error hierarchy for docweave.
 *
 * All docweave errors extend {@link DocweaveError} to enable type-safe catch blocks:
 *
 * ```ts
 * try {
 *   await controller.run(text);
 * } catch (e) {
 *   if (e instanceof FatalRunError) { ... }
 * }
 * ```
 *
 * Patch rejections are not errors: the validator returns them as values so the
 * decision-maker can read them and retry.
 *
 * @module errors
 */

import type { JsonValue } from "./domain/json.js";

/** Base error for all docweave errors. Includes an error code for programmatic matching. */
export class DocweaveError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "DocweaveError";
    this.code = code;
  }
}

/** A pointer that is well formed but does not resolve in the target value. */
export class PointerNotFoundError extends DocweaveError {
  readonly pointer: string;
  constructor(pointer: string, message: string) {
    super("POINTER_NOT_FOUND", message);
    this.name = "PointerNotFoundError";
    this.pointer = pointer;
  }
}

/** A pointer that is syntactically invalid or illegal for the requested operation. */
export class InvalidPointerError extends DocweaveError {
  readonly pointer: string;
  constructor(pointer: string, message: string) {
    super("INVALID_POINTER", message);
    this.name = "InvalidPointerError";
    this.pointer = pointer;
  }
}

export class DecisionMakerTimeoutError extends DocweaveError {
  readonly timeoutMs: number;
  constructor(timeoutMs: number) {
    super("DECISION_MAKER_TIMEOUT", `Decision-maker did not answer within ${timeoutMs}ms`);
    this.name = "DecisionMakerTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class DecisionMakerUnavailableError extends DocweaveError {
  readonly cause?: Error;
  constructor(message: string, cause?: Error) {
    super("DECISION_MAKER_UNAVAILABLE", message);
    this.name = "DecisionMakerUnavailableError";
    this.cause = cause;
  }
}

/** Thrown when even the fixed-size fallback splitter cannot chunk the input. */
export class ChunkingFailureError extends DocweaveError {
  readonly cause?: Error;
  constructor(message: string, cause?: Error) {
    super("CHUNKING_FAILURE", message);
    this.name = "ChunkingFailureError";
    this.cause = cause;
  }
}

/** An RFC 6902 "test" operation found a different value. */
export class PatchTestFailedError extends DocweaveError {
  readonly pointer: string;
  constructor(pointer: string, message: string) {
    super("PATCH_TEST_FAILED", message);
    this.name = "PatchTestFailedError";
    this.pointer = pointer;
  }
}

/** The applicator failed on a batch the validator accepted. Always a defect. */
export class InvariantViolationError extends DocweaveError {
  readonly cause?: Error;
  constructor(message: string, cause?: Error) {
    super("INVARIANT_VIOLATION", message);
    this.name = "InvariantViolationError";
    this.cause = cause;
  }
}

/** Aborts a run. Carries the last document that passed validation. */
export class FatalRunError extends DocweaveError {
  readonly lastDocument: JsonValue;
  readonly chunkIndex: number;
  readonly cause: DocweaveError;
  constructor(cause: DocweaveError, lastDocument: JsonValue, chunkIndex: number) {
    super("FATAL_RUN_ERROR", `Run aborted at chunk ${chunkIndex}: ${cause.message}`);
    this.name = "FatalRunError";
    this.cause = cause;
    this.lastDocument = lastDocument;
    this.chunkIndex = chunkIndex;
  }
}

/** Thrown when settings validation fails. */
export class ConfigurationError extends DocweaveError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIGURATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigurationError";
    this.field = field;
  }
}
