// =============================================================================
// docweave — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Domain
// ─────────────────────────────────────────────────────────────────────────────

export type { JsonPrimitive, JsonArray, JsonObject, JsonValue, JsonType } from "./domain/json.js";
export { isJsonValue, cloneJson, deepEqual, canonicalize } from "./domain/json.js";
export type { Chunk, ChunkStrategy } from "./domain/chunk.js";
export {
  GuidanceSchema,
  EMPTY_GUIDANCE,
  createGuidance,
  isEmptyGuidance,
  type Guidance,
  type GuidanceInput,
} from "./domain/guidance.schema.js";
export {
  PatchOperationSchema,
  type PatchOperation,
  type AddOperation,
  type ReplaceOperation,
  type RemoveOperation,
  type MoveOperation,
  type CopyOperation,
  type TestOperation,
} from "./domain/patch.schema.js";
export {
  OperationNameSchema,
  OPERATION_DESCRIPTORS,
  type OperationName,
  type OperationRequest,
} from "./domain/operation.schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  DocweaveError,
  PointerNotFoundError,
  InvalidPointerError,
  DecisionMakerTimeoutError,
  DecisionMakerUnavailableError,
  ChunkingFailureError,
  PatchTestFailedError,
  InvariantViolationError,
  FatalRunError,
  ConfigurationError,
} from "./errors.js";

// ─────────────────────────────────────────────────────────────────────────────
// Document engine
// ─────────────────────────────────────────────────────────────────────────────

export {
  parsePointer,
  formatPointer,
  encodeToken,
  appendToken,
  decodeToken,
  resolve,
  tryResolve,
  add,
  set,
  replace,
  remove,
  type ResolveResult,
} from "./pointer/json-pointer.js";
export { view, DEFAULT_VIEW_BUDGET, type ViewBudget, type ViewResult } from "./view/truncator.js";
export { CompactRenderer, renderCompact, type CompactRenderOptions } from "./view/compact-renderer.js";
export { readValue, type ReadLimits, type ReadResult } from "./view/read-value.js";
export { inspect, type InspectOptions, type InspectResult } from "./inspect/inspector.js";
export { search, fuzzyScore, type SearchOptions, type SearchResult, type SearchMatch } from "./search/searcher.js";
export { applyOperation, applyPatch } from "./patch/patch-applicator.js";
export {
  PatchValidator,
  validatePatch,
  type PatchError,
  type PatchValidatorOptions,
  type RejectionKind,
  type ValidationOutcome,
} from "./patch/patch-validator.js";
export { buildBaseDocument } from "./patch/schema-locations.js";

// ─────────────────────────────────────────────────────────────────────────────
// Chunking
// ─────────────────────────────────────────────────────────────────────────────

export { TextSplitter, splitText, type TextSplitterOptions } from "./chunking/text-splitter.js";
export { SemanticChunker, type SemanticChunkerOptions, type BreakpointThreshold } from "./chunking/semantic-chunker.js";

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export { OperationExecutor, type OperationExecutorOptions, type ExecutionOutcome } from "./engine/operation-executor.js";
export {
  ExtractionController,
  type ExtractionControllerOptions,
  type ExtractionResult,
  type RunMetadata,
  type RunOptions,
  type TextChunker,
  type UsageTotals,
} from "./engine/extraction-controller.js";
export { buildSystemPrompt, buildUserMessage, buildTurnPrompt, type TurnPrompt } from "./prompts/turn-prompt.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports & adapters
// ─────────────────────────────────────────────────────────────────────────────

export type {
  DecisionMakerPort,
  TurnContext,
  Proposal,
  UsageCounters,
  HistoryRound,
  HistoryEntry,
  OperationResult,
} from "./ports/decision-maker.port.js";
export type { EmbeddingPort } from "./ports/embedding.port.js";
export type { SchemaValidatorPort, SchemaValidatorFactory, SchemaIssue } from "./ports/schema-validator.port.js";
export { AiSdkDecisionMaker, type AiSdkDecisionMakerOptions } from "./adapters/decision-maker/ai-sdk-decision-maker.adapter.js";
export { AiSdkEmbeddingAdapter, type AiSdkEmbeddingOptions } from "./adapters/embedding/ai-sdk-embedding.adapter.js";
export { InMemoryEmbeddingAdapter, letterFrequencyEmbedding } from "./adapters/embedding/inmemory.adapter.js";
export { AjvSchemaValidator, createAjvSchemaValidator } from "./adapters/validation/ajv-schema-validator.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Logging & configuration
// ─────────────────────────────────────────────────────────────────────────────

export {
  consoleLogger,
  silentLogger,
  createMemoryLogger,
  type Logger,
  type LogEntry,
  type LogEvent,
  type LogLevel,
} from "./logging/logger.js";
export { loadSettings, SettingsSchema, type Settings, type SettingsInput, type LoadSettingsOptions } from "./config/settings.js";

// ─────────────────────────────────────────────────────────────────────────────
// Testing
// ─────────────────────────────────────────────────────────────────────────────

export { ScriptedDecisionMaker, type ScriptedStep, type ScriptedProposal } from "./testing/scripted-decision-maker.js";
