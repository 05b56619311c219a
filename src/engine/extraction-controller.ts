// =============================================================================
// ExtractionController — chunk / iteration loop around the decision-maker
//
// ChunkPending → ChunkActive → ChunkDone, repeated until AllChunksDone. The
// controller owns the document and the live Guidance; everything else is a
// pure function of them.
// =============================================================================

import { randomUUID } from "node:crypto";
import {
  ChunkingFailureError,
  ConfigurationError,
  DecisionMakerTimeoutError,
  FatalRunError,
  InvariantViolationError,
} from "../errors.js";
import type { Chunk } from "../domain/chunk.js";
import { EMPTY_GUIDANCE, type Guidance } from "../domain/guidance.schema.js";
import { cloneJson, type JsonValue } from "../domain/json.js";
import { consoleLogger, createRunLogger, describeError, type Logger, type RunLogger } from "../logging/logger.js";
import { SemanticChunker, type BreakpointThreshold } from "../chunking/semantic-chunker.js";
import type { EmbeddingPort } from "../ports/embedding.port.js";
import type {
  DecisionMakerPort,
  HistoryEntry,
  HistoryRound,
  Proposal,
  TurnContext,
  UsageCounters,
} from "../ports/decision-maker.port.js";
import type { SchemaValidatorFactory } from "../ports/schema-validator.port.js";
import { PatchValidator } from "../patch/patch-validator.js";
import { buildBaseDocument } from "../patch/schema-locations.js";
import { renderCompact } from "../view/compact-renderer.js";
import { OperationExecutor } from "./operation-executor.js";

export interface TextChunker {
  chunk(text: string, log?: RunLogger): Promise<Chunk[]>;
}

export interface ExtractionControllerOptions {
  decisionMaker: DecisionMakerPort;
  /** Target JSON Schema; enables schema validation and the schema source. */
  schema?: JsonValue;
  /** Starting document; defaults to the schema's base document, or {}. */
  initialDocument?: JsonValue;
  /** Replaces the default {@link SemanticChunker}. */
  chunker?: TextChunker;
  embeddings?: EmbeddingPort;
  semanticChunking?: boolean;
  breakpointThresholdType?: BreakpointThreshold;
  breakpointThresholdAmount?: number;
  minChunkSize?: number;
  chunkSize?: number;
  chunkOverlap?: number;
  schemaValidatorFactory?: SchemaValidatorFactory;
  shrinkageRatio?: number;
  shrinkageMinSize?: number;
  /** Iterations before a chunk is forced done (default: 50). */
  maxIterationsPerChunk?: number;
  /** Per-call decision-maker timeout (default: 120000). */
  decisionTimeoutMs?: number;
  /** History rounds kept on the first context-trimming retry (default: 2). */
  keepLastRounds?: number;
  /** Context-trimming retries per iteration (default: 2). */
  maxContextRetries?: number;
  /** Reprocessing attempts for a chunk that hit the iteration cap (default: 0). */
  maxChunkRetries?: number;
  documentViewLimit?: number;
  schemaViewLimit?: number;
  readValueLimit?: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Correlates log entries; generated when omitted. */
  runId?: string;
}

export interface UsageTotals extends UsageCounters {
  calls: number;
}

export interface RunMetadata {
  runId: string;
  chunkCount: number;
  chunksProcessed: number;
  iterationCount: number;
  forcedChunks: number;
  rejectedBatches: number;
  appliedBatches: number;
  usage: UsageTotals;
}

export interface ExtractionResult {
  status: "completed" | "cancelled";
  document: JsonValue;
  guidance: Guidance;
  metadata: RunMetadata;
}

/** Mutable state of one run; `document` is always the last valid one. */
interface RunState {
  readonly runId: string;
  readonly log: RunLogger;
  readonly signal?: AbortSignal;
  readonly metadata: RunMetadata;
  document: JsonValue;
  guidance: Guidance;
  chunkIndex: number;
}

type PassOutcome =
  | { status: "finalized"; guidance: Guidance; iterations: number; skippedRequests: number }
  | { status: "forced"; reason: "iteration cap" | "decision-maker unavailable"; iterations: number; lastError?: unknown }
  | { status: "cancelled" };

type ProposeOutcome =
  | { status: "proposed"; proposal: Proposal; history: HistoryRound[]; trimmedRounds: number }
  | { status: "exhausted"; lastError?: unknown }
  | { status: "cancelled" };

function requireInteger(value: number, min: number, field: string): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`must be an integer >= ${min}, received ${value}`, field);
  }
  return value;
}

function lastRounds(history: HistoryRound[], keep: number): HistoryRound[] {
  return keep <= 0 ? [] : history.slice(-keep);
}

export class ExtractionController {
  private readonly decisionMaker: DecisionMakerPort;
  private readonly schema: JsonValue | undefined;
  private readonly initialDocument: JsonValue | undefined;
  private readonly chunker: TextChunker;
  private readonly executor: OperationExecutor;
  private readonly schemaView: string | undefined;
  private readonly maxIterationsPerChunk: number;
  private readonly decisionTimeoutMs: number;
  private readonly keepLastRounds: number;
  private readonly maxContextRetries: number;
  private readonly maxChunkRetries: number;
  private readonly logger: Logger;

  constructor(options: ExtractionControllerOptions) {
    this.decisionMaker = options.decisionMaker;
    this.schema = options.schema;
    this.initialDocument = options.initialDocument;
    this.maxIterationsPerChunk = requireInteger(options.maxIterationsPerChunk ?? 50, 1, "maxIterationsPerChunk");
    this.decisionTimeoutMs = requireInteger(options.decisionTimeoutMs ?? 120_000, 1, "decisionTimeoutMs");
    this.keepLastRounds = requireInteger(options.keepLastRounds ?? 2, 0, "keepLastRounds");
    this.maxContextRetries = requireInteger(options.maxContextRetries ?? 2, 0, "maxContextRetries");
    this.maxChunkRetries = requireInteger(options.maxChunkRetries ?? 0, 0, "maxChunkRetries");
    this.logger = options.logger ?? consoleLogger;

    this.chunker =
      options.chunker ??
      new SemanticChunker({
        embeddings: options.embeddings,
        semantic: options.semanticChunking,
        thresholdType: options.breakpointThresholdType,
        thresholdAmount: options.breakpointThresholdAmount,
        minChunkSize: options.minChunkSize,
        chunkSize: options.chunkSize,
        chunkOverlap: options.chunkOverlap,
      });

    const validator = new PatchValidator({
      schema: options.schema,
      schemaValidatorFactory: options.schemaValidatorFactory,
      shrinkageRatio: options.shrinkageRatio,
      shrinkageMinSize: options.shrinkageMinSize,
    });
    this.executor = new OperationExecutor({
      validator,
      schema: options.schema,
      documentViewLimit: options.documentViewLimit,
      readValueLimit: options.readValueLimit,
    });
    this.schemaView =
      options.schema === undefined ? undefined : renderCompact(options.schema, options.schemaViewLimit ?? 6000);
  }

  /**
   * Builds the document for `text`. Resolves with status "cancelled" and the
   * last valid document when `signal` aborts; rejects with
   * {@link FatalRunError} when the run cannot continue.
   */
  async run(text: string, options: RunOptions = {}): Promise<ExtractionResult> {
    const runId = options.runId ?? randomUUID();
    const state: RunState = {
      runId,
      log: createRunLogger(this.logger, runId),
      signal: options.signal,
      metadata: {
        runId,
        chunkCount: 0,
        chunksProcessed: 0,
        iterationCount: 0,
        forcedChunks: 0,
        rejectedBatches: 0,
        appliedBatches: 0,
        usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0, calls: 0 },
      },
      document: this.startingDocument(),
      guidance: EMPTY_GUIDANCE,
      chunkIndex: 0,
    };

    try {
      return await this.execute(text, state);
    } catch (err) {
      if (err instanceof InvariantViolationError || err instanceof ChunkingFailureError) {
        state.log.emit("error", "run:complete", { status: "failed", error: describeError(err) }, state.chunkIndex);
        throw new FatalRunError(err, state.document, state.chunkIndex);
      }
      throw err;
    }
  }

  private startingDocument(): JsonValue {
    if (this.initialDocument !== undefined) return cloneJson(this.initialDocument);
    if (this.schema !== undefined) return buildBaseDocument(this.schema);
    return {};
  }

  private async execute(text: string, state: RunState): Promise<ExtractionResult> {
    state.log.emit("info", "run:start", { textLength: text.length, hasSchema: this.schema !== undefined });

    const chunks = await this.chunker.chunk(text, state.log);
    state.metadata.chunkCount = chunks.length;

    for (const chunk of chunks) {
      state.chunkIndex = chunk.index;
      if (state.signal?.aborted) return this.cancelled(state);

      state.log.emit(
        "info",
        "chunk:start",
        { length: chunk.text.length, strategy: chunk.strategy, of: chunks.length },
        chunk.index,
      );

      let outcome = await this.runChunkPass(state, chunk, chunks.length);
      for (let attempt = 1; outcome.status === "forced" && outcome.reason === "iteration cap" && attempt <= this.maxChunkRetries; attempt++) {
        state.log.emit(
          "warn",
          "chunk:forced",
          { reason: outcome.reason, iterations: outcome.iterations, retrying: true, attempt, maxAttempts: this.maxChunkRetries },
          chunk.index,
        );
        outcome = await this.runChunkPass(state, chunk, chunks.length, { attempt, maxAttempts: this.maxChunkRetries });
      }

      if (outcome.status === "cancelled") return this.cancelled(state);
      if (outcome.status === "forced") {
        state.metadata.forcedChunks++;
        state.log.emit(
          "warn",
          "chunk:forced",
          {
            reason: outcome.reason,
            iterations: outcome.iterations,
            retrying: false,
            ...(outcome.lastError === undefined ? {} : { lastError: describeError(outcome.lastError) }),
          },
          chunk.index,
        );
      } else {
        state.guidance = outcome.guidance;
      }

      state.metadata.chunksProcessed++;
      state.log.emit(
        "info",
        "chunk:done",
        outcome.status === "finalized"
          ? { finalized: true, iterations: outcome.iterations, skippedRequests: outcome.skippedRequests }
          : { finalized: false, iterations: outcome.iterations },
        chunk.index,
      );
    }

    state.log.emit("info", "run:complete", { status: "completed", ...state.metadata });
    return { status: "completed", document: state.document, guidance: state.guidance, metadata: state.metadata };
  }

  private cancelled(state: RunState): ExtractionResult {
    state.log.emit("warn", "run:cancelled", { chunksProcessed: state.metadata.chunksProcessed }, state.chunkIndex);
    return { status: "cancelled", document: state.document, guidance: state.guidance, metadata: state.metadata };
  }

  /** One pass over a chunk with a fresh history. The document carries over between passes. */
  private async runChunkPass(
    state: RunState,
    chunk: Chunk,
    chunkCount: number,
    retryAttempt?: TurnContext["retryAttempt"],
  ): Promise<PassOutcome> {
    let history: HistoryRound[] = [];
    let trimmedRounds = 0;

    for (let iteration = 1; iteration <= this.maxIterationsPerChunk; iteration++) {
      if (state.signal?.aborted) return { status: "cancelled" };

      const base: TurnContext = {
        runId: state.runId,
        chunk,
        chunkCount,
        iteration,
        maxIterations: this.maxIterationsPerChunk,
        documentView: this.executor.renderDocument(state.document),
        schemaView: this.schemaView,
        guidance: state.guidance,
        history,
        trimmedRounds,
        retryAttempt,
      };
      const proposed = await this.proposeWithRetries(state, base);
      if (proposed.status === "cancelled") return proposed;
      if (proposed.status === "exhausted") {
        return { status: "forced", reason: "decision-maker unavailable", iterations: iteration - 1, lastError: proposed.lastError };
      }
      history = proposed.history;
      trimmedRounds = proposed.trimmedRounds;
      state.metadata.iterationCount++;

      const entries: HistoryEntry[] = [];
      const { requests } = proposed.proposal;
      for (const [position, request] of requests.entries()) {
        const outcome = this.executor.execute(request, state.document);
        state.document = outcome.document;
        entries.push({ request, result: outcome.result });

        if (outcome.patch) {
          if (outcome.patch.errors.length > 0) {
            state.metadata.rejectedBatches++;
            state.log.emit(
              "warn",
              "patch:rejected",
              {
                iteration,
                requestId: request.id,
                errorCount: outcome.patch.errors.length,
                kinds: [...new Set(outcome.patch.errors.map((e) => e.kind))],
                firstReason: outcome.patch.errors[0].reason,
              },
              chunk.index,
            );
          } else {
            state.metadata.appliedBatches++;
          }
        }

        if (outcome.guidance) {
          return {
            status: "finalized",
            guidance: outcome.guidance,
            iterations: iteration,
            skippedRequests: requests.length - position - 1,
          };
        }
      }
      history = [...history, { iteration, entries }];
    }

    return { status: "forced", reason: "iteration cap", iterations: this.maxIterationsPerChunk };
  }

  /**
   * Calls the decision-maker; on an empty proposal, a timeout or a failure the
   * same iteration is retried with the oldest history rounds dropped.
   */
  private async proposeWithRetries(state: RunState, base: TurnContext): Promise<ProposeOutcome> {
    let lastError: unknown;
    for (let retry = 0; retry <= this.maxContextRetries; retry++) {
      const history = retry === 0 ? base.history : lastRounds(base.history, this.keepLastRounds - (retry - 1));
      const trimmedRounds = base.trimmedRounds + (base.history.length - history.length);
      const turn: TurnContext = { ...base, history, trimmedRounds };

      let reason: string;
      try {
        const proposal = await this.callDecisionMaker(turn, state);
        this.recordUsage(state, proposal);
        if (proposal.requests.length > 0) return { status: "proposed", proposal, history, trimmedRounds };
        reason = "empty proposal";
      } catch (err) {
        if (state.signal?.aborted) return { status: "cancelled" };
        lastError = err;
        reason = err instanceof DecisionMakerTimeoutError ? "timeout" : "decision-maker failure";
      }

      if (retry < this.maxContextRetries) {
        state.log.emit(
          "warn",
          "iteration:retry",
          {
            iteration: base.iteration,
            attempt: retry + 1,
            maxAttempts: this.maxContextRetries,
            reason,
            keepRounds: Math.max(0, this.keepLastRounds - retry),
            ...(lastError === undefined ? {} : { error: describeError(lastError) }),
          },
          base.chunk.index,
        );
      }
    }
    return { status: "exhausted", lastError };
  }

  private recordUsage(state: RunState, proposal: Proposal): void {
    const usage = state.metadata.usage;
    if (!proposal.usage) return;
    usage.inputTokens += proposal.usage.inputTokens;
    usage.outputTokens += proposal.usage.outputTokens;
    usage.totalTokens += proposal.usage.totalTokens;
  }

  /** One call, bounded by the timeout and the run's abort signal. */
  private async callDecisionMaker(turn: TurnContext, state: RunState): Promise<Proposal> {
    state.metadata.usage.calls++;
    const controller = new AbortController();
    const { signal } = state;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const guard = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = new DecisionMakerTimeoutError(this.decisionTimeoutMs);
        controller.abort(error);
        reject(error);
      }, this.decisionTimeoutMs);
      if (signal) {
        onAbort = () => {
          controller.abort(signal.reason);
          reject(signal.reason instanceof Error ? signal.reason : new Error("Run cancelled"));
        };
        if (signal.aborted) onAbort();
        else signal.addEventListener("abort", onAbort, { once: true });
      }
    });

    try {
      return await Promise.race([this.decisionMaker.propose(turn, { signal: controller.signal }), guard]);
    } finally {
      clearTimeout(timer);
      if (signal && onAbort) signal.removeEventListener("abort", onAbort);
    }
  }
}
