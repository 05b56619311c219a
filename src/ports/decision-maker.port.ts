// =============================================================================
// DecisionMakerPort — Contract for whatever proposes the next operations
// =============================================================================

import type { Chunk } from "../domain/chunk.js";
import type { Guidance } from "../domain/guidance.schema.js";
import type { OperationRequest } from "../domain/operation.schema.js";

export interface UsageCounters {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/** Outcome of one executed request, as handed back to the decision-maker. */
export interface OperationResult {
  requestId: string;
  name: string;
  ok: boolean;
  output: Readonly<Record<string, unknown>>;
}

export interface HistoryEntry {
  request: OperationRequest;
  result: OperationResult;
}

/** Every request of one iteration together with its result. */
export interface HistoryRound {
  iteration: number;
  entries: HistoryEntry[];
}

export interface TurnContext {
  runId: string;
  chunk: Chunk;
  chunkCount: number;
  /** 1-based iteration within the chunk. */
  iteration: number;
  maxIterations: number;
  /** Truncated rendering of the current document. */
  documentView: string;
  /** Truncated rendering of the target schema, when there is one. */
  schemaView?: string;
  guidance: Guidance;
  history: HistoryRound[];
  /** Rounds dropped from `history` to free context space. */
  trimmedRounds: number;
  /** Set when the chunk is being reprocessed after hitting the iteration cap. */
  retryAttempt?: { attempt: number; maxAttempts: number };
}

export interface Proposal {
  requests: OperationRequest[];
  usage?: UsageCounters;
}

export interface DecisionMakerPort {
  /**
   * Proposes the requests for the next iteration. An empty list means the
   * decision-maker had nothing to do and makes the controller retry.
   */
  propose(turn: TurnContext, options: { signal: AbortSignal }): Promise<Proposal>;
}
