// =============================================================================
// SemanticChunker — embedding-driven breakpoints with a recursive fallback
// =============================================================================

import { cosineSimilarity } from "ai";
import { ChunkingFailureError, DocweaveError } from "../errors.js";
import { createChunk, type Chunk, type ChunkStrategy } from "../domain/chunk.js";
import type { EmbeddingPort } from "../ports/embedding.port.js";
import { describeError, type RunLogger } from "../logging/logger.js";
import { TextSplitter } from "./text-splitter.js";

export type BreakpointThreshold = "percentile" | "standard_deviation" | "interquartile";

export interface SemanticChunkerOptions {
  embeddings?: EmbeddingPort;
  /** Set to false to always use the recursive splitter. */
  semantic?: boolean;
  thresholdType?: BreakpointThreshold;
  /** Percentile (0–100), or multiplier for the deviation-based thresholds. */
  thresholdAmount?: number;
  /** Neighbouring sentences embedded with each sentence (default: 1). */
  bufferSize?: number;
  /** Texts shorter than this stay whole; smaller groups are merged (default: 500). */
  minChunkSize?: number;
  chunkSize?: number;
  chunkOverlap?: number;
}

const DEFAULT_THRESHOLD_AMOUNT: Record<BreakpointThreshold, number> = {
  percentile: 95,
  standard_deviation: 3,
  interquartile: 1.5,
};

interface Span {
  start: number;
  end: number;
}

/** Sentence spans, contiguous: trailing whitespace stays with its sentence. */
export function splitSentences(text: string): Span[] {
  const spans: Span[] = [];
  let start = 0;
  for (const match of text.matchAll(/[.?!]\s+/g)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end < text.length) {
      spans.push({ start, end });
      start = end;
    }
  }
  if (start < text.length) spans.push({ start, end: text.length });
  return spans;
}

function quantile(sorted: ReadonlyArray<number>, q: number): number {
  if (sorted.length === 0) return 0;
  const rank = q * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

export function breakpointThreshold(distances: ReadonlyArray<number>, type: BreakpointThreshold, amount: number): number {
  const sorted = [...distances].sort((a, b) => a - b);
  const mean = distances.reduce((sum, d) => sum + d, 0) / Math.max(1, distances.length);
  switch (type) {
    case "percentile":
      return quantile(sorted, amount / 100);
    case "standard_deviation": {
      const variance = distances.reduce((sum, d) => sum + (d - mean) ** 2, 0) / Math.max(1, distances.length);
      return mean + amount * Math.sqrt(variance);
    }
    case "interquartile":
      return mean + amount * (quantile(sorted, 0.75) - quantile(sorted, 0.25));
  }
}

/** Merges each group shorter than `minSize` into the one before it. */
export function mergeSmallGroups(groups: ReadonlyArray<Span>, minSize: number): Span[] {
  const result: Span[] = [];
  let buffer: Span | undefined;
  for (const group of groups) {
    if (!buffer) {
      buffer = { ...group };
    } else if (buffer.end - buffer.start < minSize) {
      buffer.end = group.end;
    } else {
      result.push(buffer);
      buffer = { ...group };
    }
  }
  if (buffer) {
    const last = result[result.length - 1];
    if (last !== undefined && buffer.end - buffer.start < minSize) last.end = buffer.end;
    else result.push(buffer);
  }
  return result;
}

export class SemanticChunker {
  private readonly embeddings?: EmbeddingPort;
  private readonly semantic: boolean;
  private readonly thresholdType: BreakpointThreshold;
  private readonly thresholdAmount: number;
  private readonly bufferSize: number;
  private readonly minChunkSize: number;
  private readonly splitter: TextSplitter;

  constructor(options: SemanticChunkerOptions = {}) {
    this.embeddings = options.embeddings;
    this.semantic = options.semantic ?? true;
    this.thresholdType = options.thresholdType ?? "percentile";
    this.thresholdAmount = options.thresholdAmount ?? DEFAULT_THRESHOLD_AMOUNT[this.thresholdType];
    this.bufferSize = Math.max(0, options.bufferSize ?? 1);
    this.minChunkSize = options.minChunkSize ?? 500;
    this.splitter = new TextSplitter({ chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap });
  }

  async chunk(text: string, log?: RunLogger): Promise<Chunk[]> {
    if (text.trim() === "") return [];
    const preferred: ChunkStrategy = this.semantic && this.embeddings ? "semantic" : "recursive";
    if (text.length < this.minChunkSize) return [createChunk(text, 0, 0, text.length, 0, preferred)];

    const embeddings = this.embeddings;
    if (!embeddings || !this.semantic) {
      return this.fallback(text, log, this.semantic ? "no embedding provider configured" : "semantic chunking disabled");
    }

    const sentences = splitSentences(text);
    if (sentences.length < 2) return this.fallback(text, log, "text has a single sentence");

    let distances: number[];
    try {
      const windows = sentences.map((_, i) => {
        const first = sentences[Math.max(0, i - this.bufferSize)];
        const last = sentences[Math.min(sentences.length - 1, i + this.bufferSize)];
        return text.slice(first.start, last.end).trim();
      });
      const vectors = await embeddings.embedBatch(windows);
      if (vectors.length !== windows.length) {
        throw new Error(`expected ${windows.length} embeddings, received ${vectors.length}`);
      }
      distances = vectors.slice(1).map((vector, i) => 1 - cosineSimilarity(vectors[i], vector));
    } catch (err) {
      return this.fallback(text, log, "embedding failed", err);
    }

    const threshold = breakpointThreshold(distances, this.thresholdType, this.thresholdAmount);

    const groups: Span[] = [];
    let start = 0;
    distances.forEach((distance, i) => {
      if (distance > threshold) {
        const cut = sentences[i + 1].start;
        groups.push({ start, end: cut });
        start = cut;
      }
    });
    groups.push({ start, end: text.length });

    return mergeSmallGroups(groups, this.minChunkSize).map((span, index) =>
      createChunk(text, index, span.start, span.end, 0, "semantic"),
    );
  }

  private fallback(text: string, log: RunLogger | undefined, reason: string, error?: unknown): Chunk[] {
    log?.emit("warn", "chunking:fallback", error === undefined ? { reason } : { reason, error: describeError(error) });
    try {
      return this.splitter.split(text);
    } catch (err) {
      if (err instanceof DocweaveError) throw new ChunkingFailureError(`Fallback splitting failed: ${err.message}`, err);
      throw err;
    }
  }
}
