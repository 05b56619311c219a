// =============================================================================
// Chunk — a span of the input text processed in one controller pass
// =============================================================================

export type ChunkStrategy = "semantic" | "recursive";

export interface Chunk {
  readonly index: number;
  readonly text: string;
  /** Span `[start, end)` in the input text. */
  readonly start: number;
  readonly end: number;
  /** Leading characters shared with the previous chunk. */
  readonly overlap: number;
  readonly strategy: ChunkStrategy;
}

export function createChunk(source: string, index: number, start: number, end: number, overlap: number, strategy: ChunkStrategy): Chunk {
  return Object.freeze({ index, text: source.slice(start, end), start, end, overlap, strategy });
}
