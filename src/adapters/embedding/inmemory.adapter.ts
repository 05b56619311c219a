// =============================================================================
// InMemoryEmbeddingAdapter — Deterministic embeddings for tests
// =============================================================================

import type { EmbeddingPort } from "../../ports/embedding.port.js";

/**
 * Bag-of-letters vector: one dimension per letter a–z, counts normalised to
 * unit length. Texts sharing vocabulary land close together.
 */
export function letterFrequencyEmbedding(text: string): number[] {
  const vec = new Array<number>(26).fill(0);
  for (const ch of text.toLowerCase()) {
    const code = ch.charCodeAt(0) - 97;
    if (code >= 0 && code < 26) vec[code] += 1;
  }
  const norm = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vec : vec.map((v) => v / norm);
}

export class InMemoryEmbeddingAdapter implements EmbeddingPort {
  /** Texts received, in call order. */
  readonly calls: string[][] = [];
  private readonly embedFn: (text: string) => number[];

  constructor(options?: { embedFn?: (text: string) => number[] }) {
    this.embedFn = options?.embedFn ?? letterFrequencyEmbedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.embedFn(text));
  }
}
