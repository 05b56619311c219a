// =============================================================================
// EmbeddingPort — sentence-window vectors for the semantic chunker
// =============================================================================

/**
 * The chunker embeds every sentence window in one call and cuts where
 * consecutive vectors drift apart.
 */
export interface EmbeddingPort {
  /** One vector per text, in input order. */
  embedBatch(texts: string[]): Promise<number[][]>;
}
