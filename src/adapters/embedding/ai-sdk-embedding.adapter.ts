// =============================================================================
// AiSdkEmbeddingAdapter — EmbeddingPort over the AI SDK's embedMany
// =============================================================================

import { embedMany, type EmbeddingModel } from "ai";
import type { EmbeddingPort } from "../../ports/embedding.port.js";

export interface AiSdkEmbeddingOptions {
  model: EmbeddingModel<string>;
  maxRetries?: number;
}

export class AiSdkEmbeddingAdapter implements EmbeddingPort {
  private readonly model: EmbeddingModel<string>;
  private readonly maxRetries: number;

  constructor(options: AiSdkEmbeddingOptions) {
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 2;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const { embeddings } = await embedMany({ model: this.model, values: texts, maxRetries: this.maxRetries });
    return embeddings;
  }
}
