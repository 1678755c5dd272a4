/**
 * Embedding provider interface.
 * Wraps external embedding services (Voyage, OpenAI, etc).
 * Remote and untrusted: calls may fail, hang or return the wrong shape.
 */

export interface IEmbeddingProvider {
  /** Identifies the vector space; cached indexes are only reused for the same model. */
  readonly model: string;

  readonly dimensions: number;

  generate(text: string, signal?: AbortSignal): Promise<number[]>;

  /** Embeddings in the same order as the input. */
  generateBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}
