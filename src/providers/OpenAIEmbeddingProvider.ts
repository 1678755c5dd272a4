/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small (1536 dimensions).
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import { EmbeddingProviderError, messageOf } from '../errors.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  readonly model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.generateBatch([text], signal);
    return embedding;
  }

  async generateBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts,
          dimensions: this.dimensions,
        },
        { signal }
      );
    } catch (err) {
      throw new EmbeddingProviderError(`OpenAI embedding request failed: ${messageOf(err)}`, err);
    }

    if (response.data.length !== texts.length) {
      throw new EmbeddingProviderError(
        `OpenAI returned ${response.data.length} embeddings for ${texts.length} inputs`
      );
    }

    // OpenAI returns embeddings in the same order as input
    return response.data
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }
}
