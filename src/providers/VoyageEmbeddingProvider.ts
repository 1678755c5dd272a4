/**
 * Voyage AI embedding provider.
 * Calls the Voyage embeddings endpoint over fetch; voyage-3-lite (512 dimensions) by default.
 */

import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import { EmbeddingProviderError, messageOf } from '../errors.js';

const API_URL = 'https://api.voyageai.com/v1/embeddings';
const DEFAULT_MODEL = 'voyage-3-lite';
const DEFAULT_DIMENSIONS = 512;

type VoyageInputType = 'query' | 'document';

interface VoyageEmbeddingData {
  object: string;
  embedding: number[];
  index: number;
}

interface VoyageEmbeddingResponse {
  object: string;
  data: VoyageEmbeddingData[];
  model: string;
  usage: { total_tokens: number };
}

export class VoyageEmbeddingProvider implements IEmbeddingProvider {
  private apiKey: string;
  readonly model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
  }) {
    this.apiKey = opts?.apiKey ?? process.env.VOYAGE_API_KEY ?? '';
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  /** Single texts are questions and are embedded as queries. */
  async generate(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embed([text], 'query', signal);
    return embedding;
  }

  generateBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return this.embed(texts, 'document', signal);
  }

  private async embed(
    texts: string[],
    inputType: VoyageInputType,
    signal?: AbortSignal
  ): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.callApi(texts, inputType, signal);

    if (response.data.length !== texts.length) {
      throw new EmbeddingProviderError(
        `Voyage returned ${response.data.length} embeddings for ${texts.length} inputs`
      );
    }

    return response.data
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }

  private async callApi(
    input: string[],
    inputType: VoyageInputType,
    signal?: AbortSignal
  ): Promise<VoyageEmbeddingResponse> {
    const body: Record<string, unknown> = {
      input,
      model: this.model,
      input_type: inputType,
    };

    if (this.dimensions !== DEFAULT_DIMENSIONS) {
      body.output_dimension = this.dimensions;
    }

    let res: Response;
    try {
      res = await fetch(API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw new EmbeddingProviderError(`Voyage API unreachable: ${messageOf(err)}`, err);
    }

    if (!res.ok) {
      const err: unknown = await res.json().catch(() => null);
      const detail =
        typeof err === 'object' && err !== null && 'detail' in err
          ? String(err.detail)
          : 'Unknown error';
      throw new EmbeddingProviderError(`Voyage API error (${res.status}): ${detail}`);
    }

    return (await res.json()) as VoyageEmbeddingResponse;
  }
}
