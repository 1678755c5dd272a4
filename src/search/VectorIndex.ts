/**
 * One immutable generation of the episode similarity index.
 * Readers hold a reference to a generation; amendments produce a new one.
 * Exact k-nearest-neighbour search by cosine similarity.
 */

import { EmbeddingProviderError } from '../errors.js';
import { isSourceType } from '../episodes/verbalizers.js';
import type {
  IndexEntry,
  IndexSnapshot,
  ScoredEpisodeHit,
} from '../types/models.js';

export const INDEX_FORMAT_VERSION = 2;

export class VectorIndex {
  private readonly byId: ReadonlyMap<string, IndexEntry>;
  private readonly norms: ReadonlyMap<string, number>;

  private constructor(
    readonly contentHash: string,
    readonly embeddingModel: string,
    readonly dimensions: number,
    readonly builtAt: string,
    readonly entries: readonly IndexEntry[]
  ) {
    const byId = new Map<string, IndexEntry>();
    const norms = new Map<string, number>();
    for (const entry of entries) {
      if (entry.vector.length !== dimensions) {
        throw new EmbeddingProviderError(
          `Vector for ${entry.episodeId} has ${entry.vector.length} dimensions, expected ${dimensions}`
        );
      }
      if (byId.has(entry.episodeId)) {
        throw new Error(`Duplicate index entry for ${entry.episodeId}`);
      }
      byId.set(entry.episodeId, entry);
      norms.set(entry.episodeId, norm(entry.vector));
    }
    this.byId = byId;
    this.norms = norms;
  }

  static create(opts: {
    contentHash: string;
    embeddingModel: string;
    dimensions: number;
    entries: IndexEntry[];
    builtAt?: string;
  }): VectorIndex {
    return new VectorIndex(
      opts.contentHash,
      opts.embeddingModel,
      opts.dimensions,
      opts.builtAt ?? new Date().toISOString(),
      [...opts.entries]
    );
  }

  /**
   * Restore a persisted generation.
   * Returns null for artifacts from another format version or with a broken shape.
   */
  static fromSnapshot(snapshot: unknown): VectorIndex | null {
    if (!isSnapshot(snapshot) || snapshot.formatVersion !== INDEX_FORMAT_VERSION) {
      return null;
    }
    try {
      return VectorIndex.create(snapshot);
    } catch {
      return null;
    }
  }

  get size(): number {
    return this.entries.length;
  }

  has(episodeId: string): boolean {
    return this.byId.has(episodeId);
  }

  entry(episodeId: string): IndexEntry | undefined {
    return this.byId.get(episodeId);
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  /**
   * Top-k entries by descending cosine similarity.
   * Ties go to the most recent timestamp, then to the smaller id.
   */
  search(query: number[], k: number): ScoredEpisodeHit[] {
    if (query.length !== this.dimensions) {
      throw new EmbeddingProviderError(
        `Query vector has ${query.length} dimensions, index has ${this.dimensions}`
      );
    }
    if (k <= 0 || this.entries.length === 0) return [];

    const queryNorm = norm(query);
    const hits: ScoredEpisodeHit[] = this.entries.map((entry) => ({
      episodeId: entry.episodeId,
      similarity: cosine(query, queryNorm, entry.vector, this.norms.get(entry.episodeId) ?? 0),
      timestamp: entry.metadata.timestamp,
      sourceType: entry.metadata.sourceType,
    }));

    return hits.sort(compareHits).slice(0, k);
  }

  /** New generation with `entry` added, or replacing the entry with the same id. */
  withEntry(entry: IndexEntry, contentHash: string): VectorIndex {
    const entries = this.entries.filter((e) => e.episodeId !== entry.episodeId);
    entries.push(entry);
    return new VectorIndex(
      contentHash,
      this.embeddingModel,
      this.dimensions,
      new Date().toISOString(),
      entries
    );
  }

  withoutEntry(episodeId: string, contentHash: string): VectorIndex {
    return new VectorIndex(
      contentHash,
      this.embeddingModel,
      this.dimensions,
      new Date().toISOString(),
      this.entries.filter((e) => e.episodeId !== episodeId)
    );
  }

  toSnapshot(): IndexSnapshot {
    return {
      formatVersion: INDEX_FORMAT_VERSION,
      contentHash: this.contentHash,
      embeddingModel: this.embeddingModel,
      dimensions: this.dimensions,
      builtAt: this.builtAt,
      entries: [...this.entries],
    };
  }
}

function compareHits(a: ScoredEpisodeHit, b: ScoredEpisodeHit): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  const byTime = Date.parse(b.timestamp) - Date.parse(a.timestamp);
  if (byTime !== 0) return byTime;
  return a.episodeId < b.episodeId ? -1 : a.episodeId > b.episodeId ? 1 : 0;
}

function norm(vector: number[]): number {
  let sum = 0;
  for (const v of vector) sum += v * v;
  return Math.sqrt(sum);
}

function cosine(a: number[], aNorm: number, b: number[], bNorm: number): number {
  if (aNorm === 0 || bNorm === 0) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  return dot / (aNorm * bNorm);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSnapshot(value: unknown): value is IndexSnapshot {
  return (
    isObject(value) &&
    typeof value.formatVersion === 'number' &&
    typeof value.contentHash === 'string' &&
    typeof value.embeddingModel === 'string' &&
    typeof value.dimensions === 'number' &&
    typeof value.builtAt === 'string' &&
    Array.isArray(value.entries) &&
    value.entries.every(isEntry)
  );
}

function isEntry(value: unknown): value is IndexEntry {
  if (!isObject(value) || !isObject(value.metadata)) return false;
  const { metadata } = value;
  return (
    typeof value.episodeId === 'string' &&
    Array.isArray(value.vector) &&
    value.vector.every((v) => typeof v === 'number' && Number.isFinite(v)) &&
    typeof metadata.timestamp === 'string' &&
    typeof metadata.sourceType === 'string' &&
    isSourceType(metadata.sourceType)
  );
}
