/**
 * Embedding & index builder.
 * Owns the single live index generation. Builds run one at a time behind a
 * promise-chain lock and are swapped in only after they fully succeed, so
 * readers always see one complete generation. Snapshots are cached under the
 * content hash of the episode set and reused across restarts.
 */

import { createHash } from 'node:crypto';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IIndexCacheStore } from '../stores/IIndexCacheStore.js';
import type { Episode, IndexEntry } from '../types/models.js';
import type { IndexStatus } from '../types/api.js';
import type { EpisodeService } from './EpisodeService.js';
import { VectorIndex } from '../search/VectorIndex.js';
import { EmbeddingProviderError, messageOf } from '../errors.js';

const DEFAULT_BATCH_SIZE = 64;
const DEFAULT_INCREMENTAL_LIMIT = 32;
const DEFAULT_BATCH_TIMEOUT_MS = 60_000;

export interface IndexServiceOptions {
  /** Episodes per embedding request. Default: 64. */
  batchSize?: number;
  /** Largest number of new episodes folded into the live index without a full build. Default: 32. */
  incrementalLimit?: number;
  /** Per-request timeout for embedding calls made while building. Default: 60s. */
  batchTimeoutMs?: number;
}

interface IncrementalPlan {
  added: Episode[];
  removedIds: string[];
}

export function contentHashOf(episodes: Array<Pick<Episode, 'id'>>): string {
  return hashIds(episodes.map((e) => e.id));
}

function hashIds(ids: string[]): string {
  const sorted = [...new Set(ids)].sort();
  return createHash('sha256').update(sorted.join('\n')).digest('hex');
}

export class IndexService {
  private live: VectorIndex | null = null;
  private inflight: { contentHash: string; promise: Promise<VectorIndex> } | null = null;
  private lock: Promise<void> = Promise.resolve();
  private lastError: string | null = null;

  private readonly batchSize: number;
  private readonly incrementalLimit: number;
  private readonly batchTimeoutMs: number;

  constructor(
    private readonly episodeService: EpisodeService,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly cacheStore: IIndexCacheStore,
    private readonly logProvider: ILogProvider,
    options: IndexServiceOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.incrementalLimit = options.incrementalLimit ?? DEFAULT_INCREMENTAL_LIMIT;
    this.batchTimeoutMs = options.batchTimeoutMs ?? DEFAULT_BATCH_TIMEOUT_MS;
  }

  /** The live generation, or null before the first successful build. */
  current(): VectorIndex | null {
    return this.live;
  }

  status(): IndexStatus {
    return {
      ready: this.live !== null,
      contentHash: this.live?.contentHash ?? null,
      size: this.live?.size ?? 0,
      dimensions: this.live?.dimensions ?? null,
      building: this.inflight !== null,
      lastError: this.lastError,
    };
  }

  /**
   * Live generation matching the stored episode set.
   * A hash mismatch triggers a rebuild; while another caller's rebuild is in
   * flight the current generation is served as-is.
   */
  async ensureFresh(): Promise<VectorIndex> {
    const episodes = await this.episodeService.list();
    const contentHash = contentHashOf(episodes);

    const live = this.live;
    if (live && live.contentHash === contentHash) return live;
    if (live && this.inflight) return live;

    return this.build(episodes);
  }

  /**
   * Build (or reuse from cache) the generation for exactly `episodes`.
   * Concurrent calls for the same episode set share one build.
   */
  build(episodes: Episode[]): Promise<VectorIndex> {
    const contentHash = contentHashOf(episodes);
    if (this.inflight?.contentHash === contentHash) {
      return this.inflight.promise;
    }

    const promise = this.serialized(() => this.rebuild(episodes, contentHash));
    this.inflight = { contentHash, promise };

    const clear = () => {
      if (this.inflight?.promise === promise) this.inflight = null;
    };
    void promise.then(clear, clear);

    return promise;
  }

  /** Fold one episode into the live generation, replacing any entry with the same id. */
  addOrUpdate(episode: Episode): Promise<VectorIndex> {
    return this.serialized(async () => {
      const live = this.live;
      if (!live) {
        const episodes = await this.episodeService.list();
        return this.rebuild(episodes, contentHashOf(episodes));
      }

      const [vector] = await this.embed([episode.text]);
      const next = live.withEntry(
        toEntry(episode, vector),
        hashIds([...live.ids(), episode.id])
      );

      await this.persist(next);
      this.swap(next);
      this.logProvider.info('Index amended', { episodeId: episode.id, size: next.size });
      return next;
    });
  }

  remove(episodeId: string): Promise<VectorIndex | null> {
    return this.serialized(async () => {
      const live = this.live;
      if (!live || !live.has(episodeId)) return live;

      const next = live.withoutEntry(
        episodeId,
        hashIds(live.ids().filter((id) => id !== episodeId))
      );
      await this.persist(next);
      this.swap(next);
      return next;
    });
  }

  // ── Private ──

  private serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Runs under the lock. */
  private async rebuild(episodes: Episode[], contentHash: string): Promise<VectorIndex> {
    if (this.live?.contentHash === contentHash) return this.live;

    const cached = await this.loadCached(episodes, contentHash);
    if (cached) {
      this.swap(cached);
      this.logProvider.info('Index loaded from cache', { contentHash, size: cached.size });
      return cached;
    }

    const started = performance.now();
    let next: VectorIndex;
    let mode: 'full' | 'incremental';
    try {
      const plan = this.planIncremental(episodes);
      if (plan && this.live) {
        mode = 'incremental';
        next = await this.amend(this.live, plan, contentHash);
      } else {
        mode = 'full';
        next = await this.embedAll(episodes, contentHash);
      }

      if (next.size !== episodes.length) {
        throw new EmbeddingProviderError(
          `Index has ${next.size} entries for ${episodes.length} episodes`
        );
      }
    } catch (err) {
      const wrapped =
        err instanceof EmbeddingProviderError
          ? err
          : new EmbeddingProviderError(`Index build failed: ${messageOf(err)}`, err);
      this.lastError = wrapped.message;
      this.logProvider.error('Index build failed; previous generation stays live', {
        contentHash,
        episodes: episodes.length,
        error: wrapped.message,
      });
      throw wrapped;
    }

    await this.persist(next);
    this.swap(next);
    this.logProvider.info('Index built', {
      mode,
      contentHash,
      size: next.size,
      durationMs: Math.round(performance.now() - started),
    });
    return next;
  }

  /**
   * Incremental when the live generation shares the embedding model and only
   * a few episodes were added (any number may have been removed).
   */
  private planIncremental(episodes: Episode[]): IncrementalPlan | null {
    const live = this.live;
    if (!live || live.embeddingModel !== this.embeddingProvider.model) return null;

    const wanted = new Set(episodes.map((e) => e.id));
    const added = episodes.filter((e) => !live.has(e.id));
    const removedIds = live.ids().filter((id) => !wanted.has(id));

    if (added.length > this.incrementalLimit) return null;
    return { added, removedIds };
  }

  private async amend(
    live: VectorIndex,
    plan: IncrementalPlan,
    contentHash: string
  ): Promise<VectorIndex> {
    const removed = new Set(plan.removedIds);
    const kept = live.entries.filter((e) => !removed.has(e.episodeId));
    const vectors = await this.embed(plan.added.map((e) => e.text));

    return VectorIndex.create({
      contentHash,
      embeddingModel: live.embeddingModel,
      dimensions: live.dimensions,
      entries: [...kept, ...plan.added.map((e, i) => toEntry(e, vectors[i]))],
    });
  }

  private async embedAll(episodes: Episode[], contentHash: string): Promise<VectorIndex> {
    const entries: IndexEntry[] = [];

    for (let i = 0; i < episodes.length; i += this.batchSize) {
      const batch = episodes.slice(i, i + this.batchSize);
      const vectors = await this.embed(batch.map((e) => e.text));
      batch.forEach((episode, j) => entries.push(toEntry(episode, vectors[j])));
    }

    return VectorIndex.create({
      contentHash,
      embeddingModel: this.embeddingProvider.model,
      dimensions: entries[0]?.vector.length ?? this.embeddingProvider.dimensions,
      entries,
    });
  }

  private async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let vectors: number[][];
    try {
      vectors = await this.embeddingProvider.generateBatch(
        texts,
        AbortSignal.timeout(this.batchTimeoutMs)
      );
    } catch (err) {
      if (err instanceof EmbeddingProviderError) throw err;
      throw new EmbeddingProviderError(`Embedding request failed: ${messageOf(err)}`, err);
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingProviderError(
        `Embedding provider returned ${vectors.length} vectors for ${texts.length} texts`
      );
    }
    return vectors;
  }

  private async loadCached(
    episodes: Episode[],
    contentHash: string
  ): Promise<VectorIndex | null> {
    let raw: unknown;
    try {
      raw = await this.cacheStore.load(contentHash);
    } catch (err) {
      this.logProvider.warn('Index cache unavailable', { contentHash, error: messageOf(err) });
      return null;
    }
    if (raw === null) return null;

    const index = VectorIndex.fromSnapshot(raw);
    const valid =
      index !== null &&
      index.contentHash === contentHash &&
      index.embeddingModel === this.embeddingProvider.model &&
      index.size === episodes.length &&
      episodes.every((e) => index.has(e.id));

    if (!valid) {
      this.logProvider.warn('Discarding stale or incompatible index cache', { contentHash });
      return null;
    }
    return index;
  }

  /** Cache write failures are logged, not thrown. */
  private async persist(index: VectorIndex): Promise<void> {
    try {
      await this.cacheStore.save(index.contentHash, index.toSnapshot());
    } catch (err) {
      this.logProvider.warn('Failed to persist index cache', {
        contentHash: index.contentHash,
        error: messageOf(err),
      });
    }
  }

  private swap(next: VectorIndex): void {
    this.live = next;
    this.lastError = null;
  }
}

function toEntry(episode: Episode, vector: number[]): IndexEntry {
  return {
    episodeId: episode.id,
    vector,
    metadata: { timestamp: episode.timestamp, sourceType: episode.sourceType },
  };
}
