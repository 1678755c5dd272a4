/**
 * Durable storage for index snapshots, keyed by episode-set content hash.
 */

export interface IIndexCacheStore {
  /**
   * Raw artifact for `contentHash`, or null on a miss.
   * Validation of the artifact is the caller's job.
   */
  load(contentHash: string): Promise<unknown | null>;

  /** Persist a snapshot and drop artifacts of other hashes. */
  save(contentHash: string, snapshot: unknown): Promise<void>;
}
