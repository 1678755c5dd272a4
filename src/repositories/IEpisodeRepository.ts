/**
 * Episode data access interface.
 * Episodes are immutable: there is no update, only insert and delete.
 */

import type { EpisodeRow } from '../types/database.js';

export interface IEpisodeRepository {
  /** Insert unless a row with the same id exists. Returns true when inserted. */
  insertIfAbsent(row: Omit<EpisodeRow, 'created_at'>): Promise<boolean>;

  findById(id: string): Promise<EpisodeRow | null>;

  findByIds(ids: string[]): Promise<EpisodeRow[]>;

  findByProvenance(provenanceRef: string): Promise<EpisodeRow | null>;

  /** All episodes, oldest first. */
  list(): Promise<EpisodeRow[]>;

  delete(id: string): Promise<void>;

  count(): Promise<number>;
}
