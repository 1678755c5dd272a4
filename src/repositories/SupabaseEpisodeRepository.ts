/**
 * Supabase implementation of IEpisodeRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEpisodeRepository } from './IEpisodeRepository.js';
import type { EpisodeRow } from '../types/database.js';

const PAGE_SIZE = 1000;

export class SupabaseEpisodeRepository implements IEpisodeRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insertIfAbsent(row: Omit<EpisodeRow, 'created_at'>): Promise<boolean> {
    const { data, error } = await this.db
      .from('episodes')
      .upsert(
        {
          id: row.id,
          timestamp: row.timestamp,
          text: row.text,
          source_type: row.source_type,
          provenance_ref: row.provenance_ref,
        },
        { onConflict: 'id', ignoreDuplicates: true }
      )
      .select('id');

    if (error) throw new Error(`Failed to insert episode: ${error.message}`);
    return (data ?? []).length > 0;
  }

  async findById(id: string): Promise<EpisodeRow | null> {
    const { data, error } = await this.db
      .from('episodes')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find episode: ${error.message}`);
    return data as EpisodeRow | null;
  }

  async findByIds(ids: string[]): Promise<EpisodeRow[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db
      .from('episodes')
      .select('*')
      .in('id', ids);

    if (error) throw new Error(`Failed to find episodes: ${error.message}`);
    return (data ?? []) as EpisodeRow[];
  }

  async findByProvenance(provenanceRef: string): Promise<EpisodeRow | null> {
    const { data, error } = await this.db
      .from('episodes')
      .select('*')
      .eq('provenance_ref', provenanceRef)
      .order('created_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error)
      throw new Error(`Failed to find episode by provenance: ${error.message}`);
    return data as EpisodeRow | null;
  }

  /**
   * Pages through the whole table; PostgREST caps a single response.
   */
  async list(): Promise<EpisodeRow[]> {
    const rows: EpisodeRow[] = [];

    for (let offset = 0; ; offset += PAGE_SIZE) {
      const { data, error } = await this.db
        .from('episodes')
        .select('*')
        .order('timestamp', { ascending: true })
        .order('id', { ascending: true })
        .range(offset, offset + PAGE_SIZE - 1);

      if (error) throw new Error(`Failed to list episodes: ${error.message}`);

      const page = (data ?? []) as EpisodeRow[];
      rows.push(...page);
      if (page.length < PAGE_SIZE) return rows;
    }
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.db.from('episodes').delete().eq('id', id);

    if (error) throw new Error(`Failed to delete episode: ${error.message}`);
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from('episodes')
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count episodes: ${error.message}`);
    return count ?? 0;
  }
}
