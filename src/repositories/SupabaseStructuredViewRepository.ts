/**
 * Supabase implementation of IStructuredViewRepository.
 * Schemas come from the `view_catalog` table; queries run through the
 * `run_view_query` database function, which executes them read-only.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IStructuredViewRepository } from './IStructuredViewRepository.js';
import { parseViewCatalog } from '../structured/viewManifest.js';
import type { StructuredView, ViewRow } from '../types/models.js';

export class SupabaseStructuredViewRepository implements IStructuredViewRepository {
  constructor(private readonly db: SupabaseClient) {}

  async listViews(): Promise<StructuredView[]> {
    const { data, error } = await this.db
      .from('view_catalog')
      .select('view_name, description, columns')
      .order('view_name', { ascending: true });

    if (error) throw new Error(`Failed to list views: ${error.message}`);

    return parseViewCatalog(data ?? []);
  }

  async execute(query: string): Promise<ViewRow[]> {
    const { data, error } = await this.db.rpc('run_view_query', { query });

    if (error) throw new Error(`View query failed: ${error.message}`);
    if (!Array.isArray(data)) return [];
    return data.filter(isRow);
  }
}

function isRow(value: unknown): value is ViewRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
