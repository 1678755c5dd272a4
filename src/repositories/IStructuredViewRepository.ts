/**
 * Read-only access to the aggregate views published by the aggregation job.
 * View schemas are a fixed contract; this core never writes to the store.
 */

import type { StructuredView, ViewRow } from '../types/models.js';

export interface IStructuredViewRepository {
  /** Schemas of every view a generated query may read. */
  listViews(): Promise<StructuredView[]>;

  /** Run one already-validated SELECT. */
  execute(query: string): Promise<ViewRow[]>;
}
