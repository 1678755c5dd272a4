/**
 * SQLite implementation of IStructuredViewRepository.
 * The connection is switched to query-only, and statements that are not
 * readers are refused before they run.
 */

import type Database from 'better-sqlite3';
import type { IStructuredViewRepository } from './IStructuredViewRepository.js';
import type { StructuredView, ViewRow } from '../types/models.js';

export class SqliteStructuredViewRepository implements IStructuredViewRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly views: StructuredView[]
  ) {
    this.db.pragma('query_only = ON');
  }

  async listViews(): Promise<StructuredView[]> {
    return this.views.map((v) => ({ ...v, columns: [...v.columns] }));
  }

  async execute(query: string): Promise<ViewRow[]> {
    const stmt = this.db.prepare<unknown[], ViewRow>(query);
    if (!stmt.reader) {
      throw new Error('Refusing to run a statement that returns no rows');
    }
    return stmt.all();
  }
}
