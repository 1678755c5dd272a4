/**
 * In-memory IIndexCacheStore. Snapshots are stored as JSON text, the way a
 * file round trip would see them.
 */

import type { IIndexCacheStore } from '../../src/stores/IIndexCacheStore.js';

export class MockIndexCacheStore implements IIndexCacheStore {
  private readonly files = new Map<string, string>();
  saves = 0;
  loads = 0;
  failSaves = false;

  async load(contentHash: string): Promise<unknown | null> {
    this.loads++;
    const raw = this.files.get(contentHash);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async save(contentHash: string, snapshot: unknown): Promise<void> {
    if (this.failSaves) throw new Error('disk full');
    this.saves++;
    this.files.clear();
    this.files.set(contentHash, JSON.stringify(snapshot));
  }

  // ── Test Helpers ──

  keys(): string[] {
    return [...this.files.keys()];
  }

  put(contentHash: string, snapshot: unknown): void {
    this.files.set(contentHash, JSON.stringify(snapshot));
  }
}
