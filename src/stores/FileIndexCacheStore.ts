/**
 * Local-disk index cache.
 * One JSON file per content hash. Writes go to a temporary file first and
 * are renamed into place, so a reader never sees a half-written artifact.
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { IIndexCacheStore } from './IIndexCacheStore.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { messageOf } from '../errors.js';

const FILE_PREFIX = 'episode-index-';
const FILE_SUFFIX = '.json';
const HASH_PATTERN = /^[a-f0-9]{16,128}$/;

export class FileIndexCacheStore implements IIndexCacheStore {
  constructor(
    private readonly directory: string,
    private readonly logProvider: ILogProvider
  ) {}

  async load(contentHash: string): Promise<unknown | null> {
    if (!HASH_PATTERN.test(contentHash)) return null;

    let raw: string;
    try {
      raw = await readFile(this.pathFor(contentHash), 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      this.logProvider.warn('Index cache unreadable', { contentHash, error: messageOf(err) });
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err) {
      this.logProvider.warn('Discarding unreadable index cache', {
        contentHash,
        error: messageOf(err),
      });
      return null;
    }
  }

  async save(contentHash: string, snapshot: unknown): Promise<void> {
    if (!HASH_PATTERN.test(contentHash)) {
      throw new Error(`Refusing to cache index under invalid key "${contentHash}"`);
    }

    await mkdir(this.directory, { recursive: true });

    const target = this.pathFor(contentHash);
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
    await writeFile(temp, JSON.stringify(snapshot), 'utf8');
    await rename(temp, target);

    await this.pruneExcept(contentHash);
  }

  private pathFor(contentHash: string): string {
    return join(this.directory, `${FILE_PREFIX}${contentHash}${FILE_SUFFIX}`);
  }

  private async pruneExcept(contentHash: string): Promise<void> {
    const keep = `${FILE_PREFIX}${contentHash}${FILE_SUFFIX}`;
    const names = await readdir(this.directory);

    for (const name of names) {
      if (name === keep || !name.startsWith(FILE_PREFIX) || !name.endsWith(FILE_SUFFIX)) {
        continue;
      }
      try {
        await rm(join(this.directory, name), { force: true });
      } catch (err) {
        this.logProvider.warn('Failed to remove stale index cache', {
          file: name,
          error: messageOf(err),
        });
      }
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
