/**
 * Episode ingestion.
 * Verbalizes source records into canonical episodes and stores them.
 * One malformed record never aborts a batch; re-ingesting a record is a no-op.
 */

import type { IEpisodeRepository } from '../repositories/IEpisodeRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Episode, RawRecord } from '../types/models.js';
import type { EpisodeRow } from '../types/database.js';
import type { IngestResponse, RejectedRecord } from '../types/api.js';
import { verbalize } from '../episodes/verbalize.js';
import { isSourceType } from '../episodes/verbalizers.js';
import { MalformedRecordError, messageOf } from '../errors.js';

export class EpisodeService {
  constructor(
    private readonly episodeRepo: IEpisodeRepository,
    private readonly logProvider: ILogProvider
  ) {}

  verbalize(record: RawRecord): Episode {
    return verbalize(record);
  }

  async ingest(records: RawRecord[]): Promise<IngestResponse> {
    const result: IngestResponse = {
      created: 0,
      unchanged: 0,
      superseded: 0,
      rejected: [],
      episodes: [],
    };

    for (const [index, record] of records.entries()) {
      let episode: Episode;
      try {
        episode = verbalize(record);
      } catch (err) {
        if (!(err instanceof MalformedRecordError)) throw err;

        const rejected: RejectedRecord = {
          index,
          sourceType: String(record.sourceType),
          reason: err.message,
        };
        result.rejected.push(rejected);
        this.logProvider.warn('Skipped malformed record', { ...rejected });
        continue;
      }

      const outcome = await this.store(episode, hasProvenance(record));
      result[outcome]++;
      result.episodes.push(episode);
    }

    this.logProvider.info('Ingested record batch', {
      total: records.length,
      created: result.created,
      unchanged: result.unchanged,
      superseded: result.superseded,
      rejected: result.rejected.length,
    });

    return result;
  }

  async list(): Promise<Episode[]> {
    const rows = await this.episodeRepo.list();
    return rows.flatMap((row) => {
      const episode = toEpisode(row);
      if (!episode) {
        this.logProvider.warn('Ignoring stored episode with unknown source type', {
          id: row.id,
          sourceType: row.source_type,
        });
        return [];
      }
      return [episode];
    });
  }

  async findByIds(ids: string[]): Promise<Episode[]> {
    const rows = await this.episodeRepo.findByIds(ids);
    return rows.flatMap((row) => {
      const episode = toEpisode(row);
      return episode ? [episode] : [];
    });
  }

  async count(): Promise<number> {
    return this.episodeRepo.count();
  }

  // ── Private ──

  /**
   * An episode whose importer provenance already maps to a different id
   * supersedes the old one: the old row is removed, never edited.
   */
  private async store(
    episode: Episode,
    trackProvenance: boolean
  ): Promise<'created' | 'unchanged' | 'superseded'> {
    const previous = trackProvenance
      ? await this.episodeRepo.findByProvenance(episode.provenanceRef)
      : null;

    const inserted = await this.episodeRepo.insertIfAbsent({
      id: episode.id,
      timestamp: episode.timestamp,
      text: episode.text,
      source_type: episode.sourceType,
      provenance_ref: episode.provenanceRef,
    });

    if (previous && previous.id !== episode.id) {
      try {
        await this.episodeRepo.delete(previous.id);
      } catch (err) {
        this.logProvider.error('Failed to remove superseded episode', {
          id: previous.id,
          error: messageOf(err),
        });
        throw err;
      }
      return 'superseded';
    }

    return inserted ? 'created' : 'unchanged';
  }
}

function hasProvenance(record: RawRecord): boolean {
  return typeof record.provenance === 'string' && record.provenance.trim() !== '';
}

export function toEpisode(row: EpisodeRow): Episode | null {
  if (!isSourceType(row.source_type)) return null;
  return {
    id: row.id,
    timestamp: row.timestamp,
    text: row.text,
    sourceType: row.source_type,
    provenanceRef: row.provenance_ref,
  };
}
