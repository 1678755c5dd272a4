/**
 * Request and response payload shapes.
 * Decoupled from domain models so the API can evolve independently.
 */

import type { Episode, EngineName, RawRecord } from './models.js';

// ── Requests ──

export interface QueryRequest {
  question: string;
  /** Number of episodes to retrieve for semantic answers. */
  k?: number;
  /** Run only this engine. */
  engine?: EngineName;
}

export interface RelatedRequest {
  episodeId: string;
  k?: number;
}

export interface RelatedEpisode {
  episode: Episode;
  similarity: number;
}

export interface RelatedResponse {
  episodeId: string;
  related: RelatedEpisode[];
}

export interface IngestRequest {
  records: RawRecord[];
}

// ── Responses ──

export interface RejectedRecord {
  index: number;
  sourceType: string;
  reason: string;
}

export interface IngestResponse {
  created: number;
  unchanged: number;
  superseded: number;
  rejected: RejectedRecord[];
  episodes: Episode[];
}

export interface IndexStatus {
  ready: boolean;
  contentHash: string | null;
  size: number;
  dimensions: number | null;
  building: boolean;
  lastError: string | null;
}

export interface StatusResponse {
  index: IndexStatus;
  engines: EngineName[];
  views: string[];
  episodes: number;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
