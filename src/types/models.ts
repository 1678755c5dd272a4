/**
 * Domain models as the services see them.
 * Decoupled from both API shapes and database row shapes.
 */

import type { EngineErrorKind } from '../errors.js';

// ── Ingestion ──

/** A source record as delivered by an importer. Untyped until verbalized. */
export interface RawRecord {
  sourceType: string;
  /** ISO-8601 date or date-time. */
  timestamp: string;
  fields: Record<string, unknown>;
  /** Importer-side reference (file path, post URI, ...). */
  provenance?: string;
}

export type SourceType =
  | 'place_visit'
  | 'purchase'
  | 'photo'
  | 'post'
  | 'workout'
  | 'music';

// ── Episodes ──

export interface Episode {
  /** Content-derived, stable across runs. */
  id: string;
  /** Normalized ISO-8601 timestamp with an explicit offset. */
  timestamp: string;
  text: string;
  sourceType: SourceType;
  provenanceRef: string;
}

// ── Index ──

export interface IndexEntryMetadata {
  timestamp: string;
  sourceType: SourceType;
}

export interface IndexEntry {
  episodeId: string;
  vector: number[];
  metadata: IndexEntryMetadata;
}

export interface IndexSnapshot {
  formatVersion: number;
  contentHash: string;
  embeddingModel: string;
  dimensions: number;
  builtAt: string;
  entries: IndexEntry[];
}

export interface ScoredEpisodeHit {
  episodeId: string;
  similarity: number;
  timestamp: string;
  sourceType: SourceType;
}

// ── Structured views ──

export interface ViewColumn {
  name: string;
  type: string;
}

export interface StructuredView {
  name: string;
  description?: string;
  columns: ViewColumn[];
}

export type ViewRow = Record<string, unknown>;

// ── Answers ──

export type EngineName = 'structured' | 'retrieval' | 'general_knowledge';

export type SourceRef =
  | {
      kind: 'episode';
      episodeId: string;
      timestamp: string;
      sourceType: SourceType;
      similarity: number;
    }
  | {
      kind: 'view';
      view: string;
      rowCount: number;
      query: string;
    };

/** What a single engine hands back to the router. */
export interface EngineAnswer {
  answer: string;
  confidence: number;
  sources: SourceRef[];
  generatedQuery?: string;
  /** Set when the engine had to fall back to a lower-quality answer path. */
  degraded?: boolean;
}

export type RouterState =
  | 'classify'
  | 'try_structured'
  | 'try_retrieval'
  | 'try_general'
  | 'done'
  | 'failed';

export interface RouterTransition {
  from: RouterState;
  to: RouterState;
  engine?: EngineName;
  outcome: 'success' | 'error' | 'skipped';
  errorKind?: EngineErrorKind;
  message?: string;
  durationMs: number;
}

export interface QueryResult {
  question: string;
  engineUsed: EngineName | 'none';
  answer: string;
  confidence: number;
  sources: SourceRef[];
  generatedQuery?: string;
  status: 'done' | 'failed';
  degraded: boolean;
  trace: RouterTransition[];
}
