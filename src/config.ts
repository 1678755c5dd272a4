/**
 * Runtime configuration read from environment variables.
 * Every numeric knob is parsed and range-checked up front.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from './errors.js';

export type EmbeddingProviderName = 'voyage' | 'openai';

export interface AppConfig {
  embeddingProvider: EmbeddingProviderName;
  voyageApiKey?: string;
  openaiApiKey?: string;
  generationModel: string;

  retrieval: {
    topK: number;
    minSimilarity: number;
    lowConfidence: number;
  };
  structured: {
    confidence: number;
    maxRows: number;
    dbPath?: string;
    viewsManifestPath: string;
  };
  generalConfidence: number;
  engineTimeoutMs: number;

  index: {
    cacheDir: string;
    embedBatchSize: number;
    incrementalLimit: number;
  };

  supabase?: { url: string; serviceRoleKey: string };
  axiom?: { apiToken: string; dataset: string };
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const embeddingProvider = env.EMBEDDING_PROVIDER?.trim() || 'voyage';
  if (embeddingProvider !== 'voyage' && embeddingProvider !== 'openai') {
    throw new ConfigError('EMBEDDING_PROVIDER must be "voyage" or "openai"', {
      variable: 'EMBEDDING_PROVIDER',
    });
  }

  const supabaseUrl = text(env, 'SUPABASE_URL');
  const supabaseKey = text(env, 'SUPABASE_SERVICE_ROLE_KEY');
  const axiomToken = text(env, 'AXIOM_API_KEY');
  const axiomDataset = text(env, 'AXIOM_DATASET');

  return {
    embeddingProvider,
    voyageApiKey: text(env, 'VOYAGE_API_KEY'),
    openaiApiKey: text(env, 'OPENAI_API_KEY'),
    generationModel: text(env, 'GENERATION_MODEL') ?? 'gpt-4o-mini',

    retrieval: {
      topK: integer(env, 'RETRIEVAL_TOP_K', 10, 1, 50),
      minSimilarity: number(env, 'RETRIEVAL_MIN_SIMILARITY', 0.3, -1, 1),
      lowConfidence: number(env, 'RETRIEVAL_LOW_CONFIDENCE', 0.2, 0, 1),
    },
    structured: {
      confidence: number(env, 'STRUCTURED_CONFIDENCE', 0.9, 0, 1),
      maxRows: integer(env, 'STRUCTURED_MAX_ROWS', 20, 1, 1000),
      dbPath: text(env, 'STRUCTURED_DB_PATH'),
      viewsManifestPath: text(env, 'VIEWS_MANIFEST_PATH') ?? 'config/views.json',
    },
    generalConfidence: number(env, 'GENERAL_CONFIDENCE', 0.3, 0, 1),
    engineTimeoutMs: integer(env, 'ENGINE_TIMEOUT_MS', 15_000, 1, 600_000),

    index: {
      cacheDir: text(env, 'INDEX_CACHE_DIR') ?? join(tmpdir(), 'lifelog-qa', 'episode-index'),
      embedBatchSize: integer(env, 'INDEX_EMBED_BATCH_SIZE', 64, 1, 1000),
      incrementalLimit: integer(env, 'INDEX_INCREMENTAL_LIMIT', 32, 0, 100_000),
    },

    ...(supabaseUrl && supabaseKey
      ? { supabase: { url: supabaseUrl, serviceRoleKey: supabaseKey } }
      : {}),
    ...(axiomToken && axiomDataset
      ? { axiom: { apiToken: axiomToken, dataset: axiomDataset } }
      : {}),
  };
}

/** Names of variables the production container cannot run without. */
export function missingProductionVariables(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.supabase) missing.push('SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY');
  if (config.embeddingProvider === 'voyage' && !config.voyageApiKey) {
    missing.push('VOYAGE_API_KEY');
  }
  // Generation always goes through OpenAI.
  if (!config.openaiApiKey) missing.push('OPENAI_API_KEY');
  return missing;
}

function text(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function number(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = text(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be a number between ${min} and ${max}, got "${raw}"`, {
      variable: name,
    });
  }
  return value;
}

function integer(env: Env, name: string, fallback: number, min: number, max: number): number {
  const value = number(env, name, fallback, min, max);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be a whole number, got "${value}"`, { variable: name });
  }
  return value;
}
