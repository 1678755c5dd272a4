/**
 * Production container: Supabase episode store, Voyage or OpenAI embeddings,
 * OpenAI generation, a local index cache, and either a SQLite file or Supabase
 * for the aggregate views.
 */

import Database from 'better-sqlite3';
import { createContainer, type Container, type ContainerOptions } from './container.js';
import { loadConfig, missingProductionVariables, type AppConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { ConfigError } from './errors.js';
import { SupabaseEpisodeRepository } from './repositories/SupabaseEpisodeRepository.js';
import { SupabaseStructuredViewRepository } from './repositories/SupabaseStructuredViewRepository.js';
import { SqliteStructuredViewRepository } from './repositories/SqliteStructuredViewRepository.js';
import type { IStructuredViewRepository } from './repositories/IStructuredViewRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { VoyageEmbeddingProvider } from './providers/VoyageEmbeddingProvider.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { OpenAIGenerationProvider } from './providers/OpenAIGenerationProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { FileIndexCacheStore } from './stores/FileIndexCacheStore.js';
import { loadViewManifest } from './structured/viewManifest.js';

const SERVICE_NAME = 'lifelog-qa';

let cached: Container | null = null;

export function getProductionContainer(env: Record<string, string | undefined> = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const missing = missingProductionVariables(config);
  if (!config.supabase || missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, {
      missing,
    });
  }

  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);
  const logProvider = createLogProvider(config);

  cached = createContainer(
    {
      episodeRepo: new SupabaseEpisodeRepository(db),
      viewRepo: createViewRepository(config, () => new SupabaseStructuredViewRepository(db)),
      embeddingProvider: createEmbeddingProvider(config),
      generationProvider: new OpenAIGenerationProvider({
        apiKey: config.openaiApiKey,
        model: config.generationModel,
      }),
      cacheStore: new FileIndexCacheStore(config.index.cacheDir, logProvider),
      logProvider,
    },
    optionsFromConfig(config)
  );

  return cached;
}

export function optionsFromConfig(config: AppConfig): ContainerOptions {
  return {
    index: {
      batchSize: config.index.embedBatchSize,
      incrementalLimit: config.index.incrementalLimit,
    },
    retrieval: {
      k: config.retrieval.topK,
      minSimilarity: config.retrieval.minSimilarity,
      lowConfidence: config.retrieval.lowConfidence,
    },
    structured: {
      confidence: config.structured.confidence,
      maxRows: config.structured.maxRows,
    },
    general: { confidence: config.generalConfidence },
    router: { timeoutMs: config.engineTimeoutMs },
  };
}

function createLogProvider(config: AppConfig): ILogProvider {
  const staticFields = { service: SERVICE_NAME };
  return config.axiom
    ? new AxiomLogProvider({ ...config.axiom, staticFields })
    : new ConsoleLogProvider({
        outputToConsole: true,
        retainEvents: false,
        minLevel: 'info',
        staticFields,
      });
}

function createEmbeddingProvider(config: AppConfig): IEmbeddingProvider {
  return config.embeddingProvider === 'openai'
    ? new OpenAIEmbeddingProvider({ apiKey: config.openaiApiKey })
    : new VoyageEmbeddingProvider({ apiKey: config.voyageApiKey });
}

/** A configured SQLite file wins; the manifest then whitelists its views. */
function createViewRepository(
  config: AppConfig,
  fallback: () => IStructuredViewRepository
): IStructuredViewRepository {
  if (!config.structured.dbPath) return fallback();

  const views = loadViewManifest(config.structured.viewsManifestPath);
  const db = new Database(config.structured.dbPath, { readonly: true, fileMustExist: true });
  return new SqliteStructuredViewRepository(db, views);
}
