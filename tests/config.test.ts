import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, missingProductionVariables } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      embeddingProvider: 'voyage',
      voyageApiKey: undefined,
      openaiApiKey: undefined,
      generationModel: 'gpt-4o-mini',
      retrieval: { topK: 10, minSimilarity: 0.3, lowConfidence: 0.2 },
      structured: {
        confidence: 0.9,
        maxRows: 20,
        dbPath: undefined,
        viewsManifestPath: 'config/views.json',
      },
      generalConfidence: 0.3,
      engineTimeoutMs: 15_000,
      index: { cacheDir: join(tmpdir(), 'lifelog-qa', 'episode-index'), embedBatchSize: 64, incrementalLimit: 32 },
    });
  });

  it('reads overrides and trims whitespace', () => {
    const config = loadConfig({
      EMBEDDING_PROVIDER: ' openai ',
      OPENAI_API_KEY: 'test-key',
      RETRIEVAL_TOP_K: '5',
      RETRIEVAL_MIN_SIMILARITY: '-0.5',
      STRUCTURED_DB_PATH: '/data/lifelog.db',
      INDEX_INCREMENTAL_LIMIT: '0',
    });

    expect(config.embeddingProvider).toBe('openai');
    expect(config.openaiApiKey).toBe('test-key');
    expect(config.retrieval.topK).toBe(5);
    expect(config.retrieval.minSimilarity).toBe(-0.5);
    expect(config.structured.dbPath).toBe('/data/lifelog.db');
    expect(config.index.incrementalLimit).toBe(0);
  });

  it('only sets supabase and axiom when both of their variables are present', () => {
    expect(loadConfig({ SUPABASE_URL: 'http://localhost:54321' }).supabase).toBeUndefined();

    const config = loadConfig({
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
      AXIOM_API_KEY: 'test-token',
      AXIOM_DATASET: 'lifelog',
    });
    expect(config.supabase).toEqual({ url: 'http://localhost:54321', serviceRoleKey: 'test-secret' });
    expect(config.axiom).toEqual({ apiToken: 'test-token', dataset: 'lifelog' });
  });

  it('rejects an unknown embedding provider', () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: 'cohere' })).toThrow(
      'EMBEDDING_PROVIDER must be "voyage" or "openai"'
    );
  });

  it('rejects out-of-range and non-numeric values', () => {
    expect(() => loadConfig({ RETRIEVAL_TOP_K: '51' })).toThrow(
      'RETRIEVAL_TOP_K must be a number between 1 and 50, got "51"'
    );
    expect(() => loadConfig({ GENERAL_CONFIDENCE: 'high' })).toThrow(ConfigError);
  });

  it('rejects fractional integers', () => {
    expect(() => loadConfig({ STRUCTURED_MAX_ROWS: '2.5' })).toThrow(
      expect.objectContaining({
        code: 'CONFIGURATION_ERROR',
        details: { variable: 'STRUCTURED_MAX_ROWS' },
      })
    );
  });
});

describe('missingProductionVariables', () => {
  it('lists every missing production variable', () => {
    expect(missingProductionVariables(loadConfig({}))).toEqual([
      'SUPABASE_URL',
      'SUPABASE_SERVICE_ROLE_KEY',
      'VOYAGE_API_KEY',
      'OPENAI_API_KEY',
    ]);
  });

  it('does not ask for a Voyage key when embeddings use OpenAI', () => {
    const config = loadConfig({
      EMBEDDING_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-key',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });
    expect(missingProductionVariables(config)).toEqual([]);
  });
});
