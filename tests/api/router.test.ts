import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { createContainer, type Container } from '../../src/container.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { FAILED_ANSWER } from '../../src/services/QueryRouter.js';
import { MockEpisodeRepository } from '../mocks/MockEpisodeRepository.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockGenerationProvider } from '../mocks/MockGenerationProvider.js';
import { MockIndexCacheStore } from '../mocks/MockIndexCacheStore.js';
import { MockStructuredViewRepository } from '../mocks/MockStructuredViewRepository.js';
import type { GenerationPrompt } from '../../src/providers/IGenerationProvider.js';
import type { StructuredView } from '../../src/types/models.js';

const VIEWS: StructuredView[] = [
  {
    name: 'books',
    columns: [
      { name: 'date', type: 'TEXT' },
      { name: 'title', type: 'TEXT' },
    ],
  },
];

const BOOK_COUNT =
  "SELECT COUNT(*) AS count FROM books WHERE date BETWEEN '2019-04-01' AND '2019-04-30'";

const TOKYO_LINE = /^\[(ep_[a-f0-9]{24})\] On (\d{4}-\d{2}-\d{2}), I visited Tokyo/gm;

/** SQL for book questions, NONE for other structured prompts, cited answers otherwise. */
function respond(prompt: GenerationPrompt): string {
  if (prompt.system.includes('SQLite')) {
    return prompt.user.includes('books') && prompt.user.includes('Question: How many books')
      ? BOOK_COUNT
      : 'NONE';
  }
  const visits = [...prompt.user.matchAll(TOKYO_LINE)].map((m) => ({ id: m[1], date: m[2] }));
  visits.sort((a, b) => b.date.localeCompare(a.date));
  const latest = visits[0];
  if (!latest) return 'UNKNOWN';
  return `You last visited Tokyo on ${latest.date}.\nSOURCES: ${latest.id}`;
}

describe('API router', () => {
  let log: ConsoleLogProvider;
  let embedder: MockEmbeddingProvider;
  let views: MockStructuredViewRepository;
  let container: Container;
  let handle: ReturnType<typeof createRouter>['handle'];

  function post(path: string, body: unknown, headers: Record<string, string> = {}): Request {
    return new Request(`http://localhost${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    log = new ConsoleLogProvider();
    embedder = new MockEmbeddingProvider();
    views = new MockStructuredViewRepository(VIEWS, () => [{ count: 7 }]);
    container = createContainer(
      {
        episodeRepo: new MockEpisodeRepository(),
        viewRepo: views,
        embeddingProvider: embedder,
        generationProvider: new MockGenerationProvider(respond),
        cacheStore: new MockIndexCacheStore(),
        logProvider: log,
      },
      { retrieval: { minSimilarity: 0.05 } }
    );
    handle = createRouter(container).handle;

    await container.episodeService.ingest([
      { sourceType: 'place_visit', timestamp: '2019-03-28', fields: { place: 'Tokyo' } },
      { sourceType: 'place_visit', timestamp: '2019-04-02', fields: { place: 'Tokyo' } },
    ]);
  });

  // ── Query ──

  it('answers aggregate questions from the views', async () => {
    const res = await handle(
      post('/api/v1/query', { question: 'How many books did I buy in April 2019?' })
    );

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({
      engineUsed: 'structured',
      answer: 'There are 7 matching records in "books".',
      generatedQuery: BOOK_COUNT,
      status: 'done',
    });
    expect(views.executed).toEqual([BOOK_COUNT]);
  });

  it('answers descriptive questions from retrieval', async () => {
    const [, april] = await container.episodeService.list();

    const res = await handle(post('/api/v1/query', { question: 'When did I last visit Tokyo?' }));
    const body = await res.json();

    expect(body.engineUsed).toBe('retrieval');
    expect(body.answer).toBe('You last visited Tokyo on 2019-04-02.');
    expect(body.sources).toEqual([
      expect.objectContaining({ kind: 'episode', episodeId: april.id }),
    ]);
  });

  it('keeps answering aggregates while the embedding provider is down', async () => {
    embedder.failing = true;

    const structured = await handle(
      post('/api/v1/query', { question: 'How many books did I buy in April 2019?' })
    );
    expect((await structured.json()).engineUsed).toBe('structured');

    const descriptive = await handle(
      post('/api/v1/query', { question: 'When did I last visit Tokyo?' })
    );
    expect(descriptive.status).toBe(200);
    const body = await descriptive.json();
    expect(body).toMatchObject({
      engineUsed: 'none',
      answer: FAILED_ANSWER,
      status: 'failed',
      sources: [],
    });
    expect(body.trace.map((t: { errorKind?: string }) => t.errorKind)).toEqual([
      undefined,
      'embedding_provider',
      'query_generation',
    ]);
  });

  it('rejects a missing question', async () => {
    const res = await handle(post('/api/v1/query', { k: 3 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'question is required',
        details: { fields: ['question is required'] },
      },
    });
  });

  it('rejects a fractional k', async () => {
    const res = await handle(post('/api/v1/query', { question: 'Where?', k: 1.5 }));

    expect(res.status).toBe(400);
    expect((await res.json()).error.message).toBe('k must be a whole number');
  });

  it('runs only the engine named in the request', async () => {
    const res = await handle(
      post('/api/v1/query', { question: 'When did I last visit Tokyo?', engine: 'structured' })
    );

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ engineUsed: 'none', status: 'failed' });
    expect(body.trace.map((t: { to: string }) => t.to)).toEqual(['try_structured', 'failed']);
  });

  it('rejects an unknown engine name', async () => {
    const res = await handle(post('/api/v1/query', { question: 'Where?', engine: 'sql' }));

    expect(res.status).toBe(400);
    expect((await res.json()).error.message).toBe(
      'engine must be one of: structured, retrieval, general_knowledge'
    );
  });

  // ── Episodes ──

  it('ingests records and reports rejects', async () => {
    const res = await handle(
      post('/api/v1/episodes', {
        records: [
          { sourceType: 'place_visit', timestamp: '2019-05-01', fields: { place: 'Kyoto' } },
          { sourceType: 'place_visit', timestamp: '2019-05-02', fields: {} },
        ],
      })
    );

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body.created).toBe(1);
    expect(body.rejected).toHaveLength(1);
    expect(body.rejected[0]).toMatchObject({ index: 1, sourceType: 'place_visit' });
  });

  it('returns 200 when nothing new was stored', async () => {
    const records = [{ sourceType: 'place_visit', timestamp: '2019-03-28', fields: { place: 'Tokyo' } }];

    const res = await handle(post('/api/v1/episodes', { records }));

    expect(res.status).toBe(200);
    expect((await res.json()).unchanged).toBe(1);
  });

  it('rejects malformed envelopes', async () => {
    const res = await handle(post('/api/v1/episodes', { records: [{ sourceType: 3, fields: [] }] }));

    expect(res.status).toBe(400);
    expect((await res.json()).error.message).toBe(
      'records[0].sourceType must be a string; records[0].timestamp must be a string; records[0].fields must be an object'
    );
  });

  it('lists episodes related to a stored one', async () => {
    await container.episodeService.ingest([
      { sourceType: 'place_visit', timestamp: '2019-05-01', fields: { place: 'Kyoto' } },
    ]);
    const [march, april, may] = await container.episodeService.list();

    const res = await handle(post('/api/v1/episodes/related', { episodeId: march.id, k: 5 }));

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.episodeId).toBe(march.id);
    expect(body.related.map((r: { episode: { id: string } }) => r.episode.id)).toEqual([
      april.id,
      may.id,
    ]);
  });

  it('returns 404 for related episodes of an unknown id', async () => {
    const res = await handle(
      post('/api/v1/episodes/related', { episodeId: 'ep_000000000000000000000000' })
    );

    expect(res.status).toBe(404);
    expect((await res.json()).error).toMatchObject({
      code: 'NOT_FOUND',
      message: 'Episode ep_000000000000000000000000 is not indexed',
    });
  });

  it('requires an episode id for related episodes', async () => {
    const res = await handle(post('/api/v1/episodes/related', { k: 3 }));

    expect(res.status).toBe(400);
    expect((await res.json()).error.message).toBe('episodeId is required');
  });

  // ── Status ──

  it('reports index state, engines and views', async () => {
    const res = await handle(new Request('http://localhost/api/v1/status'));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      index: {
        ready: false,
        contentHash: null,
        size: 0,
        dimensions: null,
        building: false,
        lastError: null,
      },
      engines: ['retrieval', 'structured', 'general_knowledge'],
      views: ['books'],
      episodes: 2,
    });
  });

  // ── Routing ──

  it('returns 404 for unknown paths', async () => {
    const res = await handle(new Request('http://localhost/api/v1/nope'));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'No route matches GET /api/v1/nope' },
    });
  });

  it('returns 405 with Allow for the wrong method', async () => {
    const res = await handle(new Request('http://localhost/api/v1/query'));

    expect(res.status).toBe(405);
    expect(res.headers.get('Allow')).toBe('POST');
  });

  it('answers preflight requests with CORS headers', async () => {
    const res = await handle(new Request('http://localhost/api/v1/query', { method: 'OPTIONS' }));

    expect(res.status).toBe(204);
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
  });

  it('echoes a valid incoming request id and logs it', async () => {
    const res = await handle(
      new Request('http://localhost/api/v1/status', { headers: { 'X-Request-Id': 'abc-123' } })
    );

    expect(res.headers.get('X-Request-Id')).toBe('abc-123');
    expect(log.events.at(-1)).toMatchObject({ requestId: 'abc-123', status: 200 });
  });

  it('replaces an invalid request id', async () => {
    const res = await handle(
      new Request('http://localhost/api/v1/status', { headers: { 'X-Request-Id': 'bad id!' } })
    );

    expect(res.headers.get('X-Request-Id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('prefers the platform request id', async () => {
    const res = await handle(new Request('http://localhost/api/v1/status'), { requestId: 'netlify-1' });
    expect(res.headers.get('X-Request-Id')).toBe('netlify-1');
  });
});
