import { describe, it, expect, beforeEach } from 'vitest';
import { RetrievalService, parseCitedAnswer } from '../../src/services/RetrievalService.js';
import { IndexService } from '../../src/services/IndexService.js';
import { EpisodeService } from '../../src/services/EpisodeService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import {
  EmbeddingProviderError,
  GenerationFormatError,
  InsufficientEvidenceError,
  NotFoundError,
} from '../../src/errors.js';
import { MockEpisodeRepository } from '../mocks/MockEpisodeRepository.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockGenerationProvider } from '../mocks/MockGenerationProvider.js';
import { MockIndexCacheStore } from '../mocks/MockIndexCacheStore.js';
import type { GenerationPrompt } from '../../src/providers/IGenerationProvider.js';
import type { Episode, RawRecord } from '../../src/types/models.js';

const TOKYO_LINE = /^\[(ep_[a-f0-9]{24})\] On (\d{4}-\d{2}-\d{2}), I visited Tokyo/gm;

/** Answers from the most recent Tokyo memory in the prompt and cites it. */
function latestTokyoVisit(prompt: GenerationPrompt): string {
  const visits = [...prompt.user.matchAll(TOKYO_LINE)].map((m) => ({ id: m[1], date: m[2] }));
  visits.sort((a, b) => b.date.localeCompare(a.date));
  const latest = visits[0];
  if (!latest) return 'I have no memory of that.\nSOURCES:';
  return `You last visited Tokyo on ${latest.date}.\nSOURCES: ${latest.id}`;
}

function visit(timestamp: string, place = 'Tokyo'): RawRecord {
  return { sourceType: 'place_visit', timestamp, fields: { place } };
}

describe('RetrievalService', () => {
  let log: ConsoleLogProvider;
  let episodes: EpisodeService;
  let embedder: MockEmbeddingProvider;
  let generator: MockGenerationProvider;
  let indexService: IndexService;
  let service: RetrievalService;
  let stored: Episode[];

  beforeEach(async () => {
    log = new ConsoleLogProvider();
    episodes = new EpisodeService(new MockEpisodeRepository(), log);
    embedder = new MockEmbeddingProvider();
    generator = new MockGenerationProvider(latestTokyoVisit);
    indexService = new IndexService(episodes, embedder, new MockIndexCacheStore(), log);
    service = new RetrievalService(indexService, episodes, embedder, generator, log, {
      minSimilarity: 0.05,
    });

    stored = (
      await episodes.ingest([
        visit('2019-03-28'),
        visit('2019-03-29'),
        visit('2019-04-02'),
        { sourceType: 'purchase', timestamp: '2019-04-03', fields: { item: 'an umbrella' } },
      ])
    ).episodes;
  });

  it('answers with the latest visit and cites that episode', async () => {
    const result = await service.answer('When did I last visit Tokyo?');
    const april = stored[2];

    expect(result.answer).toBe('You last visited Tokyo on 2019-04-02.');
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0]).toMatchObject({ kind: 'episode', episodeId: april.id });
    expect(result.degraded).toBeUndefined();
    expect(result.confidence).toBeGreaterThan(0);
    expect(result.confidence).toBeLessThanOrEqual(1);
  });

  it('puts every retrieved episode into the context with its id', async () => {
    await service.answer('When did I last visit Tokyo?');
    const prompt = generator.prompts[0];

    for (const episode of stored.slice(0, 3)) {
      expect(prompt.user).toContain(`[${episode.id}] ${episode.text}`);
    }
    expect(prompt.user.endsWith('Question: When did I last visit Tokyo?')).toBe(true);
  });

  it('drops cited ids that were not retrieved', async () => {
    const fabricated = 'ep_000000000000000000000000';
    generator.respondWith(
      () => `Tokyo, twice.\nSOURCES: ${fabricated}, ${stored[0].id}`
    );

    const result = await service.answer('When did I visit Tokyo?');

    expect(result.sources.map((s) => (s.kind === 'episode' ? s.episodeId : s.view))).toEqual([
      stored[0].id,
    ]);
  });

  it('retries once with a stricter instruction when citations are missing', async () => {
    generator.respondWith((prompt, call) =>
      call === 0 ? 'It was in April.' : latestTokyoVisit(prompt)
    );

    const result = await service.answer('When did I last visit Tokyo?');

    expect(generator.callCount).toBe(2);
    expect(generator.prompts[1].system).toContain('did not follow the required format');
    expect(result.degraded).toBeUndefined();
    expect(result.sources).toHaveLength(1);
  });

  it('degrades to a low-confidence answer after two malformed replies', async () => {
    generator.respondWith(() => 'Sometime in spring.');

    const result = await service.answer('When did I last visit Tokyo?');

    expect(generator.callCount).toBe(2);
    expect(result).toMatchObject({ answer: 'Sometime in spring.', confidence: 0.2, degraded: true });
    expect(result.sources.length).toBeGreaterThanOrEqual(3);
    expect(log.messages('warn')).toEqual([
      'Retrieval answer missing citations',
      'Retrieval answer missing citations',
    ]);
  });

  it('reports insufficient evidence instead of answering', async () => {
    service = new RetrievalService(indexService, episodes, embedder, generator, log, {
      minSimilarity: 0.99,
    });

    await expect(service.answer('When did I last visit Tokyo?')).rejects.toThrow(
      InsufficientEvidenceError
    );
    expect(generator.callCount).toBe(0);
  });

  it('fails with EmbeddingProviderError when embeddings are unavailable', async () => {
    embedder.failing = true;

    await expect(service.answer('When did I last visit Tokyo?')).rejects.toThrow(
      EmbeddingProviderError
    );
  });

  it('picks up an episode added after the index was built', async () => {
    await service.answer('When did I last visit Tokyo?');
    const [may] = (await episodes.ingest([visit('2019-05-01')])).episodes;

    const result = await service.answer('When did I last visit Tokyo?');

    expect(result.answer).toBe('You last visited Tokyo on 2019-05-01.');
    expect(result.sources[0]).toMatchObject({ kind: 'episode', episodeId: may.id });
  });
});

describe('RetrievalService.related', () => {
  let episodes: EpisodeService;
  let service: RetrievalService;
  let stored: Episode[];

  beforeEach(async () => {
    const log = new ConsoleLogProvider();
    const embedder = new MockEmbeddingProvider();
    episodes = new EpisodeService(new MockEpisodeRepository(), log);
    const indexService = new IndexService(episodes, embedder, new MockIndexCacheStore(), log);
    service = new RetrievalService(
      indexService,
      episodes,
      embedder,
      new MockGenerationProvider(latestTokyoVisit),
      log
    );

    stored = (
      await episodes.ingest([
        visit('2019-03-28'),
        visit('2019-03-29'),
        visit('2019-04-02'),
        { sourceType: 'purchase', timestamp: '2019-04-03', fields: { item: 'an umbrella' } },
      ])
    ).episodes;
  });

  it('ranks other episodes by similarity to the given one and leaves it out', async () => {
    const [march28, march29, april, umbrella] = stored;

    const related = await service.related(march28.id);

    expect(related.map((r) => r.episode.id)).toEqual([march29.id, april.id, umbrella.id]);
    expect(related[0].similarity).toBeCloseTo(0.8819, 3);
    expect(related[1].similarity).toBeCloseTo(0.7143, 3);
    expect(related[2].similarity).toBeCloseTo(0.5345, 3);
  });

  it('returns at most k episodes', async () => {
    const related = await service.related(stored[0].id, 1);

    expect(related.map((r) => r.episode.id)).toEqual([stored[1].id]);
  });

  it('includes an episode stored after the index was built', async () => {
    await service.related(stored[0].id);
    const [may] = (await episodes.ingest([visit('2019-05-01')])).episodes;

    const related = await service.related(may.id, 1);

    expect(related).toHaveLength(1);
    expect(related[0].episode.id).not.toBe(may.id);
  });

  it('throws NotFoundError for an episode that is not indexed', async () => {
    await expect(service.related('ep_000000000000000000000000')).rejects.toThrow(NotFoundError);
    await expect(service.related('ep_000000000000000000000000')).rejects.toThrow(
      'Episode ep_000000000000000000000000 is not indexed'
    );
  });
});

describe('parseCitedAnswer', () => {
  const id = 'ep_0123456789abcdef01234567';
  const allowed = new Set([id]);

  it('splits the answer from the SOURCES line', () => {
    expect(parseCitedAnswer(`Yes.\n\nSOURCES: [${id}]`, allowed)).toEqual({
      answer: 'Yes.',
      citedIds: [id],
    });
  });

  it('accepts a lowercase singular label', () => {
    expect(parseCitedAnswer(`Yes.\nsource: ${id}`, allowed).citedIds).toEqual([id]);
  });

  it('reads citations from the last SOURCES line only', () => {
    const output = `Source: my diary mentions two trips.\nYou went twice.\nSOURCES: ${id}`;

    expect(parseCitedAnswer(output, allowed)).toEqual({
      answer: 'Source: my diary mentions two trips.\nYou went twice.',
      citedIds: [id],
    });
  });

  it('rejects output without a SOURCES line or without valid ids', () => {
    expect(() => parseCitedAnswer('Yes.', allowed)).toThrow(GenerationFormatError);
    expect(() => parseCitedAnswer('Yes.\nSOURCES: none', allowed)).toThrow(
      'Answer cites no retrieved episode'
    );
  });
});
