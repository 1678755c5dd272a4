import { describe, it, expect, beforeEach } from 'vitest';
import {
  GeneralKnowledgeService,
  UNABLE_TO_ANSWER,
} from '../../src/services/GeneralKnowledgeService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { GenerationProviderError } from '../../src/errors.js';
import { MockGenerationProvider } from '../mocks/MockGenerationProvider.js';

describe('GeneralKnowledgeService', () => {
  let log: ConsoleLogProvider;

  beforeEach(() => {
    log = new ConsoleLogProvider();
  });

  it('answers with the configured confidence and no sources', async () => {
    const generator = new MockGenerationProvider(() => '  George Eliot.\n');
    const service = new GeneralKnowledgeService(generator, log, { confidence: 0.25 });

    await expect(service.answer('Who wrote Middlemarch?')).resolves.toEqual({
      answer: 'George Eliot.',
      confidence: 0.25,
      sources: [],
    });
    expect(generator.prompts[0].user).toBe('Who wrote Middlemarch?');
  });

  it('reports inability when the generator does not know', async () => {
    const service = new GeneralKnowledgeService(new MockGenerationProvider(() => 'UNKNOWN.'), log);

    await expect(service.answer('What is my cat called?')).resolves.toEqual({
      answer: UNABLE_TO_ANSWER,
      confidence: 0,
      sources: [],
      degraded: true,
    });
  });

  it('treats an empty reply as inability', async () => {
    const service = new GeneralKnowledgeService(new MockGenerationProvider(() => '   '), log);

    const result = await service.answer('Who wrote Middlemarch?');
    expect(result.answer).toBe(UNABLE_TO_ANSWER);
  });

  it('logs and degrades on provider failure', async () => {
    const service = new GeneralKnowledgeService(
      MockGenerationProvider.failing(new GenerationProviderError('rate limited')),
      log
    );

    const result = await service.answer('Who wrote Middlemarch?');

    expect(result).toMatchObject({ confidence: 0, degraded: true });
    expect(log.events.find((e) => e.level === 'warn')).toMatchObject({
      message: 'General knowledge answer unavailable',
      fields: { error: 'rate limited' },
    });
  });

  it('rethrows when the caller aborted', async () => {
    const service = new GeneralKnowledgeService(
      MockGenerationProvider.failing(new Error('aborted')),
      log
    );

    await expect(
      service.answer('Who wrote Middlemarch?', { signal: AbortSignal.abort() })
    ).rejects.toThrow('aborted');
  });
});
