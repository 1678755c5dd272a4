import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function sentBatch(call = 0): Array<Record<string, unknown>> {
  const init = mockFetch.mock.calls[call][1];
  return JSON.parse(String(init?.body));
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'lifelog logs',
      flushIntervalMs: 0,
      flushThreshold: 5,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  it('buffers events until flushed', () => {
    provider.info('hello');
    provider.warn('world');

    expect(mockFetch).not.toHaveBeenCalled();
    expect(provider.pending).toBe(2);
  });

  it('posts the batch with _time and flattened fields', async () => {
    provider.log({ level: 'info', message: 'one', timestamp: '2024-01-15T12:00:00.000Z' });
    provider.log({
      level: 'warn',
      message: 'two',
      timestamp: '2024-01-15T12:00:01.000Z',
      fields: { engine: 'structured' },
    });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/lifelog%20logs/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });
    expect(sentBatch()).toEqual([
      { _time: '2024-01-15T12:00:00.000Z', level: 'info', message: 'one' },
      { _time: '2024-01-15T12:00:01.000Z', level: 'warn', message: 'two', engine: 'structured' },
    ]);
    expect(provider.pending).toBe(0);
  });

  it('skips the request when nothing is buffered', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('flushes on its own once the threshold is reached', async () => {
    for (let i = 0; i < 5; i++) provider.info(`event ${i}`);
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(sentBatch()).toHaveLength(5);
  });

  it('shares one delivery between concurrent flushes', async () => {
    provider.info('once');
    await Promise.all([provider.flush(), provider.flush()]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('keeps the batch after a rejected delivery', async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 503 }));
    provider.info('retry me');

    await provider.flush();
    expect(provider.lastFlushError).toBe('Axiom ingest returned 503');
    expect(provider.pending).toBe(1);

    await provider.flush();
    expect(provider.lastFlushError).toBeNull();
    expect(provider.pending).toBe(0);
    expect(sentBatch(1)).toEqual([expect.objectContaining({ message: 'retry me' })]);
  });

  it('keeps the batch after a network error', async () => {
    mockFetch.mockRejectedValueOnce(new Error('socket hang up'));
    provider.info('still here');

    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.lastFlushError).toBe('socket hang up');
    expect(provider.pending).toBe(1);
  });

  it('drops the oldest events beyond the buffer cap', async () => {
    const capped = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'logs',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBuffered: 2,
    });
    capped.info('a');
    capped.info('b');
    capped.info('c');
    await capped.dispose();

    expect(sentBatch().map((e) => e.message)).toEqual(['b', 'c']);
  });

  it('respects the minimum level', async () => {
    const filtered = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'logs',
      flushIntervalMs: 0,
      minLevel: 'warn',
    });
    filtered.info('ignored');
    expect(filtered.pending).toBe(0);
    await filtered.dispose();
  });

  it('drops everything without an API token', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'logs' });
    disabled.error('nowhere');
    await disabled.flush();

    expect(disabled.pending).toBe(0);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
