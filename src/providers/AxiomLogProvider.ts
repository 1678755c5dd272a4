/**
 * Axiom log provider.
 * Buffers events and ships them in batches to Axiom's ingest API, on a timer
 * and whenever the buffer reaches the flush threshold. A failed delivery keeps
 * the batch for the next flush and is reported through `lastFlushError`.
 * Without an API token the provider drops everything.
 */

import { BaseLogProvider, type BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent } from './ILogProvider.js';
import { messageOf } from '../errors.js';

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export interface AxiomLogProviderOptions extends BaseLogProviderOptions {
  /** Bearer token; empty disables delivery. */
  apiToken: string;
  dataset: string;
  /** Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms; 0 disables the timer. Default: 10s. */
  flushIntervalMs?: number;
  /** Buffer cap; the oldest events are dropped beyond it. Default: 5000. */
  maxBuffered?: number;
}

export class AxiomLogProvider extends BaseLogProvider {
  /** Message of the most recent failed delivery, cleared on success. */
  lastFlushError: string | null = null;

  private buffer: LogEvent[] = [];
  private flushing: Promise<void> | null = null;
  private flushTimer: ReturnType<typeof setInterval> | null = null;

  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly flushThreshold: number;
  private readonly maxBuffered: number;
  private readonly enabled: boolean;

  constructor(options: AxiomLogProviderOptions) {
    super(options);
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBuffered = options.maxBuffered ?? 5000;
    this.enabled = this.apiToken.length > 0;

    const interval = options.flushIntervalMs ?? 10_000;
    if (this.enabled && interval > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, interval);
      this.flushTimer.unref();
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  protected write(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push(event);
    if (this.buffer.length > this.maxBuffered) {
      this.buffer.splice(0, this.buffer.length - this.maxBuffered);
    }
    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /** Concurrent calls share one delivery. */
  flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return Promise.resolve();
    if (!this.flushing) {
      this.flushing = this.deliver().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  private async deliver(): Promise<void> {
    const batch = [...this.buffer];

    try {
      const response = await fetch(
        `${AXIOM_INGEST_URL}/${encodeURIComponent(this.dataset)}/ingest`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiToken}`,
          },
          body: JSON.stringify(batch.map(toAxiomEvent)),
        }
      );

      if (!response.ok) {
        this.lastFlushError = `Axiom ingest returned ${response.status}`;
        return;
      }
      this.buffer.splice(0, batch.length);
      this.lastFlushError = null;
    } catch (err) {
      this.lastFlushError = messageOf(err);
    }
  }
}

/** Axiom reads the event time from `_time`. */
function toAxiomEvent(event: LogEvent): Record<string, unknown> {
  const { timestamp, fields, ...rest } = event;
  return { _time: timestamp, ...rest, ...fields };
}
