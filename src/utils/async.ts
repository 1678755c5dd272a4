/**
 * Async helpers for calls into remote capabilities.
 */

import { ProviderTimeoutError, QueryCancelledError } from '../errors.js';

export interface WithTimeoutOptions {
  /** Timeout in milliseconds; values <= 0 disable the timer. */
  timeoutMs: number;
  /** Used in the timeout error message. */
  context: string;
  /** Caller-side cancellation. */
  signal?: AbortSignal;
}

/**
 * Run `task` with its own abort signal, rejecting with ProviderTimeoutError
 * after `timeoutMs` and with QueryCancelledError when the caller aborts.
 * Either way the task's signal is aborted so it can stop its I/O.
 *
 * @example
 * ```typescript
 * const vector = await withTimeout(
 *   (signal) => provider.generate(question, signal),
 *   { timeoutMs: 5000, context: 'embedding question' }
 * );
 * ```
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: WithTimeoutOptions
): Promise<T> {
  const { timeoutMs, context, signal } = options;
  if (signal?.aborted) throw new QueryCancelledError();

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  let onAbort: (() => void) | null = null;

  const guards = new Promise<never>((_, reject) => {
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new ProviderTimeoutError(timeoutMs, context));
      }, timeoutMs);
    }
    if (signal) {
      onAbort = () => {
        controller.abort();
        reject(new QueryCancelledError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guards]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}
