/**
 * Query router: the single caller-facing entry point for questions.
 *
 * Runs a small state machine over the registered engines:
 *
 *   classify → try_structured | try_retrieval
 *   try_structured → done | try_retrieval
 *   try_retrieval  → done | try_structured | try_general | failed
 *   try_general    → done | failed
 *
 * A caller may name the engine instead; then only that engine runs and its
 * failure ends in `failed`.
 *
 * Every attempt is appended to the trace with its outcome and error kind.
 * Engine errors end in a fallback transition, never in a throw; only a
 * caller cancellation rejects.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  EngineAnswer,
  EngineName,
  QueryResult,
  RouterState,
  RouterTransition,
} from '../types/models.js';
import type { AnswerEngine } from './AnswerEngine.js';
import { classifyQuestion } from './classifyQuestion.js';
import { withTimeout } from '../utils/async.js';
import { QueryCancelledError, errorKindOf, messageOf } from '../errors.js';

const DEFAULT_TIMEOUT_MS = 15_000;

export const FAILED_ANSWER =
  'I could not answer that question from your personal data.';

const STATE_OF: Record<EngineName, RouterState> = {
  structured: 'try_structured',
  retrieval: 'try_retrieval',
  general_knowledge: 'try_general',
};

export interface QueryRouterOptions {
  /** Per-engine timeout. Default: 15s. */
  timeoutMs?: number;
  /** Overrides of the timeout for individual engines. */
  engineTimeouts?: Partial<Record<EngineName, number>>;
}

export interface QueryOptions {
  k?: number;
  signal?: AbortSignal;
  /** Run only this engine, without classification or fallback. */
  engine?: EngineName;
}

type Attempt =
  | { ok: true; answer: EngineAnswer }
  | { ok: false; transition: Omit<RouterTransition, 'to'> };

export class QueryRouter {
  private readonly engines = new Map<EngineName, AnswerEngine>();
  private readonly timeoutMs: number;
  private readonly engineTimeouts: Partial<Record<EngineName, number>>;

  constructor(
    private readonly logProvider: ILogProvider,
    options: QueryRouterOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.engineTimeouts = options.engineTimeouts ?? {};
  }

  /** Register (or replace) the engine for its name. */
  register(engine: AnswerEngine): this {
    this.engines.set(engine.name, engine);
    return this;
  }

  engineNames(): EngineName[] {
    return [...this.engines.keys()];
  }

  async query(question: string, options: QueryOptions = {}): Promise<QueryResult> {
    const started = performance.now();
    const trace: RouterTransition[] = [];

    if (options.engine) {
      return this.queryOnly(options.engine, question, options, trace, started);
    }

    const classification = classifyQuestion(question);
    const chain: EngineName[] =
      classification.preferred === 'structured'
        ? ['structured', 'retrieval']
        : ['retrieval', 'structured'];

    trace.push({
      from: 'classify',
      to: STATE_OF[chain[0]],
      outcome: 'success',
      durationMs: elapsed(started),
    });

    for (const [i, name] of chain.entries()) {
      const next = chain[i + 1];
      const onFailure: RouterState = next
        ? STATE_OF[next]
        : classification.personal
          ? 'failed'
          : 'try_general';

      const attempt = await this.attempt(name, question, options);
      if (attempt.ok) {
        trace.push({
          from: STATE_OF[name],
          to: 'done',
          engine: name,
          outcome: 'success',
          durationMs: elapsedSince(trace, started),
        });
        return this.finish(question, name, attempt.answer, trace, started);
      }

      trace.push({ ...attempt.transition, to: onFailure });
      if (attempt.transition.outcome === 'error') {
        this.logProvider.warn('Engine failed; falling back', {
          engine: name,
          errorKind: attempt.transition.errorKind,
          next: onFailure,
        });
      }
    }

    if (classification.personal) {
      return this.fail(question, trace, started);
    }

    const general = await this.attempt('general_knowledge', question, options);
    if (general.ok) {
      trace.push({
        from: 'try_general',
        to: 'done',
        engine: 'general_knowledge',
        outcome: 'success',
        durationMs: elapsedSince(trace, started),
      });
      return this.finish(question, 'general_knowledge', general.answer, trace, started);
    }

    if (general.transition.outcome === 'skipped') {
      trace.push({ ...general.transition, to: 'failed' });
      return this.fail(question, trace, started);
    }

    // The general step is terminal: its failure is an explicit inability answer.
    trace.push({ ...general.transition, to: 'done' });
    return this.finish(
      question,
      'general_knowledge',
      {
        answer: 'I could not answer that question right now.',
        confidence: 0,
        sources: [],
        degraded: true,
      },
      trace,
      started
    );
  }

  // ── Private ──

  private async queryOnly(
    name: EngineName,
    question: string,
    options: QueryOptions,
    trace: RouterTransition[],
    started: number
  ): Promise<QueryResult> {
    trace.push({
      from: 'classify',
      to: STATE_OF[name],
      outcome: 'success',
      durationMs: elapsed(started),
    });

    const attempt = await this.attempt(name, question, options);
    if (attempt.ok) {
      trace.push({
        from: STATE_OF[name],
        to: 'done',
        engine: name,
        outcome: 'success',
        durationMs: elapsedSince(trace, started),
      });
      return this.finish(question, name, attempt.answer, trace, started);
    }

    trace.push({ ...attempt.transition, to: 'failed' });
    if (attempt.transition.outcome === 'error') {
      this.logProvider.warn('Selected engine failed', {
        engine: name,
        errorKind: attempt.transition.errorKind,
      });
    }
    return this.fail(question, trace, started);
  }

  private async attempt(
    name: EngineName,
    question: string,
    options: QueryOptions
  ): Promise<Attempt> {
    const state = STATE_OF[name];
    const engine = this.engines.get(name);
    if (!engine) {
      return {
        ok: false,
        transition: { from: state, engine: name, outcome: 'skipped', durationMs: 0 },
      };
    }

    const started = performance.now();
    try {
      const answer = await withTimeout(
        (signal) => engine.answer(question, { signal, k: options.k }),
        {
          timeoutMs: this.engineTimeouts[name] ?? this.timeoutMs,
          context: `${name} engine`,
          signal: options.signal,
        }
      );
      if (name !== 'general_knowledge' && answer.sources.length === 0) {
        throw new Error(`${name} engine answered without sources`);
      }
      return { ok: true, answer };
    } catch (err) {
      if (err instanceof QueryCancelledError || options.signal?.aborted) {
        this.logProvider.info('Query cancelled', { engine: name });
        throw err instanceof QueryCancelledError ? err : new QueryCancelledError();
      }
      return {
        ok: false,
        transition: {
          from: state,
          engine: name,
          outcome: 'error',
          errorKind: errorKindOf(err),
          message: messageOf(err),
          durationMs: elapsed(started),
        },
      };
    }
  }

  private finish(
    question: string,
    engine: EngineName,
    answer: EngineAnswer,
    trace: RouterTransition[],
    started: number
  ): QueryResult {
    const result: QueryResult = {
      question,
      engineUsed: engine,
      answer: answer.answer,
      confidence: clamp(answer.confidence),
      sources: answer.sources,
      ...(answer.generatedQuery !== undefined ? { generatedQuery: answer.generatedQuery } : {}),
      status: 'done',
      degraded: answer.degraded ?? false,
      trace,
    };

    this.logProvider.info('Query answered', {
      engine,
      status: result.status,
      degraded: result.degraded,
      transitions: trace.length,
      durationMs: elapsed(started),
    });
    return result;
  }

  private fail(question: string, trace: RouterTransition[], started: number): QueryResult {
    this.logProvider.info('Query failed', {
      status: 'failed',
      transitions: trace.length,
      durationMs: elapsed(started),
    });
    return {
      question,
      engineUsed: 'none',
      answer: FAILED_ANSWER,
      confidence: 0,
      sources: [],
      status: 'failed',
      degraded: false,
      trace,
    };
  }
}

function elapsed(started: number): number {
  return Math.round(performance.now() - started);
}

/** Time spent in the current state: total minus what earlier transitions took. */
function elapsedSince(trace: RouterTransition[], started: number): number {
  const spent = trace.reduce((sum, t) => sum + t.durationMs, 0);
  return Math.max(0, elapsed(started) - spent);
}

function clamp(confidence: number): number {
  if (!Number.isFinite(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}
