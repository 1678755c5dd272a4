/**
 * Contract every engine registered with the QueryRouter fulfils.
 */

import type { EngineAnswer, EngineName } from '../types/models.js';

export interface EngineCallOptions {
  /** Aborted on router timeout or caller cancellation. */
  signal?: AbortSignal;
  /** Retrieval depth; ignored by engines that do not retrieve. */
  k?: number;
}

export interface AnswerEngine {
  readonly name: EngineName;

  /**
   * Answer or throw one of the engine error types.
   * The router turns any throw into a fallback transition.
   */
  answer(question: string, options?: EngineCallOptions): Promise<EngineAnswer>;
}
