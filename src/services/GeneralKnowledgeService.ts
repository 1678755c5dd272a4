/**
 * Last-resort engine: answers from the generator's general knowledge.
 * Never claims personal facts and never throws for provider failures;
 * inability is reported as an answer with zero confidence.
 */

import type { IGenerationProvider } from '../providers/IGenerationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EngineAnswer } from '../types/models.js';
import type { AnswerEngine, EngineCallOptions } from './AnswerEngine.js';
import { messageOf } from '../errors.js';

const DEFAULT_CONFIDENCE = 0.3;
const UNKNOWN = /^\s*UNKNOWN\.?\s*$/i;

export const UNABLE_TO_ANSWER =
  'I could not find an answer to that question in your data or in general knowledge.';

export interface GeneralKnowledgeOptions {
  /** Confidence reported for a general-knowledge answer. Default: 0.3. */
  confidence?: number;
}

export class GeneralKnowledgeService implements AnswerEngine {
  readonly name = 'general_knowledge' as const;

  private readonly confidence: number;

  constructor(
    private readonly generationProvider: IGenerationProvider,
    private readonly logProvider: ILogProvider,
    options: GeneralKnowledgeOptions = {}
  ) {
    this.confidence = options.confidence ?? DEFAULT_CONFIDENCE;
  }

  async answer(question: string, options: EngineCallOptions = {}): Promise<EngineAnswer> {
    let output: string;
    try {
      output = await this.generationProvider.generate(
        {
          system:
            'Answer the question briefly from general knowledge. ' +
            'You have no access to the user\'s personal records: never state facts about the user. ' +
            'If the answer depends on personal data or you do not know it, reply exactly UNKNOWN.',
          user: question,
        },
        options.signal
      );
    } catch (err) {
      if (options.signal?.aborted) throw err;
      this.logProvider.warn('General knowledge answer unavailable', { error: messageOf(err) });
      return unable();
    }

    const answer = output.trim();
    if (answer.length === 0 || UNKNOWN.test(answer)) return unable();

    return { answer, confidence: this.confidence, sources: [] };
  }
}

function unable(): EngineAnswer {
  return { answer: UNABLE_TO_ANSWER, confidence: 0, sources: [], degraded: true };
}
