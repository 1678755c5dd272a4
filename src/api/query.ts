/**
 * POST /api/v1/query: answer a question through the router.
 */

import { pipeline } from '../middleware/pipeline.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { EngineName } from '../types/models.js';
import { ValidationError } from '../errors.js';
import { jsonResponse } from './responses.js';

const querySchema: BodySchema = {
  question: { type: 'string', required: true, maxLength: 2000 },
  k: { type: 'number', required: false, integer: true, min: 1, max: 50 },
  engine: { type: 'string', required: false, enum: ['structured', 'retrieval', 'general_knowledge'] },
};

function isEngineName(value: unknown): value is EngineName {
  return value === 'structured' || value === 'retrieval' || value === 'general_knowledge';
}

export function createQueryHandlers(container: Container) {
  const ask: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(querySchema)
  )(async (req, ctx) => {
    const question = ctx.body?.question;
    const k = ctx.body?.k;
    const engine = ctx.body?.engine;
    if (typeof question !== 'string') throw new ValidationError('question is required');

    const result = await container.queryRouter.query(question.trim(), {
      k: typeof k === 'number' ? k : undefined,
      signal: req.signal,
      ...(isEngineName(engine) ? { engine } : {}),
    });

    return jsonResponse(result);
  });

  return { ask };
}
