/**
 * POST /api/v1/episodes: ingest source records.
 * The index is not rebuilt here; the next query notices the changed episode set.
 *
 * POST /api/v1/episodes/related: nearest episodes to a stored one.
 */

import { pipeline } from '../middleware/pipeline.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { RawRecord } from '../types/models.js';
import type { RelatedResponse } from '../types/api.js';
import { ValidationError } from '../errors.js';
import { jsonResponse } from './responses.js';

const MAX_RECORDS = 1000;

const ingestSchema: BodySchema = {
  records: { type: 'array', required: true, maxItems: MAX_RECORDS },
};

const relatedSchema: BodySchema = {
  episodeId: { type: 'string', required: true, maxLength: 64 },
  k: { type: 'number', required: false, integer: true, min: 1, max: 50 },
};

export function createEpisodeHandlers(container: Container) {
  const ingest: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(ingestSchema)
  )(async (_req, ctx) => {
    const records = parseRecords(ctx.body?.records);
    const result = await container.episodeService.ingest(records);
    return jsonResponse(result, result.created + result.superseded > 0 ? 201 : 200);
  });

  const related: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(relatedSchema)
  )(async (_req, ctx) => {
    const episodeId = ctx.body?.episodeId;
    const k = ctx.body?.k;
    if (typeof episodeId !== 'string') throw new ValidationError('episodeId is required');

    const body: RelatedResponse = {
      episodeId,
      related: await container.retrievalService.related(
        episodeId,
        typeof k === 'number' ? k : undefined
      ),
    };
    return jsonResponse(body);
  });

  return { ingest, related };
}

/** Envelope check only; field contents are checked by the verbalizers. */
export function parseRecords(value: unknown): RawRecord[] {
  if (!Array.isArray(value)) throw new ValidationError('records must be an array');

  const errors: string[] = [];
  const records: RawRecord[] = [];

  value.forEach((item: unknown, i) => {
    if (!isObject(item)) {
      errors.push(`records[${i}] must be an object`);
      return;
    }
    const { sourceType, timestamp, fields, provenance } = item;
    if (typeof sourceType !== 'string') errors.push(`records[${i}].sourceType must be a string`);
    if (typeof timestamp !== 'string') errors.push(`records[${i}].timestamp must be a string`);
    if (!isObject(fields)) {
      errors.push(`records[${i}].fields must be an object`);
    }
    if (provenance !== undefined && typeof provenance !== 'string') {
      errors.push(`records[${i}].provenance must be a string`);
    }
    if (typeof sourceType === 'string' && typeof timestamp === 'string' && isObject(fields)) {
      records.push({
        sourceType,
        timestamp,
        fields: { ...fields },
        ...(typeof provenance === 'string' ? { provenance } : {}),
      });
    }
  });

  if (errors.length > 0) {
    throw new ValidationError(errors.slice(0, 20).join('; '), { fields: errors });
  }
  return records;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
