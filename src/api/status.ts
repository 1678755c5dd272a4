/**
 * GET /api/v1/status: index state, registered engines and available views.
 */

import { pipeline } from '../middleware/pipeline.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { StatusResponse } from '../types/api.js';
import { messageOf } from '../errors.js';
import { jsonResponse } from './responses.js';

export function createStatusHandlers(container: Container) {
  const status: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async () => {
    const body: StatusResponse = {
      index: container.indexService.status(),
      engines: container.queryRouter.engineNames(),
      views: await viewNames(container),
      episodes: await container.episodeService.count(),
    };
    return jsonResponse(body);
  });

  return { status };
}

async function viewNames(container: Container): Promise<string[]> {
  const engine = container.structuredQueryService;
  if (!engine) return [];
  try {
    return (await engine.listViews()).map((v) => v.name);
  } catch (err) {
    container.logProvider.warn('View catalog unavailable', { error: messageOf(err) });
    return [];
  }
}
