/**
 * Netlify Function entry point: every /api/v1/* route goes through one router.
 * The container is built once per cold start and shared by warm invocations.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

let router: ReturnType<typeof createRouter> | null = null;

export default async (req: Request, context: Context) => {
  const container = getProductionContainer();
  router ??= createRouter(container);

  const response = await router.handle(req, { requestId: context.requestId });
  // The function may be frozen after returning; ship buffered logs first.
  await container.logProvider.flush();
  return response;
};

export const config = {
  path: '/api/v1/*',
};
