/**
 * API router.
 * Maps method + path to handlers over plain Request/Response, adds CORS
 * headers and a request id to every response.
 */

import { randomUUID } from 'node:crypto';
import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createQueryHandlers } from './query.js';
import { createEpisodeHandlers } from './episodes.js';
import { createStatusHandlers } from './status.js';
import { jsonResponse } from './responses.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

export function createRouter(container: Container) {
  const query = createQueryHandlers(container);
  const episodes = createEpisodeHandlers(container);
  const status = createStatusHandlers(container);

  const routes: Route[] = [
    { method: 'POST', pattern: /^\/api\/v1\/query\/?$/, handler: query.ask },
    { method: 'POST', pattern: /^\/api\/v1\/episodes\/?$/, handler: episodes.ingest },
    { method: 'POST', pattern: /^\/api\/v1\/episodes\/related\/?$/, handler: episodes.related },
    { method: 'GET', pattern: /^\/api\/v1\/status\/?$/, handler: status.status },
  ];

  const dispatch = async (req: Request, ctx: HandlerContext): Promise<Response> => {
    const { pathname } = new URL(req.url);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204 });
    }

    const route = routes.find((r) => r.method === req.method && r.pattern.test(pathname));
    if (route) return route.handler(req, ctx);

    const allowed = routes.filter((r) => r.pattern.test(pathname)).map((r) => r.method);
    if (allowed.length > 0) {
      return jsonResponse(
        { error: { code: 'INVALID_REQUEST', message: `Method ${req.method} not allowed` } },
        405,
        { Allow: allowed.join(', ') }
      );
    }

    return jsonResponse(
      { error: { code: 'NOT_FOUND', message: `No route matches ${req.method} ${pathname}` } },
      404
    );
  };

  const handle = async (req: Request, ctx?: Partial<HandlerContext>): Promise<Response> => {
    const incoming = req.headers.get('x-request-id');
    const requestId =
      ctx?.requestId ?? (incoming && REQUEST_ID.test(incoming) ? incoming : randomUUID());

    const response = await dispatch(req, { ...ctx, requestId });
    return withHeaders(response, { ...corsHeaders(), 'X-Request-Id': requestId });
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, X-Request-Id',
    'Access-Control-Max-Age': '86400',
  };
}

function withHeaders(response: Response, extra: Record<string, string>): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(extra)) headers.set(key, value);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
