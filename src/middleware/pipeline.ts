/**
 * Composable middleware for the function handler (onion model).
 */

export interface HandlerContext {
  /** Echoed in the `X-Request-Id` response header and in request logs. */
  requestId: string;
  /** Parsed JSON body, set by validateBody. */
  body?: Record<string, unknown>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware left to right:
 *   pipeline(logging, errors)(handler) → logging wraps (errors wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler =>
    middlewares.reduceRight<Handler>((next, mw) => mw(next), handler);
}
