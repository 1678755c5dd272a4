/**
 * One log event per request: method, path, status, duration, request id.
 * 2xx/3xx → info, 4xx → warn, 5xx and thrown errors → error.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Middleware } from './pipeline.js';
import { messageOf } from '../errors.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    const method = req.method;
    const path = new URL(req.url).pathname;
    const start = performance.now();

    const emit = (status: number, fields?: Record<string, unknown>) => {
      const durationMs = Math.round(performance.now() - start);
      const event: RequestLogEvent = {
        level: fields ? 'error' : levelForStatus(status),
        message: `${method} ${path} ${status} (${durationMs}ms)`,
        method,
        path,
        status,
        durationMs,
        requestId: ctx.requestId,
        ...(fields && { fields }),
      };
      logProvider.log(event);
    };

    try {
      const response = await next(req, ctx);
      emit(response.status);
      return response;
    } catch (err) {
      emit(500, { error: messageOf(err) });
      throw err;
    }
  };
}
