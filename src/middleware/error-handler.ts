/**
 * Maps thrown errors to JSON error responses.
 * AppErrors keep their code, status and details; anything else is logged
 * and becomes an opaque 500.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import { jsonResponse } from '../api/responses.js';

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };
        return jsonResponse(body, err.statusCode);
      }

      logProvider.error('Unhandled error', {
        requestId: ctx.requestId,
        error: err instanceof Error ? (err.stack ?? err.message) : String(err),
      });
      const body: ApiErrorResponse = {
        error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
      };
      return jsonResponse(body, 500);
    }
  };
}
