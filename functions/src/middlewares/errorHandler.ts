import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { ApiError, ValidationError } from '../utils/apiErrors';
import { captureException } from '../utils/sentry';

type BodyParserError = Error & { type: string; status: number };

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    err.type.startsWith('entity.') &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

/**
 * Writes the JSON error envelope for known errors.
 * Returns false when the error is not one the API describes to clients.
 */
export function sendApiError(res: Response, err: unknown): boolean {
  if (err instanceof z.ZodError) {
    return sendApiError(res, new ValidationError('Invalid request body', err.errors));
  }

  if (err instanceof ApiError) {
    res.status(err.status).json({
      code: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
    return true;
  }

  return false;
}

export function createErrorHandler(options: { exposeErrors: boolean }) {
  return function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
    // If headers have already been sent, delegate to the default Express error handler
    if (res.headersSent) {
      next(err);
      return;
    }

    if (isBodyParserError(err)) {
      functions.logger.warn(`[http] Rejected request body on ${req.method} ${req.path}: ${err.type}`);
      sendApiError(
        res,
        err.type === 'entity.parse.failed'
          ? new ValidationError('Request body is not valid JSON')
          : new ApiError(err.status, 'invalid_body', err.message),
      );
      return;
    }

    if (sendApiError(res, err)) {
      return;
    }

    captureException(err, { method: req.method, path: req.path });

    if (!options.exposeErrors) {
      // In production, don't leak stack traces
      res.status(500).json({
        code: 'server_error',
        message: 'An unexpected error occurred',
      });
      return;
    }

    res.status(500).json({
      code: 'server_error',
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  };
}
