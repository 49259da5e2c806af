import type { NextFunction, Response } from 'express';
import { ZodError } from 'zod';
import {
  AuthenticationRequiredError,
  DuplicateFieldError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { InvalidCommentTextError } from '../../../domain/engagement/errors.js';
import type { TraceLogger } from '../../logging/traceLogger.js';
import { requestLogger, type TracedRequest } from './requestId.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
  headers?: Record<string, string>;
}

function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

function mapError(err: Error): MappedError | null {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  if (isJsonParseError(err)) {
    return { status: 400, body: { code: 'INVALID_JSON', message: 'Malformed JSON body' } };
  }

  if (err instanceof DuplicateFieldError) {
    return {
      status: 400,
      body: { code: 'DUPLICATE_FIELD', message: err.message, details: { field: err.field } },
    };
  }

  if (err instanceof InvalidCommentTextError) {
    return { status: 400, body: { code: 'INVALID_COMMENT', message: err.message } };
  }

  // Checked before UnauthorizedError, which it extends
  if (err instanceof AuthenticationRequiredError) {
    return {
      status: 401,
      body: { code: 'UNAUTHORIZED', message: err.message },
      headers: { 'WWW-Authenticate': 'Bearer' },
    };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof ForbiddenError) {
    return { status: 403, body: { code: 'FORBIDDEN', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  return null;
}

export function createErrorHandler(logger: TraceLogger) {
  return (err: Error, req: TracedRequest, res: Response, _next: NextFunction): void => {
    const log = requestLogger(req, logger);
    const mapped = mapError(err);

    if (!mapped) {
      log.error(`Error in ${req.method} ${req.path}:`, err);
      const response: ErrorResponse = {
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      };
      res.status(500).json(response);
      return;
    }

    log.info(`Request failed with ${mapped.status} ${mapped.body.code}: ${mapped.body.message}`);
    if (mapped.headers) {
      res.set(mapped.headers);
    }
    res.status(mapped.status).json(mapped.body);
  };
}
