import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import type { TraceLogger } from '../../logging/traceLogger.js';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface TracedRequest extends Request {
  requestId?: string;
  log?: TraceLogger;
}

/**
 * Assign every request a correlation id (the inbound `x-request-id` or a fresh
 * UUID), bind a logger to it, echo it on the response and log start/finish.
 */
export function requestId(logger: TraceLogger) {
  return (req: TracedRequest, res: Response, next: NextFunction): void => {
    const inbound = req.header(REQUEST_ID_HEADER)?.trim();
    const id = inbound ? inbound : randomUUID();
    const log = logger.withRequest(id);

    req.requestId = id;
    req.log = log;
    res.setHeader(REQUEST_ID_HEADER, id);

    const startedAt = Date.now();
    log.info(`Incoming ${req.method} ${req.path}`);

    res.on('finish', () => {
      const duration = ((Date.now() - startedAt) / 1000).toFixed(2);
      log.info(
        `Completed ${req.method} ${req.path} with status ${res.statusCode} (duration: ${duration}s)`
      );
    });

    next();
  };
}

/**
 * Logger bound to the request's correlation id, or `fallback` outside the middleware.
 */
export function requestLogger(req: TracedRequest, fallback: TraceLogger): TraceLogger {
  return req.log ?? fallback;
}
