import type { NextFunction, Response } from 'express';
import type { User } from '../../../domain/auth/user.js';
import type { IdentityResolver } from '../../../application/auth/identity.js';
import { AuthenticationRequiredError } from '../../../application/errors.js';
import type { TraceLogger } from '../../logging/traceLogger.js';
import { asyncHandler } from './asyncHandler.js';
import { requestLogger, type TracedRequest } from './requestId.js';

export interface AuthRequest extends TracedRequest {
  user?: User;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  return BEARER_PATTERN.exec(header)?.[1];
}

/**
 * Attach the caller to `req.user` when a valid bearer token is present.
 * Never rejects a request: routes that need a caller add `requireAuth`.
 */
export function authenticate(identity: IdentityResolver, logger: TraceLogger) {
  return asyncHandler(async (req: AuthRequest, _res, next) => {
    const token = extractBearerToken(req.headers.authorization);
    const user = await identity.resolve(token, requestLogger(req, logger));
    if (user) {
      req.user = user;
    }
    next();
  });
}

export function requireAuth(req: AuthRequest, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new AuthenticationRequiredError());
    return;
  }
  next();
}

/**
 * The authenticated caller. Throws when the route was not guarded by `requireAuth`.
 */
export function requireUser(req: AuthRequest): User {
  if (!req.user) {
    throw new AuthenticationRequiredError();
  }
  return req.user;
}
