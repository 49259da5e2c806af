import type { User } from '../../domain/auth/user.js';
import type { TraceLogger } from '../../infra/logging/traceLogger.js';
import { InvalidTokenError, NotFoundError } from '../errors.js';
import { LookupUserUseCase } from './lookup.js';
import { TokenService } from './tokens.js';

/**
 * Resolves an optional bearer token to the calling user.
 * Missing, malformed, invalid or expired tokens and tokens for unknown users all
 * resolve to null; storage failures propagate.
 */
export class IdentityResolver {
  constructor(
    private tokens: TokenService,
    private lookupUser: LookupUserUseCase
  ) {}

  async resolve(token: string | undefined, logger: TraceLogger): Promise<User | null> {
    if (!token) {
      return null;
    }

    let userId: string;
    try {
      userId = this.tokens.verify(token);
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        logger.debug(`[Auth] Ignoring ${error.reason} token`);
        return null;
      }
      throw error;
    }

    try {
      return await this.lookupUser.execute(userId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        logger.debug(`[Auth] Token subject ${userId} no longer exists`);
        return null;
      }
      throw error;
    }
  }
}
