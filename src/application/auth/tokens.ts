import jwt from 'jsonwebtoken';
import type { JwtAlgorithm } from '../../config.js';
import { InvalidTokenError } from '../errors.js';

export interface TokenServiceOptions {
  secret: string;
  algorithm: JwtAlgorithm;
  expiresInMinutes: number;
  /** Defaults to the system clock. */
  now?: () => Date;
}

/**
 * Issues and verifies signed session tokens (JWT) carrying the user id in `sub`.
 */
export class TokenService {
  readonly tokenType = 'bearer';
  private readonly now: () => Date;

  constructor(private readonly options: TokenServiceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  issue(userId: string): string {
    return jwt.sign({ sub: userId, iat: this.nowSeconds() }, this.options.secret, {
      algorithm: this.options.algorithm,
      expiresIn: this.options.expiresInMinutes * 60,
    });
  }

  /**
   * Verify signature and expiry and return the user id.
   * Throws InvalidTokenError with reason `malformed`, `invalid` or `expired`.
   */
  verify(token: string): string {
    if (jwt.decode(token) === null) {
      throw new InvalidTokenError('malformed');
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: [this.options.algorithm],
        clockTimestamp: this.nowSeconds(),
        // jsonwebtoken rejects at now >= exp; a token is still valid at exactly exp
        clockTolerance: 1,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new InvalidTokenError('expired');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new InvalidTokenError('invalid', error.message);
      }
      throw error;
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
      throw new InvalidTokenError('malformed', 'Token has no subject claim');
    }
    return payload.sub;
  }

  private nowSeconds(): number {
    return Math.floor(this.now().getTime() / 1000);
  }
}
