import express from 'express';
import cors from 'cors';
import { IdentityResolver } from '../../application/auth/identity.js';
import { LookupUserUseCase } from '../../application/auth/lookup.js';
import type { TokenService } from '../../application/auth/tokens.js';
import type { UserRepository } from '../../domain/auth/user.js';
import type { CommentRepository } from '../../domain/engagement/comment.js';
import type { VoteRepository } from '../../domain/engagement/vote.js';
import type { TraceLogger } from '../logging/traceLogger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createEngagementRoutes } from './routes/engagement.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { authenticate } from './middleware/auth.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { REQUEST_ID_HEADER, requestId } from './middleware/requestId.js';

export const SERVICE_NAME = 'Blog Engagement API';
export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
  users: UserRepository;
  votes: VoteRepository;
  comments: CommentRepository;
  tokens: TokenService;
  logger: TraceLogger;
  corsOrigins: string[] | '*';
  /** Resolves when the database answers a trivial query. */
  checkDatabase: () => Promise<unknown>;
}

const HEALTH_CHECK_TIMEOUT_MS = 2000;

/**
 * Race a promise against a timer; the timer is cleared either way.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const { logger } = deps;
  const app = express();
  const identity = new IdentityResolver(deps.tokens, new LookupUserUseCase(deps.users));

  // Correlation id first so every later log line and error response carries it
  app.use(requestId(logger));
  app.use(
    cors({
      origin: deps.corsOrigins === '*' ? true : deps.corsOrigins,
      credentials: true,
      exposedHeaders: [REQUEST_ID_HEADER],
    })
  );
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      database: 'PostgreSQL',
    });
  });

  // Liveness, no dependencies
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Readiness, requires the database
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.checkDatabase(), HEALTH_CHECK_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        logger.warn(`Health check failed: ${error instanceof Error ? error.message : String(error)}`);
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  // Identity is resolved only where routes use it; liveness and docs never touch the user store
  const identify = authenticate(identity, logger);
  app.use('/auth', identify, createAuthRoutes(deps));
  app.use('/posts', identify, createEngagementRoutes(deps));

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
