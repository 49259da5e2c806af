import dotenv from 'dotenv';
import { loadConfig } from '../../config.js';
import { TokenService } from '../../application/auth/tokens.js';
import { createPool } from '../db/pool.js';
import { ensureSchema } from '../db/schema.js';
import { UserRepo } from '../db/userRepo.js';
import { VoteRepo } from '../db/voteRepo.js';
import { CommentRepo } from '../db/commentRepo.js';
import { TraceLogger } from '../logging/traceLogger.js';
import { createApp } from './app.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new TraceLogger(config.logLevel);

  const pool = createPool(config.databaseUrl, logger);
  logger.info('Initializing database schema...');
  await ensureSchema(pool, logger);

  const app = createApp({
    users: new UserRepo(pool),
    votes: new VoteRepo(pool),
    comments: new CommentRepo(pool),
    tokens: new TokenService(config.jwt),
    logger,
    corsOrigins: config.corsOrigins,
    checkDatabase: () => pool.query('SELECT 1'),
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server running on http://localhost:${config.port}`);
    logger.info(`API docs: http://localhost:${config.port}/docs`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    server.close((closeError) => {
      if (closeError) {
        logger.error('Error closing HTTP server:', closeError);
      }
      pool
        .end()
        .then(() => {
          logger.info('Database pool closed');
          process.exit(closeError ? 1 : 0);
        })
        .catch((poolError: unknown) => {
          logger.error('Error closing database pool:', poolError);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
