import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL environment variable is required'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(1440),
  CORS_ORIGINS: z.string().default('*'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  port: number;
  databaseUrl: string;
  jwt: {
    secret: string;
    algorithm: JwtAlgorithm;
    expiresInMinutes: number;
  };
  corsOrigins: string[] | '*';
  logLevel: LogLevel;
}

function parseOrigins(raw: string): string[] | '*' {
  const origins = raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  if (origins.length === 0 || origins.includes('*')) {
    return '*';
  }
  return origins;
}

/**
 * Read and validate configuration from environment variables.
 * Throws a ZodError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    jwt: {
      secret: parsed.JWT_SECRET,
      algorithm: parsed.JWT_ALGORITHM,
      expiresInMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
    },
    corsOrigins: parseOrigins(parsed.CORS_ORIGINS),
    logLevel: parsed.LOG_LEVEL,
  };
}
