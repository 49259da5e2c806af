import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  const required = {
    DATABASE_URL: 'postgres://localhost:5432/blog_test',
    JWT_SECRET: 'test-secret',
  };

  it('should apply defaults', () => {
    expect(loadConfig(required)).toEqual({
      port: 3000,
      databaseUrl: 'postgres://localhost:5432/blog_test',
      jwt: { secret: 'test-secret', algorithm: 'HS256', expiresInMinutes: 1440 },
      corsOrigins: '*',
      logLevel: 'info',
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...required,
      PORT: '8080',
      JWT_ALGORITHM: 'HS512',
      ACCESS_TOKEN_EXPIRE_MINUTES: '60',
      CORS_ORIGINS: 'https://blog.example.com, https://admin.example.com',
      LOG_LEVEL: 'debug',
    });

    expect(config.port).toBe(8080);
    expect(config.jwt.algorithm).toBe('HS512');
    expect(config.jwt.expiresInMinutes).toBe(60);
    expect(config.corsOrigins).toEqual(['https://blog.example.com', 'https://admin.example.com']);
    expect(config.logLevel).toBe('debug');
  });

  it('should require a JWT secret', () => {
    expect(() => loadConfig({ DATABASE_URL: required.DATABASE_URL })).toThrow(ZodError);
  });

  it('should reject algorithms that are not HMAC', () => {
    expect(() => loadConfig({ ...required, JWT_ALGORITHM: 'none' })).toThrow(ZodError);
  });

  it('should reject a non-positive expiry', () => {
    expect(() => loadConfig({ ...required, ACCESS_TOKEN_EXPIRE_MINUTES: '0' })).toThrow(ZodError);
  });
});
