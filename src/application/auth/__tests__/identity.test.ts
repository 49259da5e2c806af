import { describe, it, expect, beforeEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { IdentityResolver } from '../identity.js';
import { LookupUserUseCase } from '../lookup.js';
import { TokenService } from '../tokens.js';
import type { User } from '../../../domain/auth/user.js';
import { InMemoryUserRepo } from '../../../testing/inMemoryRepos.js';
import { silentLogger } from '../../../testing/silentLogger.js';

describe('IdentityResolver', () => {
  const tokens = new TokenService({ secret: 'test-secret', algorithm: 'HS256', expiresInMinutes: 1440 });
  let users: InMemoryUserRepo;
  let resolver: IdentityResolver;
  let alice: User;

  beforeEach(async () => {
    users = new InMemoryUserRepo();
    resolver = new IdentityResolver(tokens, new LookupUserUseCase(users));
    alice = await users.create({ username: 'alice', email: 'a@x.com', passwordHash: 'hash' });
  });

  it('should resolve a valid token to its user', async () => {
    await expect(resolver.resolve(tokens.issue(alice.id), silentLogger)).resolves.toEqual(alice);
  });

  it('should resolve to null without a token', async () => {
    await expect(resolver.resolve(undefined, silentLogger)).resolves.toBeNull();
  });

  it('should resolve to null for a malformed token', async () => {
    await expect(resolver.resolve('garbage', silentLogger)).resolves.toBeNull();
  });

  it('should resolve to null for an expired token', async () => {
    const expired = jwt.sign({ sub: alice.id, exp: Math.floor(Date.now() / 1000) - 60 }, 'test-secret');

    await expect(resolver.resolve(expired, silentLogger)).resolves.toBeNull();
  });

  it('should resolve to null when the subject no longer exists', async () => {
    await expect(resolver.resolve(tokens.issue('deleted-user'), silentLogger)).resolves.toBeNull();
  });

  it('should propagate storage failures', async () => {
    vi.spyOn(users, 'findById').mockRejectedValueOnce(new Error('database unreachable'));

    await expect(resolver.resolve(tokens.issue(alice.id), silentLogger)).rejects.toThrow(
      'database unreachable'
    );
  });
});
