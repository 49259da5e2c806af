import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import request from 'supertest';
import type express from 'express';
import type pg from 'pg';
import dotenv from 'dotenv';
import { TokenService } from '../../../application/auth/tokens.js';
import { silentLogger } from '../../../testing/silentLogger.js';
import { createPool } from '../../db/pool.js';
import { ensureSchema } from '../../db/schema.js';
import { UserRepo } from '../../db/userRepo.js';
import { VoteRepo } from '../../db/voteRepo.js';
import { CommentRepo } from '../../db/commentRepo.js';
import { createApp } from '../app.js';

dotenv.config();

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('E2E: signup, vote and comment flow', () => {
  let pool: pg.Pool;
  let app: express.Application;
  const suffix = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
  const postSlug = `e2e-post-${suffix}`;
  const userIds: string[] = [];

  beforeAll(async () => {
    pool = createPool(process.env.DATABASE_URL ?? '', silentLogger);
    await ensureSchema(pool, silentLogger);

    app = createApp({
      users: new UserRepo(pool),
      votes: new VoteRepo(pool),
      comments: new CommentRepo(pool),
      tokens: new TokenService({ secret: 'test-secret', algorithm: 'HS256', expiresInMinutes: 60 }),
      logger: silentLogger,
      corsOrigins: '*',
      checkDatabase: () => pool.query('SELECT 1'),
    });
  });

  afterAll(async () => {
    await pool.query('DELETE FROM votes WHERE post_slug = $1', [postSlug]);
    await pool.query('DELETE FROM comments WHERE post_slug = $1', [postSlug]);
    await pool.query('DELETE FROM users WHERE id = ANY($1::uuid[])', [userIds]);
    await pool.end();
  });

  const signup = async (name: string): Promise<string> => {
    const res = await request(app)
      .post('/auth/signup')
      .send({
        username: `${name}-${suffix}`.slice(0, 50),
        email: `e2e-${name}-${suffix}@example.com`,
        password: 'password123',
      });
    expect(res.status).toBe(200);
    userIds.push(res.body.user.id);
    return res.body.access_token;
  };

  it('reports the database as reachable', async () => {
    const res = await request(app).get('/healthz');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  it('completes the engagement workflow', async () => {
    const aliceToken = await signup('alice');
    const bobToken = await signup('bob');

    // 1. Signing in returns a token for the same user
    const signin = await request(app)
      .post('/auth/signin')
      .send({ email: `e2e-alice-${suffix}@example.com`, password: 'password123' });
    expect(signin.status).toBe(200);
    expect(signin.body.user.id).toBe(userIds[0]);

    // 2. Votes
    await request(app)
      .post(`/posts/${postSlug}/votes`)
      .set('Authorization', `Bearer ${aliceToken}`)
      .send({ vote_type: 'up' })
      .expect(200);
    const bobVote = await request(app)
      .post(`/posts/${postSlug}/votes`)
      .set('Authorization', `Bearer ${bobToken}`)
      .send({ vote_type: 'down' });
    expect(bobVote.body).toEqual({ upvotes: 1, downvotes: 1, user_vote: 'down' });

    const toggled = await request(app)
      .post(`/posts/${postSlug}/votes`)
      .set('Authorization', `Bearer ${aliceToken}`)
      .send({ vote_type: 'up' });
    expect(toggled.body).toEqual({ upvotes: 0, downvotes: 1, user_vote: null });

    // 3. Comments
    const created = await request(app)
      .post(`/posts/${postSlug}/comments`)
      .set('Authorization', `Bearer ${aliceToken}`)
      .send({ text: 'Nice write-up' });
    expect(created.status).toBe(200);
    const commentId: string = created.body.id;

    const listed = await request(app)
      .get(`/posts/${postSlug}/comments`)
      .set('Authorization', `Bearer ${bobToken}`);
    expect(listed.body).toHaveLength(1);
    expect(listed.body[0]).toMatchObject({
      id: commentId,
      username: `alice-${suffix}`.slice(0, 50),
      text: 'Nice write-up',
      is_own: false,
    });

    // 4. Only the author may delete
    await request(app)
      .delete(`/posts/${postSlug}/comments/${commentId}`)
      .set('Authorization', `Bearer ${bobToken}`)
      .expect(403);
    await request(app)
      .delete(`/posts/${postSlug}/comments/${commentId}`)
      .set('Authorization', `Bearer ${aliceToken}`)
      .expect(200);

    const after = await request(app).get(`/posts/${postSlug}/comments`);
    expect(after.body).toEqual([]);
  });

  it('rejects a concurrent duplicate signup with exactly one success', async () => {
    const body = {
      username: `race-${suffix}`.slice(0, 50),
      email: `e2e-race-${suffix}@example.com`,
      password: 'password123',
    };

    const results = await Promise.all([
      request(app).post('/auth/signup').send(body),
      request(app).post('/auth/signup').send(body),
    ]);
    for (const res of results) {
      if (res.status === 200) {
        userIds.push(res.body.user.id);
      }
    }

    expect(results.map((r) => r.status).sort()).toEqual([200, 400]);
    expect(results.find((r) => r.status === 400)?.body.code).toBe('DUPLICATE_FIELD');
  });
});
