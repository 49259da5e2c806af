import type pg from 'pg';
import type { Vote, VoteCounts, VoteKind, VoteRepository } from '../../domain/engagement/vote.js';
import { parseVoteKind } from '../../domain/engagement/vote.js';
import { translateUniqueViolation } from './pgSupport.js';

interface VoteRow {
  id: string;
  user_id: string;
  post_slug: string;
  vote_type: string;
  created_at: Date;
  updated_at: Date;
}

const VOTE_COLUMNS = 'id, user_id, post_slug, vote_type, created_at, updated_at';

function toVote(row: VoteRow): Vote {
  return {
    id: row.id,
    userId: row.user_id,
    postSlug: row.post_slug,
    kind: parseVoteKind(row.vote_type),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class VoteRepo implements VoteRepository {
  constructor(private pool: pg.Pool) {}

  async findByUserAndPost(userId: string, postSlug: string): Promise<Vote | null> {
    const result = await this.pool.query<VoteRow>(
      `SELECT ${VOTE_COLUMNS} FROM votes WHERE user_id = $1 AND post_slug = $2`,
      [userId, postSlug]
    );
    const row = result.rows[0];
    return row ? toVote(row) : null;
  }

  async insert(userId: string, postSlug: string, kind: VoteKind): Promise<Vote> {
    try {
      const result = await this.pool.query<VoteRow>(
        `INSERT INTO votes (user_id, post_slug, vote_type)
         VALUES ($1, $2, $3)
         RETURNING ${VOTE_COLUMNS}`,
        [userId, postSlug, kind]
      );
      return toVote(result.rows[0]);
    } catch (error) {
      return translateUniqueViolation(error);
    }
  }

  async updateKind(id: string, kind: VoteKind): Promise<void> {
    await this.pool.query('UPDATE votes SET vote_type = $2, updated_at = NOW() WHERE id = $1', [
      id,
      kind,
    ]);
  }

  async delete(id: string): Promise<void> {
    await this.pool.query('DELETE FROM votes WHERE id = $1', [id]);
  }

  async countByPost(postSlug: string): Promise<VoteCounts> {
    const result = await this.pool.query<{ upvotes: number; downvotes: number }>(
      `SELECT
         COUNT(*) FILTER (WHERE vote_type = 'up')::int AS upvotes,
         COUNT(*) FILTER (WHERE vote_type = 'down')::int AS downvotes
       FROM votes
       WHERE post_slug = $1`,
      [postSlug]
    );
    const row = result.rows[0];
    return { upvotes: row.upvotes, downvotes: row.downvotes };
  }
}
