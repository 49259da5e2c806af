import type pg from 'pg';
import type {
  Comment,
  CommentRepository,
  CommentWithAuthor,
} from '../../domain/engagement/comment.js';
import { isUuid } from './pgSupport.js';

interface CommentRow {
  id: string;
  user_id: string;
  post_slug: string;
  text: string;
  created_at: Date;
}

interface CommentWithAuthorRow extends CommentRow {
  username: string | null;
}

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    userId: row.user_id,
    postSlug: row.post_slug,
    text: row.text,
    createdAt: row.created_at,
  };
}

export class CommentRepo implements CommentRepository {
  constructor(private pool: pg.Pool) {}

  async listByPost(postSlug: string): Promise<CommentWithAuthor[]> {
    const result = await this.pool.query<CommentWithAuthorRow>(
      `SELECT c.id, c.user_id, c.post_slug, c.text, c.created_at, u.username
       FROM comments c
       LEFT JOIN users u ON u.id = c.user_id
       WHERE c.post_slug = $1
       ORDER BY c.created_at DESC, c.id DESC`,
      [postSlug]
    );
    return result.rows.map((row) => ({ ...toComment(row), authorUsername: row.username }));
  }

  async findById(id: string): Promise<Comment | null> {
    if (!isUuid(id)) {
      return null;
    }
    const result = await this.pool.query<CommentRow>(
      'SELECT id, user_id, post_slug, text, created_at FROM comments WHERE id = $1',
      [id]
    );
    const row = result.rows[0];
    return row ? toComment(row) : null;
  }

  async insert(userId: string, postSlug: string, text: string): Promise<Comment> {
    const result = await this.pool.query<CommentRow>(
      `INSERT INTO comments (user_id, post_slug, text)
       VALUES ($1, $2, $3)
       RETURNING id, user_id, post_slug, text, created_at`,
      [userId, postSlug, text]
    );
    return toComment(result.rows[0]);
  }

  async delete(id: string): Promise<void> {
    await this.pool.query('DELETE FROM comments WHERE id = $1', [id]);
  }
}
