import { characterLength } from '../text.js';
import { InvalidCommentTextError } from './errors.js';

export const COMMENT_MIN_LENGTH = 1;
export const COMMENT_MAX_LENGTH = 2000;

export interface Comment {
  readonly id: string;
  readonly userId: string;
  readonly postSlug: string;
  readonly text: string;
  readonly createdAt: Date;
}

/**
 * Comment joined with its author's username (null when the author no longer exists).
 */
export interface CommentWithAuthor extends Comment {
  readonly authorUsername: string | null;
}

export interface CommentRepository {
  /** Newest first. */
  listByPost(postSlug: string): Promise<CommentWithAuthor[]>;
  findById(id: string): Promise<Comment | null>;
  insert(userId: string, postSlug: string, text: string): Promise<Comment>;
  delete(id: string): Promise<void>;
}

export function validateCommentText(text: string): string {
  const length = characterLength(text);
  if (length < COMMENT_MIN_LENGTH) {
    throw new InvalidCommentTextError('Comment text must not be empty');
  }
  if (length > COMMENT_MAX_LENGTH) {
    throw new InvalidCommentTextError(
      `Comment text must be at most ${COMMENT_MAX_LENGTH} characters`
    );
  }
  return text;
}
