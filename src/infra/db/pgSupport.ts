import pg from 'pg';
import { z } from 'zod';
import { DuplicateKeyError } from '../../application/errors.js';

const UNIQUE_VIOLATION = '23505';

export const USERS_USERNAME_KEY = 'users_username_key';
export const USERS_EMAIL_KEY = 'users_email_key';
export const VOTES_USER_POST_KEY = 'votes_user_id_post_slug_key';

const uuidSchema = z.string().uuid();

/**
 * Ids are UUID columns; anything else can never match and would make
 * Postgres reject the query, so callers treat it as "not found".
 */
export function isUuid(value: string): boolean {
  return uuidSchema.safeParse(value).success;
}

/**
 * Translate a unique violation into DuplicateKeyError, rethrow anything else.
 */
export function translateUniqueViolation(error: unknown): never {
  if (error instanceof pg.DatabaseError && error.code === UNIQUE_VIOLATION) {
    throw new DuplicateKeyError(error.constraint ?? 'unknown');
  }
  throw error;
}
