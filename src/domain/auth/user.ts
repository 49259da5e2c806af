import { characterLength } from '../text.js';

/**
 * User domain entity.
 * Immutable after creation; account management is not part of this service.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
}

/**
 * Persistence port for users.
 * `create` throws DuplicateKeyError when username or email is already stored.
 */
export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
}

export const USERNAME_MIN_LENGTH = 2;
export const USERNAME_MAX_LENGTH = 50;
export const PASSWORD_MIN_LENGTH = 6;

export function isValidUsernameLength(username: string): boolean {
  const length = characterLength(username);
  return length >= USERNAME_MIN_LENGTH && length <= USERNAME_MAX_LENGTH;
}
