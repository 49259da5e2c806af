import type pg from 'pg';
import type { NewUser, User, UserRepository } from '../../domain/auth/user.js';
import { isUuid, translateUniqueViolation } from './pgSupport.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
}

const USER_COLUMNS = 'id, username, email, password_hash, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class UserRepo implements UserRepository {
  constructor(private pool: pg.Pool) {}

  async findById(id: string): Promise<User | null> {
    if (!isUuid(id)) {
      return null;
    }
    return this.findOne(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, id);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, email);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, username);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (username, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [user.username, user.email, user.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      return translateUniqueViolation(error);
    }
  }

  private async findOne(sql: string, value: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(sql, [value]);
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }
}
