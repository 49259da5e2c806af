import { argon2id, hash, verify } from 'argon2';

// Salt is generated per hash and embedded in the encoded output
const HASH_OPTIONS = { type: argon2id } as const;

/**
 * Salted one-way hashing for stored credentials.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return hash(plainPassword, HASH_OPTIONS);
  }

  /**
   * A stored hash that argon2 cannot parse never matches.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
