import { hash, verify, argon2id } from 'argon2';

/**
 * Password hashing using Argon2id. The encoded hash embeds its own salt and
 * parameters, so verification needs nothing but the stored string.
 */
export class Password {
  /**
   * Hash a plain text password.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id });
  }

  /**
   * Verify a plain password against a stored hash.
   * A malformed hash verifies as false.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
