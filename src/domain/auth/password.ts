import { hash, verify } from 'argon2';

export const PASSWORD_MIN_LENGTH = 6;
export const PASSWORD_MAX_LENGTH = 100;

/**
 * Argon2 password hashing.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * A malformed stored hash counts as a mismatch, never as an error.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
