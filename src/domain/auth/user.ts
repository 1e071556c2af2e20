/** Matches the `users.email` column width. */
export const EMAIL_MAX_LENGTH = 255;

/**
 * Registered account. Notes are owned by email, so `email` is the
 * identity that travels inside access tokens.
 */
export interface User {
  readonly id: number;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}
