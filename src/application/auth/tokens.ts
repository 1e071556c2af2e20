import jwt from 'jsonwebtoken';

export const TOKEN_ALGORITHM = 'HS256';

export interface TokenSettings {
  secret: string;
  expiresInMinutes: number;
}

/**
 * Access tokens carry the user's email as `sub` and nothing else.
 */
export function issueAccessToken(email: string, settings: TokenSettings): string {
  return jwt.sign({ sub: email }, settings.secret, {
    algorithm: TOKEN_ALGORITHM,
    expiresIn: settings.expiresInMinutes * 60,
  });
}

/**
 * Returns the subject email, or null when the token is malformed, expired,
 * signed with another key, or carries no subject.
 */
export function readAccessToken(token: string, secret: string): string | null {
  try {
    const payload = jwt.verify(token, secret, { algorithms: [TOKEN_ALGORITHM] });
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
      return null;
    }
    return payload.sub;
  } catch {
    return null;
  }
}
