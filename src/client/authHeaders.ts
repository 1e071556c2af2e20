import type { TokenStore } from './tokenStore.js';

export type HeaderMap = Record<string, string>;

export function jsonHeaders(): HeaderMap {
  return { 'Content-Type': 'application/json' };
}

/**
 * Builds request headers from whatever token is stored at call time.
 * A missing token is not an error here: the server answers 401 and the
 * caller sees a session-expired failure.
 */
export class AuthHeaders {
  constructor(private readonly tokenStore: TokenStore) {}

  jsonHeaders(): HeaderMap {
    return jsonHeaders();
  }

  async jsonHeadersWithAuth(): Promise<HeaderMap> {
    const headers = jsonHeaders();
    const token = await this.tokenStore.readToken();

    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }
}
