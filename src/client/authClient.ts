import { z } from 'zod';
import { jsonHeaders } from './authHeaders.js';
import { UnexpectedStatusError } from './errors.js';
import { type ClientOptions, type FetchFn, joinUrl, parseBody, send } from './http.js';
import type { TokenStore } from './tokenStore.js';
import type { Credentials } from './types.js';

const loginResponseSchema = z.object({
  access_token: z.string(),
});

/**
 * Register, log in and log out. Login is the only path that writes the
 * token store; logout is the only path that clears it.
 */
export class AuthClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly tokenStore: TokenStore,
    options: ClientOptions
  ) {
    this.baseUrl = options.baseUrl;
    this.fetchFn = options.fetch ?? fetch;
  }

  /** Succeeds only on 201. Leaves the token store alone. */
  async register(email: string, password: string): Promise<void> {
    const credentials: Credentials = { email, password };
    const response = await send(
      this.fetchFn,
      'POST',
      joinUrl(this.baseUrl, '/register'),
      jsonHeaders(),
      credentials
    );

    if (response.status === 201) return;

    throw new UnexpectedStatusError(response.status, response.body);
  }

  /**
   * Succeeds only on 200 with an `access_token` string in the body, which
   * then replaces any stored token.
   */
  async login(email: string, password: string): Promise<void> {
    const credentials: Credentials = { email, password };
    const response = await send(
      this.fetchFn,
      'POST',
      joinUrl(this.baseUrl, '/login'),
      jsonHeaders(),
      credentials
    );

    if (response.status === 200) {
      const data = parseBody(loginResponseSchema, response.body, 'login');
      await this.tokenStore.saveToken(data.access_token);
      return;
    }

    throw new UnexpectedStatusError(response.status, response.body);
  }

  async logout(): Promise<void> {
    await this.tokenStore.clearToken();
  }
}
