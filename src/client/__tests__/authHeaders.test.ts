import { describe, it, expect } from 'vitest';
import { AuthHeaders, jsonHeaders } from '../authHeaders.js';
import { MemoryTokenStore } from '../tokenStore.js';

describe('AuthHeaders', () => {
  it('should build plain JSON headers', () => {
    const headers = new AuthHeaders(new MemoryTokenStore());

    expect(jsonHeaders()).toEqual({ 'Content-Type': 'application/json' });
    expect(headers.jsonHeaders()).toEqual({ 'Content-Type': 'application/json' });
  });

  it('should omit Authorization when no token is stored', async () => {
    const headers = new AuthHeaders(new MemoryTokenStore());

    expect(await headers.jsonHeadersWithAuth()).toEqual({ 'Content-Type': 'application/json' });
  });

  it('should omit Authorization for an empty token', async () => {
    const store = new MemoryTokenStore();
    await store.saveToken('');

    expect(await new AuthHeaders(store).jsonHeadersWithAuth()).toEqual({
      'Content-Type': 'application/json',
    });
  });

  it('should add a bearer header for a stored token', async () => {
    const store = new MemoryTokenStore();
    await store.saveToken('tok123');

    expect(await new AuthHeaders(store).jsonHeadersWithAuth()).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer tok123',
    });
  });

  it('should read the token on every call', async () => {
    const store = new MemoryTokenStore();
    const headers = new AuthHeaders(store);

    await store.saveToken('first');
    expect((await headers.jsonHeadersWithAuth()).Authorization).toBe('Bearer first');

    await store.clearToken();
    expect(await headers.jsonHeadersWithAuth()).not.toHaveProperty('Authorization');
  });
});
