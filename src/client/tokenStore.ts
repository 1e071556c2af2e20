import { chmod, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';

/** Key the token lives under inside the token file. */
export const TOKEN_KEY = 'access_token';

/**
 * Persistence for the single bearer token.
 * Presence of a token means the user is logged in.
 */
export interface TokenStore {
  saveToken(token: string): Promise<void>;
  /** Returns `null` when no token is stored. */
  readToken(): Promise<string | null>;
  /** Idempotent: clearing an empty store is not an error. */
  clearToken(): Promise<void>;
}

const tokenFileSchema = z.object({
  [TOKEN_KEY]: z.string().optional(),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps the token in a small JSON file readable only by the current user,
 * so it survives process restarts.
 */
export class FileTokenStore implements TokenStore {
  constructor(private readonly filePath: string) {}

  async saveToken(token: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true, mode: 0o700 });
    await writeFile(this.filePath, JSON.stringify({ [TOKEN_KEY]: token }), {
      encoding: 'utf-8',
      mode: 0o600,
    });
    // writeFile only applies `mode` when it creates the file
    await chmod(this.filePath, 0o600);
  }

  async readToken(): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const stored = tokenFileSchema.parse(JSON.parse(raw));
    return stored[TOKEN_KEY] ?? null;
  }

  async clearToken(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

export class MemoryTokenStore implements TokenStore {
  private token: string | null = null;

  async saveToken(token: string): Promise<void> {
    this.token = token;
  }

  async readToken(): Promise<string | null> {
    return this.token;
  }

  async clearToken(): Promise<void> {
    this.token = null;
  }
}
