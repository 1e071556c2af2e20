import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { FileTokenStore, MemoryTokenStore } from '../tokenStore.js';

describe('FileTokenStore', () => {
  let dir: string;
  let tokenFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'notes-vault-'));
    tokenFile = join(dir, 'nested', 'token.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return null when nothing was saved', async () => {
    const store = new FileTokenStore(tokenFile);
    expect(await store.readToken()).toBeNull();
  });

  it('should persist the token under the access_token key', async () => {
    const store = new FileTokenStore(tokenFile);
    await store.saveToken('abc');

    expect(await store.readToken()).toBe('abc');
    expect(await readFile(tokenFile, 'utf-8')).toBe('{"access_token":"abc"}');
  });

  it('should keep the file private to the current user', async () => {
    await new FileTokenStore(tokenFile).saveToken('abc');

    const { mode } = await stat(tokenFile);
    expect(mode & 0o777).toBe(0o600);
  });

  it('should restrict an existing token file to the owner', async () => {
    await mkdir(dirname(tokenFile), { recursive: true });
    await writeFile(tokenFile, '{}');
    await chmod(tokenFile, 0o644);

    await new FileTokenStore(tokenFile).saveToken('abc');

    const { mode } = await stat(tokenFile);
    expect(mode & 0o777).toBe(0o600);
  });

  it('should overwrite the previous token', async () => {
    const store = new FileTokenStore(tokenFile);
    await store.saveToken('first');
    await store.saveToken('second');

    expect(await store.readToken()).toBe('second');
  });

  it('should survive a restart', async () => {
    await new FileTokenStore(tokenFile).saveToken('abc');

    expect(await new FileTokenStore(tokenFile).readToken()).toBe('abc');
  });

  it('should clear the token and tolerate clearing twice', async () => {
    const store = new FileTokenStore(tokenFile);
    await store.saveToken('abc');

    await store.clearToken();
    await store.clearToken();

    expect(await store.readToken()).toBeNull();
  });

  it('should propagate a corrupt token file', async () => {
    const store = new FileTokenStore(join(dir, 'token.json'));
    await writeFile(join(dir, 'token.json'), 'not json');

    await expect(store.readToken()).rejects.toThrow(SyntaxError);
  });
});

describe('MemoryTokenStore', () => {
  it('should hold at most one token', async () => {
    const store = new MemoryTokenStore();
    expect(await store.readToken()).toBeNull();

    await store.saveToken('one');
    await store.saveToken('two');
    expect(await store.readToken()).toBe('two');

    await store.clearToken();
    await store.clearToken();
    expect(await store.readToken()).toBeNull();
  });
});
