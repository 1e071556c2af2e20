import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'http';
import jwt from 'jsonwebtoken';
import { createNotesApi, type NotesApi } from '../index.js';
import { MemoryTokenStore } from '../tokenStore.js';
import { SessionExpiredError, UnexpectedStatusError } from '../errors.js';
import { buildTestApp, TEST_JWT_SECRET } from '../../test/testApp.js';

// Client and service together over a real socket, with in-memory repos
describe('authenticated session against the service', () => {
  let server: Server;
  let baseUrl: string;
  let api: NotesApi;

  beforeAll(async () => {
    const { app } = buildTestApp();
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;

    const setupApi = createNotesApi({ baseUrl, tokenStore: new MemoryTokenStore() });
    await setupApi.auth.register('a@b.com', 'secret');
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  beforeEach(() => {
    api = createNotesApi({ baseUrl, tokenStore: new MemoryTokenStore() });
  });

  it('should log in, create and list notes with the stored token', async () => {
    await api.auth.login('a@b.com', 'secret');
    const token = await api.tokenStore.readToken();
    expect(jwt.verify(token ?? '', TEST_JWT_SECRET)).toMatchObject({ sub: 'a@b.com' });

    await api.notes.createNote('First', 'hello');
    await api.notes.createNote('Second', 'world');
    const notes = await api.notes.listNotes();

    expect(notes.map((n) => n.title)).toEqual(['Second', 'First']);
    expect(notes[0]).toMatchObject({ title: 'Second', content: 'world' });
    expect(notes[0]).toHaveProperty('id');
    expect(notes[0]).toHaveProperty('created_at');
  });

  it('should update and delete a note', async () => {
    await api.auth.login('a@b.com', 'secret');
    await api.notes.createNote('Draft', 'v1');
    const [created] = await api.notes.listNotes();
    const id = created.id;
    if (typeof id !== 'number') {
      throw new Error('Expected a numeric note id');
    }

    await api.notes.updateNote(id, 'Draft', 'v2');
    expect((await api.notes.listNotes()).find((n) => n.id === id)).toMatchObject({ content: 'v2' });

    await api.notes.deleteNote(id);
    expect((await api.notes.listNotes()).some((n) => n.id === id)).toBe(false);
    await expect(api.notes.deleteNote(id)).rejects.toMatchObject({ status: 404 });
  });

  it('should reject a second registration of the same email', async () => {
    const error = await api.auth.register('a@b.com', 'secret').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 409 });
  });

  it('should report wrong credentials as a plain failure', async () => {
    const error = await api.auth.login('a@b.com', 'wrong-password').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 401 });
    expect(await api.tokenStore.readToken()).toBeNull();
  });

  it('should raise session expired without a token', async () => {
    await expect(api.notes.listNotes()).rejects.toThrow(SessionExpiredError);
  });

  it('should raise session expired for an expired token and keep it stored', async () => {
    const expired = jwt.sign(
      { sub: 'a@b.com', exp: Math.floor(Date.now() / 1000) - 60 },
      TEST_JWT_SECRET
    );
    await api.tokenStore.saveToken(expired);

    await expect(api.notes.createNote('T', 'C')).rejects.toThrow(SessionExpiredError);
    expect(await api.tokenStore.readToken()).toBe(expired);
  });

  it('should raise session expired for a token signed with another key', async () => {
    await api.tokenStore.saveToken(jwt.sign({ sub: 'a@b.com' }, 'another-secret'));

    await expect(api.notes.listNotes()).rejects.toThrow(SessionExpiredError);
  });

  it('should end the session on logout', async () => {
    await api.auth.login('a@b.com', 'secret');
    await api.auth.logout();

    expect(await api.tokenStore.readToken()).toBeNull();
    await expect(api.notes.listNotes()).rejects.toThrow(SessionExpiredError);
  });
});
