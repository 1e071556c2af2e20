import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { pool } from '../pool.js';
import { UserRepo } from '../userRepo.js';
import { NoteRepo } from '../noteRepo.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('Postgres repositories', () => {
  const userRepo = new UserRepo();
  const noteRepo = new NoteRepo();
  const owner = `repo-test-${Date.now()}@example.com`;
  const other = `repo-other-${Date.now()}@example.com`;

  beforeAll(async () => {
    await pool.query('SELECT 1');
  });

  afterEach(async () => {
    await pool.query('DELETE FROM notes WHERE owner_email IN ($1, $2)', [owner, other]);
  });

  afterAll(async () => {
    await pool.query('DELETE FROM users WHERE email IN ($1, $2)', [owner, other]);
    await pool.end();
  });

  it('should create and find a user by email', async () => {
    const created = await userRepo.create(owner, 'hash');
    const found = await userRepo.findByEmail(owner);

    expect(found).toEqual(created);
    expect(await userRepo.findByEmail('missing@example.com')).toBeNull();
  });

  it('should reject a second user with the same email', async () => {
    await expect(userRepo.create(owner, 'hash')).rejects.toThrow();
  });

  it('should list an owner notes newest first', async () => {
    await noteRepo.create(owner, { title: 'first', content: '1' });
    await noteRepo.create(other, { title: 'theirs', content: '' });
    await noteRepo.create(owner, { title: 'second', content: '2' });

    const notes = await noteRepo.listByOwner(owner);

    expect(notes.map((n) => n.title)).toEqual(['second', 'first']);
    expect(notes[0].createdAt).toBeInstanceOf(Date);
  });

  it('should only update and delete owned notes', async () => {
    const note = await noteRepo.create(owner, { title: 'T', content: 'C' });

    expect(await noteRepo.update(note.id, other, { title: 'x', content: 'y' })).toBeNull();
    expect(await noteRepo.delete(note.id, other)).toBe(false);

    const updated = await noteRepo.update(note.id, owner, { title: 'T2', content: 'C2' });
    expect(updated).toMatchObject({ id: note.id, title: 'T2', content: 'C2' });

    expect(await noteRepo.delete(note.id, owner)).toBe(true);
    expect(await noteRepo.listByOwner(owner)).toEqual([]);
  });
});
