import type { User } from '../domain/auth/user.js';
import type { Note, NoteDraft } from '../domain/notes/note.js';
import type { NoteRepo } from '../infra/db/noteRepo.js';
import type { UserRepo } from '../infra/db/userRepo.js';

/** Stand-in for UserRepo so tests run without Postgres. */
export class InMemoryUserRepo implements UserRepo {
  readonly users: User[] = [];
  private nextId = 1;

  async findByEmail(email: string): Promise<User | null> {
    return this.users.find((u) => u.email === email) ?? null;
  }

  async create(email: string, passwordHash: string): Promise<User> {
    const user: User = { id: this.nextId++, email, passwordHash, createdAt: new Date() };
    this.users.push(user);
    return user;
  }
}

/** Stand-in for NoteRepo with the same owner scoping and newest-first order. */
export class InMemoryNoteRepo implements NoteRepo {
  notes: Note[] = [];
  private nextId = 1;

  async listByOwner(ownerEmail: string): Promise<Note[]> {
    return this.notes.filter((n) => n.ownerEmail === ownerEmail).sort((a, b) => b.id - a.id);
  }

  async create(ownerEmail: string, draft: NoteDraft): Promise<Note> {
    const note: Note = {
      id: this.nextId++,
      ownerEmail,
      title: draft.title,
      content: draft.content,
      createdAt: new Date('2024-05-01T10:00:00.000Z'),
    };
    this.notes.push(note);
    return note;
  }

  async update(id: number, ownerEmail: string, draft: NoteDraft): Promise<Note | null> {
    const index = this.notes.findIndex((n) => n.id === id && n.ownerEmail === ownerEmail);
    if (index === -1) {
      return null;
    }
    const updated: Note = { ...this.notes[index], title: draft.title, content: draft.content };
    this.notes[index] = updated;
    return updated;
  }

  async delete(id: number, ownerEmail: string): Promise<boolean> {
    const before = this.notes.length;
    this.notes = this.notes.filter((n) => !(n.id === id && n.ownerEmail === ownerEmail));
    return this.notes.length < before;
  }
}
