import { pool } from './pool.js';
import type { Note, NoteDraft } from '../../domain/notes/note.js';

interface NoteRow {
  id: number;
  owner_email: string;
  title: string;
  content: string;
  created_at: Date;
}

const NOTE_COLUMNS = 'id, owner_email, title, content, created_at';

function toNote(row: NoteRow): Note {
  return {
    id: row.id,
    ownerEmail: row.owner_email,
    title: row.title,
    content: row.content,
    createdAt: row.created_at,
  };
}

/**
 * Every query is scoped by owner: a note that belongs to someone else is
 * indistinguishable from a missing one.
 */
export class NoteRepo {
  /** Newest first. */
  async listByOwner(ownerEmail: string): Promise<Note[]> {
    const result = await pool.query<NoteRow>(
      `SELECT ${NOTE_COLUMNS} FROM notes WHERE owner_email = $1 ORDER BY id DESC`,
      [ownerEmail]
    );
    return result.rows.map(toNote);
  }

  async create(ownerEmail: string, draft: NoteDraft): Promise<Note> {
    const result = await pool.query<NoteRow>(
      `INSERT INTO notes (owner_email, title, content)
       VALUES ($1, $2, $3)
       RETURNING ${NOTE_COLUMNS}`,
      [ownerEmail, draft.title, draft.content]
    );
    return toNote(result.rows[0]);
  }

  async update(id: number, ownerEmail: string, draft: NoteDraft): Promise<Note | null> {
    const result = await pool.query<NoteRow>(
      `UPDATE notes SET title = $3, content = $4
       WHERE id = $1 AND owner_email = $2
       RETURNING ${NOTE_COLUMNS}`,
      [id, ownerEmail, draft.title, draft.content]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toNote(result.rows[0]);
  }

  /** Returns false when no owned note matched. */
  async delete(id: number, ownerEmail: string): Promise<boolean> {
    const result = await pool.query('DELETE FROM notes WHERE id = $1 AND owner_email = $2', [
      id,
      ownerEmail,
    ]);
    return (result.rowCount ?? 0) > 0;
  }
}
