import { type NoteView, toNoteView } from '../../domain/notes/note.js';
import type { NoteRepo } from '../../infra/db/noteRepo.js';

export class NoteQueries {
  constructor(private noteRepo: NoteRepo) {}

  async listNotes(ownerEmail: string): Promise<NoteView[]> {
    const notes = await this.noteRepo.listByOwner(ownerEmail);
    return notes.map(toNoteView);
  }
}
