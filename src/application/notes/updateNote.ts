import { type NoteView, toNoteView } from '../../domain/notes/note.js';
import type { NoteRepo } from '../../infra/db/noteRepo.js';
import { NotFoundError } from '../errors.js';

export interface UpdateNoteCommand {
  ownerEmail: string;
  noteId: number;
  title: string;
  content: string;
}

export class UpdateNoteUseCase {
  constructor(private noteRepo: NoteRepo) {}

  async execute(command: UpdateNoteCommand): Promise<NoteView> {
    const note = await this.noteRepo.update(command.noteId, command.ownerEmail, {
      title: command.title,
      content: command.content,
    });
    if (!note) {
      throw new NotFoundError('Note not found');
    }
    return toNoteView(note);
  }
}
