import { type NoteView, toNoteView } from '../../domain/notes/note.js';
import type { NoteRepo } from '../../infra/db/noteRepo.js';

export interface CreateNoteCommand {
  ownerEmail: string;
  title: string;
  content: string;
}

export class CreateNoteUseCase {
  constructor(private noteRepo: NoteRepo) {}

  async execute(command: CreateNoteCommand): Promise<NoteView> {
    const note = await this.noteRepo.create(command.ownerEmail, {
      title: command.title,
      content: command.content,
    });
    return toNoteView(note);
  }
}
