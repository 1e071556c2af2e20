import type { NoteRepo } from '../../infra/db/noteRepo.js';
import { NotFoundError } from '../errors.js';

export interface DeleteNoteCommand {
  ownerEmail: string;
  noteId: number;
}

export class DeleteNoteUseCase {
  constructor(private noteRepo: NoteRepo) {}

  async execute(command: DeleteNoteCommand): Promise<void> {
    const deleted = await this.noteRepo.delete(command.noteId, command.ownerEmail);
    if (!deleted) {
      throw new NotFoundError('Note not found');
    }
  }
}
