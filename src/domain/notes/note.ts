export const NOTE_TITLE_MAX_LENGTH = 255;
export const NOTE_CONTENT_MAX_LENGTH = 2000;
/** Largest `notes.id` a SERIAL column can hold. */
export const NOTE_ID_MAX = 2_147_483_647;

export interface Note {
  readonly id: number;
  readonly ownerEmail: string;
  readonly title: string;
  readonly content: string;
  readonly createdAt: Date;
}

export interface NoteDraft {
  title: string;
  content: string;
}

/** Wire shape served by the API. */
export interface NoteView {
  id: number;
  title: string;
  content: string;
  created_at: string;
}

export function toNoteView(note: Note): NoteView {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    created_at: note.createdAt.toISOString(),
  };
}
