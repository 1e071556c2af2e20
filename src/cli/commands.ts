import type { AuthClient } from '../client/authClient.js';
import { isNotesClientError } from '../client/errors.js';
import type { NotesClient } from '../client/notesClient.js';
import type { Note, NoteId } from '../client/types.js';

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  auth: AuthClient;
  notes: NotesClient;
  output: Output;
}

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_SESSION_EXPIRED = 2;

export function formatNote(note: Note): string {
  const id = note.id;
  const prefix = typeof id === 'number' || typeof id === 'string' ? `[${id}] ` : '';
  return `${prefix}${note.title}: ${note.content}`;
}

export async function registerCommand(ctx: CliContext, email: string, password: string): Promise<void> {
  await ctx.auth.register(email, password);
  ctx.output.log('Registered. You can log in now.');
}

export async function loginCommand(ctx: CliContext, email: string, password: string): Promise<void> {
  await ctx.auth.login(email, password);
  ctx.output.log(`Logged in as ${email}.`);
}

export async function logoutCommand(ctx: CliContext): Promise<void> {
  await ctx.auth.logout();
  ctx.output.log('Logged out.');
}

export async function listCommand(ctx: CliContext): Promise<void> {
  const notes = await ctx.notes.listNotes();
  if (notes.length === 0) {
    ctx.output.log('No notes yet.');
    return;
  }
  for (const note of notes) {
    ctx.output.log(formatNote(note));
  }
}

export async function addCommand(ctx: CliContext, title: string, content: string): Promise<void> {
  await ctx.notes.createNote(title, content);
  ctx.output.log('Note created.');
}

export async function editCommand(
  ctx: CliContext,
  id: NoteId,
  title: string,
  content: string
): Promise<void> {
  await ctx.notes.updateNote(id, title, content);
  ctx.output.log('Note updated.');
}

export async function removeCommand(ctx: CliContext, id: NoteId): Promise<void> {
  await ctx.notes.deleteNote(id);
  ctx.output.log('Note deleted.');
}

/**
 * Run one command and turn client failures into an exit code. A rejected
 * session forces a logout so the next command starts from a clean slate.
 * Anything that is not a client error is rethrown.
 */
export async function runCommand(ctx: CliContext, action: () => Promise<void>): Promise<number> {
  try {
    await action();
    return EXIT_OK;
  } catch (error) {
    if (!isNotesClientError(error)) {
      throw error;
    }

    if (error.kind === 'session_expired') {
      await ctx.auth.logout();
      ctx.output.error(`${error.message} (run: notes-vault login <email> -p <password>)`);
      return EXIT_SESSION_EXPIRED;
    }

    ctx.output.error(error.message);
    return EXIT_FAILED;
  }
}
