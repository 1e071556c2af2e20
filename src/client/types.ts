export interface Credentials {
  email: string;
  password: string;
}

/**
 * A note as returned by the server. Only `title` and `content` are read by
 * the client; server-assigned fields such as `id` pass through untouched.
 */
export interface Note {
  title: string;
  content: string;
  [field: string]: unknown;
}

export type NoteId = string | number;
