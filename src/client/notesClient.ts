import { z } from 'zod';
import type { AuthHeaders } from './authHeaders.js';
import { SessionExpiredError, UnexpectedStatusError } from './errors.js';
import {
  type ApiResponse,
  type ClientOptions,
  type FetchFn,
  type HttpMethod,
  joinUrl,
  parseBody,
  send,
} from './http.js';
import type { Note, NoteId } from './types.js';

const noteListSchema = z.array(
  z
    .object({
      title: z.string(),
      content: z.string(),
    })
    .passthrough()
);

export class NotesClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly headers: AuthHeaders,
    options: ClientOptions
  ) {
    this.baseUrl = options.baseUrl;
    this.fetchFn = options.fetch ?? fetch;
  }

  /** Fresh snapshot of the user's notes, in server order. */
  async listNotes(): Promise<Note[]> {
    const response = await this.authorized('GET', '/notes', 200);
    return parseBody(noteListSchema, response.body, 'notes list');
  }

  async createNote(title: string, content: string): Promise<void> {
    await this.authorized('POST', '/notes', 201, { title, content });
  }

  async updateNote(id: NoteId, title: string, content: string): Promise<void> {
    await this.authorized('PUT', `/notes/${encodeURIComponent(String(id))}`, 200, { title, content });
  }

  async deleteNote(id: NoteId): Promise<void> {
    await this.authorized('DELETE', `/notes/${encodeURIComponent(String(id))}`, 200);
  }

  /**
   * Send with the current bearer token. 401 always means the session is
   * gone; the stored token is left for the caller to clear.
   */
  private async authorized(
    method: HttpMethod,
    path: string,
    expectedStatus: number,
    payload?: unknown
  ): Promise<ApiResponse> {
    const response = await send(
      this.fetchFn,
      method,
      joinUrl(this.baseUrl, path),
      await this.headers.jsonHeadersWithAuth(),
      payload
    );

    if (response.status === expectedStatus) return response;
    if (response.status === 401) {
      throw new SessionExpiredError();
    }
    throw new UnexpectedStatusError(response.status, response.body);
  }
}
