import { AuthClient } from './authClient.js';
import { AuthHeaders } from './authHeaders.js';
import type { FetchFn } from './http.js';
import { NotesClient } from './notesClient.js';
import { FileTokenStore, type TokenStore } from './tokenStore.js';

export { AuthClient } from './authClient.js';
export { AuthHeaders, jsonHeaders } from './authHeaders.js';
export type { HeaderMap } from './authHeaders.js';
export { loadClientConfig, defaultTokenFile } from './config.js';
export type { ClientConfig } from './config.js';
export {
  TransportError,
  UnexpectedStatusError,
  SessionExpiredError,
  isNotesClientError,
} from './errors.js';
export type { NotesClientError } from './errors.js';
export type { ClientOptions, FetchFn } from './http.js';
export { NotesClient } from './notesClient.js';
export { FileTokenStore, MemoryTokenStore, TOKEN_KEY } from './tokenStore.js';
export type { TokenStore } from './tokenStore.js';
export type { Credentials, Note, NoteId } from './types.js';

export interface NotesApi {
  tokenStore: TokenStore;
  auth: AuthClient;
  notes: NotesClient;
}

export interface CreateNotesApiOptions {
  baseUrl: string;
  /** Ignored when `tokenStore` is given. */
  tokenFile?: string;
  tokenStore?: TokenStore;
  fetch?: FetchFn;
}

/**
 * Wire one token store into the auth client and the notes client so both
 * see the same login state.
 */
export function createNotesApi(options: CreateNotesApiOptions): NotesApi {
  let tokenStore = options.tokenStore;
  if (!tokenStore) {
    if (!options.tokenFile) {
      throw new Error('createNotesApi needs either a tokenStore or a tokenFile');
    }
    tokenStore = new FileTokenStore(options.tokenFile);
  }

  const clientOptions = { baseUrl: options.baseUrl, fetch: options.fetch };
  return {
    tokenStore,
    auth: new AuthClient(tokenStore, clientOptions),
    notes: new NotesClient(new AuthHeaders(tokenStore), clientOptions),
  };
}
