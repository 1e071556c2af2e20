/**
 * Failures surfaced by the notes API client.
 *
 * Every client error carries a `kind` tag so callers can branch with a
 * `switch` instead of inspecting messages:
 * - `transport`: the request never produced a usable response
 * - `unexpected_status`: the server answered with a status the call does not accept
 * - `session_expired`: an authenticated call was rejected with 401
 */
export class TransportError extends Error {
  readonly kind = 'transport' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnexpectedStatusError extends Error {
  readonly kind = 'unexpected_status' as const;

  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`Request failed (${status}): ${body}`);
    this.name = 'UnexpectedStatusError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SessionExpiredError extends Error {
  readonly kind = 'session_expired' as const;

  constructor(message = 'Session expired, please log in again') {
    super(message);
    this.name = 'SessionExpiredError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type NotesClientError = TransportError | UnexpectedStatusError | SessionExpiredError;

export function isNotesClientError(error: unknown): error is NotesClientError {
  return (
    error instanceof TransportError ||
    error instanceof UnexpectedStatusError ||
    error instanceof SessionExpiredError
  );
}
