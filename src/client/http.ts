import type { z } from 'zod';
import { TransportError } from './errors.js';

export type FetchFn = typeof fetch;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface ApiResponse {
  status: number;
  /** Raw response text, kept verbatim for error reporting. */
  body: string;
}

export interface ClientOptions {
  baseUrl: string;
  /** Defaults to the global fetch. */
  fetch?: FetchFn;
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

/**
 * Issue one request and read the whole body as text.
 * Only network-level failures throw; every HTTP status is returned.
 */
export async function send(
  fetchFn: FetchFn,
  method: HttpMethod,
  url: string,
  headers: Record<string, string>,
  payload?: unknown
): Promise<ApiResponse> {
  const init: RequestInit = { method, headers };
  if (payload !== undefined) {
    init.body = JSON.stringify(payload);
  }

  let response: Response;
  try {
    response = await fetchFn(url, init);
  } catch (error) {
    throw new TransportError(
      `Network error: ${method} ${url}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  try {
    return { status: response.status, body: await response.text() };
  } catch (error) {
    throw new TransportError(`Failed to read response body: ${method} ${url}`, { cause: error });
  }
}

/**
 * Parse a JSON body against a schema. A body that is not JSON, or not the
 * expected shape, is a malformed response.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: string, what: string): z.infer<S> {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new TransportError(`Malformed ${what} response: body is not JSON`, { cause: error });
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new TransportError(`Malformed ${what} response`, { cause: result.error });
  }
  return result.data;
}
