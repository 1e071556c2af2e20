import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ApplicationError } from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function isMalformedJson(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

const clientErrorCodes: Record<number, string> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

/** 4xx raised by express or body-parser (`http-errors` with `expose`). */
function exposedClientStatus(err: Error): number | null {
  if (!('expose' in err) || err.expose !== true) return null;
  const status =
    'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status >= 500) return null;
  return status;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof ApplicationError) {
    const response: ErrorResponse = {
      code: err.code,
      message: err.message,
    };
    res.status(err.status).json(response);
    return;
  }

  if (isMalformedJson(err)) {
    const response: ErrorResponse = {
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON',
    };
    res.status(400).json(response);
    return;
  }

  const clientStatus = exposedClientStatus(err);
  if (clientStatus !== null) {
    const response: ErrorResponse = {
      code: clientErrorCodes[clientStatus] ?? 'BAD_REQUEST',
      message: err.message,
    };
    res.status(clientStatus).json(response);
    return;
  }

  // Anything else is a bug or an infrastructure failure
  console.error('Unhandled error:', err);
  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
