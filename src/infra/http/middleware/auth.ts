import type { Request } from 'express';
import type { User } from '../../../domain/auth/user.js';
import { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { UnauthorizedError } from '../../../application/errors.js';
import type { UserRepo } from '../../db/userRepo.js';
import { asyncHandler } from './asyncHandler.js';

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Require `Authorization: Bearer <jwt>` for a known user. Every failure is a
 * 401 so clients can treat it as an expired session.
 */
export function authMiddleware(userRepo: UserRepo, jwtSecret: string) {
  const authenticate = new AuthenticateUseCase(userRepo, jwtSecret);

  return asyncHandler(async (req, _res, next) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }

    req.user = await authenticate.execute(authHeader.slice(BEARER_PREFIX.length));
    next();
  });
}

/** The user set by authMiddleware. */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
