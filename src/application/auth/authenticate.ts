import type { User } from '../../domain/auth/user.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { UnauthorizedError } from '../errors.js';
import { readAccessToken } from './tokens.js';

/**
 * Resolve a bearer token to the user it was issued for. A valid token whose
 * user no longer exists is rejected like an invalid one.
 */
export class AuthenticateUseCase {
  constructor(
    private userRepo: UserRepo,
    private jwtSecret: string
  ) {}

  async execute(token: string): Promise<User> {
    const email = readAccessToken(token, this.jwtSecret);
    if (!email) {
      throw new UnauthorizedError('Invalid or expired token');
    }

    const user = await this.userRepo.findByEmail(email);
    if (!user) {
      throw new UnauthorizedError('User not found');
    }
    return user;
  }
}
