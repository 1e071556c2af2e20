import { Password } from '../../domain/auth/password.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { UnauthorizedError } from '../errors.js';
import { issueAccessToken, type TokenSettings } from './tokens.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepo,
    private tokenSettings: TokenSettings
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    // Same message for unknown email and wrong password
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      throw new UnauthorizedError('Invalid email or password');
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError('Invalid email or password');
    }

    return {
      accessToken: issueAccessToken(user.email, this.tokenSettings),
      tokenType: 'bearer',
    };
  }
}
