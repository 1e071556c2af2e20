import { Password } from '../../domain/auth/password.js';
import type { UserRepo } from '../../infra/db/userRepo.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  email: string;
  password: string;
}

export interface RegisterResult {
  userId: number;
  email: string;
}

export class RegisterUseCase {
  constructor(private userRepo: UserRepo) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const existing = await this.userRepo.findByEmail(command.email);
    if (existing) {
      throw new ConflictError('Email already registered');
    }

    const passwordHash = await Password.hash(command.password);
    const user = await this.userRepo.create(command.email, passwordHash);

    return {
      userId: user.id,
      email: user.email,
    };
  }
}
