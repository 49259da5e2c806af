import { Password } from '../../domain/auth/password.js';
import type { User, UserRepository } from '../../domain/auth/user.js';
import type { TraceLogger } from '../../infra/logging/traceLogger.js';
import { DuplicateFieldError, DuplicateKeyError } from '../errors.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
}

export class RegisterUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: RegisterCommand, logger: TraceLogger): Promise<User> {
    logger.database('Query', 'users', `email=${command.email}`);
    if (await this.userRepo.findByEmail(command.email)) {
      logger.auth('Signup Failed - Email Already Registered', command.email);
      throw new DuplicateFieldError('email');
    }

    logger.database('Query', 'users', `username=${command.username}`);
    if (await this.userRepo.findByUsername(command.username)) {
      logger.auth('Signup Failed - Username Taken', command.username);
      throw new DuplicateFieldError('username');
    }

    const passwordHash = await Password.hash(command.password);

    try {
      const user = await this.userRepo.create({
        username: command.username,
        email: command.email,
        passwordHash,
      });
      logger.database('Insert', 'users', `id=${user.id}`);
      logger.auth('User Signup Successful', command.email);
      return user;
    } catch (error) {
      // A concurrent signup won the race between the checks above and this insert
      if (error instanceof DuplicateKeyError) {
        throw new DuplicateFieldError(error.constraint.includes('email') ? 'email' : 'username');
      }
      throw error;
    }
  }
}
