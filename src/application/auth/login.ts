import { Password } from '../../domain/auth/password.js';
import type { User, UserRepository } from '../../domain/auth/user.js';
import type { TraceLogger } from '../../infra/logging/traceLogger.js';
import { UnauthorizedError } from '../errors.js';

export interface LoginCommand {
  email: string;
  password: string;
}

const INVALID_CREDENTIALS = 'Invalid email or password';

export class LoginUseCase {
  constructor(private userRepo: UserRepository) {}

  /**
   * Unknown email and wrong password fail with the same error.
   */
  async execute(command: LoginCommand, logger: TraceLogger): Promise<User> {
    logger.database('Query', 'users', `email=${command.email}`);
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      logger.auth('Signin Failed - User Not Found', command.email);
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      logger.auth('Signin Failed - Invalid Password', command.email);
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    logger.auth('User Signin Successful', command.email);
    return user;
  }
}
