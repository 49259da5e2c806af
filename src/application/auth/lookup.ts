import type { User, UserRepository } from '../../domain/auth/user.js';
import { NotFoundError } from '../errors.js';

export class LookupUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(userId: string): Promise<User> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }
}
