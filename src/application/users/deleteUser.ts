import { UserRepo } from '../../infra/db/userRepo.js';
import { NotFoundError } from '../errors.js';

export class DeleteUserUseCase {
  constructor(private userRepo: UserRepo) {}

  async execute(id: number): Promise<void> {
    const deleted = await this.userRepo.delete(id);
    if (!deleted) {
      throw new NotFoundError();
    }
  }
}
