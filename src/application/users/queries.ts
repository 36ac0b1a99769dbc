import type { UserProfile } from '../../domain/users/user.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { NotFoundError, ValidationError } from '../errors.js';

/**
 * The `name` search parameter, which must be a single non-empty string.
 */
export function parseSearchTerm(value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(
      'Missing Parameter',
      "Please provide a 'name' query parameter to search."
    );
  }
  return value;
}

export class UserQueries {
  constructor(private userRepo: UserRepo) {}

  async listUsers(): Promise<UserProfile[]> {
    return this.userRepo.list();
  }

  async getUser(id: number): Promise<UserProfile> {
    const user = await this.userRepo.findById(id);
    if (!user) {
      throw new NotFoundError();
    }
    return user;
  }

  /**
   * An empty result is a valid answer, never a not-found.
   */
  async searchByName(term: string): Promise<UserProfile[]> {
    return this.userRepo.searchByName(term);
  }
}
