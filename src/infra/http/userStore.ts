import { ApplicationError, StoreError } from '../../application/errors.js';
import { UserRepo } from '../db/userRepo.js';
import { withConnection, type ConnectionPool } from '../db/session.js';

/**
 * Runs one handler's store work on a connection scoped to that call.
 * Failures that are not already application errors become a StoreError
 * carrying `failureMessage`, the only detail a client gets to see.
 */
export type UserStore = <T>(
  failureMessage: string,
  work: (users: UserRepo) => Promise<T>
) => Promise<T>;

export function createUserStore(pool: ConnectionPool): UserStore {
  return async function runWithUsers<T>(
    failureMessage: string,
    work: (users: UserRepo) => Promise<T>
  ): Promise<T> {
    try {
      return await withConnection(pool, (client) => work(new UserRepo(client)));
    } catch (error) {
      if (error instanceof ApplicationError) {
        throw error;
      }
      throw new StoreError(failureMessage, { cause: error });
    }
  };
}
