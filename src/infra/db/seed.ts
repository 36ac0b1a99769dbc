import { Password } from '../../domain/users/password.js';
import { UserRepo } from './userRepo.js';
import { withConnection, type ConnectionPool } from './session.js';

export interface SeedUser {
  name: string;
  email: string;
  password: string;
}

export const SAMPLE_USERS: readonly SeedUser[] = [
  { name: 'John Doe', email: 'john@example.com', password: 'password123' },
  { name: 'Jane Smith', email: 'jane@example.com', password: 'secret456' },
  { name: 'Bob Johnson', email: 'bob@example.com', password: 'qwerty789' },
  { name: 'Diana Prince', email: 'diana@example.com', password: 'securepass' },
  { name: 'Eve Adams', email: 'eve@example.com', password: 'evepassword' },
];

/**
 * Replace every row of the users table with `users`, in one transaction.
 * Returns the assigned ids in input order.
 */
export async function seedUsers(
  pool: ConnectionPool,
  users: readonly SeedUser[] = SAMPLE_USERS
): Promise<number[]> {
  const hashed = await Promise.all(
    users.map(async (user) => ({
      name: user.name,
      email: user.email,
      passwordHash: await Password.hash(user.password),
    }))
  );

  return withConnection(pool, async (client) => {
    const repo = new UserRepo(client);
    try {
      await client.query('BEGIN');
      await repo.deleteAll();

      const ids: number[] = [];
      for (const user of hashed) {
        ids.push(await repo.create(user));
      }

      await client.query('COMMIT');
      return ids;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  });
}
