import { withConnection, type ConnectionPool } from './session.js';

export const USERS_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL
  )
`;

/**
 * Create the users table when it does not exist yet. Safe to run on every start.
 */
export async function ensureSchema(pool: ConnectionPool): Promise<void> {
  await withConnection(pool, async (client) => {
    await client.query(USERS_TABLE_DDL);
  });
}
