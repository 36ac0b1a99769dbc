import { pool } from '../infra/db/pool.js';
import { ensureSchema } from '../infra/db/schema.js';
import { SAMPLE_USERS, seedUsers } from '../infra/db/seed.js';
import { moduleLogger } from '../infra/logger.js';

const log = moduleLogger('seed');

async function seed(): Promise<void> {
  try {
    log.warn('Resetting the users table: every existing user will be removed');
    await ensureSchema(pool);
    const ids = await seedUsers(pool, SAMPLE_USERS);
    log.info({ ids }, `Inserted ${ids.length} sample users`);
  } catch (err) {
    log.error({ err }, 'Seeding failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void seed();
