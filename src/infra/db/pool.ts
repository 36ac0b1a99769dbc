import pg from 'pg';
import { config } from '../../config.js';
import { moduleLogger } from '../logger.js';

const { Pool } = pg;
const log = moduleLogger('db');

// Do not connect at import time: the pool opens clients lazily, one per request
export const pool = new Pool({
  connectionString: config.db.connectionString,
  max: config.db.poolMax,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('connect', () => {
  log.debug('Database connection established');
});

pool.on('error', (err) => {
  log.error({ err }, 'Unexpected database error on idle client');
});
