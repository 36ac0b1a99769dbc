import { config } from '../../config.js';
import { pool } from '../db/pool.js';
import { ensureSchema } from '../db/schema.js';
import { moduleLogger } from '../logger.js';
import { createApp } from './app.js';

const log = moduleLogger('server');

async function start(): Promise<void> {
  await ensureSchema(pool);
  log.info('Database schema ready');

  const app = createApp({ pool });
  const server = app.listen(config.port, () => {
    log.info(`Server running on http://localhost:${config.port}`);
    log.info(`API docs: http://localhost:${config.port}/docs`);
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Error closing database pool');
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
