import { Router } from 'express';
import { withConnection, type ConnectionPool } from '../../db/session.js';
import { moduleLogger } from '../../logger.js';

/**
 * @openapi
 * /:
 *   get:
 *     tags: [Health]
 *     summary: Liveness message
 *     responses:
 *       200:
 *         description: The API is running
 *
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Readiness probe (checks the database)
 *     responses:
 *       200:
 *         description: Database reachable
 *       500:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const log = moduleLogger('health');

const PROBE_TIMEOUT_MS = 2000;

/**
 * Reject when `promise` has not settled within `ms`.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createHealthRoutes(pool: ConnectionPool) {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ message: 'User Management System API is running!' });
  });

  router.get('/healthz', (_req, res, next) => {
    withTimeout(
      withConnection(pool, (client) => client.query('SELECT 1')),
      PROBE_TIMEOUT_MS
    )
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        log.warn({ err }, 'Database probe failed');
        res.status(500).json({
          error: 'Database Unavailable',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  return router;
}
