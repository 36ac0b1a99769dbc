import express from 'express';
import { config, type RateLimitSettings } from '../../config.js';
import type { ConnectionPool } from '../db/session.js';
import { createAuthRoutes } from './routes/auth.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createUserRoutes } from './routes/users.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { notFoundHandler } from './middleware/routing.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface AppOptions {
  pool: ConnectionPool;
  rateLimits?: RateLimitSettings;
}

/**
 * Build the Express app. Nothing here listens or connects; each request checks
 * a client out of `pool` for its own lifetime.
 */
export function createApp({ pool, rateLimits = config.rateLimits }: AppOptions): express.Application {
  const app = express();
  app.disable('x-powered-by');

  // Middleware
  app.use(requestLogger());
  app.use(express.json());
  app.use(createApiRateLimiter(rateLimits.apiPerMinute));

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use(createHealthRoutes(pool));
  app.use(createUserRoutes(pool));
  app.use(createAuthRoutes(pool, rateLimits.loginPerMinute));

  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
