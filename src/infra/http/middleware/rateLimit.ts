import rateLimit from 'express-rate-limit';

const WINDOW_MS = 60 * 1000;

/**
 * General API rate limiter, per IP.
 * Uses the in-memory store (resets on restart); each app instance gets its own.
 */
export function createApiRateLimiter(perMinute: number) {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit: perMinute,
    message: {
      error: 'Too Many Requests',
      message: 'Too many requests, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for the login endpoint.
 */
export function createLoginRateLimiter(perMinute: number) {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit: perMinute,
    message: {
      error: 'Too Many Requests',
      message: 'Too many login attempts, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
