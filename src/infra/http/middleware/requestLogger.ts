import { randomUUID } from 'crypto';
import { pinoHttp } from 'pino-http';
import { moduleLogger } from '../../logger.js';

/**
 * Access log: one line per request, 2xx/3xx at info, 4xx at warn, 5xx at error.
 * An incoming `x-request-id` is reused and echoed back.
 */
export function requestLogger() {
  return pinoHttp({
    logger: moduleLogger('http'),
    genReqId: (req, res) => {
      const header = req.headers['x-request-id'];
      const id = typeof header === 'string' && header.length > 0 ? header : randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) {
        return 'error';
      }
      if (res.statusCode >= 400) {
        return 'warn';
      }
      return 'info';
    },
  });
}
