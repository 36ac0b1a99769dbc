import type { NextFunction, Request, Response } from 'express';
import {
  AuthError,
  ConflictError,
  MalformedRequestError,
  NotFoundError,
  StoreError,
  ValidationError,
} from '../../../application/errors.js';
import { moduleLogger } from '../../logger.js';

const log = moduleLogger('errors');

/**
 * Standard error response shape for API errors.
 * Not-found (`{ message }`) and failed login (`{ status, message }`) keep the
 * shapes existing clients already parse.
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: object;
}

const MALFORMED_JSON: ErrorResponse = {
  error: 'Invalid JSON',
  message: new MalformedRequestError().message,
};

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

function clientErrorStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const context = { method: req.method, path: req.originalUrl, error: err.name };

  if (err instanceof ValidationError) {
    log.warn({ ...context, category: err.category }, err.message);
    const response: ErrorResponse = {
      error: err.category,
      message: err.message,
    };
    if (err.details) {
      response.details = err.details;
    }
    res.status(400).json(response);
    return;
  }

  if (err instanceof MalformedRequestError || isBodyParseError(err)) {
    log.warn(context, 'Malformed request body');
    res.status(400).json(MALFORMED_JSON);
    return;
  }

  if (err instanceof NotFoundError) {
    log.warn(context, err.message);
    res.status(404).json({ message: err.message });
    return;
  }

  if (err instanceof ConflictError) {
    log.warn(context, err.message);
    const response: ErrorResponse = {
      error: 'Conflict',
      message: err.message,
    };
    res.status(409).json(response);
    return;
  }

  if (err instanceof AuthError) {
    log.warn(context, 'Failed login attempt');
    res.status(401).json({ status: 'failed', message: err.message });
    return;
  }

  if (err instanceof StoreError) {
    log.error({ ...context, err: err.cause }, err.message);
    const response: ErrorResponse = {
      error: 'Database Error',
      message: err.message,
    };
    res.status(500).json(response);
    return;
  }

  // body-parser and friends: payload too large, unsupported charset, ...
  const status = clientErrorStatus(err);
  if (status !== null) {
    log.warn(context, err.message);
    const response: ErrorResponse = {
      error: 'Bad Request',
      message: err.message,
    };
    res.status(status).json(response);
    return;
  }

  log.error({ ...context, err }, 'Unhandled error');
  const response: ErrorResponse = {
    error: 'Internal Server Error',
    message: 'Something went wrong on the server.',
  };
  res.status(500).json(response);
}
