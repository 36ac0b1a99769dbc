import type { Request, RequestHandler, Response } from 'express';
import { parseUserId } from '../../../domain/users/validation.js';
import { asyncHandler } from './asyncHandler.js';

/**
 * Handler for a `:id` route. A segment that cannot be a user id skips the
 * route entirely, so it ends in the generic 404 like any unknown path.
 */
export function withUserId(
  handler: (id: number, req: Request, res: Response) => Promise<void>
): RequestHandler {
  return asyncHandler(async (req, res, next) => {
    const id = parseUserId(req.params.id);
    if (id === null) {
      next('route');
      return;
    }
    await handler(id, req, res);
  });
}

export function methodNotAllowed(allowed: readonly string[]): RequestHandler {
  return (_req, res) => {
    res.set('Allow', allowed.join(', '));
    res.status(405).json({
      error: 'Method Not Allowed',
      message: 'The method is not allowed for the requested URL.',
    });
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not Found',
    message: 'The requested URL was not found on the server.',
  });
}
