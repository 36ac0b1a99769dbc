import type { Request } from 'express';
import { z } from 'zod';
import { MalformedRequestError } from '../../../application/errors.js';

/**
 * A request body worth handling: a JSON object with at least one key.
 */
const jsonObjectSchema = z
  .record(z.unknown())
  .refine((body) => Object.keys(body).length > 0);

/**
 * The parsed body of `req`. Arrays, scalars, `{}`, and the empty body left by a
 * non-JSON content type are all rejected as malformed.
 */
export function readJsonObject(req: Pick<Request, 'body'>): Record<string, unknown> {
  const parsed = jsonObjectSchema.safeParse(req.body);
  if (!parsed.success) {
    throw new MalformedRequestError();
  }
  return parsed.data;
}
