import { z } from 'zod';

/**
 * Pure payload checks. Nothing here throws: callers decide which error a
 * failed check becomes.
 */

export const MIN_PASSWORD_LENGTH = 8;

/** Largest value a SERIAL (int4) column can assign. */
export const MAX_USER_ID = 2_147_483_647;

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const emailSchema = z.string().regex(EMAIL_PATTERN);

const passwordSchema = z.string().min(MIN_PASSWORD_LENGTH);

const userIdSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().max(MAX_USER_ID));

export function validateEmail(value: unknown): boolean {
  return emailSchema.safeParse(value).success;
}

export function validatePasswordStrength(value: unknown): boolean {
  return passwordSchema.safeParse(value).success;
}

/**
 * The subset of `names` carrying a non-empty string in `payload`.
 */
export function presentFields<K extends string>(
  payload: Readonly<Record<string, unknown>>,
  names: readonly K[]
): Partial<Record<K, string>> {
  const fields: Partial<Record<K, string>> = {};
  for (const name of names) {
    const value = payload[name];
    if (typeof value === 'string' && value.length > 0) {
      fields[name] = value;
    }
  }
  return fields;
}

/**
 * Names from `names` that are absent, empty or not strings in `payload`.
 */
export function validateRequiredFields<K extends string>(
  payload: Readonly<Record<string, unknown>>,
  names: readonly K[]
): Set<K> {
  const present = presentFields(payload, names);
  return new Set(names.filter((name) => present[name] === undefined));
}

/**
 * Path ids are decimal digits within the id column's range; anything else
 * cannot name a user.
 */
export function parseUserId(value: unknown): number | null {
  const parsed = userIdSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
