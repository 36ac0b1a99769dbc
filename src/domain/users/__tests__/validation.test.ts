import { describe, it, expect } from 'vitest';
import {
  MAX_USER_ID,
  parseUserId,
  presentFields,
  validateEmail,
  validatePasswordStrength,
  validateRequiredFields,
} from '../validation.js';

describe('validateEmail', () => {
  it('accepts conventional addresses', () => {
    expect(validateEmail('a@x.com')).toBe(true);
    expect(validateEmail('john.doe+news@mail.example.org')).toBe(true);
    expect(validateEmail('Mixed.Case@Example.COM')).toBe(true);
  });

  it('rejects a missing @', () => {
    expect(validateEmail('no-at.example.com')).toBe(false);
  });

  it('rejects a domain without a separator', () => {
    expect(validateEmail('user@localhost')).toBe(false);
  });

  it('rejects empty local or domain parts', () => {
    expect(validateEmail('@example.com')).toBe(false);
    expect(validateEmail('user@.com')).toBe(false);
    expect(validateEmail('user@')).toBe(false);
  });

  it('rejects a one-letter top-level domain', () => {
    expect(validateEmail('user@example.c')).toBe(false);
  });

  it('rejects non-strings', () => {
    expect(validateEmail(undefined)).toBe(false);
    expect(validateEmail(42)).toBe(false);
    expect(validateEmail({ email: 'a@x.com' })).toBe(false);
  });
});

describe('validatePasswordStrength', () => {
  it('accepts eight characters or more', () => {
    expect(validatePasswordStrength('abcdefgh')).toBe(true);
    expect(validatePasswordStrength('longenough1')).toBe(true);
  });

  it('has no character class requirements', () => {
    expect(validatePasswordStrength('        ')).toBe(true);
  });

  it('rejects shorter passwords', () => {
    expect(validatePasswordStrength('abcdefg')).toBe(false);
    expect(validatePasswordStrength('')).toBe(false);
  });

  it('rejects non-strings', () => {
    expect(validatePasswordStrength(12345678)).toBe(false);
  });
});

describe('validateRequiredFields', () => {
  it('returns nothing when every field is a non-empty string', () => {
    const missing = validateRequiredFields(
      { name: 'Alice', email: 'a@x.com', password: 'longenough1' },
      ['name', 'email', 'password']
    );
    expect(missing.size).toBe(0);
  });

  it('reports absent, empty and non-string values', () => {
    const missing = validateRequiredFields({ name: 'Alice', email: '', password: 5 }, [
      'name',
      'email',
      'password',
    ]);
    expect([...missing]).toEqual(['email', 'password']);
  });

  it('ignores keys it was not asked about', () => {
    const missing = validateRequiredFields({ extra: '' }, ['name']);
    expect([...missing]).toEqual(['name']);
  });
});

describe('presentFields', () => {
  it('keeps only non-empty string values of the named fields', () => {
    expect(presentFields({ name: 'Bob', email: '', role: 'admin' }, ['name', 'email'])).toEqual({
      name: 'Bob',
    });
  });

  it('returns an empty object when nothing is present', () => {
    expect(presentFields({ name: null, email: 7 }, ['name', 'email'])).toEqual({});
  });
});

describe('parseUserId', () => {
  it('parses decimal digits', () => {
    expect(parseUserId('42')).toBe(42);
    expect(parseUserId('0')).toBe(0);
    expect(parseUserId('007')).toBe(7);
  });

  it('accepts the largest id the column can hold', () => {
    expect(parseUserId(String(MAX_USER_ID))).toBe(MAX_USER_ID);
    expect(parseUserId(String(MAX_USER_ID + 1))).toBeNull();
  });

  it('rejects anything that is not plain digits', () => {
    for (const value of ['abc', '-1', '1.5', '', ' 7', '1e3', '0x10']) {
      expect(parseUserId(value)).toBeNull();
    }
    expect(parseUserId(undefined)).toBeNull();
    expect(parseUserId(12)).toBeNull();
  });
});
