import type { Queryable } from './session.js';
import type { NewUser, User, UserChanges, UserProfile } from '../../domain/users/user.js';

type UserRow = {
  id: number;
  name: string;
  email: string;
  password_hash: string;
};

type ProfileRow = Omit<UserRow, 'password_hash'>;

const UNIQUE_VIOLATION = '23505';

/**
 * Raised when an insert or update collides with the unique email constraint.
 */
export class DuplicateEmailError extends Error {
  constructor(public readonly email: string) {
    super(`Email already exists: ${email}`);
    this.name = 'DuplicateEmailError';
  }
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

/**
 * Escape LIKE metacharacters so a search term only ever matches literally.
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function toProfile(row: ProfileRow): UserProfile {
  return { id: row.id, name: row.name, email: row.email };
}

/**
 * Users table access over one checked-out client. Build one per request.
 */
export class UserRepo {
  constructor(private readonly client: Queryable) {}

  async list(): Promise<UserProfile[]> {
    const result = await this.client.query<ProfileRow>(
      'SELECT id, name, email FROM users ORDER BY id'
    );
    return result.rows.map(toProfile);
  }

  async findById(id: number): Promise<UserProfile | null> {
    const result = await this.client.query<ProfileRow>(
      'SELECT id, name, email FROM users WHERE id = $1',
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toProfile(result.rows[0]);
  }

  /**
   * The only read that carries the credential hash; used by login.
   */
  async findByEmail(email: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(
      'SELECT id, name, email, password_hash FROM users WHERE email = $1',
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = result.rows[0];
    return {
      id: row.id,
      name: row.name,
      email: row.email,
      passwordHash: row.password_hash,
    };
  }

  /**
   * Case-insensitive substring match on name.
   */
  async searchByName(term: string): Promise<UserProfile[]> {
    const pattern = `%${escapeLikePattern(term.toLowerCase())}%`;
    const result = await this.client.query<ProfileRow>(
      'SELECT id, name, email FROM users WHERE LOWER(name) LIKE $1 ORDER BY id',
      [pattern]
    );
    return result.rows.map(toProfile);
  }

  /**
   * Id of the user owning `email`, or null.
   */
  async findIdByEmail(email: string): Promise<number | null> {
    const result = await this.client.query<Pick<UserRow, 'id'>>(
      'SELECT id FROM users WHERE email = $1',
      [email]
    );
    return result.rows.length === 0 ? null : result.rows[0].id;
  }

  async create(user: NewUser): Promise<number> {
    try {
      const result = await this.client.query<Pick<UserRow, 'id'>>(
        `INSERT INTO users (name, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING id`,
        [user.name, user.email, user.passwordHash]
      );
      return result.rows[0].id;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError(user.email);
      }
      throw error;
    }
  }

  /**
   * Apply `changes` to one row. Returns false when no row has that id.
   */
  async update(id: number, changes: UserChanges): Promise<boolean> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    if (changes.name !== undefined) {
      values.push(changes.name);
      assignments.push(`name = $${values.length}`);
    }
    if (changes.email !== undefined) {
      values.push(changes.email);
      assignments.push(`email = $${values.length}`);
    }
    if (assignments.length === 0) {
      return (await this.findById(id)) !== null;
    }

    values.push(id);
    try {
      const result = await this.client.query<Pick<UserRow, 'id'>>(
        `UPDATE users SET ${assignments.join(', ')} WHERE id = $${values.length} RETURNING id`,
        values
      );
      return result.rows.length > 0;
    } catch (error) {
      if (isUniqueViolation(error) && changes.email !== undefined) {
        throw new DuplicateEmailError(changes.email);
      }
      throw error;
    }
  }

  /**
   * Hard delete. Returns false when no row has that id.
   */
  async delete(id: number): Promise<boolean> {
    const result = await this.client.query<Pick<UserRow, 'id'>>(
      'DELETE FROM users WHERE id = $1 RETURNING id',
      [id]
    );
    return result.rows.length > 0;
  }

  /**
   * Remove every user. Used when seeding.
   */
  async deleteAll(): Promise<number> {
    const result = await this.client.query<Pick<UserRow, 'id'>>(
      'DELETE FROM users RETURNING id'
    );
    return result.rows.length;
  }
}
