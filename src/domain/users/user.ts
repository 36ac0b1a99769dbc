/**
 * User entity as stored. `passwordHash` never leaves the service:
 * every read path returns a {@link UserProfile} instead.
 */
export interface User {
  readonly id: number;
  readonly name: string;
  readonly email: string;
  readonly passwordHash: string;
}

export type UserProfile = Pick<User, 'id' | 'name' | 'email'>;

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
}

/**
 * Fields an update may change. The credential is fixed after creation.
 */
export interface UserChanges {
  name?: string;
  email?: string;
}
