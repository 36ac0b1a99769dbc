import { Password } from '../../domain/users/password.js';
import { presentFields } from '../../domain/users/validation.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { AuthError, ValidationError } from '../errors.js';

const CREDENTIAL_FIELDS = ['email', 'password'] as const;

/** Hashed once, on the first lookup that misses. */
let unknownUserHash: Promise<string> | undefined;

function hashForUnknownUser(): Promise<string> {
  if (unknownUserHash === undefined) {
    unknownUserHash = Password.hash('unknown-user-placeholder');
  }
  return unknownUserHash;
}

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  userId: number;
}

export function parseCredentials(payload: Readonly<Record<string, unknown>>): LoginCommand {
  const { email, password } = presentFields(payload, CREDENTIAL_FIELDS);
  if (email === undefined || password === undefined) {
    throw new ValidationError('Missing Credentials', 'Email and password are required.');
  }
  return { email, password };
}

export class LoginUseCase {
  constructor(private userRepo: UserRepo) {}

  /**
   * Unknown email and wrong password fail with the same AuthError after the
   * same verification work.
   */
  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      // Same argon2 work as a wrong password, so timing does not tell them apart
      await Password.verify(command.password, await hashForUnknownUser());
      throw new AuthError();
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new AuthError();
    }

    return { userId: user.id };
  }
}
