import { Password } from '../../domain/users/password.js';
import {
  MIN_PASSWORD_LENGTH,
  presentFields,
  validateEmail,
  validatePasswordStrength,
  validateRequiredFields,
} from '../../domain/users/validation.js';
import { DuplicateEmailError, UserRepo } from '../../infra/db/userRepo.js';
import { ConflictError, ValidationError } from '../errors.js';

const NEW_USER_FIELDS = ['name', 'email', 'password'] as const;

export interface CreateUserCommand {
  name: string;
  email: string;
  password: string;
}

export interface CreateUserResult {
  id: number;
}

const DUPLICATE_EMAIL_MESSAGE = 'User with this email already exists.';

/**
 * Checks run in order: required fields, email shape, password strength.
 * The first failing check decides the error.
 */
export function parseCreateUser(payload: Readonly<Record<string, unknown>>): CreateUserCommand {
  const { name, email, password } = presentFields(payload, NEW_USER_FIELDS);
  if (name === undefined || email === undefined || password === undefined) {
    throw new ValidationError('Missing Data', 'Name, email, and password are required.', {
      missing: [...validateRequiredFields(payload, NEW_USER_FIELDS)],
    });
  }
  const command: CreateUserCommand = { name, email, password };

  if (!validateEmail(command.email)) {
    throw new ValidationError('Invalid Email', 'Please provide a valid email address.');
  }

  if (!validatePasswordStrength(command.password)) {
    throw new ValidationError(
      'Weak Password',
      `Password must be at least ${MIN_PASSWORD_LENGTH} characters long.`
    );
  }

  return command;
}

export class CreateUserUseCase {
  constructor(private userRepo: UserRepo) {}

  async execute(command: CreateUserCommand): Promise<CreateUserResult> {
    // Check if user already exists
    if ((await this.userRepo.findIdByEmail(command.email)) !== null) {
      throw new ConflictError(DUPLICATE_EMAIL_MESSAGE);
    }

    const passwordHash = await Password.hash(command.password);

    try {
      const id = await this.userRepo.create({
        name: command.name,
        email: command.email,
        passwordHash,
      });
      return { id };
    } catch (error) {
      // Lost a race with a concurrent insert of the same email
      if (error instanceof DuplicateEmailError) {
        throw new ConflictError(DUPLICATE_EMAIL_MESSAGE);
      }
      throw error;
    }
  }
}
