import { presentFields, validateEmail } from '../../domain/users/validation.js';
import type { UserChanges } from '../../domain/users/user.js';
import { DuplicateEmailError, UserRepo } from '../../infra/db/userRepo.js';
import { ConflictError, NotFoundError, ValidationError } from '../errors.js';

const UPDATABLE_FIELDS = ['name', 'email'] as const;

const EMAIL_IN_USE_MESSAGE = 'Email already in use by another user.';

export interface UpdateUserCommand {
  id: number;
  changes: UserChanges;
}

/**
 * Keep the non-empty string `name`/`email` of the payload; other keys and
 * values are ignored. The email shape is checked by the use case, once the
 * user is known to exist.
 */
export function parseUserChanges(payload: Readonly<Record<string, unknown>>): UserChanges {
  const changes = presentFields(payload, UPDATABLE_FIELDS);
  if (changes.name === undefined && changes.email === undefined) {
    throw new ValidationError(
      'No Data',
      "At least 'name' or 'email' must be provided for update."
    );
  }

  return changes;
}

export class UpdateUserUseCase {
  constructor(private userRepo: UserRepo) {}

  async execute({ id, changes }: UpdateUserCommand): Promise<void> {
    if ((await this.userRepo.findById(id)) === null) {
      throw new NotFoundError();
    }

    if (changes.email !== undefined) {
      if (!validateEmail(changes.email)) {
        throw new ValidationError('Invalid Email', 'Please provide a valid email address.');
      }

      // Keeping one's own email is not a conflict
      const ownerId = await this.userRepo.findIdByEmail(changes.email);
      if (ownerId !== null && ownerId !== id) {
        throw new ConflictError(EMAIL_IN_USE_MESSAGE);
      }
    }

    let updated: boolean;
    try {
      updated = await this.userRepo.update(id, changes);
    } catch (error) {
      if (error instanceof DuplicateEmailError) {
        throw new ConflictError(EMAIL_IN_USE_MESSAGE);
      }
      throw error;
    }

    // Deleted between the existence check and the update
    if (!updated) {
      throw new NotFoundError();
    }
  }
}
