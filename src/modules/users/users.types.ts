import type { CreationResult } from '../../lib/creation/creation-result';
import type { UserCreationErrorKind } from '../../lib/creation/creation-status';

export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly apiKey: string;
  readonly registeredAt: Date;
}

/** A user built in memory, not yet stored. */
export type UserDraft = Omit<User, 'id'>;

/** Already trimmed; email already lowercased. */
export interface UserCreationInput {
  readonly name: string;
  readonly email: string;
}

export type UserCreationResult = CreationResult<User, UserCreationErrorKind>;
