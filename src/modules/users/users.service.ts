import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { CreationService } from '../../lib/creation/creation.service';
import {
  rejected,
  type CreationFailure,
} from '../../lib/creation/creation-result';
import { CLOCK, type Clock } from '../../lib/time/clock';
import {
  firstInvalid,
  validateEmail,
  validateMaxLength,
  validateRequiredField,
} from '../../lib/validation/validators';
import { USER_REPOSITORY, type UserRepository } from './users.repository';
import type { User, UserCreationInput, UserDraft } from './users.types';

export const USER_NAME_MAX_LENGTH = 100;
export const DUPLICATE_USER_MESSAGE = 'User with this email already exists';

type UserServiceKind = 'InvalidInput' | 'Conflict';

/**
 * Registers beekeepers. Duplicate emails are caught by a lookup before the
 * insert; the unique index reports the ones that race past it.
 */
@Injectable()
export class UsersService extends CreationService<
  UserCreationInput,
  UserDraft,
  User,
  UserServiceKind
> {
  protected readonly logger = new Logger(UsersService.name);
  protected readonly entityName = 'User';
  protected readonly conflictMessage = DUPLICATE_USER_MESSAGE;

  public constructor(
    @Inject(USER_REPOSITORY) private readonly users: UserRepository,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    super();
  }

  public async getById(id: string): Promise<User | null> {
    return this.users.findById(id);
  }

  protected validate(
    input: UserCreationInput,
  ): CreationFailure<UserServiceKind> | null {
    const result = firstInvalid(
      validateRequiredField(input.name, 'Name'),
      validateMaxLength(input.name, USER_NAME_MAX_LENGTH, 'Name'),
      validateEmail(input.email),
    );
    return result.isValid
      ? null
      : rejected('InvalidInput', result.errorMessage ?? 'Invalid input data');
  }

  protected async checkConflicts(
    input: UserCreationInput,
  ): Promise<CreationFailure<UserServiceKind> | null> {
    if (await this.users.existsByEmail(input.email)) {
      return rejected('Conflict', DUPLICATE_USER_MESSAGE);
    }
    return null;
  }

  protected build(input: UserCreationInput): UserDraft {
    return {
      name: input.name,
      email: input.email,
      apiKey: randomUUID(),
      registeredAt: this.clock.now(),
    };
  }

  protected persist(draft: UserDraft): Promise<User> {
    return this.users.save(draft);
  }

  protected describeInput(input: UserCreationInput): string {
    return `email=${input.email}`;
  }

  protected describeEntity(user: User): string {
    return `id=${user.id} email=${user.email}`;
  }
}
