import { Inject, Injectable, Logger } from '@nestjs/common';
import { CreationService } from '../../lib/creation/creation.service';
import {
  rejected,
  type CreationFailure,
} from '../../lib/creation/creation-result';
import { CLOCK, type Clock } from '../../lib/time/clock';
import {
  firstInvalid,
  isPresent,
  toFiniteNumber,
  validateCoordinates,
  validateMaxLength,
  validateRequiredField,
} from '../../lib/validation/validators';
import {
  USER_REPOSITORY,
  type UserRepository,
} from '../users/users.repository';
import { HIVE_REPOSITORY, type HiveRepository } from './hives.repository';
import {
  toGeoPoint,
  type GeoPoint,
  type Hive,
  type HiveCreationInput,
  type HiveDraft,
} from './hives.types';

export const HIVE_NAME_MAX_LENGTH = 100;
export const FRAME_TYPE_MAX_LENGTH = 50;

type HiveServiceKind = 'NotFound' | 'InvalidInput';

@Injectable()
export class HivesService extends CreationService<
  HiveCreationInput,
  HiveDraft,
  Hive,
  HiveServiceKind
> {
  protected readonly logger = new Logger(HivesService.name);
  protected readonly entityName = 'Hive';
  protected readonly conflictMessage =
    'Hive creation failed due to data conflict';

  public constructor(
    @Inject(HIVE_REPOSITORY) private readonly hives: HiveRepository,
    @Inject(USER_REPOSITORY) private readonly users: UserRepository,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    super();
  }

  public async getById(id: string): Promise<Hive | null> {
    return this.hives.findById(id);
  }

  public async listByUser(userId: string): Promise<Hive[]> {
    const hives = await this.hives.listByUser(userId);
    this.logger.debug(`Found ${hives.length} hive(s) for user ${userId}`);
    return hives;
  }

  /** A missing owner is reported before anything else about the input. */
  protected async checkReferences(
    input: HiveCreationInput,
  ): Promise<CreationFailure<HiveServiceKind> | null> {
    const owner = await this.users.findById(input.userId);
    return owner ? null : rejected('NotFound', 'User not found');
  }

  protected validate(
    input: HiveCreationInput,
  ): CreationFailure<HiveServiceKind> | null {
    const result = firstInvalid(
      validateRequiredField(input.name, 'Name'),
      validateMaxLength(input.name, HIVE_NAME_MAX_LENGTH, 'Name'),
      validateMaxLength(input.frameType, FRAME_TYPE_MAX_LENGTH, 'Frame type'),
      validateCoordinates(input.latitude, input.longitude),
    );
    return result.isValid
      ? null
      : rejected('InvalidInput', result.errorMessage ?? 'Invalid input data');
  }

  protected build(input: HiveCreationInput): HiveDraft {
    return {
      userId: input.userId,
      name: input.name,
      location: locationOf(input),
      frameType: input.frameType ?? null,
      installedAt: input.installedAt ?? this.clock.now(),
    };
  }

  protected persist(draft: HiveDraft): Promise<Hive> {
    return this.hives.save(draft);
  }

  protected describeInput(input: HiveCreationInput): string {
    return `userId=${input.userId} name=${JSON.stringify(input.name)}`;
  }

  protected describeEntity(hive: Hive): string {
    return `id=${hive.id} userId=${hive.userId} hasLocation=${hive.location !== null}`;
  }
}

/** Coordinates were validated as a pair; both or neither are set here. */
function locationOf(input: HiveCreationInput): GeoPoint | null {
  if (!isPresent(input.latitude) || !isPresent(input.longitude)) return null;
  const lat = toFiniteNumber(input.latitude);
  const lng = toFiniteNumber(input.longitude);
  return lat === null || lng === null ? null : toGeoPoint(lat, lng);
}
