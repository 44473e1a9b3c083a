import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../../config/app.config';
import { CreationService } from '../../lib/creation/creation.service';
import {
  rejected,
  type CreationFailure,
} from '../../lib/creation/creation-result';
import { daysBetween, toIsoDate } from '../../lib/time/calendar';
import { CLOCK, type Clock } from '../../lib/time/clock';
import {
  validateCalendarDate,
  validateMaxLength,
} from '../../lib/validation/validators';
import { HIVE_REPOSITORY, type HiveRepository } from '../hives/hives.repository';
import {
  INSPECTION_REPOSITORY,
  type InspectionRepository,
} from './inspections.repository';
import type {
  Inspection,
  InspectionCreationInput,
  InspectionDraft,
} from './inspections.types';

export const NOTES_MAX_LENGTH = 1000;
export const PAST_DATE_MESSAGE = 'Scheduled date cannot be in the past';

type InspectionServiceKind = 'NotFound' | 'InvalidInput';

/** "1 year", "2 years" or "30 days". */
export function describeHorizon(days: number): string {
  if (days > 0 && days % 365 === 0) {
    const years = days / 365;
    return years === 1 ? '1 year' : `${years} years`;
  }
  return days === 1 ? '1 day' : `${days} days`;
}

/**
 * Schedules inspections. "Today" is the UTC calendar day of the injected
 * clock; the window is [today, today + maxScheduleDaysAhead].
 */
@Injectable()
export class InspectionsService extends CreationService<
  InspectionCreationInput,
  InspectionDraft,
  Inspection,
  InspectionServiceKind
> {
  protected readonly logger = new Logger(InspectionsService.name);
  protected readonly entityName = 'Inspection';
  protected readonly conflictMessage =
    'Inspection creation failed due to data conflict';

  public constructor(
    @Inject(INSPECTION_REPOSITORY)
    private readonly inspections: InspectionRepository,
    @Inject(HIVE_REPOSITORY) private readonly hives: HiveRepository,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    super();
  }

  public async getById(id: string): Promise<Inspection | null> {
    return this.inspections.findById(id);
  }

  public async listByHive(hiveId: string): Promise<Inspection[]> {
    const found = await this.inspections.listByHive(hiveId);
    this.logger.debug(
      `Found ${found.length} inspection(s) for hive ${hiveId}`,
    );
    return found;
  }

  protected async checkReferences(
    input: InspectionCreationInput,
  ): Promise<CreationFailure<InspectionServiceKind> | null> {
    const hive = await this.hives.findById(input.hiveId);
    return hive ? null : rejected('NotFound', 'Hive not found');
  }

  protected validate(
    input: InspectionCreationInput,
  ): CreationFailure<InspectionServiceKind> | null {
    const date = validateCalendarDate(input.scheduledFor, 'Scheduled date');
    if (!date.isValid) {
      return rejected('InvalidInput', date.errorMessage ?? 'Invalid input data');
    }

    const today = toIsoDate(this.clock.now());
    const offset = daysBetween(today, input.scheduledFor);
    if (offset === null) {
      return rejected(
        'InvalidInput',
        'Scheduled date must be a valid date (YYYY-MM-DD)',
      );
    }
    if (offset < 0) return rejected('InvalidInput', PAST_DATE_MESSAGE);

    const maxDays = this.config.inspections.maxScheduleDaysAhead;
    if (offset > maxDays) {
      return rejected(
        'InvalidInput',
        `Inspection cannot be scheduled more than ${describeHorizon(maxDays)} in advance`,
      );
    }

    const notes = validateMaxLength(input.notes, NOTES_MAX_LENGTH, 'Notes');
    return notes.isValid
      ? null
      : rejected('InvalidInput', notes.errorMessage ?? 'Invalid input data');
  }

  protected build(input: InspectionCreationInput): InspectionDraft {
    return {
      hiveId: input.hiveId,
      scheduledFor: input.scheduledFor,
      notes: input.notes ?? null,
      createdAt: this.clock.now(),
    };
  }

  protected persist(draft: InspectionDraft): Promise<Inspection> {
    return this.inspections.save(draft);
  }

  protected describeInput(input: InspectionCreationInput): string {
    return `hiveId=${input.hiveId} scheduledFor=${input.scheduledFor}`;
  }

  protected describeEntity(inspection: Inspection): string {
    return `id=${inspection.id} hiveId=${inspection.hiveId} scheduledFor=${inspection.scheduledFor}`;
  }
}
