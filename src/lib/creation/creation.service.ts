import type { Logger } from '@nestjs/common';
import {
  DependencyUnavailableError,
  IntegrityViolationError,
} from '../errors/PersistenceError';
import { MongoActionError } from '../errors/MongoActionError';
import {
  created,
  rejected,
  type CreationErrorKind,
  type CreationFailure,
  type CreationResult,
  type StoreErrorKind,
} from './creation-result';

export const DEPENDENCY_FAILURE_MESSAGE = 'Database is temporarily unavailable';
export const UNKNOWN_FAILURE_MESSAGE = 'Internal server error';

/**
 * Shared create() pipeline for entity services.
 *
 *   1. checkReferences  parent lookups (NotFound)
 *   2. validate         semantic field checks (InvalidInput)
 *   3. checkConflicts   uniqueness pre-checks (Conflict)
 *   4. build            in-memory draft
 *   5. persist          the single write
 *
 * The first step that reports a failure ends the call. Anything thrown along
 * the way is logged and classified; no exception leaves create().
 *
 * `K` is the set of kinds the subclass itself reports.
 */
export abstract class CreationService<
  TInput,
  TDraft,
  TEntity,
  K extends CreationErrorKind,
> {
  protected abstract readonly logger: Logger;
  /** Capitalised entity name for log lines ("Hive"). */
  protected abstract readonly entityName: string;
  /** Message returned when the store rejects the write as a duplicate. */
  protected abstract readonly conflictMessage: string;

  public async create(
    input: TInput,
  ): Promise<CreationResult<TEntity, K | StoreErrorKind>> {
    this.logger.log(
      `Starting ${this.entityName.toLowerCase()} creation ${this.describeInput(input)}`,
    );

    try {
      const failure =
        (await this.checkReferences(input)) ??
        this.validate(input) ??
        (await this.checkConflicts(input));
      if (failure) {
        this.logger.warn(
          `${this.entityName} creation rejected (${failure.errorKind}): ${failure.message}`,
        );
        return failure;
      }

      const draft = this.build(input);
      const entity = await this.persist(draft);

      this.logger.log(
        `${this.entityName} creation successful ${this.describeEntity(entity)}`,
      );
      return created(entity);
    } catch (err) {
      return this.classifyFailure(err);
    }
  }

  protected checkReferences(input: TInput): Promise<CreationFailure<K> | null> {
    void input;
    return Promise.resolve(null);
  }

  protected abstract validate(input: TInput): CreationFailure<K> | null;

  protected checkConflicts(input: TInput): Promise<CreationFailure<K> | null> {
    void input;
    return Promise.resolve(null);
  }

  protected abstract build(input: TInput): TDraft;

  protected abstract persist(draft: TDraft): Promise<TEntity>;

  protected abstract describeInput(input: TInput): string;

  protected abstract describeEntity(entity: TEntity): string;

  /** Map a thrown value to a store kind. The original text is only logged. */
  private classifyFailure(err: unknown): CreationFailure<StoreErrorKind> {
    if (err instanceof IntegrityViolationError) {
      this.logger.warn(
        `${this.entityName} creation hit an integrity violation: ${err.message}`,
      );
      return rejected('Conflict', this.conflictMessage);
    }

    if (err instanceof DependencyUnavailableError) {
      this.logger.error(
        `${this.entityName} creation failed, ${err.message}`,
        describeCause(err),
      );
      return rejected('DependencyFailure', DEPENDENCY_FAILURE_MESSAGE);
    }

    const detail =
      err instanceof MongoActionError
        ? err.summary()
        : err instanceof Error
          ? `${err.name}: ${err.message}`
          : String(err);
    this.logger.error(
      `Unexpected error during ${this.entityName.toLowerCase()} creation: ${detail}`,
      err instanceof Error ? err.stack : undefined,
    );
    return rejected('Unknown', UNKNOWN_FAILURE_MESSAGE);
  }
}

function describeCause(err: Error): string | undefined {
  const cause = err.cause;
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  return undefined;
}
