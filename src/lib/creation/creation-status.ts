import { HttpStatus } from '@nestjs/common';
import type { CreationErrorKind } from './creation-result';

export type CreatableEntity = 'user' | 'hive' | 'inspection';

/** Users have no parent, so a user creation never reports NotFound. */
export type UserCreationErrorKind = Exclude<CreationErrorKind, 'NotFound'>;
export type HiveCreationErrorKind = CreationErrorKind;
export type InspectionCreationErrorKind = CreationErrorKind;

interface CreationStatusTable {
  readonly user: Readonly<Record<UserCreationErrorKind, HttpStatus>>;
  readonly hive: Readonly<Record<HiveCreationErrorKind, HttpStatus>>;
  readonly inspection: Readonly<Record<InspectionCreationErrorKind, HttpStatus>>;
}

/**
 * Error kind -> HTTP status, one row per entity.
 * Only controllers read this; services never see status codes.
 */
export const CREATION_STATUS: CreationStatusTable = {
  user: {
    InvalidInput: HttpStatus.BAD_REQUEST,
    Conflict: HttpStatus.CONFLICT,
    DependencyFailure: HttpStatus.INTERNAL_SERVER_ERROR,
    Unknown: HttpStatus.INTERNAL_SERVER_ERROR,
  },
  hive: {
    NotFound: HttpStatus.NOT_FOUND,
    InvalidInput: HttpStatus.BAD_REQUEST,
    Conflict: HttpStatus.CONFLICT,
    DependencyFailure: HttpStatus.INTERNAL_SERVER_ERROR,
    Unknown: HttpStatus.INTERNAL_SERVER_ERROR,
  },
  inspection: {
    NotFound: HttpStatus.NOT_FOUND,
    InvalidInput: HttpStatus.BAD_REQUEST,
    Conflict: HttpStatus.CONFLICT,
    DependencyFailure: HttpStatus.INTERNAL_SERVER_ERROR,
    Unknown: HttpStatus.INTERNAL_SERVER_ERROR,
  },
};

export function statusForCreationError(
  entity: CreatableEntity,
  kind: CreationErrorKind,
): HttpStatus {
  if (entity === 'user') {
    // NotFound is unreachable for users; fall back to the table default.
    return kind === 'NotFound'
      ? HttpStatus.BAD_REQUEST
      : CREATION_STATUS.user[kind];
  }
  return CREATION_STATUS[entity][kind];
}
