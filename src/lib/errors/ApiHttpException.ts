import { HttpException, HttpStatus } from '@nestjs/common';
import type { CreationFailure } from '../creation/creation-result';
import {
  statusForCreationError,
  type CreatableEntity,
} from '../creation/creation-status';

export interface ApiErrorBody {
  success: false;
  error: string;
}

/** HttpException carrying the API's `{ success: false, error }` envelope. */
export class ApiHttpException extends HttpException {
  constructor(message: string, status: HttpStatus) {
    const body: ApiErrorBody = { success: false, error: message };
    super(body, status);
    this.name = 'ApiHttpException';
  }

  public static fromCreationFailure(
    entity: CreatableEntity,
    failure: CreationFailure,
  ): ApiHttpException {
    return new ApiHttpException(
      failure.message,
      statusForCreationError(entity, failure.errorKind),
    );
  }

  public static notFound(message: string): ApiHttpException {
    return new ApiHttpException(message, HttpStatus.NOT_FOUND);
  }
}
