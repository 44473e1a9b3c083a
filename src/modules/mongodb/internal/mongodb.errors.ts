import {
  MongoNetworkError,
  MongoNotConnectedError,
  MongoServerError,
  MongoServerSelectionError,
  MongoTopologyClosedError,
} from 'mongodb';
import { AppError } from '../../../lib/errors/AppError';
import {
  MongoActionError,
  type MongoErrorContext,
} from '../../../lib/errors/MongoActionError';
import {
  DependencyUnavailableError,
  IntegrityViolationError,
} from '../../../lib/errors/PersistenceError';

export const DUPLICATE_KEY_CODE = 11000;

function isDuplicateKey(err: unknown): err is MongoServerError {
  return err instanceof MongoServerError && err.code === DUPLICATE_KEY_CODE;
}

function isUnavailable(err: unknown): boolean {
  return (
    err instanceof MongoNetworkError ||
    err instanceof MongoServerSelectionError ||
    err instanceof MongoNotConnectedError ||
    err instanceof MongoTopologyClosedError
  );
}

/** Field named by a duplicate-key error, from keyPattern or the message. */
export function duplicateKeyField(err: MongoServerError): string | null {
  const pattern: unknown = err.keyPattern;
  if (pattern && typeof pattern === 'object') {
    const keys = Object.keys(pattern);
    if (keys.length > 0) return keys[0];
  }
  const m = /index: (\w+?)_-?1/.exec(err.message);
  return m ? m[1] : null;
}

/**
 * Translate a driver error into the repository vocabulary:
 * duplicate key -> IntegrityViolationError, connectivity ->
 * DependencyUnavailableError, anything else -> MongoActionError.
 * Application errors pass through untouched.
 */
export function translateMongoError(
  err: unknown,
  context: MongoErrorContext,
): AppError {
  if (err instanceof AppError) return err;
  if (isDuplicateKey(err)) {
    return new IntegrityViolationError(
      context.collection ?? 'unknown',
      duplicateKeyField(err),
      err,
    );
  }
  if (isUnavailable(err)) {
    return new DependencyUnavailableError('database', err);
  }
  return MongoActionError.wrap(err, context);
}
