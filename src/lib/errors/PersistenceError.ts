import { AppError } from './AppError';

/**
 * The narrow vocabulary repositories use to report write failures.
 * Store-native errors are translated into these before they reach a service.
 */

/** A uniqueness or referential constraint rejected the write. */
export class IntegrityViolationError extends AppError {
  constructor(
    readonly collection: string,
    readonly key: string | null,
    cause?: unknown,
  ) {
    super(
      key
        ? `Integrity constraint violated on '${key}' in ${collection}`
        : `Integrity constraint violated in ${collection}`,
      'PERSISTENCE_INTEGRITY_VIOLATION',
      cause,
    );
    this.name = 'IntegrityViolationError';
  }
}

/** The store could not be reached (network, server selection, closed client). */
export class DependencyUnavailableError extends AppError {
  constructor(
    readonly dependency: string,
    cause?: unknown,
  ) {
    super(`${dependency} is unavailable`, 'PERSISTENCE_UNAVAILABLE', cause);
    this.name = 'DependencyUnavailableError';
  }
}
