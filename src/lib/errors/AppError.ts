/**
 * Base class for typed application errors.
 * `code` is a stable, machine-readable identifier; `cause` keeps the original
 * failure for logs and is never rendered to API callers.
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.code = code;
  }
}
