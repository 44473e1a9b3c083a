import { AppError } from './AppError';

/**
 * Mongo operations performed by the repositories and the database service.
 * Open-ended so new call sites do not need to touch this file.
 */
export type MongoOperation =
  | 'connect'
  | 'getDb'
  | 'getCollection'
  | 'ping'
  | 'createIndexes'
  | 'insertOne'
  | 'findOne'
  | 'find'
  | (string & {});

/** Structured context attached to Mongo errors. */
export interface MongoErrorContext {
  readonly operation: MongoOperation;
  readonly dbName?: string;
  readonly collection?: string;
  /** Driver error code (e.g. MongoServerError.code). */
  readonly driverCode?: number | string;
}

/**
 * A failed MongoDB action that is neither an integrity violation nor an
 * outage. Carries safe context; the driver error stays in `cause`.
 */
export class MongoActionError extends AppError {
  public readonly context: Readonly<MongoErrorContext>;

  constructor(message: string, context: MongoErrorContext, cause?: unknown) {
    super(message, 'MONGO_ACTION_FAILED', cause);
    this.name = 'MongoActionError';
    this.context = Object.freeze({ ...context });
  }

  /** One-line summary for logs. */
  public summary(): string {
    const parts: string[] = [`op=${this.context.operation}`];
    if (this.context.dbName) parts.push(`db=${this.context.dbName}`);
    if (this.context.collection) parts.push(`coll=${this.context.collection}`);
    if (this.context.driverCode !== undefined) {
      parts.push(`driverCode=${String(this.context.driverCode)}`);
    }
    return `Mongo action failed: ${parts.join(' ')}`;
  }

  /**
   * Wrap a thrown value with consistent context.
   * A MongoActionError is returned as-is.
   */
  public static wrap(
    err: unknown,
    context: MongoErrorContext,
    fallbackMessage = 'Mongo action failed',
  ): MongoActionError {
    if (err instanceof MongoActionError) return err;
    const { message, driverCode } = extractDriverDetails(err);
    return new MongoActionError(
      message ?? fallbackMessage,
      driverCode === undefined ? context : { ...context, driverCode },
      err,
    );
  }
}

function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (!(err instanceof Error)) return {};
  const code: unknown = 'code' in err ? err.code : undefined;
  return {
    message: err.message.length > 0 ? err.message : undefined,
    driverCode:
      typeof code === 'number' || typeof code === 'string' ? code : undefined,
  };
}
