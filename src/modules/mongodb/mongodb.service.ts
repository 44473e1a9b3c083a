import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { Collection, Db, Document } from 'mongodb';
import { APP_CONFIG, type AppConfig } from '../../config/app.config';
import { maskMongoUri } from '../../infra/mongo/mongo.config';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { LazyMongoClient } from './internal/mongodb.client';
import { translateMongoError } from './internal/mongodb.errors';

/** Jest sets JEST_WORKER_ID; NODE_ENV=test is the manual override. */
function isTestRuntime(env: NodeJS.ProcessEnv = process.env): boolean {
  return (
    env.JEST_WORKER_ID !== undefined ||
    (env.NODE_ENV ?? '').toLowerCase() === 'test'
  );
}

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

@Injectable()
export class MongodbService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MongodbService.name);
  private readonly client: LazyMongoClient;

  public constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    this.client = new LazyMongoClient(config.mongo.uri, {
      ignoreUndefined: true,
      serverSelectionTimeoutMS: config.mongo.serverSelectionTimeoutMs,
    });
  }

  /** Connected handle to the configured database. */
  public async getDb(): Promise<Db> {
    try {
      return await this.client.getDb(this.config.mongo.dbName);
    } catch (err) {
      throw translateMongoError(err, {
        operation: 'getDb',
        dbName: this.config.mongo.dbName,
      });
    }
  }

  public async getCollection<T extends Document = Document>(
    name: string,
  ): Promise<Collection<T>> {
    const db = await this.getDb();
    return db.collection<T>(name);
  }

  /**
   * One trivial round trip. Driver errors propagate as raised so callers
   * (the readiness probe) can report their category.
   */
  public async ping(): Promise<void> {
    const db = await this.client.getDb(this.config.mongo.dbName);
    await db.command({ ping: 1 });
  }

  /** Wait for the database before the app starts serving. Skipped under Jest. */
  public async onModuleInit(): Promise<void> {
    if (isTestRuntime()) {
      this.logger.log('Test environment detected; skipping database wait.');
      return;
    }
    await this.waitUntilReady();
  }

  public async onModuleDestroy(): Promise<void> {
    await this.client.close();
  }

  private async waitUntilReady(): Promise<void> {
    const { uri, waitTimeoutMs, waitIntervalMs } = this.config.mongo;
    const start = Date.now();
    let attempt = 0;

    this.logger.log(`Waiting for MongoDB at ${maskMongoUri(uri)} ...`);

    while (true) {
      attempt += 1;
      try {
        await this.ping();
        this.logger.log(`MongoDB is ready (attempt ${attempt}).`);
        return;
      } catch (err) {
        const elapsed = Date.now() - start;
        if (elapsed + waitIntervalMs >= waitTimeoutMs) {
          this.logger.error(
            `MongoDB did not become ready within ${waitTimeoutMs}ms`,
          );
          throw MongoActionError.wrap(
            err,
            { operation: 'connect', dbName: this.config.mongo.dbName },
            `MongoDB not ready after ${waitTimeoutMs}ms`,
          );
        }
        this.logger.debug(
          `MongoDB not ready yet (attempt ${attempt}): ${err instanceof Error ? err.message : String(err)}`,
        );
        await delay(waitIntervalMs);
      }
    }
  }
}
