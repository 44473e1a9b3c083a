import { MongoClient, type Db, type MongoClientOptions } from 'mongodb';

/**
 * Lazily connected MongoClient owned by one MongodbService.
 * Concurrent first calls share a single connect attempt; a failed attempt
 * is forgotten so the next call retries.
 */
export class LazyMongoClient {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  constructor(
    private readonly uri: string,
    private readonly options: MongoClientOptions,
  ) {}

  public async getClient(): Promise<MongoClient> {
    if (this.client) return this.client;
    if (this.connecting) return this.connecting;

    const connectPromise = (async (): Promise<MongoClient> => {
      const created = new MongoClient(this.uri, this.options);
      await created.connect();
      this.client = created;
      return created;
    })();
    this.connecting = connectPromise;

    try {
      return await connectPromise;
    } finally {
      this.connecting = undefined;
    }
  }

  public async getDb(dbName: string): Promise<Db> {
    const client = await this.getClient();
    return client.db(dbName);
  }

  /** Idempotent. A connect still in flight is waited for, then closed. */
  public async close(): Promise<void> {
    const pending = this.connecting;
    if (pending) {
      // A failed connect left nothing to close; its caller sees the error.
      await pending.then(
        () => undefined,
        () => undefined,
      );
    }
    const current = this.client;
    this.client = undefined;
    this.connecting = undefined;
    if (current) await current.close();
  }
}
