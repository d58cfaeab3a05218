import { MongoClient, type Db, type MongoClientOptions } from 'mongodb';
import type { MongoConfig } from '../../../infra/mongo/mongo.config';

/**
 * Lazily connected MongoDB client.
 * - One connect attempt in flight at a time; concurrent callers share it.
 * - A failed attempt resets state so the next call retries.
 * - close() is idempotent.
 */
export class LazyMongoClient {
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;

  constructor(
    private readonly config: MongoConfig,
    private readonly factory: (uri: string, options: MongoClientOptions) => MongoClient = (
      uri,
      options,
    ) => new MongoClient(uri, options),
  ) {}

  /** Get (or create) a connected MongoClient instance. */
  public async getClient(): Promise<MongoClient> {
    const existing: MongoClient | undefined = this.client;
    if (existing) return existing;

    const inflight: Promise<MongoClient> | undefined = this.connecting;
    if (inflight) return inflight;

    const options: MongoClientOptions = {
      ignoreUndefined: true,
      appName: this.config.appName,
      serverSelectionTimeoutMS: this.config.serverSelectionTimeoutMs,
    };

    const connectPromise: Promise<MongoClient> = (async () => {
      const created = this.factory(this.config.uri, options);
      await created.connect();
      this.client = created;
      this.connecting = undefined;
      return created;
    })();

    this.connecting = connectPromise;

    try {
      return await connectPromise;
    } catch (err) {
      // Reset so a subsequent call can retry.
      this.connecting = undefined;
      this.client = undefined;

      if (err instanceof Error) {
        throw err;
      }
      throw new Error('Failed to connect to MongoDB');
    }
  }

  /** Get a Db handle (defaults to the configured database). */
  public async getDb(dbName?: string): Promise<Db> {
    const client: MongoClient = await this.getClient();
    return client.db(dbName ?? this.config.dbName);
  }

  /** Close client if connected. */
  public async close(): Promise<void> {
    const current: MongoClient | undefined = this.client;
    if (!current) return;
    this.client = undefined;
    this.connecting = undefined;
    await current.close();
  }
}
