import {
  Inject,
  Injectable,
  Logger,
  type OnModuleDestroy,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import {
  GridFSBucket,
  type Collection,
  type Db,
  type Document,
} from 'mongodb';
import { mongoConfig } from '../../infra/mongo/mongo.config';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { isNonEmptyString } from '../../lib/utils/strings';
import { DEFAULT_BUCKET_NAME, MONGO_CLIENT } from './internal/mongodb.types';
import { LazyMongoClient } from './internal/mongodb.client';

@Injectable()
export class MongodbService implements OnModuleDestroy {
  private readonly logger = new Logger(MongodbService.name);

  constructor(
    @Inject(mongoConfig.KEY)
    private readonly config: ConfigType<typeof mongoConfig>,
    @Inject(MONGO_CLIENT) private readonly lazy: LazyMongoClient,
  ) {}

  /**
   * Returns a connected native driver Db handle.
   * Defaults to the configured DB when not provided.
   */
  public async getDb(dbName?: string): Promise<Db> {
    const name: string = dbName ?? this.config.dbName;
    try {
      return await this.lazy.getDb(name);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'getDb',
        dbName: name,
      });
    }
  }

  /**
   * Returns a native driver Collection<T> for direct use by callers.
   * No schema enforcement here; repositories parse what they read.
   */
  public async getCollection<T extends Document = Document>(
    collection: string,
    dbName?: string,
  ): Promise<Collection<T>> {
    const name: string = dbName ?? this.config.dbName;
    if (!isNonEmptyString(collection)) {
      throw new MongoActionError('Collection name must be a non-empty string', {
        operation: 'getCollection',
        dbName: name,
        argsPreview: { collection: String(collection) },
      });
    }

    try {
      const db: Db = await this.lazy.getDb(name);
      return db.collection<T>(collection);
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'getCollection',
        dbName: name,
        collection,
      });
    }
  }

  /** GridFS bucket for blob storage. */
  public async getBucket(
    bucketName: string = DEFAULT_BUCKET_NAME,
    dbName?: string,
  ): Promise<GridFSBucket> {
    const name: string = dbName ?? this.config.dbName;
    try {
      const db: Db = await this.lazy.getDb(name);
      return new GridFSBucket(db, { bucketName });
    } catch (err) {
      throw MongoActionError.wrap(err, {
        operation: 'getBucket',
        dbName: name,
        argsPreview: { bucketName },
      });
    }
  }

  /** Graceful shutdown for local runs/tests. */
  public async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing MongoDB client');
    await this.lazy.close();
  }
}
