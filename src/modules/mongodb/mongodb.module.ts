import { Logger, Module } from '@nestjs/common';
import { ConfigModule, type ConfigType } from '@nestjs/config';
import { MongodbService } from './mongodb.service';
import { LazyMongoClient } from './internal/mongodb.client';
import { MONGO_CLIENT } from './internal/mongodb.types';
import { maskMongoUri, mongoConfig } from '../../infra/mongo/mongo.config';

/**
 * Internal-only MongoDB module.
 * - Provides a thin, typed bridge to the native MongoDB driver.
 * - No controllers (not exposed over HTTP).
 */
@Module({
  imports: [ConfigModule.forFeature(mongoConfig)],
  providers: [
    {
      provide: MONGO_CLIENT,
      inject: [mongoConfig.KEY],
      useFactory: (cfg: ConfigType<typeof mongoConfig>): LazyMongoClient => {
        new Logger('MongodbModule').log(
          `Mongo target ${maskMongoUri(cfg.uri)} (db=${cfg.dbName})`,
        );
        return new LazyMongoClient(cfg);
      },
    },
    MongodbService,
  ],
  exports: [MongodbService],
})
export class MongodbModule {}
