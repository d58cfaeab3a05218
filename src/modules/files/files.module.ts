import { Module } from '@nestjs/common';
import { MongodbModule } from '../mongodb/mongodb.module';
import { BLOB_STORE } from './blob-store';
import { FilesController } from './files.controller';
import { GridFsBlobStore } from './gridfs.blob-store';

@Module({
  imports: [MongodbModule],
  controllers: [FilesController],
  providers: [{ provide: BLOB_STORE, useClass: GridFsBlobStore }],
  exports: [BLOB_STORE],
})
export class FilesModule {}
