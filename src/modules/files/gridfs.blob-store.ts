import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { Injectable, Logger } from '@nestjs/common';
import { MongoRuntimeError, type GridFSBucket, type ObjectId } from 'mongodb';
import { NotFoundError } from '../../lib/errors/AppError';
import { MongoActionError } from '../../lib/errors/MongoActionError';
import { MongodbService } from '../mongodb/mongodb.service';
import type { BlobStore } from './blob-store';

export class FileNotFoundError extends NotFoundError {
  constructor(readonly fileId: string) {
    super(`File not found: ${fileId}`, 'FILE_NOT_FOUND');
  }
}

/** The driver reports a missing file as a runtime error with "not found" in it. */
function isMissingFile(err: unknown): boolean {
  return err instanceof MongoRuntimeError && /not found/i.test(err.message);
}

@Injectable()
export class GridFsBlobStore implements BlobStore {
  private readonly logger = new Logger(GridFsBlobStore.name);

  public constructor(private readonly mongo: MongodbService) {}

  public async upload(name: string, bytes: Buffer): Promise<ObjectId> {
    const bucket = await this.bucket();
    const stream = bucket.openUploadStream(name);
    try {
      await pipeline(Readable.from([bytes]), stream);
    } catch (err) {
      throw MongoActionError.wrap(err, { operation: 'files.upload', argsPreview: { name } });
    }
    this.logger.debug(`Stored ${name} (${bytes.length} bytes) as ${stream.id.toHexString()}`);
    return stream.id;
  }

  public async download(id: ObjectId): Promise<Buffer> {
    const bucket = await this.bucket();
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of bucket.openDownloadStream(id)) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
    } catch (err) {
      if (isMissingFile(err)) throw new FileNotFoundError(id.toHexString());
      throw MongoActionError.wrap(err, {
        operation: 'files.download',
        argsPreview: { id: id.toHexString() },
      });
    }
    return Buffer.concat(chunks);
  }

  public async delete(id: ObjectId): Promise<void> {
    const bucket = await this.bucket();
    try {
      await bucket.delete(id);
    } catch (err) {
      if (isMissingFile(err)) throw new FileNotFoundError(id.toHexString());
      throw MongoActionError.wrap(err, {
        operation: 'files.delete',
        argsPreview: { id: id.toHexString() },
      });
    }
  }

  private bucket(): Promise<GridFSBucket> {
    return this.mongo.getBucket();
  }
}
