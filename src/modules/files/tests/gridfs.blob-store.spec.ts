import { Readable, Writable } from 'node:stream';
import { Logger } from '@nestjs/common';
import { MongoRuntimeError, ObjectId, type GridFSBucket } from 'mongodb';
import { InMemoryMongoClient } from '../../../../test/helpers/in-memory-mongo';
import { MONGO_DEFAULTS } from '../../../infra/mongo/mongo.config';
import { MongoActionError } from '../../../lib/errors/MongoActionError';
import { MongodbService } from '../../mongodb/mongodb.service';
import { FileNotFoundError, GridFsBlobStore } from '../gridfs.blob-store';

/** Bucket double that keeps file bodies in a map and fails like the driver does. */
class FakeBucket {
  public readonly files = new Map<string, { name: string; bytes: Buffer }>();

  public openUploadStream(name: string): Writable & { id: ObjectId } {
    const id = new ObjectId();
    const chunks: Buffer[] = [];
    const files = this.files;
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
      final(callback) {
        files.set(id.toHexString(), { name, bytes: Buffer.concat(chunks) });
        callback();
      },
    });
    return Object.assign(stream, { id });
  }

  public openDownloadStream(id: ObjectId): Readable {
    const file = this.files.get(id.toHexString());
    if (file) return Readable.from([file.bytes]);
    return new Readable({
      read() {
        this.destroy(new MongoRuntimeError(`FileNotFound: file ${id.toHexString()} was not found`));
      },
    });
  }

  public async delete(id: ObjectId): Promise<void> {
    if (!this.files.delete(id.toHexString())) {
      throw new MongoRuntimeError(`File not found for id ${id.toHexString()}`);
    }
  }
}

describe('GridFsBlobStore', () => {
  let bucket: FakeBucket;
  let store: GridFsBlobStore;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    bucket = new FakeBucket();
    const mongo = new MongodbService({ ...MONGO_DEFAULTS }, new InMemoryMongoClient());
    jest.spyOn(mongo, 'getBucket').mockResolvedValue(bucket as unknown as GridFSBucket);
    store = new GridFsBlobStore(mongo);
  });

  it('downloads exactly the bytes it uploaded', async () => {
    const bytes = Buffer.from('hello, blob');

    const id = await store.upload('greeting.txt', bytes);

    expect(id).toBeInstanceOf(ObjectId);
    expect(bucket.files.get(id.toHexString())?.name).toBe('greeting.txt');
    expect((await store.download(id)).toString('utf8')).toBe('hello, blob');
  });

  it('reports a missing file as FileNotFoundError', async () => {
    const ghost = new ObjectId();
    await expect(store.download(ghost)).rejects.toThrow(`File not found: ${ghost.toHexString()}`);
    await expect(store.delete(ghost)).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('deletes a file once', async () => {
    const id = await store.upload('a.bin', Buffer.from([1, 2, 3]));

    await store.delete(id);

    await expect(store.download(id)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    await expect(store.delete(id)).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('wraps other driver failures', async () => {
    jest.spyOn(bucket, 'delete').mockRejectedValueOnce(new Error('connection reset'));

    const err: unknown = await store.delete(new ObjectId()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MongoActionError);
    expect(err).toMatchObject({ message: 'connection reset', context: { operation: 'files.delete' } });
  });
});
