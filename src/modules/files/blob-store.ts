import type { ObjectId } from 'mongodb';

export const BLOB_STORE = Symbol('BLOB_STORE');

/** Named binary objects addressed by ObjectId. */
export interface BlobStore {
  upload(name: string, bytes: Buffer): Promise<ObjectId>;
  /** Throws NotFoundError when no blob has the id. */
  download(id: ObjectId): Promise<Buffer>;
  /** Throws NotFoundError when no blob has the id. */
  delete(id: ObjectId): Promise<void>;
}
