/** Injection token for the LazyMongoClient used by MongodbService. */
export const MONGO_CLIENT = Symbol('MONGO_CLIENT');

/** Name of the GridFS bucket used for file storage. */
export const DEFAULT_BUCKET_NAME = 'files' as const;
