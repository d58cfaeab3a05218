import { AppError } from './AppError';

/**
 * Canonical Mongo operation names used in error context.
 * Open-ended so repositories can report their own operation names.
 */
export type MongoOperation =
  | 'getDb'
  | 'getCollection'
  | 'getBucket'
  | 'find'
  | 'findOne'
  | 'countDocuments'
  | 'insertOne'
  | 'updateOne'
  | 'findOneAndUpdate'
  | 'deleteOne'
  | 'aggregate'
  | (string & {});

/**
 * Lightweight, structured context attached to Mongo errors.
 */
export interface MongoErrorContext {
  readonly operation: MongoOperation;
  readonly dbName?: string;
  readonly collection?: string;
  /**
   * Sanitized arguments preview. Never full documents.
   */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  /** Driver error code (e.g. from MongoServerError.code). */
  readonly driverCode?: number | string;
}

/**
 * A persistence-layer failure. Always surfaces as an internal error (500).
 * `retryable` is set when the write may have landed but could not be confirmed.
 */
export class MongoActionError extends AppError {
  public readonly name = 'MongoActionError' as const;
  public readonly context: Readonly<MongoErrorContext>;
  public readonly retryable: boolean;
  private readonly _cause?: Error;

  constructor(
    message: string,
    context: MongoErrorContext,
    cause?: Error,
    retryable = false,
  ) {
    super(message, 'MONGO_ACTION_FAILED', 'INTERNAL');
    this.context = Object.freeze({ ...context });
    this._cause = cause;
    this.retryable = retryable;
  }

  /** Human-readable summary for logs. */
  public summary(): string {
    const parts: string[] = [
      `op=${this.context.operation}`,
      this.context.dbName ? `db=${this.context.dbName}` : undefined,
      this.context.collection ? `coll=${this.context.collection}` : undefined,
      this.context.driverCode !== undefined
        ? `driverCode=${String(this.context.driverCode)}`
        : undefined,
      this.retryable ? 'retryable' : undefined,
    ].filter((p): p is string => p !== undefined);
    return `Mongo action failed: ${parts.join(' ')}`;
  }

  /** JSON-safe representation for structured logs. */
  public toJSON(): {
    name: string;
    message: string;
    retryable: boolean;
    context: MongoErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this._cause;
    return {
      name: this.name,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      cause: c ? { name: c.name, message: c.message } : undefined,
    };
  }

  /**
   * Wrap a thrown value with consistent context.
   * Domain errors (any AppError) pass through untouched.
   */
  public static wrap(
    err: unknown,
    context: MongoErrorContext,
    fallbackMessage = 'Mongo action failed',
  ): AppError {
    if (err instanceof AppError) {
      return err;
    }
    const { message, driverCode } = extractDriverDetails(err);
    return new MongoActionError(
      message ?? fallbackMessage,
      { ...context, driverCode },
      asError(err),
    );
  }
}

function asError(value: unknown): Error | undefined {
  if (value instanceof Error) return value;
  return undefined;
}

function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (err && typeof err === 'object') {
    const message =
      'message' in err && typeof err.message === 'string' && err.message.length > 0
        ? err.message
        : undefined;
    const code =
      'code' in err && (typeof err.code === 'number' || typeof err.code === 'string')
        ? err.code
        : undefined;
    return { message, driverCode: code };
  }
  return {};
}

/* ---------------------------
   Argument preview helpers
   --------------------------- */

export function preview(
  obj?: Record<string, unknown>,
  max = 6,
): Record<string, unknown> | undefined {
  if (!obj) return undefined;
  const out: Record<string, unknown> = {};
  let i = 0;
  for (const [k, v] of Object.entries(obj)) {
    out[k] = summarize(v);
    if (++i >= max) break;
  }
  return out;
}

export function summarize(v: unknown): unknown {
  if (v === null || v === undefined) return v;
  if (typeof v === 'string') {
    return v.length > 120 ? `${v.slice(0, 117)}...` : v;
  }
  if (typeof v === 'number' || typeof v === 'boolean') return v;
  if (Array.isArray(v)) return `[array(${v.length})]`;
  if (typeof v === 'object') {
    const hex = toHexString(v);
    return hex ?? '[object]';
  }
  return `[${typeof v}]`;
}

function toHexString(v: object): string | undefined {
  if ('toHexString' in v && typeof v.toHexString === 'function') {
    const out: unknown = v.toHexString();
    return typeof out === 'string' ? out : undefined;
  }
  return undefined;
}
