import {
  CreateBucketCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutBucketPolicyCommand,
  PutObjectCommand,
  S3Client
} from '@aws-sdk/client-s3';
import { retryWithBackoff, type BackoffOptions } from '@nightlight/shared';
import type { StorageConfig } from '../config/serviceConfig';
import { BlobNotFoundError, errorMessage, StorageError } from '../errors';
import { createSilentLogger, type Logger } from '../observability/logger';

export type BucketNames = {
  rasters: string;
  tiles: string;
};

export type PutOptions = {
  contentType?: string;
};

/** Object storage for raw rasters and rendered tiles. */
export interface BlobStore {
  readonly buckets: BucketNames;
  /** Creates missing buckets; repeated calls after the first success are free. */
  ensureReady(): Promise<void>;
  isReady(): boolean;
  put(bucket: string, key: string, body: Uint8Array, options?: PutOptions): Promise<void>;
  get(bucket: string, key: string): Promise<Buffer>;
}

export type StoredObjectBody = {
  transformToByteArray(): Promise<Uint8Array>;
};

/** The commands the gateway sends; satisfied by `S3Client` and by in-memory doubles. */
export interface ObjectStorageClient {
  send(command: GetObjectCommand): Promise<{ Body?: StoredObjectBody }>;
  send(command: PutObjectCommand): Promise<unknown>;
  send(command: HeadBucketCommand): Promise<unknown>;
  send(command: CreateBucketCommand): Promise<unknown>;
  send(command: PutBucketPolicyCommand): Promise<unknown>;
}

export type S3BlobStoreOptions = {
  client: ObjectStorageClient;
  buckets: BucketNames;
  maxAttempts?: number;
  backoff?: BackoffOptions;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchKey', 'NoSuchBucket']);

function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  if (NOT_FOUND_NAMES.has(err.name)) {
    return true;
  }
  if (!('$metadata' in err)) {
    return false;
  }
  const metadata = err.$metadata;
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'httpStatusCode' in metadata &&
    metadata.httpStatusCode === 404
  );
}

export function publicReadPolicy(bucket: string): string {
  return JSON.stringify({
    Version: '2012-10-17',
    Statement: [
      {
        Effect: 'Allow',
        Principal: { AWS: ['*'] },
        Action: ['s3:GetObject'],
        Resource: [`arn:aws:s3:::${bucket}/*`]
      }
    ]
  });
}

export class S3BlobStore implements BlobStore {
  readonly buckets: BucketNames;
  private readonly client: ObjectStorageClient;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffOptions;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private ready = false;
  private pendingReady: Promise<void> | null = null;

  constructor(options: S3BlobStoreOptions) {
    this.client = options.client;
    this.buckets = options.buckets;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoff = options.backoff ?? { baseMs: 500, maxMs: 5_000 };
    this.sleep = options.sleep;
    this.logger = options.logger ?? createSilentLogger();
  }

  isReady(): boolean {
    return this.ready;
  }

  async ensureReady(): Promise<void> {
    if (this.ready) {
      return;
    }
    if (!this.pendingReady) {
      this.pendingReady = this.initializeBuckets().finally(() => {
        this.pendingReady = null;
      });
    }
    await this.pendingReady;
  }

  async put(bucket: string, key: string, body: Uint8Array, options: PutOptions = {}): Promise<void> {
    try {
      await this.withRetries(`put ${bucket}/${key}`, () =>
        this.client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ContentType: options.contentType
          })
        )
      );
    } catch (err) {
      throw new StorageError(`failed to upload ${bucket}/${key}: ${errorMessage(err)}`, { bucket, key }, { cause: err });
    }
  }

  async get(bucket: string, key: string): Promise<Buffer> {
    try {
      return await this.withRetries(`get ${bucket}/${key}`, async () => {
        const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        if (!response.Body) {
          throw new BlobNotFoundError(bucket, key);
        }
        return Buffer.from(await response.Body.transformToByteArray());
      });
    } catch (err) {
      if (err instanceof BlobNotFoundError) {
        throw err;
      }
      if (isNotFound(err)) {
        throw new BlobNotFoundError(bucket, key);
      }
      throw new StorageError(`failed to download ${bucket}/${key}: ${errorMessage(err)}`, { bucket, key }, { cause: err });
    }
  }

  private async initializeBuckets(): Promise<void> {
    try {
      await this.ensureBucket(this.buckets.rasters, false);
      await this.ensureBucket(this.buckets.tiles, true);
    } catch (err) {
      throw new StorageError(`object storage is not ready: ${errorMessage(err)}`, { buckets: this.buckets }, { cause: err });
    }
    this.ready = true;
    this.logger.info({ buckets: this.buckets }, 'object storage buckets ready');
  }

  private async ensureBucket(bucket: string, publicRead: boolean): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return;
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
    }

    await this.client.send(new CreateBucketCommand({ Bucket: bucket }));
    this.logger.info({ bucket }, 'created bucket');
    if (publicRead) {
      await this.client.send(new PutBucketPolicyCommand({ Bucket: bucket, Policy: publicReadPolicy(bucket) }));
    }
  }

  private withRetries<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(fn, {
      ...this.backoff,
      attempts: this.maxAttempts,
      sleep: this.sleep,
      shouldRetry: (err) => !(err instanceof BlobNotFoundError) && !isNotFound(err),
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn({ err, attempt, delayMs, operation }, 'object storage call failed, retrying');
      }
    });
  }
}

export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined
  });
}

export function createBlobStore(config: StorageConfig, logger?: Logger): S3BlobStore {
  return new S3BlobStore({
    client: createS3Client(config),
    buckets: { rasters: config.rastersBucket, tiles: config.tilesBucket },
    maxAttempts: config.maxAttempts,
    logger
  });
}
