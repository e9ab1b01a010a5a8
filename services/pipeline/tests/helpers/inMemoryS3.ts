import {
  CreateBucketCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutBucketPolicyCommand,
  PutObjectCommand
} from '@aws-sdk/client-s3';

import type { ObjectStorageClient, StoredObjectBody } from '../../src/storage/blobStore';

type StorageCommand =
  | GetObjectCommand
  | PutObjectCommand
  | HeadBucketCommand
  | CreateBucketCommand
  | PutBucketPolicyCommand;

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

export type StoredObject = {
  body: Uint8Array;
  contentType: string | undefined;
};

/** S3 double keyed by `bucket/key`; set `unavailable` to simulate an outage. */
export class InMemoryS3Client implements ObjectStorageClient {
  readonly buckets = new Set<string>();
  readonly objects = new Map<string, StoredObject>();
  readonly policies = new Map<string, string>();
  readonly calls: string[] = [];
  unavailable = false;
  /** Number of upcoming commands that fail with a transient error. */
  transientFailures = 0;
  /** Uploads to `bucket/key` paths starting with this prefix always fail. */
  rejectPutsUnder: string | null = null;

  constructor(buckets: string[] = []) {
    for (const bucket of buckets) {
      this.buckets.add(bucket);
    }
  }

  send(command: GetObjectCommand): Promise<{ Body?: StoredObjectBody }>;
  send(command: PutObjectCommand): Promise<unknown>;
  send(command: HeadBucketCommand): Promise<unknown>;
  send(command: CreateBucketCommand): Promise<unknown>;
  send(command: PutBucketPolicyCommand): Promise<unknown>;
  async send(command: StorageCommand): Promise<unknown> {
    this.calls.push(command.constructor.name);
    if (this.unavailable) {
      throw namedError('Error', 'connect ECONNREFUSED 127.0.0.1:9000');
    }
    if (this.transientFailures > 0) {
      this.transientFailures -= 1;
      throw namedError('InternalError', 'We encountered an internal error. Please try again.');
    }

    if (command instanceof HeadBucketCommand) {
      if (!this.buckets.has(command.input.Bucket ?? '')) {
        throw namedError('NotFound', 'bucket not found');
      }
      return {};
    }
    if (command instanceof CreateBucketCommand) {
      this.buckets.add(command.input.Bucket ?? '');
      return {};
    }
    if (command instanceof PutBucketPolicyCommand) {
      this.policies.set(command.input.Bucket ?? '', command.input.Policy ?? '');
      return {};
    }
    if (command instanceof PutObjectCommand) {
      const bucket = command.input.Bucket ?? '';
      if (!this.buckets.has(bucket)) {
        throw namedError('NoSuchBucket', `bucket ${bucket} does not exist`);
      }
      const path = `${bucket}/${command.input.Key ?? ''}`;
      if (this.rejectPutsUnder !== null && path.startsWith(this.rejectPutsUnder)) {
        throw namedError('ServiceUnavailable', 'Please reduce your request rate.');
      }
      const body = command.input.Body;
      if (!(body instanceof Uint8Array)) {
        throw new Error('in-memory client only stores byte bodies');
      }
      this.objects.set(path, {
        body: Uint8Array.from(body),
        contentType: command.input.ContentType
      });
      return {};
    }

    const stored = this.objects.get(`${command.input.Bucket ?? ''}/${command.input.Key ?? ''}`);
    if (!stored) {
      throw namedError('NoSuchKey', 'The specified key does not exist.');
    }
    return {
      Body: {
        transformToByteArray: async () => Uint8Array.from(stored.body)
      }
    };
  }

  keys(prefix = ''): string[] {
    return Array.from(this.objects.keys())
      .filter((key) => key.startsWith(prefix))
      .sort();
  }
}
