import {
  S3Client,
  HeadObjectCommand,
  DeleteObjectCommand,
  PutObjectCommand,
  GetObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { IBlobStore, BlobCredential } from './types';
import { StoreUnavailableError } from '../records/errors';

const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchKey']);
const TRANSIENT_NAMES = new Set([
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
  'SlowDown',
  'ServiceUnavailable',
  'InternalError',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
]);

function httpStatusOf(error: unknown): number | undefined {
  if (error instanceof S3ServiceException) {
    return error.$metadata.httpStatusCode;
  }
  return undefined;
}

function errorNameOf(error: unknown): string | undefined {
  if (error instanceof Error) {
    return 'code' in error && typeof error.code === 'string' ? error.code : error.name;
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  const name = errorNameOf(error);
  return (name !== undefined && NOT_FOUND_NAMES.has(name)) || httpStatusOf(error) === 404;
}

/**
 * Network failures, throttling and 5xx responses are transient. Any other
 * response from the service (4xx) is permanent.
 */
export function isTransientError(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status !== undefined) {
    return status >= 500 || status === 429;
  }
  const name = errorNameOf(error);
  return name !== undefined && TRANSIENT_NAMES.has(name);
}

export function toBlobStoreError(operation: string, error: unknown): StoreUnavailableError {
  const name = errorNameOf(error) ?? 'UnknownError';
  return new StoreUnavailableError(`${operation} failed: ${name}`, {
    retryable: isTransientError(error),
    cause: error,
  });
}

export class S3BlobStore implements IBlobStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async exists(objectRef: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: objectRef }));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw toBlobStoreError('s3.headObject', error);
    }
  }

  async issueWriteCredential(objectRef: string, contentType: string, ttlSeconds: number): Promise<BlobCredential> {
    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: objectRef,
      ContentType: contentType,
    });
    const url = await this.presign('s3.presignPut', () => getSignedUrl(this.client, command, { expiresIn: ttlSeconds }));
    return {
      url,
      method: 'PUT',
      headers: { 'Content-Type': contentType },
      expiresAt: this.expiry(ttlSeconds),
    };
  }

  async issueReadCredential(objectRef: string, ttlSeconds: number): Promise<BlobCredential> {
    const command = new GetObjectCommand({ Bucket: this.bucket, Key: objectRef });
    const url = await this.presign('s3.presignGet', () => getSignedUrl(this.client, command, { expiresIn: ttlSeconds }));
    return { url, method: 'GET', headers: {}, expiresAt: this.expiry(ttlSeconds) };
  }

  /**
   * S3 deletes are idempotent: removing a missing key succeeds.
   */
  async delete(objectRef: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: objectRef }));
    } catch (error) {
      if (isNotFoundError(error)) return;
      throw toBlobStoreError('s3.deleteObject', error);
    }
  }

  private async presign(operation: string, sign: () => Promise<string>): Promise<string> {
    try {
      return await sign();
    } catch (error) {
      throw toBlobStoreError(operation, error);
    }
  }

  private expiry(ttlSeconds: number): Date {
    return new Date(this.clock().getTime() + ttlSeconds * 1000);
  }
}
