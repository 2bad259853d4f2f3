import { S3Client } from '@aws-sdk/client-s3';
import { IBlobStore, BlobCredential } from './types';
import { S3BlobStore } from './s3BlobStore';
import type { Config } from '../../bootstrap/config';

interface StoredBlob {
  bytes: Buffer;
  contentType: string;
}

/**
 * In-memory storage implementation.
 *
 * Credentials point at `memory://` URLs; nothing serves them; `put` stands in
 * for the client uploading through a write credential.
 */
export class InMemoryBlobStore implements IBlobStore {
  private store: Map<string, StoredBlob> = new Map();

  constructor(
    private readonly bucket = 'image-records',
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async put(objectRef: string, bytes: Buffer, contentType = 'application/octet-stream'): Promise<void> {
    this.store.set(objectRef, { bytes: Buffer.from(bytes), contentType });
  }

  async get(objectRef: string): Promise<Buffer | null> {
    const blob = this.store.get(objectRef);
    return blob ? Buffer.from(blob.bytes) : null;
  }

  async exists(objectRef: string): Promise<boolean> {
    return this.store.has(objectRef);
  }

  async issueWriteCredential(objectRef: string, contentType: string, ttlSeconds: number): Promise<BlobCredential> {
    return {
      ...this.sign(objectRef, 'PUT', ttlSeconds),
      headers: { 'Content-Type': contentType },
    };
  }

  async issueReadCredential(objectRef: string, ttlSeconds: number): Promise<BlobCredential> {
    return this.sign(objectRef, 'GET', ttlSeconds);
  }

  async delete(objectRef: string): Promise<void> {
    this.store.delete(objectRef);
  }

  private sign(objectRef: string, method: 'PUT' | 'GET', ttlSeconds: number): BlobCredential {
    const expiresAt = new Date(this.clock().getTime() + ttlSeconds * 1000);
    const url = `memory://${this.bucket}/${encodeURI(objectRef)}?method=${method}&expires=${expiresAt.getTime()}`;
    return { url, method, headers: {}, expiresAt };
  }
}

/**
 * Factory to create the configured blob store
 */
export function createBlobStore(config: Config['blobStore']): IBlobStore {
  if (config.type === 's3') {
    const client = new S3Client({
      endpoint: config.endpoint ? sanitizeEndpoint(config.endpoint, config.bucket) : undefined,
      region: config.region,
      credentials:
        config.accessKeyId && config.secretAccessKey
          ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
          : undefined,
      forcePathStyle: config.forcePathStyle,
    });
    return new S3BlobStore(client, config.bucket);
  }

  return new InMemoryBlobStore(config.bucket);
}

/**
 * Strips a leading "<bucket>." from a virtual-hosted endpoint. Left in place,
 * the SDK would prepend the bucket a second time.
 */
export function sanitizeEndpoint(endpoint: string, bucket: string): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new Error(`Invalid S3 endpoint "${endpoint}"`, { cause: error });
  }

  if (!url.hostname.startsWith(`${bucket}.`)) {
    return endpoint;
  }

  url.hostname = url.hostname.substring(bucket.length + 1);
  const sanitized = url.toString();
  return sanitized.endsWith('/') && !endpoint.endsWith('/') ? sanitized.slice(0, -1) : sanitized;
}
