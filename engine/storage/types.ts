/**
 * A time-limited, pre-authorized request against a single object.
 * Issuing one has no side effect on either store.
 */
export interface BlobCredential {
  url: string;
  method: 'PUT' | 'GET';
  headers: Record<string, string>;
  expiresAt: Date;
}

/**
 * Content-object store keyed by an opaque object reference.
 *
 * Failures surface as StoreUnavailableError; `retryable` marks the transient
 * ones. A missing object is never an error: `exists` answers false and
 * `delete` succeeds.
 */
export interface IBlobStore {
  exists(objectRef: string): Promise<boolean>;
  issueWriteCredential(objectRef: string, contentType: string, ttlSeconds: number): Promise<BlobCredential>;
  issueReadCredential(objectRef: string, ttlSeconds: number): Promise<BlobCredential>;
  delete(objectRef: string): Promise<void>;
}
