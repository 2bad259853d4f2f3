import { v4 as uuidv4 } from 'uuid';
import { IRecordStore } from './recordStore';
import { IBlobStore, BlobCredential } from '../storage/types';
import { StoreGuard } from './storeGuard';
import { recordStateMachine, RecordStatus } from './stateMachine';
import { CustomAttributes, ImageRecord, RecordPatch } from './types';
import {
  BlobMissingError,
  ConflictError,
  DuplicateIdError,
  ForbiddenError,
  OperationCancelledError,
  RecordNotFoundError,
  ValidationError,
} from './errors';
import {
  Validated,
  ValidationRejection,
  sanitizeFilename,
  validateContentType,
  validateCustomAttributes,
  validateDescription,
  validateDimension,
  validateOwnerId,
  validateSize,
  validateTags,
} from '../validation/validators';
import {
  logDuplicateId,
  logRecordConfirmed,
  logRecordDeleted,
  logRecordFailed,
  logRecordInitiated,
  logRecordPurged,
  logRecordUpdated,
} from '../observability/telemetry';

export const DEFAULT_URL_TTL_SECONDS = 900;
export const MAX_URL_TTL_SECONDS = 3600;
const MAX_CREATE_ATTEMPTS = 3;

export interface OperationOptions {
  /** Checked before the operation's store mutation; an aborted signal leaves no state behind. */
  signal?: AbortSignal;
}

export interface InitiateUploadRequest {
  ownerId: string;
  filename: string;
  contentType: string;
  tags?: string[];
  description?: string | null;
  customAttributes?: CustomAttributes;
  ttlSeconds?: number;
}

export interface InitiateUploadResult {
  recordId: string;
  objectRef: string;
  writeCredential: BlobCredential;
}

export type ConfirmStatus = Extract<RecordStatus, 'active' | 'error'>;

export interface ConfirmUploadRequest {
  recordId: string;
  ownerId: string;
  status: ConfirmStatus;
  sizeBytes?: number;
  width?: number;
  height?: number;
}

export interface UpdateMetadataRequest {
  recordId: string;
  ownerId: string;
  tags?: string[];
  description?: string | null;
  customAttributes?: CustomAttributes;
}

export interface DeleteRecordRequest {
  recordId: string;
  ownerId: string;
  hard?: boolean;
}

export interface CoordinatorDeps {
  recordStore: IRecordStore;
  blobStore: IBlobStore;
  guard?: StoreGuard;
  defaultUrlTtlSeconds?: number;
  maxUrlTtlSeconds?: number;
  idFactory?: () => string;
  clock?: () => Date;
}

/**
 * Object keys are derived from the owner and the record id, so no two
 * initiations can address the same key.
 */
export function buildObjectRef(ownerId: string, recordId: string, filename: string): string {
  return `images/${ownerId}/${recordId}/${filename}`;
}

function unwrap<T>(result: Validated<T>, rejections: ValidationRejection[], fallback: T): T {
  if (result.ok) return result.value;
  rejections.push(result.rejection);
  return fallback;
}

function throwIfAborted(operation: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

/**
 * Owns the record lifecycle.
 *
 * Every status change is a conditional write keyed by the status the
 * coordinator observed, so concurrent callers on the same record race inside
 * the metadata store: one wins, the others get ConflictError. No in-process
 * locks are held.
 */
export class RecordCoordinator {
  private readonly recordStore: IRecordStore;
  private readonly blobStore: IBlobStore;
  private readonly guard: StoreGuard;
  private readonly defaultUrlTtlSeconds: number;
  private readonly maxUrlTtlSeconds: number;
  private readonly idFactory: () => string;
  private readonly clock: () => Date;

  constructor(deps: CoordinatorDeps) {
    this.recordStore = deps.recordStore;
    this.blobStore = deps.blobStore;
    this.guard = deps.guard ?? new StoreGuard();
    this.maxUrlTtlSeconds = deps.maxUrlTtlSeconds ?? MAX_URL_TTL_SECONDS;
    this.defaultUrlTtlSeconds = Math.min(deps.defaultUrlTtlSeconds ?? DEFAULT_URL_TTL_SECONDS, this.maxUrlTtlSeconds);
    this.idFactory = deps.idFactory ?? uuidv4;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Phase one of an upload: reserves a `processing` record and hands back a
   * write credential for its object key. The blob store is only asked to sign.
   */
  async initiateUpload(request: InitiateUploadRequest, options: OperationOptions = {}): Promise<InitiateUploadResult> {
    const rejections: ValidationRejection[] = [];
    const ownerId = unwrap(validateOwnerId(request.ownerId), rejections, request.ownerId);
    const contentType = unwrap(validateContentType(request.contentType), rejections, 'image/jpeg');
    const tags = unwrap(validateTags(request.tags ?? []), rejections, []);
    const description = unwrap(validateDescription(request.description), rejections, null);
    const customAttributes = unwrap(validateCustomAttributes(request.customAttributes), rejections, {});
    const ttlSeconds = this.resolveTtl(request.ttlSeconds, rejections);
    if (rejections.length > 0) {
      throw new ValidationError(rejections);
    }

    const filename = sanitizeFilename(request.filename);

    for (let attempt = 1; ; attempt++) {
      throwIfAborted('initiateUpload', options.signal);

      const id = this.idFactory();
      const now = this.clock();
      const record: ImageRecord = {
        id,
        ownerId,
        status: 'processing',
        objectRef: buildObjectRef(ownerId, id, filename),
        filename,
        contentType,
        sizeBytes: null,
        width: null,
        height: null,
        tags,
        description,
        customAttributes,
        createdAt: now,
        updatedAt: now,
      };

      try {
        await this.guard.once('records.createIfAbsent', () => this.recordStore.createIfAbsent(record));
      } catch (error) {
        if (error instanceof DuplicateIdError) {
          logDuplicateId(id, attempt);
          if (attempt < MAX_CREATE_ATTEMPTS) continue;
        }
        throw error;
      }

      const writeCredential = await this.guard.retrying('blob.issueWriteCredential', () =>
        this.blobStore.issueWriteCredential(record.objectRef, contentType, ttlSeconds),
      );

      logRecordInitiated(id, ownerId);
      return { recordId: id, objectRef: record.objectRef, writeCredential };
    }
  }

  /**
   * Phase two: the client reports the outcome of its upload. Confirming
   * `active` requires the blob to be present; a missing blob leaves the record
   * in `processing` so the client can upload again and retry.
   */
  async confirmUpload(request: ConfirmUploadRequest, options: OperationOptions = {}): Promise<ImageRecord> {
    const rejections: ValidationRejection[] = [];
    if (request.status !== 'active' && request.status !== 'error') {
      rejections.push({ code: 'InvalidStatus', field: 'status', message: 'Status must be active or error' });
    }
    const sizeBytes = request.sizeBytes === undefined ? undefined : unwrap(validateSize(request.sizeBytes), rejections, 0);
    const width = request.width === undefined ? undefined : unwrap(validateDimension('width', request.width), rejections, 0);
    const height = request.height === undefined ? undefined : unwrap(validateDimension('height', request.height), rejections, 0);
    if (rejections.length > 0) {
      throw new ValidationError(rejections);
    }

    const current = await this.loadOwned(request.recordId, request.ownerId);
    if (current.status !== 'processing') {
      throw new ConflictError(`Record ${current.id} is ${current.status}; only processing records can be confirmed`);
    }
    recordStateMachine.assertTransition(current.id, current.status, request.status);

    if (request.status === 'active') {
      const present = await this.guard.retrying('blob.exists', () => this.blobStore.exists(current.objectRef));
      if (!present) {
        throw new BlobMissingError(current.id, current.objectRef);
      }
    }

    throwIfAborted('confirmUpload', options.signal);

    const patch: RecordPatch = { status: request.status, updatedAt: this.nextUpdatedAt(current) };
    if (sizeBytes !== undefined) patch.sizeBytes = sizeBytes;
    if (width !== undefined) patch.width = width;
    if (height !== undefined) patch.height = height;

    const updated = await this.guard.once('records.conditionalUpdate', () =>
      this.recordStore.conditionalUpdate(current.id, 'processing', patch),
    );

    if (updated.status === 'active') {
      logRecordConfirmed(updated.id);
    } else {
      logRecordFailed(updated.id);
    }
    return updated;
  }

  /**
   * Point lookup. A record owned by someone else is reported exactly like a
   * missing one. Soft-deleted records are still returned.
   */
  async getRecord(recordId: string, ownerId: string): Promise<ImageRecord> {
    const record = await this.guard.retrying('records.get', () => this.recordStore.get(recordId));
    if (!record || record.ownerId !== ownerId) {
      throw new RecordNotFoundError(recordId);
    }
    return record;
  }

  /**
   * Replaces tags, description or custom attributes. Only the fields present
   * in the request change.
   */
  async updateMetadata(request: UpdateMetadataRequest, options: OperationOptions = {}): Promise<ImageRecord> {
    const rejections: ValidationRejection[] = [];
    const patchFields: Omit<RecordPatch, 'updatedAt'> = {};
    if (request.tags !== undefined) {
      patchFields.tags = unwrap(validateTags(request.tags), rejections, []);
    }
    if (request.description !== undefined) {
      patchFields.description = unwrap(validateDescription(request.description), rejections, null);
    }
    if (request.customAttributes !== undefined) {
      patchFields.customAttributes = unwrap(validateCustomAttributes(request.customAttributes), rejections, {});
    }
    if (rejections.length > 0) {
      throw new ValidationError(rejections);
    }

    const current = await this.loadOwned(request.recordId, request.ownerId);
    if (current.status === 'deleted') {
      throw new ConflictError(`Record ${current.id} is deleted`);
    }

    throwIfAborted('updateMetadata', options.signal);

    const updated = await this.guard.once('records.conditionalUpdate', () =>
      this.recordStore.conditionalUpdate(current.id, current.status, {
        ...patchFields,
        updatedAt: this.nextUpdatedAt(current),
      }),
    );
    logRecordUpdated(updated.id);
    return updated;
  }

  /**
   * Soft delete marks the record `deleted`. Hard delete purges it: mark
   * `deleted`, remove the blob, then remove the metadata. Metadata goes last
   * so an interrupted purge leaves a `deleted` record pointing at a possibly
   * removed blob, which a repeated hard delete finishes.
   */
  async deleteRecord(request: DeleteRecordRequest, options: OperationOptions = {}): Promise<void> {
    const current = await this.loadOwned(request.recordId, request.ownerId);

    if (!request.hard) {
      recordStateMachine.assertTransition(current.id, current.status, 'deleted');
      throwIfAborted('deleteRecord', options.signal);
      await this.markDeleted(current);
      logRecordDeleted(current.id);
      return;
    }

    throwIfAborted('deleteRecord', options.signal);

    if (current.status !== 'deleted') {
      try {
        await this.markDeleted(current);
        logRecordDeleted(current.id);
      } catch (error) {
        // A concurrent caller may have marked it first; the purge can continue.
        if (!(error instanceof ConflictError)) throw error;
        const latest = await this.guard.retrying('records.get', () => this.recordStore.get(current.id));
        if (latest && latest.status !== 'deleted') throw error;
      }
    }

    await this.guard.retrying('blob.delete', () => this.blobStore.delete(current.objectRef));
    await this.guard.retrying('records.delete', () => this.recordStore.delete(current.id));
    logRecordPurged(current.id, current.objectRef);
  }

  /**
   * Signs a time-limited read URL for the record's blob.
   */
  async generateReadAccess(recordId: string, ownerId: string, ttlSeconds?: number): Promise<BlobCredential> {
    const rejections: ValidationRejection[] = [];
    const ttl = this.resolveTtl(ttlSeconds, rejections);
    if (rejections.length > 0) {
      throw new ValidationError(rejections);
    }

    const record = await this.loadOwned(recordId, ownerId);
    if (record.status === 'deleted') {
      throw new ConflictError(`Record ${record.id} is deleted`);
    }

    return this.guard.retrying('blob.issueReadCredential', () =>
      this.blobStore.issueReadCredential(record.objectRef, ttl),
    );
  }

  private async loadOwned(recordId: string, ownerId: string): Promise<ImageRecord> {
    const record = await this.guard.retrying('records.get', () => this.recordStore.get(recordId));
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    if (record.ownerId !== ownerId) {
      throw new ForbiddenError(recordId);
    }
    return record;
  }

  private async markDeleted(current: ImageRecord): Promise<ImageRecord> {
    return this.guard.once('records.conditionalUpdate', () =>
      this.recordStore.conditionalUpdate(current.id, current.status, {
        status: 'deleted',
        updatedAt: this.nextUpdatedAt(current),
      }),
    );
  }

  /** Keeps `createdAt <= updatedAt` and `updatedAt` non-decreasing even if the clock steps back. */
  private nextUpdatedAt(current: ImageRecord): Date {
    const now = this.clock();
    return now.getTime() < current.updatedAt.getTime() ? new Date(current.updatedAt.getTime()) : now;
  }

  /**
   * Missing ttl takes the default; any other number is clamped to
   * `[1, maxUrlTtlSeconds]`.
   */
  private resolveTtl(ttlSeconds: number | undefined, rejections: ValidationRejection[]): number {
    if (ttlSeconds === undefined) {
      return this.defaultUrlTtlSeconds;
    }
    if (Number.isNaN(ttlSeconds)) {
      rejections.push({ code: 'InvalidTtl', field: 'ttlSeconds', message: 'ttl must be a number' });
      return this.defaultUrlTtlSeconds;
    }
    return Math.max(1, Math.min(Math.floor(ttlSeconds), this.maxUrlTtlSeconds));
  }
}
