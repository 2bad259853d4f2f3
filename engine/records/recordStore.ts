import { ConflictError, DuplicateIdError, RecordNotFoundError } from './errors';
import { RecordStatus } from './stateMachine';
import { SupabaseRecordStore } from './supabaseRecordStore';
import { getSupabaseClient } from './dbClient';
import {
  ImageRecord,
  RecordPatch,
  IndexQuery,
  IndexPage,
  compareSortKeysDesc,
  sortKeyOf,
  withinTimeRange,
} from './types';
import type { Config } from '../../bootstrap/config';

/**
 * Metadata store contract.
 *
 * `conditionalUpdate` is the only per-record mutation primitive: it applies
 * the patch only while the stored status still equals `expectedStatus`, so
 * of two racing writers exactly one wins and the other sees ConflictError.
 */
export interface IRecordStore {
  /** Fails with DuplicateIdError when a record with the same id exists. */
  createIfAbsent(record: ImageRecord): Promise<void>;
  get(id: string): Promise<ImageRecord | null>;
  /** Fails with RecordNotFoundError when the record is gone, ConflictError on status mismatch. */
  conditionalUpdate(id: string, expectedStatus: RecordStatus, patch: RecordPatch): Promise<ImageRecord>;
  /** Idempotent. */
  delete(id: string): Promise<void>;
  query(query: IndexQuery): Promise<IndexPage>;
}

const cloneRecord = (record: ImageRecord): ImageRecord => structuredClone(record);

/**
 * Applies the fields the patch defines. A key present with `undefined` leaves
 * the stored value alone.
 */
export function applyPatch(record: ImageRecord, patch: RecordPatch): ImageRecord {
  const next: ImageRecord = { ...record, updatedAt: patch.updatedAt };
  if (patch.status !== undefined) next.status = patch.status;
  if (patch.sizeBytes !== undefined) next.sizeBytes = patch.sizeBytes;
  if (patch.width !== undefined) next.width = patch.width;
  if (patch.height !== undefined) next.height = patch.height;
  if (patch.tags !== undefined) next.tags = [...patch.tags];
  if (patch.description !== undefined) next.description = patch.description;
  if (patch.customAttributes !== undefined) next.customAttributes = structuredClone(patch.customAttributes);
  return next;
}

/**
 * In-memory implementation.
 *
 * Each method reads and writes the map without yielding in between, so a
 * conditional update is atomic with respect to every other call.
 */
export class InMemoryRecordStore implements IRecordStore {
  private records: Map<string, ImageRecord> = new Map();

  async createIfAbsent(record: ImageRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new DuplicateIdError(record.id);
    }
    this.records.set(record.id, cloneRecord(record));
  }

  async get(id: string): Promise<ImageRecord | null> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : null;
  }

  async conditionalUpdate(id: string, expectedStatus: RecordStatus, patch: RecordPatch): Promise<ImageRecord> {
    const record = this.records.get(id);
    if (!record) {
      throw new RecordNotFoundError(id);
    }
    if (record.status !== expectedStatus) {
      throw new ConflictError(`Record ${id} is ${record.status}, expected ${expectedStatus}`);
    }

    const next = applyPatch(record, patch);
    this.records.set(id, next);
    return cloneRecord(next);
  }

  async delete(id: string): Promise<void> {
    this.records.delete(id);
  }

  async query(query: IndexQuery): Promise<IndexPage> {
    const { after } = query;
    const matches = Array.from(this.records.values())
      .filter(record =>
        query.index === 'owner' ? record.ownerId === query.partitionKey : record.status === query.partitionKey,
      )
      .filter(record => withinTimeRange(record.createdAt, query.timeRange))
      .filter(record => !after || compareSortKeysDesc(sortKeyOf(record), after) > 0)
      .sort((a, b) => compareSortKeysDesc(sortKeyOf(a), sortKeyOf(b)));

    const records = matches.slice(0, query.limit).map(cloneRecord);
    const last = records[records.length - 1];
    return {
      records,
      nextKey: matches.length > query.limit && last ? sortKeyOf(last) : undefined,
    };
  }

  size(): number {
    return this.records.size;
  }
}

/**
 * Factory to create the configured record store
 */
export function createRecordStore(config: Config['metadataStore']): IRecordStore {
  if (config.type === 'supabase') {
    return new SupabaseRecordStore(getSupabaseClient(config), config.table);
  }
  return new InMemoryRecordStore();
}
