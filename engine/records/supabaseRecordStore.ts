import type { SupabaseClient, PostgrestError } from '@supabase/supabase-js';
import type { IRecordStore } from './recordStore';
import { ConflictError, DuplicateIdError, RecordNotFoundError, StoreUnavailableError } from './errors';
import { RecordStatus, isRecordStatus } from './stateMachine';
import { CustomAttributes, ImageRecord, IndexPage, IndexQuery, RecordPatch, SortKey, sortKeyOf } from './types';

/** Column layout of the `image_records` table (see schema.sql). */
export interface RecordRow {
  id: string;
  owner_id: string;
  status: string;
  object_ref: string;
  filename: string;
  content_type: string;
  size_bytes: number | null;
  width: number | null;
  height: number | null;
  tags: string[] | null;
  description: string | null;
  custom_attributes: CustomAttributes | null;
  created_at: string;
  updated_at: string;
}

type RowPatch = Partial<Omit<RecordRow, 'id' | 'owner_id' | 'object_ref' | 'filename' | 'created_at'>>;

const UNIQUE_VIOLATION = '23505';

const INDEX_COLUMNS = {
  owner: 'owner_id',
  status: 'status',
} as const;

export function mapRowToRecord(row: RecordRow): ImageRecord {
  if (!isRecordStatus(row.status)) {
    throw new StoreUnavailableError(`Record ${row.id} has unrecognized status "${row.status}"`, {
      retryable: false,
    });
  }

  return {
    id: row.id,
    ownerId: row.owner_id,
    status: row.status,
    objectRef: row.object_ref,
    filename: row.filename,
    contentType: row.content_type,
    sizeBytes: row.size_bytes,
    width: row.width,
    height: row.height,
    tags: row.tags ?? [],
    description: row.description,
    customAttributes: row.custom_attributes ?? {},
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function mapRecordToRow(record: ImageRecord): RecordRow {
  return {
    id: record.id,
    owner_id: record.ownerId,
    status: record.status,
    object_ref: record.objectRef,
    filename: record.filename,
    content_type: record.contentType,
    size_bytes: record.sizeBytes,
    width: record.width,
    height: record.height,
    tags: record.tags,
    description: record.description,
    custom_attributes: record.customAttributes,
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  };
}

export function mapPatchToRow(patch: RecordPatch): RowPatch {
  const row: RowPatch = { updated_at: patch.updatedAt.toISOString() };
  if (patch.status !== undefined) row.status = patch.status;
  if (patch.sizeBytes !== undefined) row.size_bytes = patch.sizeBytes;
  if (patch.width !== undefined) row.width = patch.width;
  if (patch.height !== undefined) row.height = patch.height;
  if (patch.tags !== undefined) row.tags = patch.tags;
  if (patch.description !== undefined) row.description = patch.description;
  if (patch.customAttributes !== undefined) row.custom_attributes = patch.customAttributes;
  return row;
}

/**
 * PostgREST `or` filter selecting rows strictly after `after` in
 * (created_at desc, id desc) order.
 */
export function buildResumeFilter(after: SortKey): string {
  const createdAt = `"${after.createdAt.toISOString()}"`;
  return `created_at.lt.${createdAt},and(created_at.eq.${createdAt},id.lt.${after.id})`;
}

/**
 * Status 0 means the request never got a response (network failure).
 */
export function toStoreError(
  operation: string,
  error: Pick<PostgrestError, 'message' | 'code'>,
  status: number,
): StoreUnavailableError {
  return new StoreUnavailableError(`${operation} failed: ${error.message}`, {
    retryable: status === 0 || status === 429 || status >= 500,
    cause: error,
  });
}

/**
 * Supabase implementation
 */
export class SupabaseRecordStore implements IRecordStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'image_records',
  ) {}

  async createIfAbsent(record: ImageRecord): Promise<void> {
    const { error, status } = await this.client.from(this.table).insert(mapRecordToRow(record));

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new DuplicateIdError(record.id);
      }
      throw toStoreError('records.insert', error, status);
    }
  }

  async get(id: string): Promise<ImageRecord | null> {
    const { data, error, status } = await this.client
      .from(this.table)
      .select('*')
      .eq('id', id)
      .maybeSingle<RecordRow>();

    if (error) throw toStoreError('records.get', error, status);
    return data ? mapRowToRecord(data) : null;
  }

  async conditionalUpdate(id: string, expectedStatus: RecordStatus, patch: RecordPatch): Promise<ImageRecord> {
    const { data, error, status } = await this.client
      .from(this.table)
      .update(mapPatchToRow(patch))
      .eq('id', id)
      .eq('status', expectedStatus)
      .select('*')
      .returns<RecordRow[]>();

    if (error) throw toStoreError('records.conditionalUpdate', error, status);

    const updated = data?.[0];
    if (updated) {
      return mapRowToRecord(updated);
    }

    // Nothing matched: tell a vanished record apart from a lost race.
    const current = await this.get(id);
    if (!current) {
      throw new RecordNotFoundError(id);
    }
    throw new ConflictError(`Record ${id} is ${current.status}, expected ${expectedStatus}`);
  }

  async delete(id: string): Promise<void> {
    const { error, status } = await this.client.from(this.table).delete().eq('id', id);
    if (error) throw toStoreError('records.delete', error, status);
  }

  async query(query: IndexQuery): Promise<IndexPage> {
    let request = this.client
      .from(this.table)
      .select('*')
      .eq(INDEX_COLUMNS[query.index], query.partitionKey);

    if (query.timeRange?.start) {
      request = request.gte('created_at', query.timeRange.start.toISOString());
    }
    if (query.timeRange?.end) {
      request = request.lt('created_at', query.timeRange.end.toISOString());
    }
    if (query.after) {
      request = request.or(buildResumeFilter(query.after));
    }

    // One extra row tells whether another page exists.
    const { data, error, status } = await request
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(query.limit + 1)
      .returns<RecordRow[]>();

    if (error) throw toStoreError('records.query', error, status);

    const rows = data ?? [];
    const records = rows.slice(0, query.limit).map(mapRowToRecord);
    const last = records[records.length - 1];
    return {
      records,
      nextKey: rows.length > query.limit && last ? sortKeyOf(last) : undefined,
    };
  }
}
