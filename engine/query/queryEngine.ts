import { IRecordStore } from '../records/recordStore';
import { StoreGuard } from '../records/storeGuard';
import { ValidationError } from '../records/errors';
import { RecordStatus, isRecordStatus } from '../records/stateMachine';
import { ImageRecord, IndexQuery, SortKey, TimeRange, sortKeyOf } from '../records/types';
import {
  ValidationRejection,
  validateContentType,
  validateOwnerId,
  validateTags,
} from '../validation/validators';
import { decodeCursor, encodeCursor } from './cursor';

export const DEFAULT_QUERY_LIMIT = 50;
export const MAX_QUERY_LIMIT = 100;
export const DEFAULT_MAX_SCAN_BATCHES = 10;

export type ListableStatus = Exclude<RecordStatus, 'deleted'>;

export interface RecordQuery {
  ownerId?: string;
  /** Matches records carrying at least one of these tags. */
  tags?: string[];
  contentType?: string;
  /** Inclusive lower bound on createdAt. */
  startTime?: Date;
  /** Exclusive upper bound on createdAt. */
  endTime?: Date;
  minSize?: number;
  maxSize?: number;
  /** Only honoured together with ownerId. */
  status?: string;
  limit?: number;
  cursor?: string;
}

export interface QueryResult {
  records: ImageRecord[];
  nextCursor?: string;
  count: number;
}

export interface QueryEngineDeps {
  recordStore: IRecordStore;
  guard?: StoreGuard;
  maxScanBatches?: number;
}

interface QueryPlan {
  index: IndexQuery['index'];
  partitionKey: string;
  timeRange?: TimeRange;
  after?: SortKey;
  limit: number;
  batchSize: number;
  matches: (record: ImageRecord) => boolean;
}

/**
 * Composes the filters of a listing request into one index scan plus an
 * in-memory residual predicate, then pages through the index in
 * (createdAt desc, id desc) order.
 */
export class QueryEngine {
  private readonly recordStore: IRecordStore;
  private readonly guard: StoreGuard;
  private readonly maxScanBatches: number;

  constructor(deps: QueryEngineDeps) {
    this.recordStore = deps.recordStore;
    this.guard = deps.guard ?? new StoreGuard();
    this.maxScanBatches = Math.max(1, deps.maxScanBatches ?? DEFAULT_MAX_SCAN_BATCHES);
  }

  async search(query: RecordQuery): Promise<QueryResult> {
    const plan = this.plan(query);

    const records: ImageRecord[] = [];
    let resumeKey = plan.after;
    let exhausted = false;

    for (let batch = 0; batch < this.maxScanBatches && records.length < plan.limit; batch++) {
      const page = await this.guard.retrying('records.query', () =>
        this.recordStore.query({
          index: plan.index,
          partitionKey: plan.partitionKey,
          timeRange: plan.timeRange,
          after: resumeKey,
          limit: plan.batchSize,
        }),
      );

      let consumed = 0;
      for (const record of page.records) {
        consumed++;
        resumeKey = sortKeyOf(record);
        if (plan.matches(record)) {
          records.push(record);
          if (records.length === plan.limit) break;
        }
      }
      if (consumed === 0 && page.nextKey) {
        resumeKey = page.nextKey;
      }

      const hasMore = consumed < page.records.length || page.nextKey !== undefined;
      if (!hasMore) {
        exhausted = true;
        break;
      }
    }

    // Either the last returned record or, when the scan budget ran out first,
    // the last record scanned.
    const nextCursor = !exhausted && resumeKey ? encodeCursor(resumeKey) : undefined;
    return { records, nextCursor, count: records.length };
  }

  private plan(query: RecordQuery): QueryPlan {
    const rejections: ValidationRejection[] = [];

    let ownerId: string | undefined;
    if (query.ownerId !== undefined) {
      const result = validateOwnerId(query.ownerId);
      if (result.ok) ownerId = result.value;
      else rejections.push(result.rejection);
    }

    let contentType: string | undefined;
    if (query.contentType !== undefined) {
      const result = validateContentType(query.contentType);
      if (result.ok) contentType = result.value;
      else rejections.push(result.rejection);
    }

    let tags: Set<string> | undefined;
    if (query.tags !== undefined && query.tags.length > 0) {
      const result = validateTags(query.tags);
      if (result.ok) tags = new Set(result.value);
      else rejections.push(result.rejection);
    }

    const status = resolveStatus(query.status, query.ownerId !== undefined, rejections);
    const limit = resolveLimit(query.limit, rejections);
    const timeRange = resolveTimeRange(query.startTime, query.endTime, rejections);
    checkSizeRange(query.minSize, query.maxSize, rejections);

    let after: SortKey | undefined;
    if (query.cursor !== undefined) {
      try {
        after = decodeCursor(query.cursor);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        rejections.push(...error.rejections);
      }
    }

    if (rejections.length > 0) {
      throw new ValidationError(rejections);
    }

    const { minSize, maxSize } = query;
    const requiredTags = tags;
    const requiredType = contentType;
    const hasResidual =
      ownerId !== undefined ||
      tags !== undefined ||
      contentType !== undefined ||
      minSize !== undefined ||
      maxSize !== undefined;

    return {
      index: ownerId !== undefined ? 'owner' : 'status',
      partitionKey: ownerId ?? 'active',
      timeRange,
      after,
      limit,
      // Filters applied after the read would starve small batches.
      batchSize: hasResidual ? MAX_QUERY_LIMIT : limit,
      matches: record => {
        if (record.status !== status) return false;
        if (requiredType !== undefined && record.contentType !== requiredType) return false;
        if (requiredTags && !record.tags.some(tag => requiredTags.has(tag))) return false;
        if (minSize !== undefined || maxSize !== undefined) {
          if (record.sizeBytes === null) return false;
          if (minSize !== undefined && record.sizeBytes < minSize) return false;
          if (maxSize !== undefined && record.sizeBytes > maxSize) return false;
        }
        return true;
      },
    };
  }
}

function resolveStatus(
  status: string | undefined,
  ownerScoped: boolean,
  rejections: ValidationRejection[],
): ListableStatus {
  if (status === undefined) {
    return 'active';
  }
  if (!isRecordStatus(status) || status === 'deleted') {
    rejections.push({ code: 'InvalidStatus', field: 'status', message: 'Status must be active, processing or error' });
    return 'active';
  }
  if (!ownerScoped && status !== 'active') {
    rejections.push({ code: 'InvalidStatus', field: 'status', message: 'Only active records can be listed without an owner' });
    return 'active';
  }
  return status;
}

function resolveLimit(limit: number | undefined, rejections: ValidationRejection[]): number {
  if (limit === undefined) {
    return DEFAULT_QUERY_LIMIT;
  }
  if (!Number.isInteger(limit) || limit < 1) {
    rejections.push({ code: 'InvalidLimit', field: 'limit', message: 'Limit must be a positive integer' });
    return DEFAULT_QUERY_LIMIT;
  }
  return Math.min(limit, MAX_QUERY_LIMIT);
}

function resolveTimeRange(
  start: Date | undefined,
  end: Date | undefined,
  rejections: ValidationRejection[],
): TimeRange | undefined {
  if (start === undefined && end === undefined) {
    return undefined;
  }
  if ((start && Number.isNaN(start.getTime())) || (end && Number.isNaN(end.getTime()))) {
    rejections.push({ code: 'InvalidTimeRange', field: 'timeRange', message: 'Invalid date' });
    return undefined;
  }
  if (start && end && start.getTime() >= end.getTime()) {
    rejections.push({ code: 'InvalidTimeRange', field: 'timeRange', message: 'startTime must be before endTime' });
    return undefined;
  }
  return { start, end };
}

function checkSizeRange(minSize: number | undefined, maxSize: number | undefined, rejections: ValidationRejection[]): void {
  for (const [field, value] of [['minSize', minSize], ['maxSize', maxSize]] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      rejections.push({ code: 'InvalidSizeRange', field, message: `${field} must be a non-negative integer` });
    }
  }
  if (minSize !== undefined && maxSize !== undefined && minSize > maxSize) {
    rejections.push({ code: 'InvalidSizeRange', field: 'minSize', message: 'minSize must not exceed maxSize' });
  }
}
