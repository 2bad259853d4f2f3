import { RecordStatus } from './stateMachine';

export type CustomAttributes = { [key: string]: unknown };

export interface ImageRecord {
  id: string;
  ownerId: string;
  status: RecordStatus;
  objectRef: string;
  filename: string;
  contentType: string;
  sizeBytes: number | null;
  width: number | null;
  height: number | null;
  tags: string[];
  description: string | null;
  customAttributes: CustomAttributes;
  createdAt: Date;
  updatedAt: Date;
}

/** Fields a conditional update may change. Identity fields are never patched. */
export type RecordPatch = Partial<
  Pick<ImageRecord, 'status' | 'sizeBytes' | 'width' | 'height' | 'tags' | 'description' | 'customAttributes'>
> & { updatedAt: Date };

export type RecordIndex = 'owner' | 'status';

/** Position in a time-ordered index scan: newest first, ties broken by id. */
export interface SortKey {
  createdAt: Date;
  id: string;
}

/** Half-open window `[start, end)` over createdAt. */
export interface TimeRange {
  start?: Date;
  end?: Date;
}

export interface IndexQuery {
  index: RecordIndex;
  partitionKey: string;
  timeRange?: TimeRange;
  after?: SortKey;
  limit: number;
}

export interface IndexPage {
  records: ImageRecord[];
  nextKey?: SortKey;
}

export const sortKeyOf = (record: Pick<ImageRecord, 'createdAt' | 'id'>): SortKey => ({
  createdAt: record.createdAt,
  id: record.id,
});

/**
 * Orders keys newest first. Negative when `a` comes before `b` in a scan.
 */
export function compareSortKeysDesc(a: SortKey, b: SortKey): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

export function withinTimeRange(createdAt: Date, range: TimeRange | undefined): boolean {
  if (!range) {
    return true;
  }
  const time = createdAt.getTime();
  if (range.start && time < range.start.getTime()) {
    return false;
  }
  if (range.end && time >= range.end.getTime()) {
    return false;
  }
  return true;
}
