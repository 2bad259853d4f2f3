type RecordEvent =
  | 'record_initiated'
  | 'record_confirmed'
  | 'record_failed'
  | 'record_updated'
  | 'record_deleted'
  | 'record_purged';

type RecordMetric =
  | 'records_initiated'
  | 'records_confirmed'
  | 'records_failed'
  | 'records_deleted'
  | 'records_purged'
  | 'store_retries';

type MetricsSnapshot = Record<RecordMetric, number>;

type EventDetails = Record<string, string | number | boolean | null>;

const metrics: MetricsSnapshot = {
  records_initiated: 0,
  records_confirmed: 0,
  records_failed: 0,
  records_deleted: 0,
  records_purged: 0,
  store_retries: 0,
};

function logEvent(event: RecordEvent, recordId: string, details: EventDetails = {}): void {
  console.info({
    event,
    recordId,
    ...details,
    timestamp: new Date().toISOString(),
  });
}

function increment(metric: RecordMetric): void {
  metrics[metric] += 1;
}

export function logRecordInitiated(recordId: string, ownerId: string): void {
  increment('records_initiated');
  logEvent('record_initiated', recordId, { ownerId });
}

export function logRecordConfirmed(recordId: string): void {
  increment('records_confirmed');
  logEvent('record_confirmed', recordId);
}

export function logRecordFailed(recordId: string): void {
  increment('records_failed');
  logEvent('record_failed', recordId);
}

export function logRecordUpdated(recordId: string): void {
  logEvent('record_updated', recordId);
}

export function logRecordDeleted(recordId: string): void {
  increment('records_deleted');
  logEvent('record_deleted', recordId);
}

export function logRecordPurged(recordId: string, objectRef: string): void {
  increment('records_purged');
  logEvent('record_purged', recordId, { objectRef });
}

export function logDuplicateId(recordId: string, attempt: number): void {
  console.error({
    event: 'duplicate_id',
    recordId,
    attempt,
    timestamp: new Date().toISOString(),
  });
}

export function logStoreRetry(operation: string, attempt: number, delayMs: number, reason: string): void {
  increment('store_retries');
  console.warn({
    event: 'store_retry',
    operation,
    attempt,
    delayMs,
    reason,
    timestamp: new Date().toISOString(),
  });
}

export function getRecordMetrics(): MetricsSnapshot {
  return { ...metrics };
}
