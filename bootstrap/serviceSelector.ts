import { Config } from './config';
import { RecordCoordinator } from '../engine/records/coordinator';
import { QueryEngine } from '../engine/query/queryEngine';
import { StoreGuard } from '../engine/records/storeGuard';
import { RetryPolicy } from '../engine/records/retryPolicy';
import { IRecordStore, createRecordStore } from '../engine/records/recordStore';
import { IBlobStore } from '../engine/storage/types';
import { createBlobStore } from '../engine/storage/blobStore';

export interface Services {
  coordinator: RecordCoordinator;
  queryEngine: QueryEngine;
}

/**
 * Overrides for the adapters, used by tests to inject in-memory stores.
 */
export interface ServiceOverrides {
  recordStore?: IRecordStore;
  blobStore?: IBlobStore;
  guard?: StoreGuard;
}

/**
 * Wires the coordinator and the query engine to the adapters selected by
 * BLOB_STORE_TYPE and METADATA_STORE_TYPE. Both share one store guard.
 */
export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const recordStore = overrides.recordStore ?? createRecordStore(config.metadataStore);
  const blobStore = overrides.blobStore ?? createBlobStore(config.blobStore);
  const guard =
    overrides.guard ??
    new StoreGuard({
      timeoutMs: config.store.timeoutMs,
      retryPolicy: new RetryPolicy({ maxAttempts: config.store.maxAttempts }),
    });

  console.info('[BOOTSTRAP] services configured', {
    blobStore: config.blobStore.type,
    metadataStore: config.metadataStore.type,
    serviceEnv: config.serviceEnv,
  });

  return {
    coordinator: new RecordCoordinator({
      recordStore,
      blobStore,
      guard,
      defaultUrlTtlSeconds: config.urlTtl.defaultSeconds,
      maxUrlTtlSeconds: config.urlTtl.maxSeconds,
    }),
    queryEngine: new QueryEngine({ recordStore, guard }),
  };
}
