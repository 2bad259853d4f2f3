import { RecordServiceError, StoreUnavailableError } from './errors';
import { RetryPolicy, defaultRetryPolicy } from './retryPolicy';
import { logStoreRetry } from '../observability/telemetry';

export const DEFAULT_STORE_TIMEOUT_MS = 5_000;

export type Sleep = (ms: number) => Promise<void>;

export interface StoreGuardOptions {
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
}

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Races a store call against a timer. The timer is always cleared, so a
 * settled call never keeps the process alive.
 */
export async function withTimeout<T>(operation: string, call: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new StoreUnavailableError(`${operation} timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Every adapter call made by the coordinator and the query engine passes
 * through a guard: it bounds the call with a timeout and maps anything that
 * is not already part of the error taxonomy to StoreUnavailableError.
 *
 * `retrying` is for idempotent calls (reads, blob operations, deletes).
 * `once` is for conditional writes, which are never replayed: a write that
 * timed out may still have been applied.
 */
export class StoreGuard {
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(options: StoreGuardOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async once<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(operation, call(), this.timeoutMs);
    } catch (error) {
      throw this.normalize(operation, error);
    }
  }

  async retrying<T>(operation: string, call: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await withTimeout(operation, call(), this.timeoutMs);
      } catch (error) {
        const normalized = this.normalize(operation, error);
        const decision = this.retryPolicy.decide(attempt, normalized);
        if (!decision.shouldRetry) {
          throw normalized;
        }
        logStoreRetry(operation, attempt, decision.delayMs, decision.reason);
        await this.sleep(decision.delayMs);
      }
    }
  }

  private normalize(operation: string, error: unknown): RecordServiceError {
    if (error instanceof RecordServiceError) {
      return error;
    }
    return new StoreUnavailableError(`${operation} failed`, { retryable: false, cause: error });
  }
}
