export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
  reason: string;
}

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 100;
const DEFAULT_MAX_DELAY_MS = 2_000;

const isRetryable = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'retryable' in error && error.retryable === true;

const describeFailure = (error: unknown): string =>
  error instanceof Error && error.message !== '' ? error.message : String(error ?? 'Unknown error');

/**
 * Bounded exponential backoff for store calls. Only failures that declare
 * themselves retryable are retried; everything else is terminal on the first
 * attempt.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  constructor(options?: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  }

  /**
   * `attempt` is 1-indexed: the attempt that just failed.
   */
  decide(attempt: number, error: unknown): RetryDecision {
    const reason = describeFailure(error);

    if (!isRetryable(error)) {
      return { shouldRetry: false, delayMs: 0, reason };
    }
    if (attempt >= this.maxAttempts) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Retry limit reached (${this.maxAttempts}) after attempt ${attempt}: ${reason}`,
      };
    }
    return {
      shouldRetry: true,
      delayMs: Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs),
      reason,
    };
  }
}

export const defaultRetryPolicy = new RetryPolicy();
