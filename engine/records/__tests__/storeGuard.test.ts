import { RetryPolicy } from '../retryPolicy';
import { StoreGuard, withTimeout } from '../storeGuard';
import { ConflictError, StoreUnavailableError } from '../errors';

/**
 * ============================================================================
 * RetryPolicy
 * ============================================================================
 */

describe('RetryPolicy', () => {
  const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 150 });

  test('backs off exponentially up to the cap', () => {
    const transient = new StoreUnavailableError('s3 down');
    expect(policy.decide(1, transient)).toMatchObject({ shouldRetry: true, delayMs: 100 });
    expect(policy.decide(2, transient)).toMatchObject({ shouldRetry: true, delayMs: 150 });
  });

  test('stops at the attempt limit', () => {
    const decision = policy.decide(3, new StoreUnavailableError('s3 down'));
    expect(decision.shouldRetry).toBe(false);
    expect(decision.reason).toBe('Retry limit reached (3) after attempt 3: s3 down');
  });

  test('never retries permanent failures', () => {
    expect(policy.decide(1, new ConflictError('lost race')).shouldRetry).toBe(false);
    expect(policy.decide(1, new StoreUnavailableError('bad row', { retryable: false })).shouldRetry).toBe(false);
    expect(policy.decide(1, new Error('plain')).shouldRetry).toBe(false);
  });
});

/**
 * ============================================================================
 * StoreGuard
 * ============================================================================
 */

describe('StoreGuard', () => {
  let sleeps: number[];
  let guard: StoreGuard;

  beforeEach(() => {
    sleeps = [];
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    guard = new StoreGuard({
      timeoutMs: 50,
      retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100 }),
      sleep: async ms => {
        sleeps.push(ms);
      },
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('retrying replays transient failures and returns the eventual result', async () => {
    let calls = 0;
    const result = await guard.retrying('records.get', async () => {
      calls++;
      if (calls < 3) throw new StoreUnavailableError('flaky');
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  test('retrying gives up after the attempt budget', async () => {
    let calls = 0;
    await expect(
      guard.retrying('blob.exists', async () => {
        calls++;
        throw new StoreUnavailableError('down');
      }),
    ).rejects.toThrow('down');
    expect(calls).toBe(3);
  });

  test('once never replays a failed call', async () => {
    let calls = 0;
    await expect(
      guard.once('records.conditionalUpdate', async () => {
        calls++;
        throw new StoreUnavailableError('flaky');
      }),
    ).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(calls).toBe(1);
  });

  test('foreign errors become non-retryable StoreUnavailableError', async () => {
    const failure = guard.once('records.get', async () => {
      throw new TypeError('boom');
    });
    await expect(failure).rejects.toMatchObject({
      errorCode: 'STORE_UNAVAILABLE',
      message: 'records.get failed',
      retryable: false,
    });
  });

  test('taxonomy errors pass through unchanged', async () => {
    const conflict = new ConflictError('lost race');
    await expect(guard.once('records.conditionalUpdate', async () => Promise.reject(conflict))).rejects.toBe(conflict);
  });

  test('a call that never settles times out as StoreUnavailableError', async () => {
    const hang = new Promise<string>(() => undefined);
    await expect(withTimeout('records.query', hang, 10)).rejects.toThrow('records.query timed out after 10ms');
  });
});
