import { describe, it, expect } from 'vitest';
import { withRetry, createRetryPolicy, backoffDelay } from '../src/net/retry.js';
import { NetworkError, OrderError } from '../src/errors.js';

describe('withRetry', () => {
  const policy = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 10_000 });

  it('should retry retryable errors with exponential backoff', async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await withRetry(
      policy,
      'test',
      async () => {
        calls++;
        if (calls < 3) throw new NetworkError('flaky');
        return 'ok';
      },
      { sleep: async (ms) => { delays.push(ms); } },
    );
    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it('should give up after maxAttempts', async () => {
    let calls = 0;
    await expect(
      withRetry(policy, 'test', async () => {
        calls++;
        throw new NetworkError('down');
      }, { sleep: async () => {} }),
    ).rejects.toThrow('down');
    expect(calls).toBe(3);
  });

  it('should not retry non-retryable errors', async () => {
    let calls = 0;
    await expect(
      withRetry(policy, 'test', async () => {
        calls++;
        throw new OrderError('rejected');
      }, { sleep: async () => {} }),
    ).rejects.toBeInstanceOf(OrderError);
    expect(calls).toBe(1);
  });

  it('should respect the retryable flag on network errors', async () => {
    let calls = 0;
    await expect(
      withRetry(policy, 'test', async () => {
        calls++;
        throw new NetworkError('bad request', { status: 400, retryable: false });
      }, { sleep: async () => {} }),
    ).rejects.toBeInstanceOf(NetworkError);
    expect(calls).toBe(1);
  });
});

describe('backoffDelay', () => {
  it('should cap at maxDelayMs', () => {
    const policy = createRetryPolicy({ baseDelayMs: 1000, maxDelayMs: 3000 });
    expect(backoffDelay(policy, 0)).toBe(1000);
    expect(backoffDelay(policy, 1)).toBe(2000);
    expect(backoffDelay(policy, 5)).toBe(3000);
  });

  it('should default to four attempts', () => {
    expect(createRetryPolicy().maxAttempts).toBe(4);
  });
});
