import type { Logger } from '../logger.js';
import { isRetryableError } from '../errors.js';

export interface RetryPolicy {
  /** 첫 시도 포함 */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly isRetryable: (err: unknown) => boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function createRetryPolicy(opts: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: opts.maxAttempts ?? 4,
    baseDelayMs: opts.baseDelayMs ?? 1000,
    maxDelayMs: opts.maxDelayMs ?? 30_000,
    isRetryable: opts.isRetryable ?? isRetryableError,
  };
}

/** attempt(0부터) 이후 대기: base·2^attempt, 상한 maxDelayMs */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt));
}

/**
 * 지수 백오프 재시도
 * 재시도 불가 에러나 마지막 시도의 에러는 그대로 던진다.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  label: string,
  fn: () => Promise<T>,
  deps: { log?: Logger; sleep?: Sleep } = {},
): Promise<T> {
  const wait = deps.sleep ?? sleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const last = attempt + 1 >= policy.maxAttempts;
      if (last || !policy.isRetryable(err)) throw err;
      const delay = backoffDelay(policy, attempt);
      deps.log?.warn({ call: label, attempt: attempt + 1, delay, err }, 'Retryable error, backing off');
      await wait(delay);
    }
  }
}
