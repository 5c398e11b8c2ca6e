import { describe, expect, it, vi } from 'vitest';
import { RetryPolicy, type RetryInfo } from './retry.js';

class Flaky extends Error {}

function createPolicy(onRetry?: (info: RetryInfo) => void) {
  const sleep = vi.fn(async (_ms: number) => {});
  const policy = new RetryPolicy({
    maxRetries: 3,
    baseDelayMs: 1000,
    isRetryable: (error) => error instanceof Flaky,
    onRetry,
    sleep,
  });
  return { policy, sleep };
}

describe('RetryPolicy', () => {
  it('backs off exponentially', () => {
    const { policy } = createPolicy();
    expect(policy.maxAttempts).toBe(4);
    expect([1, 2, 3].map((retry) => policy.delayForRetry(retry))).toEqual([1000, 2000, 4000]);
  });

  it('retries retryable failures until the task succeeds', async () => {
    const retries: RetryInfo[] = [];
    const { policy, sleep } = createPolicy((info) => retries.push(info));
    const task = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Flaky('busy');
      return 'ok';
    });

    await expect(policy.execute(task)).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    expect(retries.map((info) => [info.attempt, info.delayMs])).toEqual([[1, 1000], [2, 2000]]);
  });

  it('gives up after the last retry', async () => {
    const { policy, sleep } = createPolicy();
    const failure = new Flaky('still busy');
    const task = vi.fn(async () => {
      throw failure;
    });

    await expect(policy.execute(task)).rejects.toBe(failure);
    expect(task).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls).toEqual([[1000], [2000], [4000]]);
  });

  it('does not retry other errors', async () => {
    const { policy, sleep } = createPolicy();
    const task = vi.fn(async () => {
      throw new Error('bad request');
    });

    await expect(policy.execute(task)).rejects.toThrow('bad request');
    expect(task).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
