import { afterEach, describe, expect, it, vi } from 'vitest';
import { PermanentError, RetryableError, StageTimeoutError } from '../src/errors.js';
import { backoffDelay, retryStage, withStageTimeout } from '../src/pipeline/stage-runner.js';

describe('withStageTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the work result inside the limit', async () => {
    await expect(withStageTimeout('compute', 1000, () => 42)).resolves.toBe(42);
  });

  it('rejects with StageTimeoutError once the limit passes', async () => {
    vi.useFakeTimers();
    const pending = withStageTimeout('store', 500, () => new Promise<never>(() => undefined));
    const assertion = expect(pending).rejects.toThrow(StageTimeoutError);
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('names the stage and limit in the timeout message', async () => {
    vi.useFakeTimers();
    const pending = withStageTimeout('send', 250, () => new Promise<never>(() => undefined));
    const assertion = expect(pending).rejects.toThrow('Stage "send" timed out after 250ms');
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });

  it('disables the limit for a non-positive timeout', async () => {
    await expect(withStageTimeout('store', 0, async () => 'done')).resolves.toBe('done');
  });

  it('passes work errors through unchanged', async () => {
    const failure = new PermanentError('constraint violated');
    await expect(withStageTimeout('store', 1000, () => Promise.reject(failure))).rejects.toBe(failure);
  });
});

describe('backoffDelay', () => {
  it('doubles the base delay on every retry', () => {
    expect([1, 2, 3].map((retry) => backoffDelay(retry, 100))).toEqual([100, 200, 400]);
  });
});

describe('retryStage', () => {
  const retry = { attempts: 3, backoffMs: 100 };

  it('retries transient failures with exponential backoff', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const work = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RetryableError('connection reset'))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValue('stored');

    await expect(retryStage(work, retry, sleep)).resolves.toBe('stored');
    expect(work).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const onRetry = vi.fn();
    const work = vi.fn<() => Promise<string>>().mockRejectedValue(new RetryableError('still down'));

    await expect(retryStage(work, retry, sleep, onRetry)).rejects.toThrow('still down');
    expect(work).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('never retries a non-retryable error', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const work = vi.fn<() => Promise<string>>().mockRejectedValue(new PermanentError('bad row'));

    await expect(retryStage(work, retry, sleep)).rejects.toBeInstanceOf(PermanentError);
    expect(work).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
