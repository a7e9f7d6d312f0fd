import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { BoostFactors, BoostRequest } from '@boost-pipeline/shared-types';
import { PermanentError, RetryableError } from '../src/errors.js';
import { InlineChainDispatcher } from '../src/pipeline/inline-chain.js';
import { computeBoostFactors } from '../src/scoring/final-boost.js';
import { makeConfig, makeRequest } from './helpers.js';

const now = new Date('2024-03-01T00:00:00Z');

function createHandlers() {
  const calls: string[] = [];
  return {
    calls,
    compute: vi.fn((request: BoostRequest): BoostFactors => {
      calls.push('compute');
      return computeBoostFactors(request, makeConfig(), now);
    }),
    store: vi.fn(async (_factors: BoostFactors): Promise<void> => {
      calls.push('store');
    }),
    send: vi.fn(async (_factors: BoostFactors): Promise<void> => {
      calls.push('send');
    }),
  };
}

describe('InlineChainDispatcher', () => {
  const sleep = vi.fn().mockResolvedValue(undefined);
  let handlers: ReturnType<typeof createHandlers>;

  beforeEach(() => {
    vi.clearAllMocks();
    handlers = createHandlers();
  });

  function dispatcher(timeoutMs = 1000) {
    return new InlineChainDispatcher(handlers, { timeoutMs, retry: { attempts: 3, backoffMs: 10 }, sleep });
  }

  it('runs compute, store and send in order and hands the factors along', async () => {
    const outcome = await dispatcher().dispatch(makeRequest());

    expect(outcome).toEqual({ key: { bibcode: '2024TEST..001..001A', scixId: 'scix:0001-TEST' }, status: 'succeeded' });
    expect(handlers.calls).toEqual(['compute', 'store', 'send']);
    const computed = handlers.compute.mock.results[0]?.value;
    expect(handlers.store).toHaveBeenCalledWith(computed);
    expect(handlers.send).toHaveBeenCalledWith(computed);
  });

  it('stops at a permanent store failure without sending', async () => {
    handlers.store.mockRejectedValueOnce(new PermanentError('value too long for type character varying(19)'));

    const outcome = await dispatcher().dispatch(makeRequest());

    expect(outcome).toMatchObject({ status: 'failed', stage: 'store', errorKind: 'permanent' });
    expect(handlers.store).toHaveBeenCalledTimes(1);
    expect(handlers.send).not.toHaveBeenCalled();
  });

  it('retries a transient store failure and then completes', async () => {
    handlers.store.mockRejectedValueOnce(new RetryableError('connection reset'));

    const outcome = await dispatcher().dispatch(makeRequest());

    expect(outcome.status).toBe('succeeded');
    expect(handlers.store).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it('reports a send failure after retries while the stored row stays', async () => {
    handlers.send.mockRejectedValue(new RetryableError('broker unavailable'));

    const outcome = await dispatcher().dispatch(makeRequest());

    expect(outcome).toMatchObject({
      status: 'failed',
      stage: 'send',
      errorKind: 'retryable',
      message: 'broker unavailable',
    });
    expect(handlers.store).toHaveBeenCalledTimes(1);
    expect(handlers.send).toHaveBeenCalledTimes(3);
  });

  it('turns a hung stage into a retryable timeout failure', async () => {
    handlers.store.mockImplementation(() => new Promise<never>(() => undefined));

    const outcome = await new InlineChainDispatcher(handlers, {
      timeoutMs: 20,
      retry: { attempts: 1, backoffMs: 10 },
      sleep,
    }).dispatch(makeRequest());

    expect(outcome).toMatchObject({
      status: 'failed',
      stage: 'store',
      errorKind: 'retryable',
      message: 'Stage "store" timed out after 20ms',
    });
  });

  it('attributes compute failures to the compute stage', async () => {
    handlers.compute.mockImplementationOnce(() => {
      throw new PermanentError('corrupt request');
    });

    const outcome = await dispatcher().dispatch(makeRequest());

    expect(outcome).toMatchObject({ status: 'failed', stage: 'compute', errorKind: 'permanent' });
    expect(handlers.store).not.toHaveBeenCalled();
  });
});
