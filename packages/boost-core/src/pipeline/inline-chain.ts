/**
 * FILE PURPOSE: In-process ChainDispatcher: compute → store → send as direct calls
 *
 * WHY: Direct mode for the CLI (no Redis needed) with the same semantics as
 *      the queue-backed chain: per-stage timeout, bounded exponential retry,
 *      non-retryable errors fail fast, stages strictly sequential per record.
 */

import type { BoostRequest, PipelineStage, RecordOutcome } from '@boost-pipeline/shared-types';
import { errorKindOf, errorMessage } from '../errors.js';
import { log } from '../log.js';
import type { ChainDispatcher, StageHandlers } from './chain.js';
import { recordLabel } from './jobs.js';
import { DEFAULT_STAGE_RETRY } from './queue.js';
import type { StageRetryOptions } from './queue.js';
import { defaultSleep, retryStage, withStageTimeout } from './stage-runner.js';
import type { Sleep } from './stage-runner.js';

export interface InlineChainOptions {
  /** Per-stage timeout; 0 disables it. */
  timeoutMs: number;
  retry?: StageRetryOptions;
  sleep?: Sleep;
}

export class InlineChainDispatcher implements ChainDispatcher {
  private readonly retry: StageRetryOptions;
  private readonly sleep: Sleep;

  constructor(
    private readonly handlers: StageHandlers,
    private readonly options: InlineChainOptions,
  ) {
    this.retry = options.retry ?? DEFAULT_STAGE_RETRY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async dispatch(request: BoostRequest): Promise<RecordOutcome> {
    const key = { bibcode: request.bibcode, scixId: request.scixId };
    let stage: PipelineStage = 'compute';

    try {
      const factors = await this.runStage(stage, request, () => this.handlers.compute(request));
      stage = 'store';
      await this.runStage(stage, request, () => this.handlers.store(factors));
      stage = 'send';
      await this.runStage(stage, request, () => this.handlers.send(factors));
      return { key, status: 'succeeded' };
    } catch (err) {
      return { key, status: 'failed', stage, errorKind: errorKindOf(err), message: errorMessage(err) };
    }
  }

  private runStage<T>(stage: PipelineStage, request: BoostRequest, work: () => Promise<T> | T): Promise<T> {
    return retryStage(
      () => withStageTimeout(stage, this.options.timeoutMs, work),
      this.retry,
      this.sleep,
      (attempt, err) => {
        log.warn(`${stage} attempt ${attempt} failed for ${recordLabel(request)}, retrying: ${errorMessage(err)}`);
      },
    );
  }
}
