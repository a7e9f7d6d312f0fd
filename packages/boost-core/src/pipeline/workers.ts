/**
 * FILE PURPOSE: BullMQ worker definitions for the compute, store and send stages
 * WHY: Each stage runs on its own queue. A parent stage reads its child's
 *      return value, so store only sees factors compute produced and send only
 *      runs once store has succeeded.
 *      Processors return the factors so the next stage up the flow can read them.
 */

import { UnrecoverableError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { BoostErrorKind, BoostFactors } from '@boost-pipeline/shared-types';
import { PermanentError, errorKindOf, errorMessage, isRetryable } from '../errors.js';
import { log } from '../log.js';
import type { StageHandlers } from './chain.js';
import { parseRedisConnection } from './connection.js';
import { factorsFromChildren, recordLabel } from './jobs.js';
import type { StageJobData } from './jobs.js';
import { STAGE_QUEUES } from './queue.js';
import type { ChainStage } from './queue.js';
import { withStageTimeout } from './stage-runner.js';

export type StageJob = Job<StageJobData, BoostFactors>;
export type StageProcessor = (job: StageJob) => Promise<BoostFactors>;

const ERROR_KINDS: readonly BoostErrorKind[] = ['validation', 'configuration', 'retryable', 'permanent', 'unknown'];

function isErrorKind(value: string): value is BoostErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Rewrap a stage failure for BullMQ: the kind travels in the message as
 * `[kind] message`, and non-retryable kinds become UnrecoverableError so the
 * queue does not spend further attempts on them.
 */
export function toQueueError(err: unknown): Error {
  const message = `[${errorKindOf(err)}] ${errorMessage(err)}`;
  return isRetryable(err) ? new Error(message, { cause: err }) : new UnrecoverableError(message);
}

/** Inverse of toQueueError, applied to a job's failedReason. */
export function parseQueueFailure(reason: string | undefined): { errorKind: BoostErrorKind; message: string } {
  const match = /^\[([a-z]+)\] ([\s\S]*)$/.exec(reason ?? '');
  if (match?.[1] && isErrorKind(match[1])) {
    return { errorKind: match[1], message: match[2] ?? '' };
  }
  return { errorKind: 'unknown', message: reason ?? 'unknown failure' };
}

async function factorsFromChild(job: StageJob, stage: ChainStage): Promise<BoostFactors> {
  const factors = factorsFromChildren(await job.getChildrenValues());
  if (!factors) {
    throw new PermanentError(`${stage}: no boost factors handed over for job ${job.id ?? '?'}`);
  }
  return factors;
}

/** Map the in-process stage handlers onto BullMQ job processors. */
export function buildStageProcessors(handlers: StageHandlers): Record<ChainStage, StageProcessor> {
  return {
    compute: async (job) => {
      if (!('request' in job.data)) {
        throw new PermanentError(`compute: job ${job.id ?? '?'} carries no request`);
      }
      const factors = await handlers.compute(job.data.request);
      await job.log(`Computed combined boost ${factors.combinedBoost} for ${recordLabel(factors)}`);
      return factors;
    },
    store: async (job) => {
      const factors = await factorsFromChild(job, 'store');
      await handlers.store(factors);
      await job.log(`Stored boost factors for ${recordLabel(factors)}`);
      return factors;
    },
    send: async (job) => {
      const factors = await factorsFromChild(job, 'send');
      await handlers.send(factors);
      await job.log(`Sent boost response for ${recordLabel(factors)}`);
      return factors;
    },
  };
}

/** Apply the stage timeout and translate errors into the queue's retry vocabulary. */
export function guardStageProcessor(stage: ChainStage, timeoutMs: number, processor: StageProcessor): StageProcessor {
  return async (job) => {
    try {
      return await withStageTimeout(stage, timeoutMs, () => processor(job));
    } catch (err) {
      throw toQueueError(err);
    }
  };
}

export interface StageWorkerOptions {
  redisUrl?: string;
  concurrency?: number;
  /** Per-stage timeout; 0 disables it. */
  timeoutMs?: number;
}

export function createStageWorker(
  stage: ChainStage,
  processor: StageProcessor,
  options: StageWorkerOptions = {},
): Worker<StageJobData, BoostFactors> {
  const worker = new Worker<StageJobData, BoostFactors>(
    STAGE_QUEUES[stage],
    guardStageProcessor(stage, options.timeoutMs ?? 0, processor),
    {
      connection: parseRedisConnection(options.redisUrl),
      concurrency: options.concurrency ?? 5,
    },
  );

  worker.on('failed', (job, err) => {
    const attempts = job ? `${job.attemptsMade}/${job.opts.attempts ?? 1}` : '?';
    log.error(`${stage} job ${job?.id ?? '?'} failed (attempt ${attempts}): ${err.message}`);
  });
  worker.on('error', (err) => {
    log.error(`${stage} worker error: ${err.message}`);
  });

  return worker;
}
