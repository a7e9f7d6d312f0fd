/**
 * FILE PURPOSE: BullMQ channel names + queue factory for the boost pipeline
 *
 * WHY: Four logical channels: raw requests come in on the intake queue, and
 *      every record's chain runs as one job per stage on its own queue, so
 *      each stage retries and scales independently.
 * HOW: Stage jobs retry with exponential backoff; completed/failed jobs are
 *      trimmed so Redis memory stays bounded.
 */

import { Queue } from 'bullmq';
import type { JobsOptions } from 'bullmq';
import type { PipelineStage } from '@boost-pipeline/shared-types';
import { parseRedisConnection } from './connection.js';

export const BoostQueue = {
  INTAKE: 'boost-request',
  COMPUTE: 'compute-boost',
  STORE: 'store-boost',
  SEND: 'send-boost-response',
} as const;

export type BoostQueueName = (typeof BoostQueue)[keyof typeof BoostQueue];

export type ChainStage = Exclude<PipelineStage, 'intake'>;

export const STAGE_QUEUES: Record<ChainStage, BoostQueueName> = {
  compute: BoostQueue.COMPUTE,
  store: BoostQueue.STORE,
  send: BoostQueue.SEND,
};

export interface StageRetryOptions {
  /** Total attempts including the first run. */
  attempts: number;
  /** Base delay; doubles on every further attempt. */
  backoffMs: number;
}

export const DEFAULT_STAGE_RETRY: StageRetryOptions = { attempts: 3, backoffMs: 1000 };

export function stageJobOptions(retry: StageRetryOptions = DEFAULT_STAGE_RETRY): JobsOptions {
  return {
    attempts: retry.attempts,
    backoff: { type: 'exponential', delay: retry.backoffMs },
    removeOnComplete: { count: 1000 },
    removeOnFail: { count: 5000 },
  };
}

export function createBoostQueue<T>(
  name: string,
  redisUrl?: string,
  retry: StageRetryOptions = DEFAULT_STAGE_RETRY,
): Queue<T> {
  return new Queue<T>(name, {
    connection: parseRedisConnection(redisUrl),
    defaultJobOptions: stageJobOptions(retry),
  });
}
