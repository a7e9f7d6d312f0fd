/**
 * FILE PURPOSE: Start every BullMQ worker of the pipeline
 * WHY: The worker entry point gets the intake worker plus one worker per
 *      chain stage, all sharing one set of stage handlers.
 */

import { UnrecoverableError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { PipelineStage, RecordKey } from '@boost-pipeline/shared-types';
import {
  BoostQueue,
  buildStageProcessors,
  createStageWorker,
  log,
  parseRedisConnection,
} from '@boost-pipeline/boost-core';
import type { ChainStage, IntakeJobData, StageHandlers } from '@boost-pipeline/boost-core';
import type { PipelineConfig } from '../config.js';
import { createIntakeProcessor } from './intake-processor.js';
import type { ChainScheduler } from './intake-processor.js';

export type TerminalFailureHandler = (stage: PipelineStage, job: Job | undefined, err: Error) => void;

export interface PipelineWorkerDeps {
  config: PipelineConfig;
  handlers: StageHandlers;
  scheduler: ChainScheduler;
  /** Called when a job has failed for good: unrecoverable, or out of attempts. */
  onTerminalFailure?: TerminalFailureHandler;
}

const CHAIN_STAGES: readonly ChainStage[] = ['compute', 'store', 'send'];

export function isTerminalFailure(job: Job | undefined, err: Error): boolean {
  if (err instanceof UnrecoverableError || err.name === 'UnrecoverableError') return true;
  return job !== undefined && job.attemptsMade >= (job.opts.attempts ?? 1);
}

function watchTerminalFailures(stage: PipelineStage, worker: Worker, handler: TerminalFailureHandler | undefined): void {
  if (!handler) return;
  worker.on('failed', (job: Job | undefined, err: Error) => {
    if (isTerminalFailure(job, err)) handler(stage, job, err);
  });
}

export function startPipelineWorkers(deps: PipelineWorkerDeps): Worker[] {
  const { config } = deps;
  const processors = buildStageProcessors(deps.handlers);

  const stageWorkers = CHAIN_STAGES.map((stage) => {
    const worker = createStageWorker(stage, processors[stage], {
      redisUrl: config.redisUrl,
      concurrency: config.workerConcurrency,
      timeoutMs: config.stageTimeoutMs,
    });
    watchTerminalFailures(stage, worker, deps.onTerminalFailure);
    return worker;
  });

  const intakeWorker = new Worker<IntakeJobData, RecordKey>(BoostQueue.INTAKE, createIntakeProcessor(deps.scheduler), {
    connection: parseRedisConnection(config.redisUrl),
    concurrency: config.workerConcurrency,
  });
  intakeWorker.on('failed', (job, err) => {
    log.error(`INTAKE: job ${job?.id ?? '?'} failed: ${err.message}`);
  });
  intakeWorker.on('error', (err) => {
    log.error(`INTAKE: worker error: ${err.message}`);
  });
  watchTerminalFailures('intake', intakeWorker, deps.onTerminalFailure);

  log.info(`Pipeline workers started (concurrency=${config.workerConcurrency}, stages=${CHAIN_STAGES.join(',')})`);
  return [intakeWorker, ...stageWorkers];
}
