/**
 * FILE PURPOSE: INTAKE processor: upstream message → validated request → scheduled chain
 * WHY: Upstream messages arrive loosely shaped. A malformed one is rejected
 *      here, once, instead of failing inside every stage.
 */

import type { Job } from 'bullmq';
import type { BoostRequest, RecordKey } from '@boost-pipeline/shared-types';
import { errorMessage, log, parseBoostRequest, recordLabel, toQueueError } from '@boost-pipeline/boost-core';
import type { IntakeJobData } from '@boost-pipeline/boost-core';

/** Anything that can enqueue a record's chain without waiting for it. */
export interface ChainScheduler {
  schedule(request: BoostRequest): Promise<unknown>;
}

export function createIntakeProcessor(scheduler: ChainScheduler) {
  return async (job: Job<IntakeJobData, RecordKey>): Promise<RecordKey> => {
    let request: BoostRequest;
    try {
      request = parseBoostRequest(job.data.message, {
        onWarning: (message) => log.warn(`INTAKE: job ${job.id ?? '?'}: ${message}`),
      });
    } catch (err) {
      log.warn(`INTAKE: rejected message in job ${job.id ?? '?'}: ${errorMessage(err)}`);
      throw toQueueError(err);
    }

    await scheduler.schedule(request);
    await job.log(`Scheduled boost chain for ${recordLabel(request)}`);
    return { bibcode: request.bibcode, scixId: request.scixId };
  };
}
