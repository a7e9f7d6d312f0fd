/**
 * FILE PURPOSE: Command implementations behind the boost CLI
 *
 * WHY: index.ts only parses arguments and wires resources; the work itself
 *      lives here so it runs against fakes in tests.
 */

import type { BoostResponseMessage } from '@boost-pipeline/shared-types';
import { BatchOrchestrator, log, toBoostResponseMessage } from '@boost-pipeline/boost-core';
import type { ChainDispatcher, ProgressEvent, RecordSource, SubmissionSummary } from '@boost-pipeline/boost-core';
import type { BoostFactorsStore } from '../services/boost-persistence.js';

export interface SubmitOptions {
  source: RecordSource;
  dispatcher: ChainDispatcher;
  batchSize: number;
  progressInterval?: number;
  onProgress?: (event: ProgressEvent) => void;
}

export function formatProgress(event: ProgressEvent): string {
  return `batch ${event.batchIndex}: ${event.processed} processed (${event.succeeded} ok, ${event.failed} failed, ${event.rejected} rejected)`;
}

/** Run every record of a source through the chain, batch by batch. */
export async function submitRecords(options: SubmitOptions): Promise<SubmissionSummary> {
  const orchestrator = new BatchOrchestrator({
    dispatcher: options.dispatcher,
    progressInterval: options.progressInterval,
    onProgress: options.onProgress ?? ((event) => log.info(formatProgress(event))),
  });
  const summary = await orchestrator.submitFromSource(options.source, options.batchSize);
  log.info(
    `Submission finished: ${summary.total} records in ${summary.batches.length} batches, `
      + `${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.rejected} rejected`,
  );
  return summary;
}

/** Stored factors for a bibcode or scix_id, in the outbound wire shape. */
export async function queryBoostFactors(store: BoostFactorsStore, id: string): Promise<BoostResponseMessage | null> {
  const identifier = id.trim();
  const factors = await store.get({ bibcode: identifier, scixId: identifier });
  return factors ? toBoostResponseMessage(factors) : null;
}
