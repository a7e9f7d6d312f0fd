/**
 * FILE PURPOSE: Batch orchestration: partition input, fan out one chain per record, tally outcomes
 *
 * WHY: Bulk submissions must report per-batch counts while a bad record never
 *      stops its siblings. Batches settle one after another so memory stays
 *      bounded; records inside a batch are dispatched without waiting on
 *      each other.
 * HOW: Every raw record is parsed first (ValidationError → rejected), then
 *      handed to the ChainDispatcher. Outcomes are collected with
 *      Promise.all; the dispatcher never rejects for a record-level failure.
 */

import type { BatchReport, BoostRequest, RecordOutcome } from '@boost-pipeline/shared-types';
import { errorKindOf, errorMessage } from '../errors.js';
import { parseBoostRequest } from '../intake/request-parser.js';
import { log } from '../log.js';
import type { ChainDispatcher } from '../pipeline/chain.js';
import { recordLabel } from '../pipeline/jobs.js';

export interface ProgressEvent {
  batchIndex: number;
  processed: number;
  succeeded: number;
  failed: number;
  rejected: number;
}

export interface SubmissionSummary {
  batches: BatchReport[];
  total: number;
  succeeded: number;
  failed: number;
  rejected: number;
}

/** Paged access to a bulk record store; each page holds at most `pageSize` raw records. */
export interface RecordSource {
  pages(pageSize: number): AsyncIterable<readonly unknown[]>;
}

export interface BatchOrchestratorOptions {
  dispatcher: ChainDispatcher;
  /** Raw record → BoostRequest. Throws ValidationError for malformed input. */
  parse?: (raw: unknown) => BoostRequest;
  /** Emit progress after this many settled records (and at every batch end). */
  progressInterval?: number;
  onProgress?: (event: ProgressEvent) => void;
  /** Called once per settled chain. */
  onOutcome?: (outcome: RecordOutcome) => void;
}

export const DEFAULT_PROGRESS_INTERVAL = 100;

function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
}

/**
 * Split records into contiguous batches of at most `batchSize`, keeping
 * input order. Only the last batch may be shorter.
 */
export function partitionIntoBatches<T>(records: readonly T[], batchSize: number): T[][] {
  assertBatchSize(batchSize);
  const batches: T[][] = [];
  for (let start = 0; start < records.length; start += batchSize) {
    batches.push(records.slice(start, start + batchSize));
  }
  return batches;
}

export class BatchOrchestrator {
  private readonly dispatcher: ChainDispatcher;
  private readonly parse: (raw: unknown) => BoostRequest;
  private readonly progressInterval: number;

  constructor(private readonly options: BatchOrchestratorOptions) {
    this.dispatcher = options.dispatcher;
    this.parse = options.parse ?? ((raw) => parseBoostRequest(raw));
    this.progressInterval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
  }

  /** Process an in-memory record list batch by batch. */
  async submit(records: readonly unknown[], batchSize: number): Promise<SubmissionSummary> {
    const batches = partitionIntoBatches(records, batchSize);
    const reports: BatchReport[] = [];
    for (const [index, batch] of batches.entries()) {
      reports.push(await this.runBatch(batch, index));
    }
    return summarize(reports);
  }

  /**
   * Pull pages from a bulk source and settle each one before the next is
   * read, so only one page of records is held at a time.
   */
  async submitFromSource(source: RecordSource, batchSize: number): Promise<SubmissionSummary> {
    assertBatchSize(batchSize);
    const reports: BatchReport[] = [];
    let index = 0;
    for await (const page of source.pages(batchSize)) {
      // A source may hand back more than asked for; never exceed batchSize.
      for (const batch of partitionIntoBatches(page, batchSize)) {
        reports.push(await this.runBatch(batch, index));
        index += 1;
      }
    }
    return summarize(reports);
  }

  private async runBatch(batch: readonly unknown[], batchIndex: number): Promise<BatchReport> {
    const progress: ProgressEvent = { batchIndex, processed: 0, succeeded: 0, failed: 0, rejected: 0 };

    const settle = (): void => {
      progress.processed += 1;
      if (progress.processed % this.progressInterval === 0 && progress.processed < batch.length) {
        this.emitProgress(progress);
      }
    };

    const chains: Promise<void>[] = [];
    for (const raw of batch) {
      let request: BoostRequest;
      try {
        request = this.parse(raw);
      } catch (err) {
        log.warn(`Rejected record in batch ${batchIndex} (${errorKindOf(err)}): ${errorMessage(err)}`);
        progress.rejected += 1;
        settle();
        continue;
      }

      chains.push(
        this.dispatchOne(request).then((outcome) => {
          if (outcome.status === 'succeeded') {
            progress.succeeded += 1;
          } else {
            progress.failed += 1;
            log.error(
              `Record ${recordLabel(outcome.key)} failed at ${outcome.stage} (${outcome.errorKind}): ${outcome.message}`,
            );
          }
          this.options.onOutcome?.(outcome);
          settle();
        }),
      );
    }

    await Promise.all(chains);
    this.emitProgress(progress);

    const report: BatchReport = {
      batchIndex,
      size: batch.length,
      succeeded: progress.succeeded,
      failed: progress.failed,
      rejected: progress.rejected,
    };
    log.info(
      `Batch ${batchIndex}: ${report.size} records, ${report.succeeded} succeeded, ${report.failed} failed, ${report.rejected} rejected`,
    );
    return report;
  }

  /** A dispatcher that throws anyway still yields a failed outcome for its record. */
  private async dispatchOne(request: BoostRequest): Promise<RecordOutcome> {
    try {
      return await this.dispatcher.dispatch(request);
    } catch (err) {
      return {
        key: { bibcode: request.bibcode, scixId: request.scixId },
        status: 'failed',
        stage: 'compute',
        errorKind: 'unknown',
        message: errorMessage(err),
      };
    }
  }

  private emitProgress(progress: ProgressEvent): void {
    this.options.onProgress?.({ ...progress });
  }
}

function summarize(batches: BatchReport[]): SubmissionSummary {
  return batches.reduce<SubmissionSummary>(
    (acc, batch) => ({
      batches: acc.batches,
      total: acc.total + batch.size,
      succeeded: acc.succeeded + batch.succeeded,
      failed: acc.failed + batch.failed,
      rejected: acc.rejected + batch.rejected,
    }),
    { batches, total: 0, succeeded: 0, failed: 0, rejected: 0 },
  );
}
