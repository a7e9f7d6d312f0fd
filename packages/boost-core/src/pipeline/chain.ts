/**
 * FILE PURPOSE: Contracts for running one record's compute → store → send chain
 *
 * WHY: The orchestrator must not care whether a chain runs through the
 *      BullMQ queues or in process. Both implement ChainDispatcher.
 */

import type { BoostFactors, BoostRequest, RecordOutcome } from '@boost-pipeline/shared-types';

/** The three stages. Each must be safe to re-run with the same input. */
export interface StageHandlers {
  compute(request: BoostRequest): Promise<BoostFactors> | BoostFactors;
  store(factors: BoostFactors): Promise<void>;
  send(factors: BoostFactors): Promise<void>;
}

export interface ChainDispatcher {
  /**
   * Schedule the chain for one record. Resolves with the record's outcome
   * once the chain has finished; never rejects for a record-level failure.
   */
  dispatch(request: BoostRequest): Promise<RecordOutcome>;
}
