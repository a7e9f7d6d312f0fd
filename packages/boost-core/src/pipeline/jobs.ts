/**
 * FILE PURPOSE: Job payload definitions for the boost pipeline channels
 *
 * WHY: Each stage worker gets compile-time safety on its payload. Results
 *      handed from one stage to the next come back from Redis as untyped
 *      JSON, so they are narrowed with a guard rather than trusted.
 */

import { DISCIPLINES } from '@boost-pipeline/shared-types';
import type { BoostFactors, BoostRequest, RecordKey } from '@boost-pipeline/shared-types';

/** Intake channel: a raw upstream message, parsed by the intake worker. */
export interface IntakeJobData {
  message: unknown;
  receivedAt: string;
}

/** compute-boost: the validated request. */
interface ComputeJobData {
  request: BoostRequest;
}

/** store-boost and send-boost-response: factors arrive from the child stage. */
interface HandoffJobData {
  key: RecordKey;
}

export type StageJobData = ComputeJobData | HandoffJobData;

/** Record label for logs: bibcode, or scix_id when there is none. */
export function recordLabel(key: RecordKey): string {
  return key.bibcode || key.scixId;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScores(value: unknown): boolean {
  return isRecord(value) && DISCIPLINES.every((d) => typeof value[d] === 'number');
}

export function isBoostFactors(value: unknown): value is BoostFactors {
  return (
    isRecord(value)
    && typeof value.bibcode === 'string'
    && typeof value.scixId === 'string'
    && typeof value.refereedBoost === 'number'
    && typeof value.doctypeBoost === 'number'
    && typeof value.recencyBoost === 'number'
    && typeof value.combinedBoost === 'number'
    && isScores(value.weights)
    && isScores(value.finalBoosts)
    && typeof value.createdAt === 'string'
  );
}

/**
 * Pick the BoostFactors a parent stage received from its child job
 * (BullMQ's getChildrenValues() result).
 */
export function factorsFromChildren(children: Record<string, unknown>): BoostFactors | null {
  for (const value of Object.values(children)) {
    if (isBoostFactors(value)) return value;
  }
  return null;
}
