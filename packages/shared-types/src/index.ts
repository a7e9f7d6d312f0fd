/**
 * FILE PURPOSE: Shared types across the boost pipeline workspaces
 *
 * WHY: Single source of truth for the boost data model. The core library,
 *      the pipeline worker and the HTTP server all import from here instead
 *      of defining their own copies.
 * HOW: Plain interfaces plus the closed discipline set as a const tuple.
 */

/** The fixed, closed set of disciplines every record is scored against. */
export const DISCIPLINES = [
  'astronomy',
  'physics',
  'earth_science',
  'planetary_science',
  'heliophysics',
  'general',
] as const;

export type Discipline = (typeof DISCIPLINES)[number];

/** One value per discipline. Always carries all six keys. */
export type DisciplineScores = Record<Discipline, number>;

/** Identity of a record. At least one of the two is non-empty. */
export interface RecordKey {
  bibcode: string;
  scixId: string;
}

/** Input unit of the pipeline. Built by intake, read-only inside the core. */
export interface BoostRequest extends RecordKey {
  isRefereed: boolean;
  /** Lower-cased document type; unknown values are allowed. */
  docType: string;
  /** Calendar date (YYYY-MM-DD) or null when the record has none. */
  publicationDate: string | null;
  /** De-duplicated collection tags, may be empty. */
  collections: string[];
}

/** Computed output: one per BoostRequest, identified by the same key pair. */
export interface BoostFactors extends RecordKey {
  refereedBoost: number;
  doctypeBoost: number;
  recencyBoost: number;
  /** Weighted average of the three basic boosts. */
  combinedBoost: number;
  weights: DisciplineScores;
  /** weights[d] × combinedBoost */
  finalBoosts: DisciplineScores;
  /** ISO timestamp of the computation. */
  createdAt: string;
}

/** Stage names of the per-record chain, in execution order. */
export type PipelineStage = 'intake' | 'compute' | 'store' | 'send';

/** Error kinds surfaced in logs and batch reports. */
export type BoostErrorKind = 'validation' | 'configuration' | 'retryable' | 'permanent' | 'unknown';

/** Outbound message for the upstream system (snake_case wire shape). */
export interface BoostResponseMessage {
  bibcode: string;
  scix_id: string;
  status: 'updated';
  refereed_boost: number;
  doctype_boost: number;
  recency_boost: number;
  boost_factor: number;
  astronomy_weight: number;
  physics_weight: number;
  earth_science_weight: number;
  planetary_science_weight: number;
  heliophysics_weight: number;
  general_weight: number;
  astronomy_final_boost: number;
  physics_final_boost: number;
  earth_science_final_boost: number;
  planetary_science_final_boost: number;
  heliophysics_final_boost: number;
  general_final_boost: number;
  created: string;
}

/** Outcome of one record's chain, as reported by the orchestrator. */
export type RecordOutcome =
  | { key: RecordKey; status: 'succeeded' }
  | { key: RecordKey; status: 'failed'; stage: PipelineStage; errorKind: BoostErrorKind; message: string };

/** Counts for one batch, the externally observable result of a submission. */
export interface BatchReport {
  batchIndex: number;
  size: number;
  succeeded: number;
  failed: number;
  rejected: number;
}
