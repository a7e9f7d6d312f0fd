/**
 * FILE PURPOSE: Barrel export for the boost computation core and pipeline primitives
 *
 * WHY: Single import point for the worker, server and CLI.
 *      Import: `import { computeBoostFactors, BatchOrchestrator } from '@boost-pipeline/boost-core'`
 */

export {
  BoostPipelineError,
  ValidationError,
  ConfigurationError,
  RetryableError,
  StageTimeoutError,
  PermanentError,
  errorKindOf,
  isRetryable,
  errorMessage,
} from './errors.js';

export { log } from './log.js';

// ─── Ranking configuration ──────────────────────────────────────────────────
export {
  buildBoostConfig,
  loadBoostConfig,
  rankScale,
  MIN_COLLECTION_WEIGHT,
  MAX_COLLECTION_WEIGHT,
} from './ranking/boost-config.js';
export type {
  BoostConfig,
  RankingTable,
  RecencyConfig,
  DecayCurve,
  BasicBoostWeights,
  CollectionWeights,
} from './ranking/boost-config.js';

// ─── Scoring ────────────────────────────────────────────────────────────────
export {
  DAYS_PER_MONTH,
  computeRefereedBoost,
  computeDoctypeBoost,
  ageInMonths,
  computeRecencyBoost,
  computeCombinedBoost,
  computeBasicBoosts,
} from './scoring/boost-calculator.js';
export type { BasicBoosts, CalculatorHooks } from './scoring/boost-calculator.js';
export { resolveDisciplineWeights } from './scoring/discipline-weights.js';
export { aggregateFinalBoosts, computeBoostFactors } from './scoring/final-boost.js';
export { mapDisciplines } from './scoring/disciplines.js';

// ─── Intake ─────────────────────────────────────────────────────────────────
export { parseBoostRequest, normalizeDate } from './intake/request-parser.js';
export type { ParseOptions } from './intake/request-parser.js';
export { toBoostResponseMessage } from './intake/response-message.js';

// ─── Pipeline (BullMQ) ──────────────────────────────────────────────────────
export { parseRedisConnection } from './pipeline/connection.js';
export type { RedisConnectionOptions } from './pipeline/connection.js';
export {
  BoostQueue,
  STAGE_QUEUES,
  DEFAULT_STAGE_RETRY,
  stageJobOptions,
  createBoostQueue,
} from './pipeline/queue.js';
export type { BoostQueueName, ChainStage, StageRetryOptions } from './pipeline/queue.js';
export { recordLabel, isBoostFactors, factorsFromChildren } from './pipeline/jobs.js';
export type { IntakeJobData, StageJobData } from './pipeline/jobs.js';
export { defaultSleep, withStageTimeout, backoffDelay, retryStage } from './pipeline/stage-runner.js';
export type { Sleep } from './pipeline/stage-runner.js';
export type { StageHandlers, ChainDispatcher } from './pipeline/chain.js';
export { InlineChainDispatcher } from './pipeline/inline-chain.js';
export type { InlineChainOptions } from './pipeline/inline-chain.js';
export {
  toQueueError,
  parseQueueFailure,
  buildStageProcessors,
  guardStageProcessor,
  createStageWorker,
} from './pipeline/workers.js';
export type { StageJob, StageProcessor, StageWorkerOptions } from './pipeline/workers.js';

// ─── Orchestration ──────────────────────────────────────────────────────────
export {
  BatchOrchestrator,
  partitionIntoBatches,
  DEFAULT_PROGRESS_INTERVAL,
} from './orchestrator/batch-orchestrator.js';
export type {
  BatchOrchestratorOptions,
  ProgressEvent,
  RecordSource,
  SubmissionSummary,
} from './orchestrator/batch-orchestrator.js';
