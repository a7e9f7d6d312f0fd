/**
 * FILE PURPOSE: Error taxonomy for the boost pipeline
 *
 * WHY: Workers, the orchestrator and the gateways need one shared vocabulary
 *      to decide between "retry", "skip the record" and "refuse to start".
 * HOW: A base class carrying a `kind` discriminator and a `retryable` flag.
 *      Only ConfigurationError is allowed to escape record-level handling.
 */

import type { BoostErrorKind } from '@boost-pipeline/shared-types';

export abstract class BoostPipelineError extends Error {
  abstract readonly kind: BoostErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed BoostRequest (no usable identifier, unparseable message). */
export class ValidationError extends BoostPipelineError {
  readonly kind = 'validation' as const;
  readonly retryable = false;
}

/** Ranking table failed to load or holds out-of-range values. Fatal at startup. */
export class ConfigurationError extends BoostPipelineError {
  readonly kind = 'configuration' as const;
  readonly retryable = false;
}

/** Transient failure in store or send. The queue retries it with backoff. */
export class RetryableError extends BoostPipelineError {
  readonly kind = 'retryable' as const;
  readonly retryable = true;
}

/** A stage ran past its configured timeout. Treated as transient. */
export class StageTimeoutError extends RetryableError {
  constructor(stage: string, timeoutMs: number) {
    super(`Stage "${stage}" timed out after ${timeoutMs}ms`);
  }
}

/** Non-retryable per-record failure (constraint violation, bad data). */
export class PermanentError extends BoostPipelineError {
  readonly kind = 'permanent' as const;
  readonly retryable = false;
}

function isBoostPipelineError(err: unknown): err is BoostPipelineError {
  return err instanceof BoostPipelineError;
}

/** Error kind for logs and reports; anything outside the taxonomy is `unknown`. */
export function errorKindOf(err: unknown): BoostErrorKind {
  return isBoostPipelineError(err) ? err.kind : 'unknown';
}

/**
 * Whether a failure may be re-attempted. Errors outside the taxonomy are
 * retried: they are most likely infrastructure hiccups.
 */
export function isRetryable(err: unknown): boolean {
  return isBoostPipelineError(err) ? err.retryable : true;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
