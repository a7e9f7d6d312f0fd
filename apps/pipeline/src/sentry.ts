/**
 * FILE PURPOSE: Sentry setup shared by the worker, the server and the CLI
 *
 * WHY: Error tracking is optional. Without SENTRY_DSN every call here is a no-op.
 */

import * as Sentry from '@sentry/node';
import type { RecordOutcome } from '@boost-pipeline/shared-types';
import { recordLabel } from '@boost-pipeline/boost-core';

let enabled = false;

export function initSentry(dsn: string | undefined): void {
  if (!dsn) return;
  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0.2,
    sendDefaultPii: false,
  });
  enabled = true;
}

/** Report a record that failed for good, tagged with its stage and error kind. */
export function captureRecordFailure(outcome: RecordOutcome): void {
  if (!enabled || outcome.status !== 'failed') return;
  Sentry.captureMessage(`Boost chain failed at ${outcome.stage}: ${outcome.message}`, {
    level: 'error',
    tags: { stage: outcome.stage, errorKind: outcome.errorKind },
    extra: { record: recordLabel(outcome.key), bibcode: outcome.key.bibcode, scixId: outcome.key.scixId },
  });
}

export function captureError(err: unknown, tags: Record<string, string> = {}): void {
  if (!enabled) return;
  Sentry.captureException(err, { tags });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
