/**
 * FILE PURPOSE: Process configuration from environment variables
 *
 * WHY: The worker, the server and the CLI read the same settings. Reading
 *      them once, validated, keeps bad values from surfacing mid-batch.
 * HOW: zod coerces and bounds every variable; a failure is a
 *      ConfigurationError, which the entry points treat as fatal.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError, log } from '@boost-pipeline/boost-core';
import type { StageRetryOptions } from '@boost-pipeline/boost-core';

export const DEFAULT_RANKING_CONFIG_PATH = fileURLToPath(new URL('../config/ranking.json', import.meta.url));

export interface PipelineConfig {
  redisUrl: string;
  /** Redis holding the upstream system's queue; defaults to redisUrl. */
  outputRedisUrl: string;
  outputQueueName: string;
  databaseUrl: string;
  databasePoolSize: number;
  batchSize: number;
  workerConcurrency: number;
  /** Per-stage timeout; 0 disables it. */
  stageTimeoutMs: number;
  stageRetry: StageRetryOptions;
  progressInterval: number;
  rankingConfigPath: string;
  port: number;
  sentryDsn: string | undefined;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const intWithDefault = (fallback: number, min: number) =>
  optionalString.pipe(z.coerce.number().int().min(min).optional()).transform((value) => value ?? fallback);

const envSchema = z.object({
  REDIS_URL: optionalString,
  OUTPUT_REDIS_URL: optionalString,
  OUTPUT_QUEUE_NAME: optionalString,
  DATABASE_URL: optionalString,
  DATABASE_POOL_SIZE: intWithDefault(10, 1),
  BATCH_SIZE: intWithDefault(100, 1),
  WORKER_CONCURRENCY: intWithDefault(5, 1),
  STAGE_TIMEOUT_MS: intWithDefault(30_000, 0),
  STAGE_ATTEMPTS: intWithDefault(3, 1),
  STAGE_BACKOFF_MS: intWithDefault(1_000, 0),
  PROGRESS_INTERVAL: intWithDefault(100, 1),
  RANKING_CONFIG_PATH: optionalString,
  PORT: intWithDefault(3002, 0),
  SENTRY_DSN: optionalString,
  NODE_ENV: optionalString,
});

/**
 * Read and validate the pipeline settings.
 *
 * @throws ConfigurationError on a malformed value, or a missing DATABASE_URL in production
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const vars = parsed.data;

  if (!vars.DATABASE_URL) {
    if (vars.NODE_ENV === 'production') {
      throw new ConfigurationError('DATABASE_URL is required in production');
    }
    log.warn('DATABASE_URL not set, database queries will fail');
  }

  const redisUrl = vars.REDIS_URL ?? 'redis://localhost:6379';
  return {
    redisUrl,
    outputRedisUrl: vars.OUTPUT_REDIS_URL ?? redisUrl,
    outputQueueName: vars.OUTPUT_QUEUE_NAME ?? 'boost-response',
    databaseUrl: vars.DATABASE_URL ?? '',
    databasePoolSize: vars.DATABASE_POOL_SIZE,
    batchSize: vars.BATCH_SIZE,
    workerConcurrency: vars.WORKER_CONCURRENCY,
    stageTimeoutMs: vars.STAGE_TIMEOUT_MS,
    stageRetry: { attempts: vars.STAGE_ATTEMPTS, backoffMs: vars.STAGE_BACKOFF_MS },
    progressInterval: vars.PROGRESS_INTERVAL,
    rankingConfigPath: vars.RANKING_CONFIG_PATH ?? DEFAULT_RANKING_CONFIG_PATH,
    port: vars.PORT,
    sentryDsn: vars.SENTRY_DSN,
  };
}
