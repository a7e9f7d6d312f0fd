/**
 * FILE PURPOSE: Standalone BullMQ worker process for the boost pipeline
 * WHY: Runs separately from the HTTP server so chain processing doesn't block
 *      API requests. Start via `npm run worker`.
 *      Refuses to start on a bad ranking table or environment.
 */

import { ConfigurationError, errorMessage, isRetryable, loadBoostConfig, log } from '@boost-pipeline/boost-core';
import type { BoostConfig } from '@boost-pipeline/boost-core';
import { loadPipelineConfig } from './config.js';
import type { PipelineConfig } from './config.js';
import { createDatabase } from './db/index.js';
import { DrizzleBoostFactorsStore } from './services/boost-persistence.js';
import { QueueBoostNotifier } from './services/boost-notifier.js';
import { QueueChainDispatcher } from './services/queue-dispatcher.js';
import { createStageHandlers } from './services/stage-handlers.js';
import { captureError, flushSentry, initSentry } from './sentry.js';
import { startPipelineWorkers } from './workers/index.js';

let config: PipelineConfig;
let boostConfig: BoostConfig;
try {
  config = loadPipelineConfig();
  boostConfig = loadBoostConfig(config.rankingConfigPath);
} catch (err) {
  const kind = err instanceof ConfigurationError ? 'configuration' : 'startup';
  process.stderr.write(`FATAL: ${kind} error: ${errorMessage(err)}\n`);
  process.exit(1);
}

initSentry(config.sentryDsn);

const database = createDatabase({ url: config.databaseUrl, poolSize: config.databasePoolSize });
const notifier = QueueBoostNotifier.create(config.outputRedisUrl, config.outputQueueName);
const dispatcher = new QueueChainDispatcher({ redisUrl: config.redisUrl, retry: config.stageRetry });

const workers = startPipelineWorkers({
  config,
  handlers: createStageHandlers({ config: boostConfig, store: new DrizzleBoostFactorsStore(database.db), notifier }),
  scheduler: dispatcher,
  onTerminalFailure: (stage, job, err) => {
    log.error(`Record job ${job?.id ?? '?'} failed for good at ${stage}${isRetryable(err) ? ' after retries' : ''}: ${err.message}`);
    captureError(err, { stage });
  },
});

async function shutdown(): Promise<void> {
  log.info('Shutting down workers…');
  try {
    await Promise.all(workers.map((worker) => worker.close()));
    await Promise.all([dispatcher.close(), notifier.close()]);
    await database.close();
    await flushSentry();
    process.exit(0);
  } catch (err) {
    log.error(`Error during shutdown: ${errorMessage(err)}`);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());
