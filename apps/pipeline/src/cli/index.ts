#!/usr/bin/env node
/**
 * FILE PURPOSE: `boost` command line: bulk submission, lookup and CSV export
 *
 * HOW: `submit` runs a file through the chain, either on the BullMQ workers
 *      (default) or in this process with --inline. Each command closes the
 *      connections it opened before exiting.
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  ConfigurationError,
  InlineChainDispatcher,
  errorMessage,
  loadBoostConfig,
} from '@boost-pipeline/boost-core';
import type { ChainDispatcher } from '@boost-pipeline/boost-core';
import { loadPipelineConfig } from '../config.js';
import type { PipelineConfig } from '../config.js';
import { createDatabase } from '../db/index.js';
import type { DatabaseConnection } from '../db/index.js';
import { FileRecordSource } from '../intake/file-source.js';
import { exportBoostFactors } from '../services/boost-export.js';
import { QueueBoostNotifier } from '../services/boost-notifier.js';
import { DrizzleBoostFactorsStore } from '../services/boost-persistence.js';
import { QueueChainDispatcher } from '../services/queue-dispatcher.js';
import { createStageHandlers } from '../services/stage-handlers.js';
import { captureRecordFailure, flushSentry, initSentry } from '../sentry.js';
import { queryBoostFactors, submitRecords } from './commands.js';

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

let database: DatabaseConnection | undefined;

/** Store over the pool, opened on first use so commands that never touch Postgres don't connect. */
function openStore(config: PipelineConfig): DrizzleBoostFactorsStore {
  database ??= createDatabase({ url: config.databaseUrl, poolSize: config.databasePoolSize });
  return new DrizzleBoostFactorsStore(database.db);
}

/** Run a command body, closing the pool afterwards and mapping failures to exit codes. */
async function runCommand(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    const prefix = err instanceof ConfigurationError ? 'FATAL: configuration error' : 'ERROR';
    process.stderr.write(`${prefix}: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  } finally {
    await database?.close();
    await flushSentry();
  }
}

const program = new Command();

program
  .name('boost')
  .description('Compute, store and publish boost factors for bibliographic records')
  .version('0.1.0');

// ─── SUBMIT command ───

program
  .command('submit')
  .description('Process a .json, .jsonl or .csv file of records in batches')
  .argument('<file>', 'input file')
  .option('-b, --batch-size <n>', 'records per batch', positiveInt)
  .option('--inline', 'run the chain in this process instead of on the queue workers', false)
  .option('--progress-interval <n>', 'log progress every n settled records', positiveInt)
  .action(async (file: string, opts: { batchSize?: number; inline: boolean; progressInterval?: number }) => {
    await runCommand(async () => {
      const config = loadPipelineConfig();
      initSentry(config.sentryDsn);
      const source = new FileRecordSource(file);

      let dispatcher: ChainDispatcher;
      let release: () => Promise<void>;
      if (opts.inline) {
        const notifier = QueueBoostNotifier.create(config.outputRedisUrl, config.outputQueueName);
        const handlers = createStageHandlers({
          config: loadBoostConfig(config.rankingConfigPath),
          store: openStore(config),
          notifier,
        });
        dispatcher = new InlineChainDispatcher(handlers, { timeoutMs: config.stageTimeoutMs, retry: config.stageRetry });
        release = () => notifier.close();
      } else {
        const queueDispatcher = new QueueChainDispatcher({ redisUrl: config.redisUrl, retry: config.stageRetry });
        dispatcher = queueDispatcher;
        release = () => queueDispatcher.close();
      }

      try {
        const summary = await submitRecords({
          source,
          dispatcher: {
            dispatch: async (request) => {
              const outcome = await dispatcher.dispatch(request);
              captureRecordFailure(outcome);
              return outcome;
            },
          },
          batchSize: opts.batchSize ?? config.batchSize,
          progressInterval: opts.progressInterval ?? config.progressInterval,
        });
        process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
        if (summary.failed > 0) process.exitCode = 2;
      } finally {
        await release();
      }
    });
  });

// ─── QUERY command ───

program
  .command('query')
  .description('Print the stored boost factors of a bibcode or scix_id')
  .argument('<id>', 'bibcode or scix_id')
  .action(async (id: string) => {
    await runCommand(async () => {
      const config = loadPipelineConfig();
      const message = await queryBoostFactors(openStore(config), id);
      if (!message) {
        process.stderr.write(`No boost factors stored for ${id}\n`);
        process.exitCode = 1;
        return;
      }
      process.stdout.write(`${JSON.stringify(message, null, 2)}\n`);
    });
  });

// ─── EXPORT command ───

program
  .command('export')
  .description('Write every stored boost row to a CSV file')
  .argument('<path>', 'output CSV path')
  .option('--page-size <n>', 'rows read per database round trip', positiveInt, 1000)
  .action(async (path: string, opts: { pageSize: number }) => {
    await runCommand(async () => {
      const config = loadPipelineConfig();
      const rows = await exportBoostFactors(openStore(config), path, opts.pageSize);
      process.stdout.write(`Exported ${rows} rows to ${path}\n`);
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`ERROR: ${errorMessage(err)}\n`);
  process.exit(1);
});
