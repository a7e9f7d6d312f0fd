/**
 * FILE PURPOSE: Production API server with health checks and graceful shutdown
 *
 * HOW: Wires the Drizzle store and the BullMQ intake queue into the request
 *      handler from api.ts. Graceful shutdown closes every connection in order.
 */

import { createServer } from 'node:http';
import { sql } from 'drizzle-orm';
import { BoostQueue, ConfigurationError, createBoostQueue, errorMessage, log } from '@boost-pipeline/boost-core';
import type { IntakeJobData } from '@boost-pipeline/boost-core';
import { createRequestHandler, parseAllowedOrigins } from './api.js';
import { loadPipelineConfig } from './config.js';
import type { PipelineConfig } from './config.js';
import { createDatabase } from './db/index.js';
import { DrizzleBoostFactorsStore } from './services/boost-persistence.js';
import { captureError, flushSentry, initSentry } from './sentry.js';

let config: PipelineConfig;
try {
  config = loadPipelineConfig();
} catch (err) {
  const kind = err instanceof ConfigurationError ? 'configuration' : 'startup';
  process.stderr.write(`FATAL: ${kind} error: ${errorMessage(err)}\n`);
  process.exit(1);
}

initSentry(config.sentryDsn);

const database = createDatabase({ url: config.databaseUrl, poolSize: config.databasePoolSize });
const intakeQueue = createBoostQueue<IntakeJobData>(BoostQueue.INTAKE, config.redisUrl);
const handler = createRequestHandler({
  store: new DrizzleBoostFactorsStore(database.db),
  intakeQueue,
  pingDatabase: async () => {
    await database.db.execute(sql`SELECT 1`);
  },
  allowedOrigins: parseAllowedOrigins(process.env.ALLOWED_ORIGINS),
});

const server = createServer((req, res) => {
  handler(req, res).catch((err: unknown) => {
    captureError(err, { component: 'api' });
    log.error(`Unhandled request error: ${errorMessage(err)}`);
    if (!res.writableEnded) {
      res.statusCode = 500;
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });
});

server.listen(config.port, () => {
  process.stdout.write(`Boost API server running on port ${config.port}\n`);
});

// ─── Graceful shutdown: close all connections in order ───
process.on('SIGTERM', () => {
  process.stdout.write('SIGTERM received, shutting down gracefully\n');

  const forceExitTimer = setTimeout(() => {
    log.warn('Graceful shutdown timed out after 30s, forcing exit');
    process.exit(1);
  }, 30_000);
  forceExitTimer.unref();

  void (async () => {
    try {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
      process.stdout.write('  Server closed\n');

      await intakeQueue.close();
      process.stdout.write('  Intake queue closed\n');

      await database.close();
      process.stdout.write('  Database disconnected\n');

      await flushSentry();
      process.stdout.write('Shutdown complete\n');
    } catch (err) {
      log.error(`Error during shutdown: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  })();
});
