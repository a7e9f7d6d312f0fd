/**
 * FILE PURPOSE: postgres.js pool wrapped in Drizzle ORM
 *
 * WHY: Every store stage in a process shares one pool; concurrent upserts to
 *      different keys run on separate connections.
 * HOW: Entry points build the pool from the validated PipelineConfig and
 *      close it during graceful shutdown. A missing URL is rejected by
 *      loadPipelineConfig, not here.
 */

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { errorMessage, log } from '@boost-pipeline/boost-core';
import * as schema from './schema.js';

export interface DatabaseOptions {
  url: string;
  poolSize: number;
}

function connect(options: DatabaseOptions) {
  const client = postgres(options.url, {
    max: options.poolSize,
    idle_timeout: 20,
    connect_timeout: 10,
  });
  return { client, db: drizzle(client, { schema }) };
}

export type Database = ReturnType<typeof connect>['db'];

export interface DatabaseConnection {
  db: Database;
  /** Close the pool. Errors are logged, not thrown, so shutdown carries on. */
  close(): Promise<void>;
}

export function createDatabase(options: DatabaseOptions): DatabaseConnection {
  const { client, db } = connect(options);
  return {
    db,
    close: async () => {
      try {
        await client.end({ timeout: 5 });
      } catch (err) {
        log.warn(`Error closing database connection: ${errorMessage(err)}`);
      }
    },
  };
}
