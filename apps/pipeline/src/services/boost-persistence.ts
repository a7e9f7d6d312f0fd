/**
 * FILE PURPOSE: Persistence gateway for boost factors: idempotent upsert, lookup, paging
 *
 * WHY: Under at-least-once delivery the store stage may run more than once
 *      for the same record. Each run must leave exactly one row holding the
 *      latest values.
 *
 * HOW: One INSERT ... ON CONFLICT (bibcode, scix_id) DO UPDATE per record,
 *      through the process's Drizzle/postgres.js pool. The update replaces
 *      every computed column and `created`, and stamps `modified`. Driver errors are mapped
 *      onto RetryableError (connectivity, serialization) or PermanentError
 *      (constraint and data violations) so the queue knows whether to retry.
 */

import { asc, desc, eq, gt, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { BoostFactors, RecordKey } from '@boost-pipeline/shared-types';
import { PermanentError, RetryableError, errorMessage, log, recordLabel } from '@boost-pipeline/boost-core';
import { boostFactors } from '../db/index.js';
import type { BoostFactorsRow, Database, NewBoostFactorsRow } from '../db/index.js';

// ─── Types ───

export interface BoostFactorsPage {
  items: BoostFactors[];
  /** Pass back to listPage for the next page; null when there is none. */
  nextCursor: number | null;
}

export interface BoostFactorsStore {
  /** Insert or fully replace the row for the factors' key. */
  upsert(factors: BoostFactors): Promise<void>;
  /** Row for a key, looked up by bibcode first, then by scix_id. */
  get(key: RecordKey): Promise<BoostFactors | null>;
  /** Rows in insertion order, `limit` at a time. */
  listPage(cursor: number, limit: number): Promise<BoostFactorsPage>;
}

// ─── Error classification ───

const SOCKET_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
]);

const RETRYABLE_SQLSTATES = new Set(['53300', '40001', '40P01']);

/** SQLSTATE or socket code of a driver error, looking through wrapping errors. */
export function databaseErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 4; depth++) {
    if (typeof current !== 'object' || current === null) return undefined;
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

export function isTransientDatabaseError(code: string): boolean {
  return (
    SOCKET_ERROR_CODES.has(code)
    || RETRYABLE_SQLSTATES.has(code)
    || code.startsWith('08')
    || code.startsWith('57P0')
  );
}

/**
 * Map a driver error onto the pipeline taxonomy. Unknown failures are
 * treated as transient.
 */
export function classifyDatabaseError(err: unknown, context: string): RetryableError | PermanentError {
  const code = databaseErrorCode(err);
  const message = `${context}: ${errorMessage(err)}${code ? ` (${code})` : ''}`;
  if (code && (code.startsWith('23') || code.startsWith('22'))) {
    return new PermanentError(message, { cause: err });
  }
  if (code && !isTransientDatabaseError(code)) {
    log.warn(`Unclassified database error code ${code}, treating it as retryable`);
  }
  return new RetryableError(message, { cause: err });
}

// ─── Row mapping ───

export function toBoostFactorsRow(factors: BoostFactors): Omit<NewBoostFactorsRow, 'id' | 'modified'> {
  const { weights, finalBoosts } = factors;
  return {
    bibcode: factors.bibcode,
    scixId: factors.scixId,
    created: new Date(factors.createdAt),
    refereedBoost: factors.refereedBoost,
    doctypeBoost: factors.doctypeBoost,
    recencyBoost: factors.recencyBoost,
    boostFactor: factors.combinedBoost,
    astronomyWeight: weights.astronomy,
    physicsWeight: weights.physics,
    earthScienceWeight: weights.earth_science,
    planetaryScienceWeight: weights.planetary_science,
    heliophysicsWeight: weights.heliophysics,
    generalWeight: weights.general,
    astronomyFinalBoost: finalBoosts.astronomy,
    physicsFinalBoost: finalBoosts.physics,
    earthScienceFinalBoost: finalBoosts.earth_science,
    planetaryScienceFinalBoost: finalBoosts.planetary_science,
    heliophysicsFinalBoost: finalBoosts.heliophysics,
    generalFinalBoost: finalBoosts.general,
  };
}

export function fromBoostFactorsRow(row: BoostFactorsRow): BoostFactors {
  return {
    bibcode: row.bibcode,
    scixId: row.scixId,
    refereedBoost: row.refereedBoost,
    doctypeBoost: row.doctypeBoost,
    recencyBoost: row.recencyBoost,
    combinedBoost: row.boostFactor,
    weights: {
      astronomy: row.astronomyWeight,
      physics: row.physicsWeight,
      earth_science: row.earthScienceWeight,
      planetary_science: row.planetaryScienceWeight,
      heliophysics: row.heliophysicsWeight,
      general: row.generalWeight,
    },
    finalBoosts: {
      astronomy: row.astronomyFinalBoost,
      physics: row.physicsFinalBoost,
      earth_science: row.earthScienceFinalBoost,
      planetary_science: row.planetaryScienceFinalBoost,
      heliophysics: row.heliophysicsFinalBoost,
      general: row.generalFinalBoost,
    },
    createdAt: row.created.toISOString(),
  };
}

// ─── Drizzle store ───

export class DrizzleBoostFactorsStore implements BoostFactorsStore {
  constructor(private readonly db: Database) {}

  async upsert(factors: BoostFactors): Promise<void> {
    const { bibcode, scixId, ...values } = toBoostFactorsRow(factors);
    try {
      await this.db
        .insert(boostFactors)
        .values({ bibcode, scixId, ...values })
        .onConflictDoUpdate({
          target: [boostFactors.bibcode, boostFactors.scixId],
          set: { ...values, modified: sql`now()` },
        });
    } catch (err) {
      throw classifyDatabaseError(err, `upsert ${recordLabel(factors)}`);
    }
  }

  async get(key: RecordKey): Promise<BoostFactors | null> {
    if (key.bibcode) {
      const byBibcode = await this.selectOne(eq(boostFactors.bibcode, key.bibcode), key);
      if (byBibcode) return byBibcode;
    }
    if (key.scixId) {
      return this.selectOne(eq(boostFactors.scixId, key.scixId), key);
    }
    return null;
  }

  async listPage(cursor: number, limit: number): Promise<BoostFactorsPage> {
    try {
      const rows = await this.db
        .select()
        .from(boostFactors)
        .where(gt(boostFactors.id, cursor))
        .orderBy(asc(boostFactors.id))
        .limit(limit);
      const last = rows.at(-1);
      return {
        items: rows.map(fromBoostFactorsRow),
        nextCursor: last && rows.length === limit ? last.id : null,
      };
    } catch (err) {
      throw classifyDatabaseError(err, `list boost factors after id ${cursor}`);
    }
  }

  /** Latest-written row wins when an identifier appears under more than one key. */
  private async selectOne(condition: SQL, key: RecordKey): Promise<BoostFactors | null> {
    try {
      const [row] = await this.db
        .select()
        .from(boostFactors)
        .where(condition)
        .orderBy(desc(boostFactors.modified), desc(boostFactors.id))
        .limit(1);
      return row ? fromBoostFactorsRow(row) : null;
    } catch (err) {
      throw classifyDatabaseError(err, `get ${recordLabel(key)}`);
    }
  }
}
