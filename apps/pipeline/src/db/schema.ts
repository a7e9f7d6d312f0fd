/**
 * FILE PURPOSE: Database schema: boost_factors
 *
 * WHY: One row per record key holding the full computed result, so the
 *      search side can read every discipline boost without recomputing.
 *
 * HOW: Drizzle ORM schema definitions. `sql/boost_factors.sql`
 *      creates the same table for environments without drizzle-kit.
 *
 * An absent identifier is stored as '' so the (bibcode, scix_id) unique key
 * also holds for records known by only one of them.
 */

import {
  pgTable,
  serial,
  varchar,
  doublePrecision,
  timestamp,
  index,
  unique,
} from 'drizzle-orm/pg-core';

const IDENTIFIER_LENGTH = 19;

export const boostFactors = pgTable(
  'boost_factors',
  {
    id: serial('id').primaryKey(),
    bibcode: varchar('bibcode', { length: IDENTIFIER_LENGTH }).notNull().default(''),
    scixId: varchar('scix_id', { length: IDENTIFIER_LENGTH }).notNull().default(''),
    created: timestamp('created', { withTimezone: true }).notNull(),
    /** Last time the row was written; bumped by every upsert. */
    modified: timestamp('modified', { withTimezone: true }).notNull().defaultNow(),

    refereedBoost: doublePrecision('refereed_boost').notNull(),
    doctypeBoost: doublePrecision('doctype_boost').notNull(),
    recencyBoost: doublePrecision('recency_boost').notNull(),
    boostFactor: doublePrecision('boost_factor').notNull(),

    astronomyWeight: doublePrecision('astronomy_weight').notNull(),
    physicsWeight: doublePrecision('physics_weight').notNull(),
    earthScienceWeight: doublePrecision('earth_science_weight').notNull(),
    planetaryScienceWeight: doublePrecision('planetary_science_weight').notNull(),
    heliophysicsWeight: doublePrecision('heliophysics_weight').notNull(),
    generalWeight: doublePrecision('general_weight').notNull(),

    astronomyFinalBoost: doublePrecision('astronomy_final_boost').notNull(),
    physicsFinalBoost: doublePrecision('physics_final_boost').notNull(),
    earthScienceFinalBoost: doublePrecision('earth_science_final_boost').notNull(),
    planetaryScienceFinalBoost: doublePrecision('planetary_science_final_boost').notNull(),
    heliophysicsFinalBoost: doublePrecision('heliophysics_final_boost').notNull(),
    generalFinalBoost: doublePrecision('general_final_boost').notNull(),
  },
  (table) => [
    unique('uq_boost_factors_key').on(table.bibcode, table.scixId),
    index('idx_boost_factors_bibcode').on(table.bibcode),
    index('idx_boost_factors_scix_id').on(table.scixId),
  ],
);

export type BoostFactorsRow = typeof boostFactors.$inferSelect;
export type NewBoostFactorsRow = typeof boostFactors.$inferInsert;
