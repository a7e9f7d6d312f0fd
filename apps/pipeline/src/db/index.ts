/**
 * FILE PURPOSE: Barrel export for database layer
 *
 * WHY: Single import point for the pool factory, tables, and inferred types.
 */

export { createDatabase } from './connection.js';
export type { Database, DatabaseConnection, DatabaseOptions } from './connection.js';
export { boostFactors } from './schema.js';
export type { BoostFactorsRow, NewBoostFactorsRow } from './schema.js';
