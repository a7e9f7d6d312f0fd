/**
 * FILE PURPOSE: Ranking table and boost configuration: schema, derivation and loading
 *
 * WHY: Every score depends on the ranking file. A bad file must stop the
 *      process at startup, never produce quietly wrong scores.
 * HOW: zod validates the raw JSON shape. Integer ranks are then spread over
 *      a monotonic scale (doctypes → [0, 1], collections → [0.1, 1.0]),
 *      range-checked, and frozen into one immutable BoostConfig object that
 *      callers pass explicitly to the calculator and resolver.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { DISCIPLINES } from '@boost-pipeline/shared-types';
import type { Discipline } from '@boost-pipeline/shared-types';
import { ConfigurationError } from '../errors.js';

// ─── Types ───

export type DecayCurve = 'reciprocal' | 'exponential' | 'linear';

export interface RecencyConfig {
  curve: DecayCurve;
  /** Decay rate k, per month. */
  rate: number;
  /** Age in months at (and beyond) which the floor applies. */
  cutoffMonths: number;
  /** Value at age 0. */
  maxValue: number;
  /** Value at age ≥ cutoff and for records with no date. */
  floorValue: number;
}

export interface BasicBoostWeights {
  refereed: number;
  doctype: number;
  recency: number;
}

export type CollectionWeights = Readonly<Partial<Record<Discipline, number>>>;

/** doctype → boost, collection tag → per-discipline relevance weight. */
export interface RankingTable {
  doctypeBoosts: Readonly<Record<string, number>>;
  collectionWeights: Readonly<Record<string, CollectionWeights>>;
}

export interface BoostConfig {
  ranking: RankingTable;
  defaultDoctypeBoost: number;
  /** Weight for a discipline no collection of the record maps to. */
  defaultDisciplineWeight: number;
  /** Collection assumed for a record with no collections; null disables it. */
  fallbackCollection: string | null;
  recency: RecencyConfig;
  boostWeights: BasicBoostWeights;
}

export const MIN_COLLECTION_WEIGHT = 0.1;
export const MAX_COLLECTION_WEIGHT = 1.0;

// ─── Schema ───

const rankSchema = z.number().int().positive();

const boostConfigSchema = z.object({
  doctypeRanks: z.record(z.string(), rankSchema).default({}),
  defaultDoctypeBoost: z.number().min(0).max(1).default(0),
  collectionRanks: z.record(z.string(), z.record(z.string(), rankSchema.nullable())).default({}),
  collectionWeights: z.record(z.string(), z.record(z.string(), z.number())).default({}),
  /** Alternate tag → configured collection it shares weights with. */
  collectionAliases: z.record(z.string(), z.string()).default({}),
  defaultDisciplineWeight: z.number().min(0).max(1).default(0),
  fallbackCollection: z.string().min(1).nullable().default('general'),
  recency: z
    .object({
      curve: z.enum(['reciprocal', 'exponential', 'linear']).default('reciprocal'),
      rate: z.number().nonnegative().default(0.1),
      cutoffMonths: z.number().positive().default(24),
      maxValue: z.number().nonnegative().default(1),
      floorValue: z.number().nonnegative().default(0),
    })
    .default({}),
  boostWeights: z
    .object({
      refereed: z.number().nonnegative(),
      doctype: z.number().nonnegative(),
      recency: z.number().nonnegative(),
    })
    .default({ refereed: 0.4, doctype: 0.6, recency: 0 }),
});

// ─── Rank scales ───

/**
 * Spread distinct ranks evenly between `top` (rank with the lowest number)
 * and `bottom` (highest number). A single distinct rank maps to `top`.
 */
export function rankScale(ranks: Iterable<number>, top: number, bottom: number): Map<number, number> {
  const unique = [...new Set(ranks)].sort((a, b) => a - b);
  const scale = new Map<number, number>();
  const last = unique.length - 1;
  unique.forEach((rank, i) => {
    if (i === 0) scale.set(rank, top);
    else if (i === last) scale.set(rank, bottom);
    else scale.set(rank, (top * (last - i) + bottom * i) / last);
  });
  return scale;
}

function isDiscipline(value: string): value is Discipline {
  return DISCIPLINES.some((discipline) => discipline === value);
}

function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/\s+/g, '_');
}

function deriveDoctypeBoosts(doctypeRanks: Record<string, number>): Record<string, number> {
  const scale = rankScale(Object.values(doctypeRanks), 1, 0);
  const boosts: Record<string, number> = {};
  for (const [doctype, rank] of Object.entries(doctypeRanks)) {
    boosts[doctype.toLowerCase()] = scale.get(rank) ?? 0;
  }
  return boosts;
}

function deriveCollectionWeights(
  collectionRanks: Record<string, Record<string, number | null>>,
  explicit: Record<string, Record<string, number>>,
): Record<string, CollectionWeights> {
  const allRanks: number[] = [];
  for (const byDiscipline of Object.values(collectionRanks)) {
    for (const rank of Object.values(byDiscipline)) {
      if (rank !== null) allRanks.push(rank);
    }
  }
  const scale = rankScale(allRanks, MAX_COLLECTION_WEIGHT, MIN_COLLECTION_WEIGHT);

  const result: Record<string, Partial<Record<Discipline, number>>> = {};
  const put = (collection: string, discipline: string, weight: number, source: string): void => {
    if (!isDiscipline(discipline)) {
      throw new ConfigurationError(
        `${source}.${collection}: unknown discipline "${discipline}" (expected one of ${DISCIPLINES.join(', ')})`,
      );
    }
    if (!(weight >= MIN_COLLECTION_WEIGHT && weight <= MAX_COLLECTION_WEIGHT)) {
      throw new ConfigurationError(
        `${source}.${collection}.${discipline}: weight ${weight} outside [${MIN_COLLECTION_WEIGHT}, ${MAX_COLLECTION_WEIGHT}]`,
      );
    }
    const key = normalizeTag(collection);
    const entry = (Object.hasOwn(result, key) ? result[key] : undefined) ?? {};
    entry[discipline] = weight;
    result[key] = entry;
  };

  for (const [collection, byDiscipline] of Object.entries(collectionRanks)) {
    for (const [discipline, rank] of Object.entries(byDiscipline)) {
      if (rank === null) continue; // no relevance → no mapping
      put(collection, discipline, scale.get(rank) ?? MIN_COLLECTION_WEIGHT, 'collectionRanks');
    }
  }
  // Explicit weights override rank-derived ones.
  for (const [collection, byDiscipline] of Object.entries(explicit)) {
    for (const [discipline, weight] of Object.entries(byDiscipline)) {
      put(collection, discipline, weight, 'collectionWeights');
    }
  }
  return result;
}

function applyAliases(
  weights: Record<string, CollectionWeights>,
  aliases: Record<string, string>,
): Record<string, CollectionWeights> {
  const result = { ...weights };
  for (const [alias, target] of Object.entries(aliases)) {
    const targetKey = normalizeTag(target);
    const targetWeights = Object.hasOwn(weights, targetKey) ? weights[targetKey] : undefined;
    if (!targetWeights) {
      throw new ConfigurationError(`collectionAliases.${alias}: unknown collection "${target}"`);
    }
    result[normalizeTag(alias)] = targetWeights;
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

// ─── Public API ───

/**
 * Validate a raw configuration object and derive the immutable BoostConfig.
 *
 * @throws ConfigurationError on any schema or range violation
 */
export function buildBoostConfig(raw: unknown): BoostConfig {
  const parsed = boostConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid boost configuration: ${issues}`);
  }

  const data = parsed.data;
  if (data.recency.floorValue > data.recency.maxValue) {
    throw new ConfigurationError(
      `recency.floorValue (${data.recency.floorValue}) must not exceed recency.maxValue (${data.recency.maxValue})`,
    );
  }

  const fallbackCollection = data.fallbackCollection === null ? null : normalizeTag(data.fallbackCollection);

  return deepFreeze({
    ranking: {
      doctypeBoosts: deriveDoctypeBoosts(data.doctypeRanks),
      collectionWeights: applyAliases(
        deriveCollectionWeights(data.collectionRanks, data.collectionWeights),
        data.collectionAliases,
      ),
    },
    defaultDoctypeBoost: data.defaultDoctypeBoost,
    defaultDisciplineWeight: data.defaultDisciplineWeight,
    fallbackCollection,
    recency: { ...data.recency },
    boostWeights: { ...data.boostWeights },
  });
}

/**
 * Read and validate the ranking configuration file. Call once at process start.
 *
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export function loadBoostConfig(filePath: string): BoostConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read ranking configuration at ${filePath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Ranking configuration at ${filePath} is not valid JSON`, { cause: err });
  }

  return buildBoostConfig(raw);
}
