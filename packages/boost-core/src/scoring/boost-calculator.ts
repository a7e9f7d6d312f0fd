/**
 * FILE PURPOSE: Basic boost factors (refereed, doctype, recency) + combined boost
 *
 * WHY: The three basic factors and their weighted average are the base every
 *      discipline score is scaled from.
 * HOW: Pure functions of (request, config, now). No I/O, no throws: unknown
 *      doctypes and missing dates degrade to configured baseline values.
 */

import type { BoostRequest } from '@boost-pipeline/shared-types';
import type { BasicBoostWeights, BoostConfig, DecayCurve, RecencyConfig } from '../ranking/boost-config.js';

export const DAYS_PER_MONTH = 30.44;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface BasicBoosts {
  refereedBoost: number;
  doctypeBoost: number;
  recencyBoost: number;
}

export interface CalculatorHooks {
  /** Called when a doctype is absent from the ranking table. */
  onUnknownDoctype?: (docType: string) => void;
}

export function computeRefereedBoost(request: Pick<BoostRequest, 'isRefereed'>): number {
  return request.isRefereed ? 1.0 : 0.0;
}

export function computeDoctypeBoost(
  request: Pick<BoostRequest, 'docType'>,
  config: Pick<BoostConfig, 'ranking' | 'defaultDoctypeBoost'>,
  hooks: CalculatorHooks = {},
): number {
  const docType = request.docType.toLowerCase();
  const boosts = config.ranking.doctypeBoosts;
  const boost = Object.hasOwn(boosts, docType) ? boosts[docType] : undefined;
  if (boost === undefined) {
    hooks.onUnknownDoctype?.(docType);
    return config.defaultDoctypeBoost;
  }
  return boost;
}

/** Age in months between a YYYY-MM-DD date and `now`; null when there is no usable date. */
export function ageInMonths(publicationDate: string | null, now: Date): number | null {
  if (!publicationDate) return null;
  const published = Date.parse(`${publicationDate.slice(0, 10)}T00:00:00Z`);
  if (Number.isNaN(published)) return null;
  const days = (now.getTime() - published) / MS_PER_DAY;
  return Math.max(0, days / DAYS_PER_MONTH);
}

function decay(curve: DecayCurve, rate: number, cutoffMonths: number, age: number): number {
  switch (curve) {
    case 'reciprocal':
      return 1 / (1 + rate * age);
    case 'exponential':
      return Math.exp(-rate * age);
    case 'linear':
      return 1 - age / cutoffMonths;
  }
}

/**
 * Recency boost for a record of the given age.
 *
 * The decay curve is rescaled so that age 0 gives `maxValue` and the cutoff
 * gives `floorValue`; beyond the cutoff (and with no date) the floor holds.
 * A curve that does not decay at all (rate 0) falls back to the linear shape.
 */
export function computeRecencyBoost(ageMonths: number | null, recency: RecencyConfig): number {
  const { curve, rate, cutoffMonths, maxValue, floorValue } = recency;
  if (ageMonths === null || ageMonths >= cutoffMonths) return floorValue;

  const age = Math.max(0, ageMonths);
  let start = decay(curve, rate, cutoffMonths, 0);
  let end = decay(curve, rate, cutoffMonths, cutoffMonths);
  let current = decay(curve, rate, cutoffMonths, age);

  if (!(start > end)) {
    start = 1;
    end = 0;
    current = 1 - age / cutoffMonths;
  }

  const t = (current - end) / (start - end);
  return floorValue + (maxValue - floorValue) * t;
}

/**
 * Weighted average of the three basic boosts. Weights are normalised by their
 * sum; an all-zero vector falls back to the plain mean.
 */
export function computeCombinedBoost(basic: BasicBoosts, weights: BasicBoostWeights): number {
  const total = weights.refereed + weights.doctype + weights.recency;
  if (total <= 0) {
    return (basic.refereedBoost + basic.doctypeBoost + basic.recencyBoost) / 3;
  }
  return (
    (basic.refereedBoost * weights.refereed
      + basic.doctypeBoost * weights.doctype
      + basic.recencyBoost * weights.recency) / total
  );
}

export function computeBasicBoosts(
  request: BoostRequest,
  config: BoostConfig,
  now: Date,
  hooks: CalculatorHooks = {},
): BasicBoosts {
  return {
    refereedBoost: computeRefereedBoost(request),
    doctypeBoost: computeDoctypeBoost(request, config, hooks),
    recencyBoost: computeRecencyBoost(ageInMonths(request.publicationDate, now), config.recency),
  };
}
