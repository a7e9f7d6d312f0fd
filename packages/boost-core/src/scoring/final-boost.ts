/**
 * FILE PURPOSE: Final discipline boosts + the full compute chain for one record
 *
 * HOW: finalBoost[d] = weight[d] × combinedBoost. computeBoostFactors runs
 *      calculator → resolver → aggregator and stamps the result.
 */

import type { BoostFactors, BoostRequest, DisciplineScores } from '@boost-pipeline/shared-types';
import type { BoostConfig } from '../ranking/boost-config.js';
import { computeBasicBoosts, computeCombinedBoost } from './boost-calculator.js';
import type { CalculatorHooks } from './boost-calculator.js';
import { resolveDisciplineWeights } from './discipline-weights.js';
import { mapDisciplines } from './disciplines.js';

export function aggregateFinalBoosts(weights: DisciplineScores, combinedBoost: number): DisciplineScores {
  return mapDisciplines((discipline) => weights[discipline] * combinedBoost);
}

/** Deterministic for a given (request, config, now). */
export function computeBoostFactors(
  request: BoostRequest,
  config: BoostConfig,
  now: Date = new Date(),
  hooks: CalculatorHooks = {},
): BoostFactors {
  const basic = computeBasicBoosts(request, config, now, hooks);
  const combinedBoost = computeCombinedBoost(basic, config.boostWeights);
  const weights = resolveDisciplineWeights(request.collections, config);

  return {
    bibcode: request.bibcode,
    scixId: request.scixId,
    ...basic,
    combinedBoost,
    weights,
    finalBoosts: aggregateFinalBoosts(weights, combinedBoost),
    createdAt: now.toISOString(),
  };
}
