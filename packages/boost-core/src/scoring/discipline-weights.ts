/**
 * FILE PURPOSE: Collection memberships → one relevance weight per discipline
 *
 * WHY: A record in several collections relevant to the same discipline must
 *      not be boosted past its single strongest relevance.
 * HOW: Max over the ranking-table weights of every collection the record
 *      belongs to; disciplines nothing maps to get the configured default.
 *      The table is trusted here; range checks happen at load time.
 */

import type { DisciplineScores } from '@boost-pipeline/shared-types';
import type { BoostConfig } from '../ranking/boost-config.js';
import { mapDisciplines } from './disciplines.js';

export function resolveDisciplineWeights(
  collections: readonly string[],
  config: Pick<BoostConfig, 'ranking' | 'defaultDisciplineWeight' | 'fallbackCollection'>,
): DisciplineScores {
  const memberships = collections.length === 0 && config.fallbackCollection !== null
    ? [config.fallbackCollection]
    : collections;

  const weights = config.ranking.collectionWeights;
  return mapDisciplines((discipline) => {
    let best: number | null = null;
    for (const collection of memberships) {
      if (!Object.hasOwn(weights, collection)) continue;
      const weight = weights[collection]?.[discipline];
      if (weight !== undefined && (best === null || weight > best)) {
        best = weight;
      }
    }
    return best ?? config.defaultDisciplineWeight;
  });
}
