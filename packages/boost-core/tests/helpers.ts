/**
 * Shared test builders for boost-core: a small literal config and request
 * factory so each test spells out only the fields it cares about.
 */

import type { BoostFactors, BoostRequest } from '@boost-pipeline/shared-types';
import type { BoostConfig } from '../src/ranking/boost-config.js';

export function makeConfig(overrides: Partial<BoostConfig> = {}): BoostConfig {
  return {
    ranking: {
      doctypeBoosts: { article: 0.8, eprint: 0.8, software: 0.5, misc: 0 },
      collectionWeights: {
        astronomy: { astronomy: 1.0, physics: 0.6 },
        physics: { physics: 1.0, astronomy: 0.6 },
        earthscience: { earth_science: 1.0 },
        general: { general: 1.0 },
      },
    },
    defaultDoctypeBoost: 0,
    defaultDisciplineWeight: 0,
    fallbackCollection: 'general',
    recency: { curve: 'reciprocal', rate: 0.1, cutoffMonths: 24, maxValue: 1, floorValue: 0 },
    boostWeights: { refereed: 1, doctype: 1, recency: 1 },
    ...overrides,
  };
}

export function makeRequest(overrides: Partial<BoostRequest> = {}): BoostRequest {
  return {
    bibcode: '2024TEST..001..001A',
    scixId: 'scix:0001-TEST',
    isRefereed: true,
    docType: 'article',
    publicationDate: '2024-03-01',
    collections: ['astronomy'],
    ...overrides,
  };
}

const zeroScores = {
  astronomy: 0,
  physics: 0,
  earth_science: 0,
  planetary_science: 0,
  heliophysics: 0,
  general: 0,
};

export function makeFactors(overrides: Partial<BoostFactors> = {}): BoostFactors {
  return {
    bibcode: '2024TEST..001..001A',
    scixId: 'scix:0001-TEST',
    refereedBoost: 1,
    doctypeBoost: 0.8,
    recencyBoost: 1,
    combinedBoost: 0.9,
    weights: { ...zeroScores, astronomy: 1 },
    finalBoosts: { ...zeroScores, astronomy: 0.9 },
    createdAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}
