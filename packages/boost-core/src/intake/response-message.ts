/**
 * FILE PURPOSE: BoostFactors → outbound message for the upstream system
 *
 * WHY: The upstream consumer reads a flat snake_case payload keyed by
 *      bibcode/scix_id; the core works with the nested camelCase shape.
 */

import type { BoostFactors, BoostResponseMessage } from '@boost-pipeline/shared-types';

export function toBoostResponseMessage(factors: BoostFactors): BoostResponseMessage {
  const { weights, finalBoosts } = factors;
  return {
    bibcode: factors.bibcode,
    scix_id: factors.scixId,
    status: 'updated',
    refereed_boost: factors.refereedBoost,
    doctype_boost: factors.doctypeBoost,
    recency_boost: factors.recencyBoost,
    boost_factor: factors.combinedBoost,
    astronomy_weight: weights.astronomy,
    physics_weight: weights.physics,
    earth_science_weight: weights.earth_science,
    planetary_science_weight: weights.planetary_science,
    heliophysics_weight: weights.heliophysics,
    general_weight: weights.general,
    astronomy_final_boost: finalBoosts.astronomy,
    physics_final_boost: finalBoosts.physics,
    earth_science_final_boost: finalBoosts.earth_science,
    planetary_science_final_boost: finalBoosts.planetary_science,
    heliophysics_final_boost: finalBoosts.heliophysics,
    general_final_boost: finalBoosts.general,
    created: factors.createdAt,
  };
}
