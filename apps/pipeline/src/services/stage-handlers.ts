/**
 * FILE PURPOSE: Wire the calculator, the store and the notifier into chain stage handlers
 *
 * WHY: The BullMQ workers and the inline CLI mode run the same three stages;
 *      both take them from here.
 */

import type { BoostFactors, BoostRequest } from '@boost-pipeline/shared-types';
import { computeBoostFactors, log, recordLabel } from '@boost-pipeline/boost-core';
import type { BoostConfig, StageHandlers } from '@boost-pipeline/boost-core';
import type { BoostFactorsStore } from './boost-persistence.js';
import type { BoostNotifier } from './boost-notifier.js';

export interface StageHandlerDeps {
  config: BoostConfig;
  store: BoostFactorsStore;
  notifier: BoostNotifier;
  /** Clock for the recency boost. */
  now?: () => Date;
}

export function createStageHandlers(deps: StageHandlerDeps): StageHandlers {
  const now = deps.now ?? (() => new Date());
  return {
    compute: (request: BoostRequest): BoostFactors =>
      computeBoostFactors(request, deps.config, now(), {
        onUnknownDoctype: (docType) => {
          log.warn(`Unknown doctype "${docType}" for ${recordLabel(request)}, using default doctype boost`);
        },
      }),
    store: (factors) => deps.store.upsert(factors),
    send: (factors) => deps.notifier.send(factors),
  };
}
