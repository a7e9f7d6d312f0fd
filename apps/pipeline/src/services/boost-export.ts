/**
 * FILE PURPOSE: CSV export of every persisted boost row
 *
 * WHY: Downstream analysis takes a flat file; the table can be far larger
 *      than memory, so rows are paged through the store and appended to the
 *      file a page at a time.
 */

import { open } from 'node:fs/promises';
import type { BoostFactors } from '@boost-pipeline/shared-types';
import { log } from '@boost-pipeline/boost-core';
import type { BoostFactorsStore } from './boost-persistence.js';

export const EXPORT_COLUMNS = [
  'bibcode',
  'scix_id',
  'created',
  'doctype_boost',
  'refereed_boost',
  'recency_boost',
  'boost_factor',
  'astronomy_weight',
  'physics_weight',
  'earth_science_weight',
  'planetary_science_weight',
  'heliophysics_weight',
  'general_weight',
  'astronomy_final_boost',
  'physics_final_boost',
  'earth_science_final_boost',
  'planetary_science_final_boost',
  'heliophysics_final_boost',
  'general_final_boost',
] as const;

export function toExportRow(factors: BoostFactors): Array<string | number> {
  const { weights: w, finalBoosts: f } = factors;
  return [
    factors.bibcode,
    factors.scixId,
    factors.createdAt,
    factors.doctypeBoost,
    factors.refereedBoost,
    factors.recencyBoost,
    factors.combinedBoost,
    w.astronomy, w.physics, w.earth_science, w.planetary_science, w.heliophysics, w.general,
    f.astronomy, f.physics, f.earth_science, f.planetary_science, f.heliophysics, f.general,
  ];
}

/** Write all rows to `filePath` as CSV with a header line. Returns the row count. */
export async function exportBoostFactors(
  store: BoostFactorsStore,
  filePath: string,
  pageSize = 1000,
): Promise<number> {
  const Papa = await import('papaparse');
  const unparse = Papa.default?.unparse ?? Papa.unparse;
  const handle = await open(filePath, 'w');
  let written = 0;

  try {
    await handle.write(`${EXPORT_COLUMNS.join(',')}\n`);
    let cursor: number | null = 0;
    while (cursor !== null) {
      const page = await store.listPage(cursor, pageSize);
      if (page.items.length > 0) {
        const csv = unparse(page.items.map(toExportRow), { header: false, newline: '\n' });
        await handle.write(`${csv}\n`);
        written += page.items.length;
      }
      cursor = page.nextCursor;
    }
  } finally {
    await handle.close();
  }

  log.info(`Exported ${written} boost rows to ${filePath}`);
  return written;
}
