import { describe, it, expect } from 'vitest';
import { DISCIPLINES } from '../src/index.js';
import type { BoostRequest, Discipline, RecordOutcome } from '../src/index.js';

describe('shared-types', () => {
  it('DISCIPLINES lists the six disciplines in a fixed order', () => {
    expect(DISCIPLINES).toEqual([
      'astronomy',
      'physics',
      'earth_science',
      'planetary_science',
      'heliophysics',
      'general',
    ]);
  });

  it('BoostRequest interface is importable and usable', () => {
    const request: BoostRequest = {
      bibcode: '2024ApJ...900....1A',
      scixId: 'scix:TEST-0001',
      isRefereed: true,
      docType: 'article',
      publicationDate: '2024-03-01',
      collections: ['astronomy'],
    };
    expect(request.collections).toContain('astronomy');
  });

  it('Discipline type constrains to the closed set', () => {
    const discipline: Discipline = 'heliophysics';
    expect(DISCIPLINES).toContain(discipline);
  });

  it('RecordOutcome narrows on status', () => {
    const outcome: RecordOutcome = {
      key: { bibcode: 'b', scixId: '' },
      status: 'failed',
      stage: 'store',
      errorKind: 'retryable',
      message: 'connection reset',
    };
    if (outcome.status === 'failed') {
      expect(outcome.stage).toBe('store');
    }
  });
});
