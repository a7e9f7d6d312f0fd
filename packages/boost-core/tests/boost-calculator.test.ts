import { describe, expect, it, vi } from 'vitest';
import {
  ageInMonths,
  computeBasicBoosts,
  computeCombinedBoost,
  computeDoctypeBoost,
  computeRecencyBoost,
  computeRefereedBoost,
} from '../src/scoring/boost-calculator.js';
import type { RecencyConfig } from '../src/ranking/boost-config.js';
import { makeConfig, makeRequest } from './helpers.js';

const reciprocal: RecencyConfig = { curve: 'reciprocal', rate: 0.1, cutoffMonths: 24, maxValue: 1, floorValue: 0 };

describe('computeRefereedBoost', () => {
  it('is 1.0 for refereed records and 0.0 otherwise', () => {
    expect(computeRefereedBoost({ isRefereed: true })).toBe(1);
    expect(computeRefereedBoost({ isRefereed: false })).toBe(0);
  });
});

describe('computeDoctypeBoost', () => {
  const config = makeConfig({ defaultDoctypeBoost: 0.1 });

  it('returns the ranking table value for a known doctype', () => {
    expect(computeDoctypeBoost({ docType: 'software' }, config)).toBe(0.5);
  });

  it('matches doctypes case-insensitively', () => {
    expect(computeDoctypeBoost({ docType: 'Article' }, config)).toBe(0.8);
  });

  it('falls back to the default and reports an unknown doctype', () => {
    const onUnknownDoctype = vi.fn();
    expect(computeDoctypeBoost({ docType: 'poster' }, config, { onUnknownDoctype })).toBe(0.1);
    expect(onUnknownDoctype).toHaveBeenCalledWith('poster');
  });

  it.each(['constructor', '__proto__', 'toString', 'hasOwnProperty'])(
    'treats the object property name %s as an unknown doctype',
    (docType) => {
      const onUnknownDoctype = vi.fn();
      expect(computeDoctypeBoost({ docType }, config, { onUnknownDoctype })).toBe(0.1);
      expect(onUnknownDoctype).toHaveBeenCalledWith(docType.toLowerCase());
    },
  );

  it('does not report known doctypes', () => {
    const onUnknownDoctype = vi.fn();
    computeDoctypeBoost({ docType: 'misc' }, config, { onUnknownDoctype });
    expect(onUnknownDoctype).not.toHaveBeenCalled();
  });
});

describe('ageInMonths', () => {
  const now = new Date('2024-03-01T00:00:00Z');

  it('is 0 on the publication day', () => {
    expect(ageInMonths('2024-03-01', now)).toBe(0);
  });

  it('counts days divided by 30.44', () => {
    // 2023-03-01 → 2024-03-01 spans the 2024 leap day: 366 days.
    expect(ageInMonths('2023-03-01', now)).toBeCloseTo(366 / 30.44, 10);
  });

  it('clamps future dates to 0', () => {
    expect(ageInMonths('2024-06-15', now)).toBe(0);
  });

  it('is null for missing or unparseable dates', () => {
    expect(ageInMonths(null, now)).toBeNull();
    expect(ageInMonths('not-a-date', now)).toBeNull();
  });
});

describe('computeRecencyBoost', () => {
  it('gives the maximum at age 0', () => {
    expect(computeRecencyBoost(0, reciprocal)).toBe(1);
  });

  it('rescales the reciprocal curve between maximum and floor', () => {
    // (1/2.2 - 1/3.4) / (1 - 1/3.4) = 5/22
    expect(computeRecencyBoost(12, reciprocal)).toBeCloseTo(5 / 22, 10);
  });

  it('holds the floor at and beyond the cutoff, and for undated records', () => {
    const floored = { ...reciprocal, floorValue: 0.2 };
    expect(computeRecencyBoost(24, floored)).toBe(0.2);
    expect(computeRecencyBoost(120, floored)).toBe(0.2);
    expect(computeRecencyBoost(null, floored)).toBe(0.2);
  });

  it('is monotonically non-increasing and never below the floor', () => {
    for (const curve of ['reciprocal', 'exponential', 'linear'] as const) {
      const config = { ...reciprocal, curve, floorValue: 0.1 };
      let previous = Infinity;
      for (let age = 0; age <= 30; age += 0.5) {
        const value = computeRecencyBoost(age, config);
        expect(value).toBeLessThanOrEqual(previous);
        expect(value).toBeGreaterThanOrEqual(0.1);
        previous = value;
      }
    }
  });

  it('approaches the floor continuously at the cutoff', () => {
    const justBefore = computeRecencyBoost(23.999, reciprocal);
    expect(justBefore).toBeGreaterThan(0);
    expect(justBefore).toBeLessThan(0.001);
  });

  it('interpolates linearly with the linear curve', () => {
    const linear: RecencyConfig = { curve: 'linear', rate: 0, cutoffMonths: 24, maxValue: 1, floorValue: 0.2 };
    expect(computeRecencyBoost(6, linear)).toBeCloseTo(0.8, 10);
  });

  it('falls back to a linear shape when the curve does not decay', () => {
    expect(computeRecencyBoost(12, { ...reciprocal, rate: 0 })).toBeCloseTo(0.5, 10);
  });
});

describe('computeCombinedBoost', () => {
  const basic = { refereedBoost: 1, doctypeBoost: 0.5, recencyBoost: 0 };

  it('applies weights that already sum to 1', () => {
    expect(computeCombinedBoost(basic, { refereed: 0.4, doctype: 0.6, recency: 0 })).toBeCloseTo(0.7, 10);
  });

  it('normalises weights by their sum', () => {
    expect(computeCombinedBoost(basic, { refereed: 1, doctype: 1, recency: 2 })).toBeCloseTo(0.375, 10);
  });

  it('falls back to the plain mean for an all-zero weight vector', () => {
    expect(computeCombinedBoost(basic, { refereed: 0, doctype: 0, recency: 0 })).toBeCloseTo(0.5, 10);
  });

  it('stays within the range of its inputs', () => {
    const combined = computeCombinedBoost(basic, { refereed: 0.3, doctype: 0.3, recency: 0.4 });
    expect(combined).toBeGreaterThanOrEqual(0);
    expect(combined).toBeLessThanOrEqual(1);
  });
});

describe('computeBasicBoosts', () => {
  it('combines the three factors for one request', () => {
    const boosts = computeBasicBoosts(
      makeRequest({ isRefereed: false, docType: 'software', publicationDate: null }),
      makeConfig(),
      new Date('2024-03-01T00:00:00Z'),
    );
    expect(boosts).toEqual({ refereedBoost: 0, doctypeBoost: 0.5, recencyBoost: 0 });
  });
});
