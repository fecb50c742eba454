import { describe, it, expect } from 'vitest';
import { repairClaims, citationCoverage } from './citations.js';

const bundleIds = new Set([1, 2]);

describe('repairClaims', () => {
  it('strips ids missing from the bundle and caps the uncited claim', () => {
    const repaired = repairClaims(
      [{ driver: 'Refinancing wall', evidence_ids: [7], confidence: 0.9 }],
      bundleIds,
      'driver',
    );

    expect(repaired).toEqual([{ driver: 'Refinancing wall', evidence_ids: [], confidence: 0.45 }]);
  });

  it('keeps valid ids and the original confidence', () => {
    const repaired = repairClaims(
      [{ strategy: 'Early equity raise', evidence_ids: [2, 7, 1, 2], confidence: 0.8 }],
      bundleIds,
      'strategy',
    );

    expect(repaired).toEqual([{ strategy: 'Early equity raise', evidence_ids: [2, 1], confidence: 0.8 }]);
  });

  it('leaves a low uncited confidence alone', () => {
    const [claim] = repairClaims([{ driver: 'Demand shock', evidence_ids: [], confidence: 0.2 }], bundleIds, 'driver');
    expect(claim.confidence).toBe(0.2);
  });

  it('caps a non-numeric confidence at zero', () => {
    const [claim] = repairClaims([{ driver: 'Demand shock', confidence: 'high' }], bundleIds, 'driver');
    expect(claim).toEqual({ driver: 'Demand shock', evidence_ids: [], confidence: 0 });
  });

  it('turns bare strings into uncited claims', () => {
    const repaired = repairClaims(['Cash burn outpaced revenue', '  ', 5], bundleIds, 'driver');
    expect(repaired).toEqual([{ driver: 'Cash burn outpaced revenue', evidence_ids: [], confidence: 0.45 }]);
  });

  it('returns an empty list for a non-array', () => {
    expect(repairClaims({ driver: 'x' }, bundleIds, 'driver')).toEqual([]);
  });

  it('cites nothing against an empty bundle', () => {
    const [claim] = repairClaims([{ driver: 'Leverage', evidence_ids: [1], confidence: 0.7 }], new Set(), 'driver');
    expect(claim.evidence_ids).toEqual([]);
    expect(claim.confidence).toBe(0.45);
  });
});

describe('citationCoverage', () => {
  it('is the cited fraction across all lists', () => {
    expect(citationCoverage(
      [{ evidence_ids: [1] }, { evidence_ids: [] }],
      [{ evidence_ids: [2] }, { evidence_ids: [] }],
    )).toBe(0.5);
  });

  it('is zero with no claims', () => {
    expect(citationCoverage([], [])).toBe(0);
  });
});
