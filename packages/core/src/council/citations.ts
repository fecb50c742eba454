/**
 * Citation repair.
 *
 * Every evidence id a claim carries must exist in the bundle that was handed
 * to the providers. Ids outside that set are dropped; a claim left with no
 * citation keeps its text but its confidence is capped.
 */

import { clamp, cleanEvidenceIds, coerceFloat, isRecord } from './coerce.js';
import { UNCITED_CONFIDENCE_CAP, type ProviderPayload } from './types.js';

export type ClaimTextKey = 'driver' | 'strategy';

export function repairClaims(
  rows: unknown,
  available: ReadonlySet<number>,
  textKey: ClaimTextKey,
): ProviderPayload[] {
  if (!Array.isArray(rows)) return [];

  const repaired: ProviderPayload[] = [];
  for (const row of rows) {
    // Models sometimes answer with bare strings instead of claim objects
    if (typeof row === 'string') {
      if (!row.trim()) continue;
      repaired.push({ [textKey]: row.trim(), evidence_ids: [], confidence: UNCITED_CONFIDENCE_CAP });
      continue;
    }
    if (!isRecord(row)) continue;

    const ids = cleanEvidenceIds(row.evidence_ids).filter(id => available.has(id));
    if (ids.length > 0) {
      repaired.push({ ...row, evidence_ids: ids });
    } else {
      repaired.push({
        ...row,
        evidence_ids: [],
        confidence: Math.min(clamp(coerceFloat(row.confidence)), UNCITED_CONFIDENCE_CAP),
      });
    }
  }
  return repaired;
}

/** Fraction of claims carrying at least one citation; 0 when there are no claims. */
export function citationCoverage(...claimLists: ProviderPayload[][]): number {
  const pool = claimLists.flat();
  const cited = pool.filter(row => Array.isArray(row.evidence_ids) && row.evidence_ids.length > 0).length;
  return cited / Math.max(pool.length, 1);
}
