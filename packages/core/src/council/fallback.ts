/**
 * Deterministic stand-ins used when providers fail.
 *
 * `fallbackDraft` replaces a failed primary draft so later stages still
 * have something to critique. `consensusFallback` replaces a failed
 * synthesis and is what keeps a council run total: it is built only from
 * the inputs and whatever partial provider output exists.
 */

import { asArray, clamp, cleanEvidenceIds, coerceFloat, coerceText, isRecord } from './coerce.js';
import { EVIDENCE_UNAVAILABLE, UNCITED_CONFIDENCE_CAP, type ProviderPayload } from './types.js';
import type { PeerSummary, SimulationResult } from '../providers/types.js';

export const FALLBACK_DRAFT_EXPLAINER =
  'Evidence unavailable. Deterministic fallback used because the primary draft failed.';
export const FALLBACK_DRAFT_SUMMARY =
  'Collaborative council fallback draft was generated without the primary provider.';
export const SURVIVOR_BENCHMARK_NOTE =
  'Survivor benchmark suggests stronger liquidity and leverage discipline.';
export const CONSENSUS_FALLBACK_SUMMARY =
  'Evidence unavailable. Consensus fallback was assembled from the available deterministic signals.';
export const DEFAULT_EXPECTED_EFFECT = 'Reduce distress risk versus current baseline.';

/** Fixed overall confidence of a consensus fallback. */
export const CONSENSUS_FALLBACK_CONFIDENCE = 0.3;

const TOP_ITEMS = 3;
const MIN_CLAIM_CONFIDENCE = 0.3;

export interface FallbackDraftInput {
  peerSummary: PeerSummary;
  recommendations: readonly string[];
  simulation: SimulationResult;
}

export interface ConsensusFallbackInput extends FallbackDraftInput {
  /** Primary draft, or the fallback draft when drafting failed. */
  draft: ProviderPayload;
  failingRiskScore: number;
}

/** Top metric gaps rendered as `"debt to equity: 2.4"`. */
export function metricGapLines(peerSummary: PeerSummary, limit = TOP_ITEMS): string[] {
  const gaps = peerSummary.metric_gaps ?? {};
  return Object.entries(gaps)
    .slice(0, limit)
    .map(([key, value]) => `${key.replace(/_/g, ' ')}: ${String(value)}`);
}

export function fallbackDraft(input: FallbackDraftInput): ProviderPayload {
  const drivers = metricGapLines(input.peerSummary);
  const measures = input.recommendations.slice(0, TOP_ITEMS);
  return {
    plain_english_explainer: FALLBACK_DRAFT_EXPLAINER,
    executive_summary: FALLBACK_DRAFT_SUMMARY,
    failure_drivers: drivers.length > 0 ? drivers : [EVIDENCE_UNAVAILABLE],
    survivor_differences: [SURVIVOR_BENCHMARK_NOTE],
    prevention_measures: measures.length > 0 ? measures : [EVIDENCE_UNAVAILABLE],
    technical_notes: [`Counterfactual improvement: ${input.simulation.improvement_percentage ?? 0}%`],
  };
}

interface ClaimPayload {
  text: string;
  confidence?: number;
  evidenceIds: number[];
}

/**
 * Pull text, confidence and citations out of a claim row. Rows may be
 * objects, plain strings, or strings holding a JSON object.
 */
export function extractClaimPayload(row: unknown, textKeys: readonly string[]): ClaimPayload {
  let payload: Record<string, unknown> | undefined;
  if (isRecord(row)) {
    payload = row;
  } else if (typeof row === 'string') {
    const raw = row.trim();
    if (raw.startsWith('{') && raw.endsWith('}')) {
      payload = parseObject(raw);
    }
    if (!payload || Object.keys(payload).length === 0) {
      return { text: raw, evidenceIds: [] };
    }
  }

  if (!payload || Object.keys(payload).length === 0) {
    return { text: EVIDENCE_UNAVAILABLE, evidenceIds: [] };
  }

  const source = payload;
  const text = textKeys.map(key => coerceText(source[key])).find(Boolean) ?? JSON.stringify(source);
  const confidence = 'confidence' in source ? coerceFloat(source.confidence, Number.NaN) : Number.NaN;
  return {
    text,
    confidence: Number.isNaN(confidence) ? undefined : confidence,
    evidenceIds: cleanEvidenceIds(source.evidence_ids),
  };
}

function parseObject(raw: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reshape whatever the draft and the scenario engine produced into a council
 * result. No fallback claim is scored above the uncited cap; citations are
 * kept only where the draft supplied them, and citation repair drops any that
 * are not in the bundle.
 */
export function consensusFallback(input: ConsensusFallbackInput): ProviderPayload {
  let drivers: ProviderPayload[] = [];
  for (const row of asArray(input.draft.failure_drivers).slice(0, TOP_ITEMS)) {
    const claim = extractClaimPayload(row, ['driver', 'strategy', 'action']);
    if (!claim.text) continue;
    drivers.push({
      driver: claim.text,
      evidence_ids: claim.evidenceIds,
      confidence: clamp(claim.confidence ?? UNCITED_CONFIDENCE_CAP, MIN_CLAIM_CONFIDENCE, UNCITED_CONFIDENCE_CAP),
    });
  }

  let strategies: ProviderPayload[] = [];
  for (const row of input.recommendations.slice(0, TOP_ITEMS)) {
    const claim = extractClaimPayload(row, ['strategy', 'action', 'driver']);
    if (!claim.text) continue;
    strategies.push({
      strategy: claim.text,
      evidence_ids: claim.evidenceIds,
      confidence: clamp(claim.confidence ?? UNCITED_CONFIDENCE_CAP, MIN_CLAIM_CONFIDENCE, UNCITED_CONFIDENCE_CAP),
    });
  }

  let recommendations: ProviderPayload[] = input.recommendations.slice(0, TOP_ITEMS).map(item => ({
    action: item,
    expected_effect: DEFAULT_EXPECTED_EFFECT,
    confidence: UNCITED_CONFIDENCE_CAP,
  }));

  if (drivers.length === 0) {
    drivers = metricGapLines(input.peerSummary).map(line => ({
      driver: line,
      evidence_ids: [],
      confidence: 0.25,
    }));
  }
  if (strategies.length === 0) {
    strategies = [{ strategy: EVIDENCE_UNAVAILABLE, evidence_ids: [], confidence: 0.2 }];
  }
  if (recommendations.length === 0) {
    recommendations = [{ action: EVIDENCE_UNAVAILABLE, expected_effect: EVIDENCE_UNAVAILABLE, confidence: 0.2 }];
  }

  return {
    executive_summary: CONSENSUS_FALLBACK_SUMMARY,
    failure_drivers: drivers,
    survivor_strategies: strategies,
    counterfactual_impact: {
      before_score: input.failingRiskScore,
      after_score: input.simulation.adjusted_score ?? 0,
      improvement_pct: input.simulation.improvement_percentage ?? 0,
    },
    disagreements: [],
    final_recommendations: recommendations,
    overall_confidence: CONSENSUS_FALLBACK_CONFIDENCE,
  };
}
