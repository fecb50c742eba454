/**
 * Output normalizer: the single path between "whatever a provider
 * returned" and the strict CouncilOutput shape.
 *
 * Pure: no I/O, no provider access. Never throws.
 */

import type { SignalSummary } from '../evidence/types.js';
import {
  asArray,
  clamp,
  cleanEvidenceIds,
  coerceFloat,
  coerceInt,
  coerceText,
  isRecord,
  round,
} from './coerce.js';
import {
  COUNCIL_LIMITS,
  EVIDENCE_UNAVAILABLE,
  OPEN_ISSUE,
  type BreakdownKey,
  type CouncilOutput,
  type Disagreement,
  type EvidenceClaim,
  type ModelBreakdown,
  type ModelBreakdownEntry,
  type Recommendation,
  type StrategyClaim,
} from './types.js';

export function normalizeCouncilOutput(payload: unknown): CouncilOutput {
  const raw: Record<string, unknown> = isRecord(payload) ? payload : {};
  const signalSummary = normalizeSignalSummary(raw.signal_summary);

  const failureDrivers = asArray(raw.failure_drivers)
    .filter(isRecord)
    .map((row): EvidenceClaim => ({
      driver: coerceText(row.driver) || EVIDENCE_UNAVAILABLE,
      evidence_ids: cleanEvidenceIds(row.evidence_ids),
      confidence: clamp(coerceFloat(row.confidence)),
    }))
    .slice(0, COUNCIL_LIMITS.failureDrivers);

  const survivorStrategies = asArray(raw.survivor_strategies)
    .filter(isRecord)
    .map((row): StrategyClaim => ({
      strategy: coerceText(row.strategy) || EVIDENCE_UNAVAILABLE,
      evidence_ids: cleanEvidenceIds(row.evidence_ids),
      confidence: clamp(coerceFloat(row.confidence)),
    }))
    .slice(0, COUNCIL_LIMITS.survivorStrategies);

  const disagreements = asArray(raw.disagreements)
    .filter(isRecord)
    .map((row): Disagreement => ({
      topic: coerceText(row.topic) || OPEN_ISSUE,
      groq_view: coerceText(row.groq_view),
      watsonx_view: coerceText(row.watsonx_view),
      local_view: coerceText(row.local_view),
    }))
    .slice(0, COUNCIL_LIMITS.disagreements);

  const finalRecommendations = asArray(raw.final_recommendations)
    .filter(isRecord)
    .map((row): Recommendation => ({
      action: coerceText(row.action) || EVIDENCE_UNAVAILABLE,
      expected_effect: coerceText(row.expected_effect) || EVIDENCE_UNAVAILABLE,
      confidence: clamp(coerceFloat(row.confidence)),
    }))
    .slice(0, COUNCIL_LIMITS.finalRecommendations);

  const counterfactualRaw = raw.counterfactual_impact;
  const counterfactual: Record<string, unknown> = isRecord(counterfactualRaw) ? counterfactualRaw : {};

  return {
    executive_summary: coerceText(raw.executive_summary) || EVIDENCE_UNAVAILABLE,
    failure_drivers: failureDrivers.length > 0
      ? failureDrivers
      : [{ driver: EVIDENCE_UNAVAILABLE, evidence_ids: [], confidence: 0 }],
    survivor_strategies: survivorStrategies.length > 0
      ? survivorStrategies
      : [{ strategy: EVIDENCE_UNAVAILABLE, evidence_ids: [], confidence: 0 }],
    counterfactual_impact: {
      before_score: coerceFloat(counterfactual.before_score),
      after_score: coerceFloat(counterfactual.after_score),
      improvement_pct: coerceFloat(counterfactual.improvement_pct),
    },
    disagreements,
    final_recommendations: finalRecommendations.length > 0
      ? finalRecommendations
      : [{ action: EVIDENCE_UNAVAILABLE, expected_effect: EVIDENCE_UNAVAILABLE, confidence: 0 }],
    overall_confidence: round(clamp(coerceFloat(raw.overall_confidence)), 3),
    model_breakdown: normalizeBreakdown(raw.model_breakdown, signalSummary),
    signal_summary: signalSummary,
  };
}

function normalizeBreakdown(value: unknown, fallbackSummary: SignalSummary): ModelBreakdown {
  const breakdown: Record<string, unknown> = isRecord(value) ? value : {};

  const entry = (key: BreakdownKey): ModelBreakdownEntry => {
    const slot = breakdown[key];
    const row: Record<string, unknown> = isRecord(slot) ? slot : {};
    const providerRaw = row.raw;
    const normalized: ModelBreakdownEntry = {
      raw: isRecord(providerRaw) ? providerRaw : {},
      latency_ms: Math.max(0, coerceInt(row.latency_ms)),
      signal_summary: row.signal_summary === undefined
        ? fallbackSummary
        : normalizeSignalSummary(row.signal_summary),
    };
    const rawErrors = row.errors;
    const errors = typeof rawErrors === 'string' ? rawErrors.trim() : '';
    if (errors) normalized.errors = errors;
    return normalized;
  };

  return {
    primary: entry('primary'),
    secondary: entry('secondary'),
    local: entry('local'),
  };
}

export function normalizeSignalSummary(value: unknown): SignalSummary {
  const summary: Record<string, unknown> = isRecord(value) ? value : {};
  return {
    snippet_count: Math.max(0, coerceInt(summary.snippet_count)),
    source_count: Math.max(0, coerceInt(summary.source_count)),
    channels: asArray(summary.channels).map(coerceText).filter(Boolean),
  };
}
