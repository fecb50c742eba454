/**
 * Single-provider narrative: the plain-language explainer that predates the
 * council. Primary first, then secondary, then a deterministic narrative
 * built from the metric gaps and recommendations.
 */

import type { PrimaryLLM, ReasoningContext, ReasoningNarrative, SecondaryLLM } from '../providers/types.js';
import { runFailoverChain, type FailoverCandidate } from './failover.js';

export const FALLBACK_NARRATIVE = {
  explainer: 'The company likely failed because cash pressure and debt stress built up faster than it could recover sales.',
  summary: 'Deterministic fallback used because no reasoning provider was available.',
  noDrivers: 'Insufficient data to rank failure drivers.',
  survivorDifference: 'Survivors showed stronger liquidity/leverage balance in benchmark metrics.',
  defaultMeasure: 'Improve liquidity and reduce leverage.',
  technicalNote: 'Fallback reasoning path was used.',
} as const;

const DEFAULT_EXPLAINER =
  'This company failed because debt and cash pressure stayed high while revenue momentum weakened. ' +
  'The benchmark survivors kept stronger liquidity and lower leverage.';
const DEFAULT_SUMMARY =
  'Consensus view: distress risk is materially reducible by applying survivor-like balance sheet and liquidity discipline.';

/** Layer signals used to top up a short driver list, in priority order. */
const BACKFILL_LAYERS = ['financial_health', 'operational', 'business_model', 'qualitative', 'macro'];
const MIN_DRIVERS = 3;
const MAX_MEASURES = 4;

export interface LegacyProviders {
  primary?: PrimaryLLM;
  secondary?: SecondaryLLM;
}

export interface LegacyReasoningResult {
  narrative: ReasoningNarrative;
  /** 'primary', 'secondary' or 'fallback'. */
  source: string;
  /** Failure strings keyed by provider role. */
  errors: Record<string, string>;
}

export async function generateLegacyReasoning(
  context: ReasoningContext,
  providers: LegacyProviders,
): Promise<LegacyReasoningResult> {
  const candidates: FailoverCandidate<ReasoningNarrative>[] = [];
  if (providers.primary) {
    const primary = providers.primary;
    candidates.push({ name: 'primary', invoke: () => primary.generateReasoning(context) });
  }
  if (providers.secondary) {
    const secondary = providers.secondary;
    candidates.push({ name: 'secondary', invoke: () => secondary.generateReasoning(context) });
  }

  const result = await runFailoverChain({
    candidates,
    validate: narrative => narrative.executive_summary.trim() !== '' || 'narrative has no executive summary',
    fallback: () => fallbackNarrative(context),
  });

  return {
    narrative: strengthenNarrative(result.value, context),
    source: result.source,
    errors: result.errors,
  };
}

export function fallbackNarrative(context: Pick<ReasoningContext, 'metricGaps' | 'recommendations'>): ReasoningNarrative {
  const gapLines = Object.entries(context.metricGaps)
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([key, value]) => `${key}: ${String(value)}`)
    .slice(0, 3);
  const measures = context.recommendations.slice(0, 3);

  return {
    plain_english_explainer: FALLBACK_NARRATIVE.explainer,
    executive_summary: FALLBACK_NARRATIVE.summary,
    failure_drivers: gapLines.length > 0 ? gapLines : [FALLBACK_NARRATIVE.noDrivers],
    survivor_differences: [FALLBACK_NARRATIVE.survivorDifference],
    prevention_measures: measures.length > 0 ? measures : [FALLBACK_NARRATIVE.defaultMeasure],
    technical_notes: [FALLBACK_NARRATIVE.technicalNote],
    model_used: 'fallback',
  };
}

/**
 * Top the narrative up to three drivers from the analysis layers and four
 * prevention measures from the deterministic recommendations.
 */
export function strengthenNarrative(
  narrative: ReasoningNarrative,
  context: Pick<ReasoningContext, 'layerSignals' | 'recommendations'>,
): ReasoningNarrative {
  const drivers = [...narrative.failure_drivers];
  if (drivers.length < MIN_DRIVERS) {
    const backfill = BACKFILL_LAYERS.flatMap(layer => context.layerSignals[layer] ?? []);
    for (const signal of backfill) {
      if (drivers.length >= MIN_DRIVERS) break;
      if (!drivers.includes(signal)) drivers.push(signal);
    }
  }

  const measures = [...narrative.prevention_measures];
  for (const recommendation of context.recommendations) {
    if (measures.length >= MAX_MEASURES) break;
    if (!measures.includes(recommendation)) measures.push(recommendation);
  }

  return {
    ...narrative,
    plain_english_explainer: narrative.plain_english_explainer.trim() || DEFAULT_EXPLAINER,
    executive_summary: narrative.executive_summary.trim() || DEFAULT_SUMMARY,
    failure_drivers: drivers.slice(0, MIN_DRIVERS),
    prevention_measures: measures.slice(0, MAX_MEASURES),
  };
}
