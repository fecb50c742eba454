/**
 * Local sanity check: score the as-is and counterfactual metrics with the
 * local model and flag where the narrative's numbers disagree with it.
 */

import { round } from './coerce.js';
import { summarizeProviderError } from '../providers/errors.js';
import type { LocalModel, MetricMap, SimulationResult } from '../providers/types.js';

export const OVERSTATED_DISTRESS_FLAG = 'Narrative may overstate distress relative to local probability.';
export const COUNTERFACTUAL_CONFLICT_FLAG = 'Counterfactual narrative conflicts with local risk delta.';
export const ALIGNED_FLAG = 'Narrative broadly aligns with metric-derived distress profile.';

/** Baseline probability below which a high external risk score is suspicious. */
const LOW_PROBABILITY = 0.45;
/** External risk score (0-100) above which a low local probability is flagged. */
const HIGH_RISK_SCORE = 65;

export interface SanityInput {
  metrics: MetricMap;
  macroStressScore: number;
  qualitativeIntensity: number;
  /** Externally computed 0-100 risk score. */
  failingRiskScore: number;
  simulation: SimulationResult;
}

export interface SanityReport {
  failure_probability: number;
  counterfactual_probability: number;
  top_numeric_drivers: string[];
  narrative_alignment_flags: string[];
  feature_values: Record<string, number>;
}

export interface SanityOutcome {
  report: SanityReport;
  /** Set when the model could not score the input. */
  error?: string;
}

export function emptySanityReport(): SanityReport {
  return {
    failure_probability: 0,
    counterfactual_probability: 0,
    top_numeric_drivers: [],
    narrative_alignment_flags: [],
    feature_values: {},
  };
}

/** Never throws; a failing model yields an empty report and an error string. */
export function runSanityCheck(model: LocalModel | undefined, input: SanityInput): SanityOutcome {
  if (!model) {
    return { report: emptySanityReport(), error: 'local provider not configured' };
  }

  try {
    const before = model.predict(input.metrics, input.macroStressScore, input.qualitativeIntensity);
    const after = model.predict(
      input.simulation.adjusted_metrics ?? input.metrics,
      input.macroStressScore,
      input.qualitativeIntensity,
    );

    const flags: string[] = [];
    if (before.risk_probability < LOW_PROBABILITY && input.failingRiskScore > HIGH_RISK_SCORE) {
      flags.push(OVERSTATED_DISTRESS_FLAG);
    }
    if (before.risk_probability > after.risk_probability && (input.simulation.improvement_percentage ?? 0) <= 0) {
      flags.push(COUNTERFACTUAL_CONFLICT_FLAG);
    }
    if (flags.length === 0) flags.push(ALIGNED_FLAG);

    return {
      report: {
        failure_probability: round(before.risk_probability, 4),
        counterfactual_probability: round(after.risk_probability, 4),
        top_numeric_drivers: before.top_drivers,
        narrative_alignment_flags: flags,
        feature_values: before.feature_values,
      },
    };
  } catch (err) {
    return {
      report: emptySanityReport(),
      error: summarizeProviderError(err) ?? 'local model failed',
    };
  }
}
