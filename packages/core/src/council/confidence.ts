import { clamp } from './coerce.js';

export interface AgreementWeights {
  base: number;
  primary: number;
  secondary: number;
  local: number;
  coverage: number;
  perDisagreement: number;
  maxDisagreementPenalty: number;
  floor: number;
  ceiling: number;
}

/**
 * Weights of the agreement-confidence heuristic.
 * The constants are tunable; only the shape (reward redundancy and
 * grounding, penalize recorded conflict, never reach 0 or 1) is fixed.
 */
export const AGREEMENT_WEIGHTS: Readonly<AgreementWeights> = Object.freeze({
  base: 0.25,
  primary: 0.2,
  secondary: 0.2,
  local: 0.15,
  coverage: 0.2,
  perDisagreement: 0.05,
  maxDisagreementPenalty: 0.25,
  floor: 0.05,
  ceiling: 0.95,
});

export interface AgreementSignals {
  primaryOk: boolean;
  secondaryOk: boolean;
  localOk: boolean;
  /** Fraction of claims with at least one valid citation, in [0, 1]. */
  evidenceCoverage: number;
  disagreementCount: number;
}

export function agreementConfidence(
  signals: AgreementSignals,
  weights: Readonly<AgreementWeights> = AGREEMENT_WEIGHTS,
): number {
  let score = weights.base;
  if (signals.primaryOk) score += weights.primary;
  if (signals.secondaryOk) score += weights.secondary;
  if (signals.localOk) score += weights.local;
  score += weights.coverage * clamp(signals.evidenceCoverage);
  score -= Math.min(
    weights.maxDisagreementPenalty,
    Math.max(0, signals.disagreementCount) * weights.perDisagreement,
  );
  return clamp(score, weights.floor, weights.ceiling);
}
