/**
 * Council output model.
 *
 * Field names are snake_case because a CouncilOutput is a wire artifact:
 * it is cached, written to disk as JSON and fed back to LLMs as context.
 */

import type { SignalSummary } from '../evidence/types.js';

/** Loosely-typed JSON object as returned by a reasoning provider. */
export type ProviderPayload = Record<string, unknown>;

export interface EvidenceClaim {
  driver: string;
  evidence_ids: number[];
  confidence: number;
}

export interface StrategyClaim {
  strategy: string;
  evidence_ids: number[];
  confidence: number;
}

export interface Recommendation {
  action: string;
  expected_effect: string;
  confidence: number;
}

/** Where two or more providers disagreed. Produced only by synthesis. */
export interface Disagreement {
  topic: string;
  groq_view: string;
  watsonx_view: string;
  local_view: string;
}

export interface CounterfactualImpact {
  before_score: number;
  after_score: number;
  improvement_pct: number;
}

export const BREAKDOWN_KEYS = ['primary', 'secondary', 'local'] as const;

export type BreakdownKey = typeof BREAKDOWN_KEYS[number];

export interface ModelBreakdownEntry {
  raw: ProviderPayload;
  latency_ms: number;
  errors?: string;
  signal_summary: SignalSummary;
}

export type ModelBreakdown = Record<BreakdownKey, ModelBreakdownEntry>;

export interface CouncilOutput {
  executive_summary: string;
  failure_drivers: EvidenceClaim[];
  survivor_strategies: StrategyClaim[];
  counterfactual_impact: CounterfactualImpact;
  disagreements: Disagreement[];
  final_recommendations: Recommendation[];
  overall_confidence: number;
  model_breakdown: ModelBreakdown;
  signal_summary: SignalSummary;
}

export const COUNCIL_LIMITS = {
  failureDrivers: 5,
  survivorStrategies: 5,
  disagreements: 6,
  finalRecommendations: 5,
} as const;

export const EVIDENCE_UNAVAILABLE = 'Evidence unavailable';
export const OPEN_ISSUE = 'Open issue';

/** Ceiling on the confidence of a claim that cites nothing in the bundle. */
export const UNCITED_CONFIDENCE_CAP = 0.45;
