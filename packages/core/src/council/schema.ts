import { z } from 'zod';
import { COUNCIL_LIMITS } from './types.js';

const confidence = z.number().min(0).max(1);
const evidenceIds = z.array(z.number().int().positive());

export const SignalSummarySchema = z.object({
  snippet_count: z.number().int().nonnegative(),
  source_count: z.number().int().nonnegative(),
  channels: z.array(z.string()),
}).strict();

export const EvidenceClaimSchema = z.object({
  driver: z.string().min(1),
  evidence_ids: evidenceIds,
  confidence,
}).strict();

export const StrategyClaimSchema = z.object({
  strategy: z.string().min(1),
  evidence_ids: evidenceIds,
  confidence,
}).strict();

export const RecommendationSchema = z.object({
  action: z.string().min(1),
  expected_effect: z.string().min(1),
  confidence,
}).strict();

export const DisagreementSchema = z.object({
  topic: z.string().min(1),
  groq_view: z.string(),
  watsonx_view: z.string(),
  local_view: z.string(),
}).strict();

export const ModelBreakdownEntrySchema = z.object({
  raw: z.record(z.string(), z.unknown()),
  latency_ms: z.number().int().nonnegative(),
  errors: z.string().min(1).optional(),
  signal_summary: SignalSummarySchema,
}).strict();

/** The strict shape every normalized CouncilOutput satisfies. */
export const CouncilOutputSchema = z.object({
  executive_summary: z.string().min(1),
  failure_drivers: z.array(EvidenceClaimSchema).min(1).max(COUNCIL_LIMITS.failureDrivers),
  survivor_strategies: z.array(StrategyClaimSchema).min(1).max(COUNCIL_LIMITS.survivorStrategies),
  counterfactual_impact: z.object({
    before_score: z.number(),
    after_score: z.number(),
    improvement_pct: z.number(),
  }).strict(),
  disagreements: z.array(DisagreementSchema).max(COUNCIL_LIMITS.disagreements),
  final_recommendations: z.array(RecommendationSchema).min(1).max(COUNCIL_LIMITS.finalRecommendations),
  overall_confidence: confidence,
  model_breakdown: z.object({
    primary: ModelBreakdownEntrySchema,
    secondary: ModelBreakdownEntrySchema,
    local: ModelBreakdownEntrySchema,
  }).strict(),
  signal_summary: SignalSummarySchema,
}).strict();
