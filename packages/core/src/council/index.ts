export * from './types.js';
export { CouncilOutputSchema, EvidenceClaimSchema, StrategyClaimSchema, RecommendationSchema } from './schema.js';
export { normalizeCouncilOutput, normalizeSignalSummary } from './normalizer.js';
export { repairClaims, citationCoverage, type ClaimTextKey } from './citations.js';
export {
  type AgreementWeights,
  type AgreementSignals,
  AGREEMENT_WEIGHTS,
  agreementConfidence,
} from './confidence.js';
export {
  type SanityInput,
  type SanityReport,
  type SanityOutcome,
  OVERSTATED_DISTRESS_FLAG,
  COUNTERFACTUAL_CONFLICT_FLAG,
  ALIGNED_FLAG,
  emptySanityReport,
  runSanityCheck,
} from './sanity.js';
export {
  type FailoverCandidate,
  type FailoverValidator,
  type FailoverOptions,
  type FailoverAttempt,
  type FailoverResult,
  type SettledFailoverResult,
  FALLBACK_SOURCE,
  runFailoverChain,
} from './failover.js';
export { Semaphore, runConcurrentPair, type PairOutcome, type ConcurrentPairOptions } from './concurrency.js';
export {
  type CouncilCache,
  type CouncilCacheKeyInput,
  type MemoryCouncilCacheOptions,
  COUNCIL_SCHEMA_VERSION,
  MemoryCouncilCache,
  defaultCouncilCache,
  councilCacheKey,
} from './cache.js';
export {
  CONSENSUS_FALLBACK_SUMMARY,
  CONSENSUS_FALLBACK_CONFIDENCE,
  fallbackDraft,
  consensusFallback,
  metricGapLines,
} from './fallback.js';
export {
  type CouncilInput,
  type CouncilProviders,
  type CouncilStage,
  type CouncilEvents,
  type CouncilOrchestratorOptions,
  type SynthesisRole,
  type CouncilStartEvent,
  type CouncilCacheHitEvent,
  type CouncilStageStartEvent,
  type CouncilStageCompleteEvent,
  type CouncilStageErrorEvent,
  type SynthesisFailoverEvent,
  type CouncilCompleteEvent,
  DEFAULT_STAGE_TIMEOUT_MS,
  DEFAULT_MACRO_STRESS,
  CouncilOrchestrator,
  runCouncil,
  resolveSynthesisRoute,
} from './orchestrator.js';
export {
  type LegacyProviders,
  type LegacyReasoningResult,
  generateLegacyReasoning,
  fallbackNarrative,
  strengthenNarrative,
} from './legacy.js';
