export * from './types.js';
export { ProviderError, MAX_ERROR_LENGTH, summarizeProviderError, isQuotaError } from './errors.js';
export { extractJsonObject } from './json.js';
export {
  type FailureEvidence,
  HEURISTIC_STATUS_CONFIDENCE,
  GUARDRAIL_MIN_CONFIDENCE,
  scanFailureEvidence,
  applyFailureGuardrail,
  heuristicFailureStatus,
  heuristicAnswer,
} from './heuristics.js';
export { type LLMKind, type LLMReasonerOptions, LLMReasoner } from './llm-reasoner.js';
export {
  type LocalFeature,
  type LocalAnalystModelOptions,
  LOCAL_FEATURES,
  METRIC_DEFAULTS,
  LocalAnalystModel,
  vectorize,
} from './local-model.js';
