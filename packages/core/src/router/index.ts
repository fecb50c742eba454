export {
  type ProviderId,
  type ProviderConfig,
  GROQ_BASE_URL,
  detectProvider,
  providerModelName,
  watsonxBaseUrl,
  createWatsonxFetch,
  ProviderRegistry,
} from './providers.js';

export { IAM_TOKEN_URL, IamTokenSource } from './iam.js';

export {
  type LLMCallOptions,
  type LLMResponse,
  MIN_REPAIR_OUTPUT_TOKENS,
  JSON_REPAIR_INSTRUCTION,
  callLLM,
  callLLMWithJsonRetry,
} from './llm.js';

export {
  type ErrorCategory,
  type RetryConfig,
  type RetryResult,
  classifyError,
  withRetry,
  withTimeout,
  TimeoutError,
  ProviderNotConfiguredError,
  PROVIDER_RETRY,
  JSON_REPAIR_RETRY,
} from './retry.js';
