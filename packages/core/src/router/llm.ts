import { generateText, type LanguageModel, type ModelMessage } from 'ai';
import { withRetry, PROVIDER_RETRY, JSON_REPAIR_RETRY, type RetryConfig } from './retry.js';

export interface LLMCallOptions {
  /** Resolved AI SDK LanguageModel instance. */
  model: LanguageModel;
  /** Raw model-id string, as configured. */
  modelId: string;
  system: string;
  messages: ModelMessage[];
  maxOutputTokens?: number;
  temperature?: number;
  /** Retry configuration (uses PROVIDER_RETRY if not provided). */
  retry?: RetryConfig;
}

export interface LLMResponse {
  content: string;
  usage: { inputTokens: number; outputTokens: number };
  /** Number of attempts made (1 = no retries needed). */
  attempts?: number;
  /** True when the content came from the JSON repair request. */
  repaired?: boolean;
}

/** Floor for the output-token cap of a JSON repair request. */
export const MIN_REPAIR_OUTPUT_TOKENS = 512;

export const JSON_REPAIR_INSTRUCTION =
  'Your previous response was invalid or truncated JSON.\n' +
  'Repair it and return ONLY valid JSON matching the schema.\n' +
  'Do not omit any required keys. No commentary.';

/**
 * Single-shot LLM call with retry support.
 * Retries on 429 (rate limit), 5xx (server errors), and timeouts.
 * Quota, auth and configuration errors surface on the first attempt.
 */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  const retryConfig = { ...PROVIDER_RETRY, ...options.retry };

  const { result, attempts } = await withRetry(
    async () => {
      const result = await generateText({
        model: options.model,
        system: options.system,
        messages: options.messages,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
      });

      return {
        content: result.text,
        usage: {
          inputTokens: result.usage.inputTokens ?? 0,
          outputTokens: result.usage.outputTokens ?? 0,
        },
      };
    },
    retryConfig,
  );

  return { ...result, attempts };
}

/**
 * Call LLM with JSON output repair.
 *
 * When the reply fails `validateJson`, re-asks once with the previous reply
 * and a repair instruction, doubling the output-token cap (minimum 512).
 * The repair reply is returned as-is; callers decide whether it parses.
 */
export async function callLLMWithJsonRetry(
  options: LLMCallOptions,
  validateJson?: (content: string) => boolean,
): Promise<LLMResponse> {
  const response = await callLLM(options);

  if (!validateJson) return response;
  if (validateJson(response.content)) return response;

  const retryMessages: ModelMessage[] = [
    ...options.messages,
    { role: 'assistant', content: response.content },
    { role: 'user', content: JSON_REPAIR_INSTRUCTION },
  ];
  const repairTokens = Math.max((options.maxOutputTokens ?? 0) * 2, MIN_REPAIR_OUTPUT_TOKENS);

  const repaired = await callLLM({
    ...options,
    messages: retryMessages,
    maxOutputTokens: repairTokens,
    retry: JSON_REPAIR_RETRY,
  });
  return { ...repaired, repaired: true };
}
