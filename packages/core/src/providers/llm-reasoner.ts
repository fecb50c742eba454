/**
 * AI SDK backed implementation of both LLM provider variants.
 *
 * A reasoner holds an ordered list of model ids (for example a large Groq
 * model followed by a small one) and returns the first reply that parses
 * as a JSON object.
 */

import { callLLMWithJsonRetry } from '../router/llm.js';
import { classifyError, ProviderNotConfiguredError, type ErrorCategory, type RetryConfig } from '../router/retry.js';
import type { ProviderRegistry } from '../router/providers.js';
import { asArray, clamp, coerceFloat, coerceText } from '../council/coerce.js';
import type { ProviderPayload } from '../council/types.js';
import { ProviderError, summarizeProviderError } from './errors.js';
import { extractJsonObject } from './json.js';
import { applyFailureGuardrail, scanFailureEvidence } from './heuristics.js';
import {
  ANSWER_SYSTEM_PROMPT,
  CRITIQUE_SYSTEM_PROMPT,
  DRAFT_SYSTEM_PROMPT,
  REASONING_SYSTEM_PROMPT,
  SYNTHESIS_SYSTEM_PROMPT,
  VERIFY_SYSTEM_PROMPT,
  buildAnswerPrompt,
  buildCritiquePrompt,
  buildDraftPrompt,
  buildReasoningPrompt,
  buildSynthesisPrompt,
  buildVerifyPrompt,
} from './prompts.js';
import type {
  CouncilContext,
  FailureStatus,
  FailureStatusLabel,
  FailureStatusRequest,
  QuestionAnswer,
  ReasoningContext,
  ReasoningLLM,
  ReasoningNarrative,
  SynthesisInputs,
} from './types.js';

export type LLMKind = 'primary' | 'secondary';

export interface LLMReasonerOptions<K extends LLMKind> {
  kind: K;
  /** Short label used in error strings, e.g. "groq". */
  name: string;
  registry: Pick<ProviderRegistry, 'getModel'>;
  /** Model ids tried in order. */
  models: readonly string[];
  retry?: RetryConfig;
}

interface ChatSettings {
  temperature: number;
  maxOutputTokens: number;
}

const STATUS_LABELS: readonly FailureStatusLabel[] = ['failed', 'not_failed', 'unclear'];

export class LLMReasoner<K extends LLMKind> implements ReasoningLLM {
  readonly kind: K;
  readonly name: string;
  private readonly registry: Pick<ProviderRegistry, 'getModel'>;
  private readonly models: readonly string[];
  private readonly retry?: RetryConfig;

  constructor(options: LLMReasonerOptions<K>) {
    this.kind = options.kind;
    this.name = options.name;
    this.registry = options.registry;
    this.models = options.models.filter(model => model.trim());
    this.retry = options.retry;
  }

  generateDraft(context: CouncilContext): Promise<ProviderPayload> {
    return this.chatJson(DRAFT_SYSTEM_PROMPT, buildDraftPrompt(context), { temperature: 0.1, maxOutputTokens: 650 });
  }

  generateCritique(context: CouncilContext, draft: ProviderPayload): Promise<ProviderPayload> {
    return this.chatJson(CRITIQUE_SYSTEM_PROMPT, buildCritiquePrompt(context, draft), { temperature: 0, maxOutputTokens: 420 });
  }

  synthesize(context: CouncilContext, inputs: SynthesisInputs): Promise<ProviderPayload> {
    return this.chatJson(SYNTHESIS_SYSTEM_PROMPT, buildSynthesisPrompt(context, inputs), { temperature: 0.1, maxOutputTokens: 900 });
  }

  async answerQuestion(
    question: string,
    reportContext: ProviderPayload,
    webEvidence: readonly ProviderPayload[],
  ): Promise<QuestionAnswer> {
    const parsed = await this.chatJson(
      ANSWER_SYSTEM_PROMPT,
      buildAnswerPrompt(question, reportContext, webEvidence),
      { temperature: 0.2, maxOutputTokens: 300 },
    );
    return {
      answer: coerceText(parsed.answer) || 'No answer returned.',
      rationale: coerceText(parsed.rationale) || 'No rationale returned.',
      caveat: coerceText(parsed.caveat),
      confidence: coerceText(parsed.confidence),
    };
  }

  async verifyFailureStatus(request: FailureStatusRequest): Promise<FailureStatus> {
    const evidence = scanFailureEvidence(request);
    const parsed = await this.chatJson(
      VERIFY_SYSTEM_PROMPT,
      buildVerifyPrompt(request, evidence.combined),
      { temperature: 0, maxOutputTokens: 160 },
    );

    const label = STATUS_LABELS.find(candidate => candidate === parsed.status_label) ?? 'unclear';
    const listed = asArray(parsed.evidence).map(coerceText).filter(Boolean);
    const status: FailureStatus = {
      is_failed: parsed.is_failed === true || parsed.is_failed === 'true',
      status_label: label,
      confidence: clamp(coerceFloat(parsed.confidence, 0.5)),
      reason: coerceText(parsed.reason) || 'No reason returned.',
      evidence: (listed.length ? listed : evidence.curated).slice(0, 3),
      model_used: coerceText(parsed.model_used) || 'unknown',
    };
    return applyFailureGuardrail(status, evidence);
  }

  async generateReasoning(context: ReasoningContext): Promise<ReasoningNarrative> {
    const parsed = await this.chatJson(
      REASONING_SYSTEM_PROMPT,
      buildReasoningPrompt(context),
      { temperature: 0.15, maxOutputTokens: 700 },
    );
    const list = (value: unknown): string[] => asArray(value).map(coerceText).filter(Boolean);
    const prevention = list(parsed.prevention_measures);

    return {
      plain_english_explainer: coerceText(parsed.plain_english_explainer) || 'No plain-English explanation returned.',
      executive_summary: coerceText(parsed.executive_summary),
      failure_drivers: list(parsed.failure_drivers),
      survivor_differences: list(parsed.survivor_differences),
      prevention_measures: prevention.length ? prevention : context.recommendations.slice(0, 3),
      technical_notes: list(parsed.technical_notes),
      model_used: coerceText(parsed.model_used) || 'unknown',
    };
  }

  /**
   * Try each model in turn. A model whose reply still fails to parse after
   * the repair request counts as failed and the next one is tried.
   */
  private async chatJson(system: string, user: string, settings: ChatSettings): Promise<ProviderPayload> {
    if (this.models.length === 0) {
      throw new ProviderError(this.name, `${this.name}: no models configured`, 'not_configured');
    }

    const failures: string[] = [];
    let lastCategory: ErrorCategory = 'unknown';
    let lastError: unknown;

    for (const modelId of this.models) {
      try {
        const model = this.registry.getModel(modelId);
        const response = await callLLMWithJsonRetry(
          {
            model,
            modelId,
            system,
            messages: [{ role: 'user', content: user }],
            temperature: settings.temperature,
            maxOutputTokens: settings.maxOutputTokens,
            retry: this.retry,
          },
          content => extractJsonObject(content) !== null,
        );

        const parsed = extractJsonObject(response.content);
        if (parsed) {
          return { ...parsed, model_used: modelId };
        }
        failures.push(`${modelId}: invalid JSON response`);
        lastCategory = 'json_parse';
      } catch (err) {
        failures.push(`${modelId}: ${summarizeProviderError(err) ?? 'request failed'}`);
        lastCategory = err instanceof ProviderNotConfiguredError ? 'not_configured' : classifyError(err);
        lastError = err;
      }
    }

    throw new ProviderError(
      this.name,
      `${this.name}: ${failures.slice(-3).join(' | ')}`,
      lastCategory,
      { cause: lastError },
    );
  }
}
