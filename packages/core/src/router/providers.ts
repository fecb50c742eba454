import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';
import { IamTokenSource } from './iam.js';
import { ProviderNotConfiguredError } from './retry.js';

export type ProviderId = 'anthropic' | 'openai' | 'google' | 'groq' | 'watsonx';

export interface ProviderConfig {
  providers: {
    anthropic?: { apiKey?: string };
    openai?: { apiKey?: string };
    google?: { apiKey?: string };
    groq?: { apiKey?: string };
    watsonx?: { apiKey?: string; projectId?: string; url?: string };
  };
}

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

const CONFIG_HINT = 'in ~/.autopsy/config.yaml';

/** Determine which provider a model string belongs to. */
export function detectProvider(modelId: string): ProviderId {
  if (modelId.startsWith('groq:')) return 'groq';
  if (modelId.startsWith('watsonx:')) return 'watsonx';
  if (modelId.startsWith('claude-')) return 'anthropic';
  if (
    modelId.startsWith('gpt-') ||
    modelId.startsWith('o1') ||
    modelId.startsWith('o3')
  ) {
    return 'openai';
  }
  if (modelId.startsWith('gemini-')) return 'google';
  throw new Error(`Cannot determine provider for model: ${modelId}`);
}

/** Model name as the provider knows it (`groq:llama-3.1-8b-instant` → `llama-3.1-8b-instant`). */
export function providerModelName(modelId: string): string {
  const colon = modelId.indexOf(':');
  return colon === -1 ? modelId : modelId.slice(colon + 1);
}

/**
 * Resolve the watsonx OpenAI-compatible base URL. A URL that already names
 * the chat completions endpoint is trimmed back to its `/v1` root.
 */
export function watsonxBaseUrl(url: string): string {
  const base = url.trim().replace(/\/+$/, '');
  if (base.endsWith('/chat/completions')) return base.slice(0, -'/chat/completions'.length);
  if (base.endsWith('/v1')) return base;
  return `${base}/ml/v1`;
}

/**
 * Registry that lazily initialises AI SDK providers and hands out
 * LanguageModel instances by model-id string.
 */
export class ProviderRegistry {
  private config: ProviderConfig;
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;
  private groqProvider: ReturnType<typeof createOpenAI> | null = null;
  private watsonxProvider: ReturnType<typeof createOpenAI> | null = null;

  constructor(config: ProviderConfig) {
    this.config = config;
  }

  /** True when the provider behind `modelId` has the credentials it needs. */
  isConfigured(modelId: string): boolean {
    let providerId: ProviderId;
    try {
      providerId = detectProvider(modelId);
    } catch {
      return false;
    }
    if (providerId === 'watsonx') {
      const watsonx = this.config.providers.watsonx;
      return !!(watsonx?.apiKey && watsonx.projectId && watsonx.url);
    }
    return !!this.config.providers[providerId]?.apiKey;
  }

  /** Return a LanguageModel for the given model-id, creating the provider lazily. */
  getModel(modelId: string): LanguageModel {
    const providerId = detectProvider(modelId);
    const name = providerModelName(modelId);

    switch (providerId) {
      case 'anthropic': {
        if (!this.anthropicProvider) {
          this.anthropicProvider = createAnthropic({ apiKey: this.requireKey('anthropic', 'Anthropic') });
        }
        return this.anthropicProvider(name);
      }
      case 'openai': {
        if (!this.openaiProvider) {
          this.openaiProvider = createOpenAI({ apiKey: this.requireKey('openai', 'OpenAI') });
        }
        return this.openaiProvider.chat(name);
      }
      case 'google': {
        if (!this.googleProvider) {
          this.googleProvider = createGoogleGenerativeAI({ apiKey: this.requireKey('google', 'Google') });
        }
        return this.googleProvider(name);
      }
      case 'groq': {
        if (!this.groqProvider) {
          this.groqProvider = createOpenAI({
            name: 'groq',
            apiKey: this.requireKey('groq', 'Groq', 'GROQ_API_KEY'),
            baseURL: GROQ_BASE_URL,
          });
        }
        return this.groqProvider.chat(name);
      }
      case 'watsonx': {
        if (!this.watsonxProvider) {
          this.watsonxProvider = this.createWatsonx();
        }
        return this.watsonxProvider.chat(name);
      }
    }
  }

  private requireKey(id: Exclude<ProviderId, 'watsonx'>, label: string, envVar?: string): string {
    const apiKey = this.config.providers[id]?.apiKey;
    if (!apiKey) {
      const envHint = envVar ? ` or export ${envVar}` : '';
      throw new ProviderNotConfiguredError(
        `${label} API key not configured. Set providers.${id}.api_key ${CONFIG_HINT}${envHint}`,
      );
    }
    return apiKey;
  }

  /**
   * watsonx speaks the OpenAI chat protocol but authenticates with a
   * short-lived IAM bearer token and needs the project id on every request.
   */
  private createWatsonx(): ReturnType<typeof createOpenAI> {
    const watsonx = this.config.providers.watsonx;
    if (!watsonx?.apiKey) throw new ProviderNotConfiguredError('WATSONX_API_KEY is required.');
    if (!watsonx.projectId) throw new ProviderNotConfiguredError('WATSONX_PROJECT_ID is required.');
    if (!watsonx.url) throw new ProviderNotConfiguredError('WATSONX_URL is required.');

    const fetchWithToken = createWatsonxFetch(new IamTokenSource(watsonx.apiKey), watsonx.projectId);

    return createOpenAI({
      name: 'watsonx',
      apiKey: 'iam',
      baseURL: watsonxBaseUrl(watsonx.url),
      fetch: fetchWithToken,
    });
  }
}

/** `fetch` that authorizes each watsonx request with a fresh IAM token and the project id. */
export function createWatsonxFetch(
  tokens: Pick<IamTokenSource, 'getToken'>,
  projectId: string,
): typeof fetch {
  return async (input, init) => {
    const token = await tokens.getToken();
    const headers = new Headers(init?.headers);
    headers.set('Authorization', `Bearer ${token}`);
    headers.set('X-Watsonx-Project-Id', projectId);
    headers.set('X-Project-Id', projectId);
    return fetch(input, { ...init, headers, body: withProjectId(init?.body, projectId) });
  };
}

function withProjectId(body: RequestInit['body'], projectId: string): RequestInit['body'] {
  if (typeof body !== 'string') return body;
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return body;
  return JSON.stringify({ ...parsed, project_id: projectId });
}
