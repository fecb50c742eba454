import {
  detectProvider,
  LLMReasoner,
  LocalAnalystModel,
  ProviderRegistry,
  type CouncilProviders,
  type ProviderConfig,
} from '@autopsy/core';
import { resolveSecondaryModel, type Config } from './config/index.js';

export function toProviderConfig(config: Config): ProviderConfig {
  const { groq, watsonx, openai, anthropic, google } = config.providers;
  return {
    providers: {
      groq: { apiKey: groq.api_key },
      watsonx: { apiKey: watsonx.api_key, projectId: watsonx.project_id, url: watsonx.url },
      openai: { apiKey: openai.api_key },
      anthropic: { apiKey: anthropic.api_key },
      google: { apiKey: google.api_key },
    },
  };
}

function providerLabel(modelId: string): string {
  try {
    return detectProvider(modelId);
  } catch {
    return modelId;
  }
}

export interface BuiltProviders {
  providers: CouncilProviders;
  /** Model ids that were configured but lack credentials. */
  skipped: string[];
}

/**
 * Council providers from the config. A role whose models all lack
 * credentials is left out, and the orchestrator records it as not configured.
 */
export function buildCouncilProviders(
  config: Config,
  registry: ProviderRegistry = new ProviderRegistry(toProviderConfig(config)),
): BuiltProviders {
  const providers: CouncilProviders = { local: new LocalAnalystModel() };
  const skipped: string[] = [];

  const primaryModels = config.council.primary_models.filter(model => {
    const ready = registry.isConfigured(model);
    if (!ready) skipped.push(model);
    return ready;
  });
  if (primaryModels.length > 0) {
    providers.primary = new LLMReasoner({
      kind: 'primary',
      name: providerLabel(primaryModels[0]),
      registry,
      models: primaryModels,
    });
  }

  const secondaryModel = resolveSecondaryModel(config);
  if (secondaryModel && registry.isConfigured(secondaryModel)) {
    providers.secondary = new LLMReasoner({
      kind: 'secondary',
      name: providerLabel(secondaryModel),
      registry,
      models: [secondaryModel],
    });
  } else if (secondaryModel) {
    skipped.push(secondaryModel);
  }

  return { providers, skipped };
}
