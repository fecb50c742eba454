import { z } from 'zod';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' },
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const secretSchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const keyOnlyProviderSchema = z.object({
  api_key: secretSchema.optional(),
}).strict();

const watsonxSchema = z.object({
  api_key: secretSchema.optional(),
  project_id: secretSchema.optional(),
  url: z.string().optional(),
  model: z.string().optional(),
}).strict();

const providersSchema = z.object({
  groq: keyOnlyProviderSchema.optional(),
  watsonx: watsonxSchema.optional(),
  openai: keyOnlyProviderSchema.optional(),
  anthropic: keyOnlyProviderSchema.optional(),
  google: keyOnlyProviderSchema.optional(),
}).strict();

export const SYNTHESIS_PROVIDERS = ['primary', 'secondary'] as const;
export const SEARCH_DEPTHS = ['basic', 'advanced'] as const;
export const OUTPUT_FORMATS = ['markdown', 'json'] as const;

const councilSchema = z.object({
  primary_models: z.array(z.string().min(1)).min(1).optional(),
  secondary_model: z.string().min(1).optional(),
  synthesis_provider: z.enum(SYNTHESIS_PROVIDERS).optional(),
  stage_timeout_ms: z.number().int().positive().optional(),
  cache_max_entries: z.number().int().min(1).optional(),
}).strict();

const searchSchema = z.object({
  api_key: secretSchema.optional(),
  max_results: z.number().int().min(1).max(20).optional(),
  search_depth: z.enum(SEARCH_DEPTHS).optional(),
}).strict();

const defaultsSchema = z.object({
  output_format: z.enum(OUTPUT_FORMATS).optional(),
  output_dir: z.string().optional(),
}).strict();

const ConfigSchema = z.object({
  providers: providersSchema.optional(),
  council: councilSchema.optional(),
  search: searchSchema.optional(),
  defaults: defaultsSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type SynthesisProvider = typeof SYNTHESIS_PROVIDERS[number];
export type SearchDepth = typeof SEARCH_DEPTHS[number];
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface ResolvedKeyConfig {
  api_key?: string;
}

export interface ResolvedWatsonxConfig {
  api_key?: string;
  project_id?: string;
  url?: string;
  model?: string;
}

export interface Config {
  providers: {
    groq: ResolvedKeyConfig;
    watsonx: ResolvedWatsonxConfig;
    openai: ResolvedKeyConfig;
    anthropic: ResolvedKeyConfig;
    google: ResolvedKeyConfig;
  };
  council: {
    /** Model ids for the drafting provider, tried in order. */
    primary_models: string[];
    /** Model id for the critique provider. Empty means watsonx:<providers.watsonx.model>. */
    secondary_model: string;
    synthesis_provider: SynthesisProvider;
    stage_timeout_ms: number;
    cache_max_entries: number;
  };
  search: {
    api_key?: string;
    max_results: number;
    search_depth: SearchDepth;
  };
  defaults: {
    output_format: OutputFormat;
    output_dir: string;
  };
}

export const ConfigDefaults: Config = {
  providers: {
    groq: {},
    watsonx: {},
    openai: {},
    anthropic: {},
    google: {},
  },
  council: {
    primary_models: ['groq:llama-3.3-70b-versatile', 'groq:llama-3.1-8b-instant'],
    secondary_model: '',
    synthesis_provider: 'secondary',
    stage_timeout_ms: 60_000,
    cache_max_entries: 32,
  },
  search: {
    max_results: 5,
    search_depth: 'advanced',
  },
  defaults: {
    output_format: 'markdown',
    output_dir: './reports',
  },
};

export { ConfigSchema };
