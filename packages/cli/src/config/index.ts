export {
  ConfigSchema,
  ConfigDefaults,
  SYNTHESIS_PROVIDERS,
  SEARCH_DEPTHS,
  OUTPUT_FORMATS,
  type RawConfig,
  type Config,
  type SynthesisProvider,
  type SearchDepth,
  type OutputFormat,
} from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  expandTilde,
  envRefName,
  resolveSecondaryModel,
  maskSecret,
  maskConfig,
  SECRET_SLOTS,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
