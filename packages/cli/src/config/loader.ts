import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { parse, stringify } from 'yaml';
import { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.autopsy/config.yaml';

export interface LoadConfigOptions {
  configPath?: string;
  /** Environment to resolve references and fallbacks against. Default: process.env. */
  env?: NodeJS.ProcessEnv;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expandTilde(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return resolve(home, path.slice(2));
  return path;
}

export function getConfigPath(configPath?: string): string {
  return configPath ? expandTilde(configPath) : resolve(homedir(), DEFAULT_CONFIG_PATH);
}

/** Name of the variable an `env:NAME`, `$NAME` or `${NAME}` reference points at. */
export function envRefName(value: string): string | undefined {
  if (value.startsWith('env:')) return value.slice(4);
  if (value.startsWith('${') && value.endsWith('}')) return value.slice(2, -1);
  if (value.startsWith('$')) return value.slice(1);
  return undefined;
}

function resolveEnvRef(value: string, env: NodeJS.ProcessEnv): string {
  const name = envRefName(value);
  if (!name) return value;
  return env[name] || value;
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  return Boolean(value && envRefName(value) !== undefined);
}

function stripNullValues(value: unknown): unknown {
  if (value === null || value === undefined) return undefined;
  if (Array.isArray(value)) {
    return value.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== null) result[key] = stripNullValues(entry);
    }
    return result;
  }
  return value;
}

function resolveEnvRefsInObject(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') return resolveEnvRef(value, env);
  if (Array.isArray(value)) return value.map(item => resolveEnvRefsInObject(item, env));
  if (isRecord(value)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      resolved[key] = resolveEnvRefsInObject(entry, env);
    }
    return resolved;
  }
  return value;
}

/** A credential slot and the standard variables that can fill it. */
interface SecretSlot {
  path: string;
  env: readonly string[];
  get(config: Config): string | undefined;
  set(config: Config, value: string | undefined): void;
}

export const SECRET_SLOTS: readonly SecretSlot[] = [
  {
    path: 'providers.groq.api_key',
    env: ['GROQ_API_KEY'],
    get: c => c.providers.groq.api_key,
    set: (c, v) => { c.providers.groq.api_key = v; },
  },
  {
    path: 'providers.watsonx.api_key',
    env: ['WATSONX_API_KEY'],
    get: c => c.providers.watsonx.api_key,
    set: (c, v) => { c.providers.watsonx.api_key = v; },
  },
  {
    path: 'providers.watsonx.project_id',
    env: ['WATSONX_PROJECT_ID'],
    get: c => c.providers.watsonx.project_id,
    set: (c, v) => { c.providers.watsonx.project_id = v; },
  },
  {
    path: 'providers.watsonx.url',
    env: ['WATSONX_URL'],
    get: c => c.providers.watsonx.url,
    set: (c, v) => { c.providers.watsonx.url = v; },
  },
  {
    path: 'providers.watsonx.model',
    env: ['WATSONX_MODEL'],
    get: c => c.providers.watsonx.model,
    set: (c, v) => { c.providers.watsonx.model = v; },
  },
  {
    path: 'providers.openai.api_key',
    env: ['OPENAI_API_KEY'],
    get: c => c.providers.openai.api_key,
    set: (c, v) => { c.providers.openai.api_key = v; },
  },
  {
    path: 'providers.anthropic.api_key',
    env: ['ANTHROPIC_API_KEY'],
    get: c => c.providers.anthropic.api_key,
    set: (c, v) => { c.providers.anthropic.api_key = v; },
  },
  {
    path: 'providers.google.api_key',
    env: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
    get: c => c.providers.google.api_key,
    set: (c, v) => { c.providers.google.api_key = v; },
  },
  {
    path: 'search.api_key',
    env: ['TAVILY_API_KEY'],
    get: c => c.search.api_key,
    set: (c, v) => { c.search.api_key = v; },
  },
];

/**
 * Clear references whose variable is unset, then fill empty slots from the
 * standard variables. Returns the names of the variables used.
 */
function applyEnvFallbacks(config: Config, env: NodeJS.ProcessEnv): string[] {
  const used: string[] = [];
  for (const slot of SECRET_SLOTS) {
    if (isUnresolvedEnvRef(slot.get(config))) slot.set(config, undefined);
    if (slot.get(config)) continue;

    const name = slot.env.find(candidate => env[candidate]);
    if (name) {
      slot.set(config, env[name]);
      used.push(name);
    }
  }
  return used;
}

function mergeConfig(raw: RawConfig): Config {
  const result = structuredClone(ConfigDefaults);
  const { providers, council, search, defaults } = raw;

  if (providers) {
    result.providers = {
      groq: { ...result.providers.groq, ...providers.groq },
      watsonx: { ...result.providers.watsonx, ...providers.watsonx },
      openai: { ...result.providers.openai, ...providers.openai },
      anthropic: { ...result.providers.anthropic, ...providers.anthropic },
      google: { ...result.providers.google, ...providers.google },
    };
  }
  if (council) result.council = { ...result.council, ...council };
  if (search) result.search = { ...result.search, ...search };
  if (defaults) result.defaults = { ...result.defaults, ...defaults };

  return result;
}

function formatIssues(error: { issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }> }): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

function readYamlDocument(configPath: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  try {
    return parse(fileContent);
  } catch (error) {
    const reason = error instanceof Error ? `: ${error.message.split('\n')[0]}` : '';
    throw new ConfigError(`Failed to parse config file: ${configPath}${reason}`);
  }
}

export interface LoadConfigResult {
  config: Config;
  configPath: string;
  configFileExists: boolean;
  /** Standard variables that filled otherwise empty credentials. */
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const env = options.env ?? process.env;
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  let config = structuredClone(ConfigDefaults);

  if (configFileExists) {
    const rawConfig = readYamlDocument(configPath);
    if (rawConfig !== null && rawConfig !== undefined) {
      const resolved = resolveEnvRefsInObject(stripNullValues(rawConfig), env);
      const validated = ConfigSchema.safeParse(resolved);
      if (!validated.success) {
        throw new ConfigError(`Invalid config: ${formatIssues(validated.error)}`);
      }
      config = mergeConfig(validated.data);
    }
  }

  const envKeysUsed = applyEnvFallbacks(config, env);
  return { config, configPath, configFileExists, envKeysUsed };
}

/** Model id of the critique provider: the configured one, else watsonx's model. */
export function resolveSecondaryModel(config: Config): string {
  if (config.council.secondary_model.trim()) return config.council.secondary_model.trim();
  const model = config.providers.watsonx.model?.trim();
  return model ? `watsonx:${model}` : '';
}

/** Show only the last four characters of a secret. */
export function maskSecret(value: string): string {
  if (value.length <= 8) return '****';
  return `****${value.slice(-4)}`;
}

/** A copy of the config that is safe to print. */
export function maskConfig(config: Config): Config {
  const masked = structuredClone(config);
  for (const slot of SECRET_SLOTS) {
    if (!slot.path.endsWith('api_key')) continue;
    const value = slot.get(masked);
    if (value) slot.set(masked, maskSecret(value));
  }
  return masked;
}

/** `5` → 5, `true` → true, `[a, b]` → ['a', 'b']; anything else stays a string. */
function parseValue(value: string): unknown {
  if (value.trim() === '') return value;
  try {
    const parsed: unknown = parse(value);
    return parsed === null ? value : parsed;
  } catch {
    return value;
  }
}

export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'autopsy config init' first.`);
  }

  const parsed = readYamlDocument(configPath);
  const doc: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  const keys = key.split('.').filter(Boolean);
  const lastKey = keys.pop();
  if (!lastKey) {
    throw new ConfigError('Config key must not be empty');
  }

  let current = doc;
  for (const segment of keys) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[lastKey] = parseValue(value);

  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    throw new ConfigError(`Invalid config after setting ${key}: ${formatIssues(validated.error)}`);
  }

  writeFileSync(configPath, stringify(doc), 'utf-8');
}
