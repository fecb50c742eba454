import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import { expandTilde } from '../config/index.js';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

export const CONFIG_TEMPLATE = `# autopsy configuration
#
# Values may reference environment variables: env:NAME, $NAME or \${NAME}.
# Unset references are ignored and the standard variable is used instead.

providers:
  groq:
    api_key: env:GROQ_API_KEY
  watsonx:
    api_key: env:WATSONX_API_KEY
    project_id: env:WATSONX_PROJECT_ID
    url: env:WATSONX_URL
    model: env:WATSONX_MODEL
  # openai:
  #   api_key: env:OPENAI_API_KEY
  # anthropic:
  #   api_key: env:ANTHROPIC_API_KEY
  # google:
  #   api_key: env:GEMINI_API_KEY

council:
  # Drafting models, tried in order
  primary_models:
    - groq:llama-3.3-70b-versatile
    - groq:llama-3.1-8b-instant
  # Critique model; empty means watsonx:<providers.watsonx.model>
  # secondary_model: gpt-4o
  synthesis_provider: secondary   # primary | secondary
  stage_timeout_ms: 60000
  cache_max_entries: 32

search:
  api_key: env:TAVILY_API_KEY
  max_results: 5
  search_depth: advanced          # basic | advanced

defaults:
  output_format: markdown         # markdown | json
  output_dir: "./reports"
`;

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.autopsy', 'config.yaml');
}

/** Write the commented default config. An existing file is left alone. Returns whether one was written. */
export function initCommand(options: InitCommandOptions = {}): boolean {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return false;
  }

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Add your API keys or set GROQ_API_KEY, WATSONX_* and TAVILY_API_KEY');
  log('  3. Run', chalk.green('autopsy run company.json --search'));
  return true;
}
