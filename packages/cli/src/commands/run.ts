import { Command, Option } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import {
  CouncilOrchestrator,
  MemoryCouncilCache,
  writeCouncilReport,
  type CouncilOutput,
  type EvidenceChannels,
} from '@autopsy/core';
import { TavilySearchClient, gatherEvidence } from '@autopsy/tools';
import { getConfig, type GlobalOptions } from '../context.js';
import { OUTPUT_FORMATS, SYNTHESIS_PROVIDERS, type OutputFormat } from '../config/index.js';
import { buildCouncilProviders } from '../providers.js';
import { HeadlessReporter } from '../reporter/headless.js';
import {
  InputFileError,
  mergeChannels,
  readCouncilInputFile,
  toCouncilInput,
  type CouncilInputFile,
} from '../input.js';

interface RunOptions {
  search?: boolean;
  output?: string;
  outputDir?: string;
  synthesis?: string;
}

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the reasoning council on a company input file and write the report')
    .argument('<input>', 'Council input JSON (company, metrics, peer summary, simulation)')
    .option('--search', 'Gather web evidence for every channel before the council runs')
    .addOption(new Option('-o, --output <format>', 'Output format').choices(OUTPUT_FORMATS))
    .option('--output-dir <dir>', 'Output directory')
    .addOption(new Option('--synthesis <provider>', 'Preferred synthesis provider').choices(SYNTHESIS_PROVIDERS))
    .action(async (inputPath: string, options: RunOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();
      const warn = (message: string) => {
        if (!globalOpts.json) console.error(chalk.yellow(`  Warning: ${message}`));
      };

      const format: OutputFormat = isOutputFormat(options.output) ? options.output : config.defaults.output_format;
      const outputDir = resolve(options.outputDir ?? config.defaults.output_dir);

      let file: CouncilInputFile;
      try {
        file = readCouncilInputFile(resolve(inputPath));
      } catch (err) {
        if (!(err instanceof InputFileError)) throw err;
        console.error(globalOpts.json ? JSON.stringify({ error: err.message }) : chalk.red(err.message));
        process.exitCode = 1;
        return;
      }

      let channels: EvidenceChannels | undefined;
      let macroStressScore: number | undefined;
      if (options.search) {
        const client = new TavilySearchClient(config.search.api_key, {
          onError: (query, error) => warn(`search failed for "${query}": ${error.message}`),
        });
        if (!client.enabled) {
          warn('web search disabled; set search.api_key or TAVILY_API_KEY');
        } else {
          const gathered = await gatherEvidence(client, file.company, file.failure_year, {
            maxResults: config.search.max_results,
            searchDepth: config.search.search_depth,
          });
          channels = mergeChannels(file.evidence, gathered.channels);
          macroStressScore = gathered.macroStressScore;
        }
      }

      const { providers, skipped } = buildCouncilProviders(config);
      for (const model of skipped) {
        warn(`skipping ${model}: provider credentials not configured`);
      }

      const orchestrator = new CouncilOrchestrator({
        cache: new MemoryCouncilCache({ maxEntries: config.council.cache_max_entries }),
        stageTimeoutMs: config.council.stage_timeout_ms,
      });

      let durationMs: number | undefined;
      let usedFallback = false;
      orchestrator.on('council:complete', event => {
        durationMs = event.durationMs;
        usedFallback = event.usedFallback;
      });

      const reporter = globalOpts.json
        ? undefined
        : new HeadlessReporter({ verbose: globalOpts.verbose }).attach(orchestrator);

      const input = toCouncilInput(file, {
        providers,
        channels,
        macroStressScore,
        synthesisProvider: options.synthesis ?? config.council.synthesis_provider,
      });

      let output: CouncilOutput;
      try {
        output = await orchestrator.run(input);
      } finally {
        reporter?.detach();
      }

      const written = writeCouncilReport({
        output,
        company: file.company,
        outputDir,
        format,
        evidence: input.evidenceBundle,
        failureYear: file.failure_year,
        durationMs,
      });

      if (globalOpts.json) {
        console.log(JSON.stringify({
          command: 'run',
          company: file.company.name,
          ticker: file.company.ticker,
          path: written.path,
          format: written.format,
          overallConfidence: output.overall_confidence,
          usedFallback,
          durationMs,
        }, null, 2));
      } else {
        console.log(chalk.dim(`  Output: ${written.path}`));
      }
    });
}
