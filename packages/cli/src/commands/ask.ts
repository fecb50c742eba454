import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseCouncilReport, type JsonOutput } from '@autopsy/core';
import { TavilySearchClient } from '@autopsy/tools';
import { getConfig, type GlobalOptions } from '../context.js';
import { buildCouncilProviders } from '../providers.js';
import { askReport } from '../followup.js';

interface AskOptions {
  search?: boolean;
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Answer a follow-up question about a saved JSON report')
    .argument('<report>', 'Report written by "autopsy run -o json"')
    .argument('<question>', 'Question about the report')
    .option('--no-search', 'Answer from the report alone, without web evidence')
    .action(async (reportPath: string, question: string, options: AskOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      let document: JsonOutput;
      try {
        document = parseCouncilReport(readFileSync(resolve(reportPath), 'utf-8'));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(globalOpts.json ? JSON.stringify({ error: message }) : chalk.red(message));
        process.exitCode = 1;
        return;
      }

      const { providers } = buildCouncilProviders(config);
      const search = options.search === false ? undefined : new TavilySearchClient(config.search.api_key);
      const result = await askReport({
        document,
        question,
        answerer: providers.primary ?? providers.secondary,
        search,
      });

      if (globalOpts.json) {
        console.log(JSON.stringify({ question, ...result.answer, source: result.source, error: result.error }, null, 2));
        return;
      }

      console.log('');
      console.log(chalk.bold(result.answer.answer));
      if (result.answer.rationale) console.log(`\n${chalk.dim('Why:')} ${result.answer.rationale}`);
      if (result.answer.caveat) console.log(chalk.dim(`Caveat: ${result.answer.caveat}`));
      if (result.answer.confidence) console.log(chalk.dim(`Confidence: ${result.answer.confidence}`));
      if (result.source === 'heuristic' && result.error) {
        console.error(chalk.yellow(`  Heuristic answer (${result.error})`));
      }
      if (globalOpts.verbose && result.webEvidence.length > 0) {
        console.log(chalk.dim(`\n${result.webEvidence.length} web snippets consulted.`));
      }
      console.log('');
    });
}
