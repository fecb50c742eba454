import { Command } from 'commander';
import chalk from 'chalk';
import { TavilySearchClient } from '@autopsy/tools';
import { getConfig, type GlobalOptions } from '../context.js';
import { buildCouncilProviders } from '../providers.js';
import { verifyCompany } from '../followup.js';

interface VerifyOptions {
  ticker?: string;
  year?: string;
}

const LABEL_COLORS = {
  failed: chalk.red,
  not_failed: chalk.green,
  unclear: chalk.yellow,
} as const;

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check from web evidence whether a company actually failed')
    .argument('<company>', 'Company name')
    .option('-t, --ticker <ticker>', 'Ticker symbol')
    .option('--year <year>', 'Suspected failure year')
    .action(async (company: string, options: VerifyOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      const year = options.year ? Number.parseInt(options.year, 10) : undefined;
      const failureYear = year !== undefined && Number.isFinite(year) ? year : undefined;

      const search = new TavilySearchClient(config.search.api_key);
      if (!search.enabled && !globalOpts.json) {
        console.error(chalk.yellow('  Warning: web search disabled; set search.api_key or TAVILY_API_KEY'));
      }

      const { providers } = buildCouncilProviders(config);
      const result = await verifyCompany({
        companyInput: company,
        profile: { name: company, ticker: (options.ticker ?? '').toUpperCase() },
        search,
        verifier: providers.primary ?? providers.secondary,
        failureYear,
      });

      if (globalOpts.json) {
        console.log(JSON.stringify({ company, ...result }, null, 2));
        return;
      }

      const { status } = result;
      const color = LABEL_COLORS[status.status_label];
      console.log('');
      console.log(`${chalk.bold(company)}: ${color.bold(status.status_label)} ${chalk.dim(`(confidence ${Math.round(status.confidence * 100)}%, ${status.model_used})`)}`);
      console.log(status.reason);
      for (const line of status.evidence) {
        console.log(chalk.dim(`  - ${line}`));
      }
      if (globalOpts.verbose) {
        for (const url of result.sources) console.log(chalk.dim(`  ${url}`));
      }
      if (result.error) {
        console.error(chalk.yellow(`  Keyword fallback (${result.error})`));
      }
      console.log('');
    });
}
