import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { initCommand } from './init.js';
import { getConfig, type GlobalOptions } from '../context.js';
import { setConfigValue, getConfigPath, maskConfig } from '../config/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage autopsy configuration');

  config
    .command('init')
    .description('Write a commented config file to ~/.autopsy/config.yaml')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      initCommand({ configPath: globalOpts.config });
    });

  config
    .command('show')
    .description('Show the resolved configuration (API keys masked)')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = maskConfig(getConfig());

      if (globalOpts.json) {
        console.log(JSON.stringify(cfg, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:\n'));
        console.log(stringify(cfg));
        console.log(chalk.dim(`Config: ${getConfigPath(globalOpts.config)}`));
      }
    });

  config
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key (dot-notation, e.g. council.synthesis_provider)')
    .argument('<value>', 'Value to set')
    .action((key: string, value: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      setConfigValue(key, value, { configPath: globalOpts.config });

      console.log(chalk.green(`Set ${chalk.bold(key)} = ${chalk.bold(value)}`));
      console.log(chalk.dim(`Config: ${getConfigPath(globalOpts.config)}`));
    });
}
