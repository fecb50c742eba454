#!/usr/bin/env node

import chalk from 'chalk';
import { ConfigError } from './config/index.js';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`Config error: ${error.message}`));
    } else {
      console.error(error);
    }
    process.exit(1);
  });
