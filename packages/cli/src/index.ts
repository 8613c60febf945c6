#!/usr/bin/env node

import chalk from 'chalk';
import { InvalidInputError } from '@corroborate/core';
import { ConfigError } from './config/index.js';
import { createProgram } from './program.js';

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Config error: ${error.message}`));
    process.exit(1);
  }
  if (error instanceof InvalidInputError) {
    console.error(chalk.red(`Invalid input: ${error.message}`));
    process.exit(1);
  }
  console.error(error);
  process.exit(1);
});
