#!/usr/bin/env node
import chalk from 'chalk';
import { createProgram } from './program.js';
import { errorMessage } from './core/errors.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red(`❌ Error: ${errorMessage(error)}`));
    process.exitCode = 1;
  });
