#!/usr/bin/env node
import chalk from 'chalk';
import { createProgram, installInterruptHandler } from './program.js';
import { formatError } from './commands/action.js';

installInterruptHandler();

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(`Error: ${formatError(err)}`));
  process.exit(1);
});
