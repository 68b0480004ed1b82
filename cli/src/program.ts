import chalk from 'chalk';
import { Command } from 'commander';
import { registerInfoCommand } from './commands/info.js';
import { registerSplitCommand } from './commands/split.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('chapterize')
    .description('Split PDFs into chapter files at given start pages')
    .version(VERSION);

  registerSplitCommand(program);
  registerInfoCommand(program);

  return program;
}

/**
 * Ctrl-C between chapters: stop without writing further files.
 * Returns the listener so it can be removed again.
 */
export function installInterruptHandler(): () => void {
  const onInterrupt = (): void => {
    console.error(chalk.yellow('\nInterrupted'));
    process.exit(130);
  };
  process.on('SIGINT', onInterrupt);
  return onInterrupt;
}
