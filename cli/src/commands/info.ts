import chalk from 'chalk';
import { existsSync, statSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { Command } from 'commander';
import { getPageCount, NotFoundError } from '../core/pdf/index.js';
import { commandAction } from './action.js';

export function registerInfoCommand(program: Command): void {
  program
    .command('info <file>')
    .description('Show the page count of a PDF (use it to pick chapter start pages)')
    .option('--json', 'Output as JSON')
    .action(commandAction(async (file: string, opts: { json?: boolean }) => {
      const filePath = resolve(file);
      if (!existsSync(filePath) || !statSync(filePath).isFile()) {
        throw new NotFoundError(`Input file '${filePath}' not found`);
      }

      const pageCount = await getPageCount(filePath);

      if (opts.json) {
        console.log(JSON.stringify({ file: basename(filePath), pageCount }, null, 2));
      } else {
        console.log(`${chalk.bold('File:')} ${basename(filePath)}`);
        console.log(`${chalk.bold('Pages:')} ${pageCount}`);
      }
    }));
}
