import chalk from 'chalk';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { buildSplitConfig, splitPdf } from '../core/pdf/index.js';
import type { SplitFile, SkippedRange } from '../core/pdf/index.js';
import { commandAction } from './action.js';
import { parsePageList } from './parsers.js';

const USAGE = 'Usage: chapterize split -i book.pdf -o chapters/ -p 1,10,20,30';

interface SplitCommandOptions {
  input?: string;
  output?: string;
  pages?: string;
  dryRun?: boolean;
  json?: boolean;
}

function requireOption(value: string | undefined, flag: string): string {
  if (value === undefined) {
    console.error(chalk.red(`Error: ${flag} is required`));
    console.error(chalk.dim(USAGE));
    process.exit(1);
  }
  return value;
}

export function registerSplitCommand(program: Command): void {
  // ── chapterize split ──────────────────────────────────────────
  program
    .command('split')
    .description(
      'Split a PDF into chapter files at the given start pages.\n' +
      'Pages 1,10,20,30 on a 100-page PDF → 1-9, 10-19, 20-29, 30-100.',
    )
    .option('-i, --input <file>', 'Input PDF file path (required)')
    .option('-o, --output <dir>', 'Output directory, created if missing (required)')
    .option('-p, --pages <list>', 'Chapter start pages, comma-separated (e.g. 1,10,20,30) (required)')
    .option('--dry-run', 'Show the chapters that would be written — do not write files')
    .option('--json', 'Output as JSON')
    .action(commandAction(async (opts: SplitCommandOptions) => {
      // ── Validate inputs ──
      const input = requireOption(opts.input, '--input');
      const output = requireOption(opts.output, '--output');
      const pages = requireOption(opts.pages, '--pages');

      const breakPages = parsePageList(pages);
      const config = buildSplitConfig(resolve(input), resolve(output), breakPages);
      const verb = opts.dryRun ? 'Would create' : 'Created';

      const result = await splitPdf(config, {
        dryRun: opts.dryRun,
        onFile: (file: SplitFile) => {
          if (!opts.json) {
            console.log(chalk.green(`${verb}: ${file.path} (pages ${file.start}-${file.end})`));
          }
        },
        onSkip: (skipped: SkippedRange) => {
          console.error(chalk.yellow(`Warning: Page ${skipped.page} is out of range. Skipping.`));
        },
      });

      if (opts.json) {
        console.log(JSON.stringify({ dryRun: Boolean(opts.dryRun), ...result }, null, 2));
        return;
      }

      console.log('');
      if (opts.dryRun) {
        console.log(chalk.bold(`Dry run: ${result.files.length} file(s) would be created`));
      } else {
        console.log(chalk.bold(`Split complete: ${result.files.length} file(s) created`));
      }
    }));
}
