import { Command, Option } from 'commander';
import { DEFAULT_CONFIG } from '@twinblocks/core';
import { csvList, integerAtLeast } from './options.js';
import { handleScanCommand, type ScanOptions } from './dupes.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('twinblocks')
    .description('Find repeated blocks of normalized source lines across a repository')
    .version(VERSION)
    .option('--root <path>', 'Project root to scan', '.')
    .option('--window <lines>', 'Normalized lines per block', integerAtLeast(1), DEFAULT_CONFIG.window)
    .option('--min-chars <chars>', 'Minimum normalized chars per block', integerAtLeast(0), DEFAULT_CONFIG.minChars)
    .option(
      '--extensions <list>',
      'Comma-separated file extensions to scan',
      csvList,
      [...DEFAULT_CONFIG.extensions]
    )
    .option(
      '--exclude-dirs <list>',
      'Comma-separated directory names to exclude',
      csvList,
      [...DEFAULT_CONFIG.excludedDirs]
    )
    .addOption(
      new Option('--exclude-paths <list>', 'Comma-separated globs of root-relative paths to skip').argParser(csvList)
    )
    .option('--top <count>', 'Max duplicate groups to print', integerAtLeast(0), DEFAULT_CONFIG.top)
    .option('--json', 'Output the report as JSON')
    .action(async (options: ScanOptions) => {
      await handleScanCommand(options);
    });

  return program;
}
