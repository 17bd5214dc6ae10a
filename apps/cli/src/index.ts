#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for encode-spec.
 * Resolves specification strings and prints the resulting outputs;
 * it never runs an encoder.
 */

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { resolveCommand } from './commands/resolve.js';
import { encodersCommand } from './commands/encoders.js';
import { filtersCommand } from './commands/filters.js';

const program = new Command();

program
  .name('encode-spec')
  .description('Resolve encode-job specification strings')
  .version('1.0.0');

program
  .command('resolve <source> [formats]')
  .description('Resolve the outputs a specification describes for a source file')
  .option('--json', 'Output in JSON format')
  .option('-o, --output-dir <dir>', 'Directory the output paths point into')
  .action(resolveCommand);

program
  .command('encoders')
  .description('List supported video and audio encoders')
  .option('--json', 'Output in JSON format')
  .action(encodersCommand);

program
  .command('filters')
  .description('Show the specification syntax')
  .action(filtersCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('encode-spec --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
program.parse();
