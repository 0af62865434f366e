#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for edit-assist.
 * Commands run against a JSON project document and the shared settings file.
 */

// Must load first: sets LOG_LEVEL/NODE_ENV before any logger is created
import './config/env.js';

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { alignCommand } from './commands/align.js';
import { qcCommand } from './commands/qc.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('edit-assist')
  .description('Multitrack conform and timeline QC for editorial projects')
  .version('0.1.0');

program
  .command('align')
  .description('Place multitrack recordings under the reference timeline audio')
  .requiredOption('-p, --project <file>', 'Project document (JSON)')
  .option('-i, --interactive', 'Prompt for settings and the multitrack bin')
  .option('-n, --dry-run', 'Match clips and print the summary without placing anything')
  .action(alignCommand);

program
  .command('qc')
  .description('Check the current timeline for gaps, overlaps, flash frames and offline media')
  .requiredOption('-p, --project <file>', 'Project document (JSON)')
  .option('-i, --interactive', 'Prompt for QC settings before the run')
  .option('-g, --goto <n>', 'Move the playhead to issue number n after the report')
  .action(qcCommand);

program
  .command('config [key] [value]')
  .description('View or modify settings')
  .option('--list', 'List all settings')
  .option('--reset', 'Reset to defaults')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('edit-assist --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
