#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupRestoreCommand } from './commands/restore.js';
import { setupBackupCommand } from './commands/backup.js';
import { setupDiffCommand } from './commands/diff.js';
import { setupListCommand } from './commands/list.js';

/**
 * dotkeeper CLI - Main entry point
 *
 * Keeps a dotfiles repository and the files on this machine in step,
 * one category at a time.
 */

const program = new Command();

program
  .name('dotkeeper')
  .description('Install, back up, restore and diff dotfiles by category')
  .version(getVersion())
  .option('--repository <dir>', 'dotfiles repository (default: $DOTKEEPER_REPOSITORY, config file, or ~/.dotfiles)')
  .configureHelp({ sortSubcommands: true });

setupInstallCommand(program);
setupRestoreCommand(program);
setupBackupCommand(program);
setupDiffCommand(program);
setupListCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Set DOTKEEPER_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Set DOTKEEPER_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('dotkeeper')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
