import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import type { ReconcileReport, TransferMode } from '../core/reconcile/types.js';
import { reportSummary } from '../core/reconcile/reporter.js';
import { createCliContext } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface InstallCommandOptions {
  dryRun?: boolean;
  cp?: boolean;
}

async function installCommand(
  categories: string[],
  options: InstallCommandOptions,
  command: Command
): Promise<CommandResult<ReconcileReport>> {
  const { engine, output } = await createCliContext(command, { dryRun: options.dryRun });
  const mode: TransferMode = options.cp ? 'copy' : 'symlink';
  logger.debug('Installing categories', { categories, mode, dryRun: options.dryRun });

  const report = await engine.install(categories, { mode });
  reportSummary(report, output);
  return { success: true, data: report };
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description('Link files from the repository into place and run each category\'s install hooks. Prerequisites are installed first.')
    .argument('[categories...]', 'categories to install (case-insensitive); all when omitted')
    .option('--dry-run', 'print the planned actions without running hooks or touching files')
    .option('--cp', 'copy files instead of symlinking them')
    .action(withErrorHandling(async (categories: string[], options: InstallCommandOptions, command: Command) => {
      await installCommand(categories, options, command);
    }));
}
