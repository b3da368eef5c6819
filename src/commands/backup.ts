import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import type { ReconcileReport } from '../core/reconcile/types.js';
import { reportSummary } from '../core/reconcile/reporter.js';
import { createCliContext } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';

interface BackupCommandOptions {
  dryRun?: boolean;
}

async function backupCommand(
  categories: string[],
  options: BackupCommandOptions,
  command: Command
): Promise<CommandResult<ReconcileReport>> {
  const { engine, output } = await createCliContext(command, { dryRun: options.dryRun });

  const report = await engine.backup(categories);
  reportSummary(report, output);
  return { success: true, data: report };
}

export function setupBackupCommand(program: Command): void {
  program
    .command('backup')
    .description('Copy files from their system locations back into the repository.')
    .argument('[categories...]', 'categories to back up (case-insensitive); all when omitted')
    .option('--dry-run', 'print the planned actions without touching files')
    .action(withErrorHandling(async (categories: string[], options: BackupCommandOptions, command: Command) => {
      await backupCommand(categories, options, command);
    }));
}
