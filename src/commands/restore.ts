import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import type { ReconcileReport, TransferMode } from '../core/reconcile/types.js';
import { reportSummary } from '../core/reconcile/reporter.js';
import { createCliContext } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';

interface RestoreCommandOptions {
  dryRun?: boolean;
  symlink?: boolean;
}

async function restoreCommand(
  categories: string[],
  options: RestoreCommandOptions,
  command: Command
): Promise<CommandResult<ReconcileReport>> {
  const { engine, output } = await createCliContext(command, { dryRun: options.dryRun });
  const mode: TransferMode = options.symlink ? 'symlink' : 'copy';

  const report = await engine.restore(categories, { mode });
  reportSummary(report, output);
  return { success: true, data: report };
}

export function setupRestoreCommand(program: Command): void {
  program
    .command('restore')
    .description('Copy files from the repository into place. Hooks are not run.')
    .argument('[categories...]', 'categories to restore (case-insensitive); all when omitted')
    .option('--dry-run', 'print the planned actions without touching files')
    .option('--symlink', 'symlink files instead of copying them')
    .action(withErrorHandling(async (categories: string[], options: RestoreCommandOptions, command: Command) => {
      await restoreCommand(categories, options, command);
    }));
}
