import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import type { ReconcileReport } from '../core/reconcile/types.js';
import { reportSummary } from '../core/reconcile/reporter.js';
import { createCliContext } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';

interface DiffCommandOptions {
  dryRun?: boolean;
}

async function diffCommand(
  categories: string[],
  options: DiffCommandOptions,
  command: Command
): Promise<CommandResult<ReconcileReport>> {
  const { engine, output } = await createCliContext(command, { dryRun: options.dryRun });

  const report = await engine.diff(categories);
  reportSummary(report, output);
  return { success: true, data: report };
}

export function setupDiffCommand(program: Command): void {
  program
    .command('diff')
    .description('Show line differences between repository files and their system locations.')
    .argument('[categories...]', 'categories to compare (case-insensitive); all when omitted')
    .option('--dry-run', 'accepted for symmetry with the other commands; diff never touches files')
    .action(withErrorHandling(async (categories: string[], options: DiffCommandOptions, command: Command) => {
      await diffCommand(categories, options, command);
    }));
}
