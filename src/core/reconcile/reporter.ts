import type { OutputPort } from '../ports/output.js';
import type { ReconcileReport } from './types.js';

export interface ReportCounts {
  categories: number;
  transferred: number;
  unchanged: number;
  skipped: number;
  hooks: number;
  differences: number;
}

export function countActions(report: ReconcileReport): ReportCounts {
  const counts: ReportCounts = {
    categories: report.categories.length,
    transferred: 0,
    unchanged: 0,
    skipped: 0,
    hooks: 0,
    differences: 0
  };

  for (const category of report.categories) {
    for (const action of category.actions) {
      switch (action.kind) {
        case 'transfer':
          counts.transferred++;
          break;
        case 'same-file':
          counts.unchanged++;
          break;
        case 'missing-source':
          counts.skipped++;
          break;
        case 'hook':
          counts.hooks++;
          break;
        case 'diff':
          counts.differences++;
          break;
      }
    }
  }
  return counts;
}

function plural(count: number, noun: string, nounPlural = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : nounPlural}`;
}

/**
 * One-line summary printed after a command completes.
 */
export function formatSummary(report: ReconcileReport): string {
  const counts = countActions(report);

  if (report.operation === 'diff') {
    return counts.differences === 0
      ? 'No differences'
      : `${plural(counts.differences, 'file')} with differences in ${plural(counts.categories, 'category', 'categories')}`;
  }

  const parts = [`${plural(counts.transferred, 'file')} ${report.dryRun ? 'planned' : 'written'}`];
  if (counts.unchanged > 0) parts.push(`${counts.unchanged} unchanged`);
  if (counts.skipped > 0) parts.push(`${counts.skipped} skipped`);
  if (counts.hooks > 0) parts.push(plural(counts.hooks, 'hook'));

  const prefix = report.dryRun ? '(dry run) ' : '';
  return `${prefix}${report.operation}: ${parts.join(', ')}`;
}

export function reportSummary(report: ReconcileReport, output: OutputPort): void {
  output.success(formatSummary(report));
}
