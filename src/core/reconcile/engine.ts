/**
 * Reconciliation engine: drives install, restore, backup and diff over the
 * ordered, enabled categories.
 *
 * Per category: before-install hooks, then every location, then after-install
 * hooks (hooks run for install only). Work is strictly sequential, and every
 * planned action is reported before it is attempted, so a failure leaves a
 * record of what ran and what was next. The first failure aborts the run;
 * categories already processed stay applied.
 */

import type { HookCommand } from '../categories/definitions.js';
import type { Category, CategoryRegistry } from '../categories/registry.js';
import { topologicalOrder } from '../categories/dependency-sorter.js';
import type { LocationResolver } from '../locations/location-resolver.js';
import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';
import { expandLocation } from './path-pairs.js';
import { formatLineDiff } from './line-diff.js';
import type {
  CategoryReport,
  HookPhase,
  HookRunner,
  PairDirection,
  PairMaterializer,
  PathPair,
  ReconcileOperation,
  ReconcileReport,
  TransferMode
} from './types.js';
import { exists, readTextFileOrEmpty } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface ReconciliationEngineOptions {
  registry: CategoryRegistry;
  resolver: LocationResolver;
  materializer: PairMaterializer;
  hookRunner: HookRunner;
  output?: OutputPort;
  /** Plan and report everything, but run no hook and touch no file */
  dryRun?: boolean;
}

export interface TransferOptions {
  mode?: TransferMode;
}

interface TransferPlan {
  operation: Exclude<ReconcileOperation, 'diff'>;
  direction: Exclude<PairDirection, 'compare'>;
  mode: TransferMode;
  runHooks: boolean;
}

export function describeTransfer(mode: TransferMode, pair: PathPair): string {
  const name = mode === 'symlink' ? 'symlink' : 'cp';
  return `${name}(src='${pair.source}', dst='${pair.destination}')`;
}

/**
 * Plan line for a hook; shows the resolved executable when one is known.
 */
export function describeHook(command: HookCommand, resolvedExecutable?: string): string {
  const [executable, ...rest] = command.args;
  const shown = [resolvedExecutable ?? executable, ...rest];
  return `run[${shown.map((arg) => `'${arg}'`).join(', ')}]`;
}

export class ReconciliationEngine {
  private readonly registry: CategoryRegistry;
  private readonly resolver: LocationResolver;
  private readonly materializer: PairMaterializer;
  private readonly hookRunner: HookRunner;
  private readonly output: OutputPort;
  readonly dryRun: boolean;

  constructor(options: ReconciliationEngineOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.materializer = options.materializer;
    this.hookRunner = options.hookRunner;
    this.output = options.output ?? consoleOutput;
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Repository -> OS, symlinks by default, with hooks.
   */
  async install(names: readonly string[], options: TransferOptions = {}): Promise<ReconcileReport> {
    return this.transfer(names, {
      operation: 'install',
      direction: 'to-system',
      mode: options.mode ?? 'symlink',
      runHooks: true
    });
  }

  /**
   * Repository -> OS, copies by default, without hooks.
   */
  async restore(names: readonly string[], options: TransferOptions = {}): Promise<ReconcileReport> {
    return this.transfer(names, {
      operation: 'restore',
      direction: 'to-system',
      mode: options.mode ?? 'copy',
      runHooks: false
    });
  }

  /**
   * OS -> repository copies, without hooks.
   */
  async backup(names: readonly string[]): Promise<ReconcileReport> {
    return this.transfer(names, {
      operation: 'backup',
      direction: 'to-repository',
      mode: 'copy',
      runHooks: false
    });
  }

  /**
   * Line differences between the repository and the OS, missing files read as
   * empty. Only categories with at least one difference are reported.
   */
  async diff(names: readonly string[]): Promise<ReconcileReport> {
    const report: ReconcileReport = { operation: 'diff', dryRun: this.dryRun, categories: [] };

    for (const category of this.enabledCategories(names)) {
      const categoryReport: CategoryReport = { name: category.name, actions: [] };

      for (const location of category.descriptor.locations) {
        const pairs = await expandLocation(this.resolver, location, 'compare');
        for (const pair of pairs) {
          const sourceText = await readTextFileOrEmpty(pair.source);
          const destinationText = await readTextFileOrEmpty(pair.destination);
          const patch = formatLineDiff(sourceText, destinationText, pair.source, pair.destination);
          if (!patch) {
            continue;
          }
          if (categoryReport.actions.length === 0) {
            this.output.step(category.name);
          }
          this.output.message(patch);
          categoryReport.actions.push({ kind: 'diff', pair, patch });
        }
      }

      if (categoryReport.actions.length > 0) {
        report.categories.push(categoryReport);
      }
    }

    return report;
  }

  private async transfer(names: readonly string[], plan: TransferPlan): Promise<ReconcileReport> {
    const report: ReconcileReport = { operation: plan.operation, dryRun: this.dryRun, categories: [] };

    for (const category of this.enabledCategories(names)) {
      const categoryReport: CategoryReport = { name: category.name, actions: [] };
      report.categories.push(categoryReport);
      this.output.step(category.name);

      if (plan.runHooks) {
        await this.runHooks(category.descriptor.beforeInstall, 'before', categoryReport);
      }

      for (const location of category.descriptor.locations) {
        const pairs = await expandLocation(this.resolver, location, plan.direction);
        for (const pair of pairs) {
          await this.transferPair(pair, plan.mode, categoryReport);
        }
      }

      if (plan.runHooks) {
        await this.runHooks(category.descriptor.afterInstall, 'after', categoryReport);
      }
    }

    return report;
  }

  /**
   * Ordering and name validation happen up front, so unknown names and
   * prerequisite cycles fail before any category is touched.
   */
  private enabledCategories(names: readonly string[]): Category[] {
    const ordered = topologicalOrder(this.registry, names);
    return ordered.filter((category) => {
      const disabled = this.resolver.isDisabled(category.descriptor);
      if (disabled) {
        logger.debug(`Skipping ${category.name}: no locations on ${this.resolver.os}`);
      }
      return !disabled;
    });
  }

  private async runHooks(commands: readonly HookCommand[], phase: HookPhase, report: CategoryReport): Promise<void> {
    for (const command of commands) {
      this.output.message(describeHook(command, await this.hookRunner.resolve(command)));
      if (this.dryRun) {
        report.actions.push({ kind: 'hook', phase, args: [...command.args] });
        continue;
      }

      const captured = await this.hookRunner.run(command);
      if (captured.trim()) {
        this.output.note(captured.trimEnd());
      }
      report.actions.push({ kind: 'hook', phase, args: [...command.args], output: captured });
    }
  }

  private async transferPair(pair: PathPair, mode: TransferMode, report: CategoryReport): Promise<void> {
    if (!(await exists(pair.source))) {
      this.output.warn(`skip: '${pair.source}' does not exist`);
      report.actions.push({ kind: 'missing-source', pair });
      return;
    }

    this.output.message(describeTransfer(mode, pair));
    if (this.dryRun) {
      report.actions.push({ kind: 'transfer', mode, pair });
      return;
    }

    if (await this.materializer.isSameFile(pair)) {
      this.output.info(`same file: '${pair.destination}' is already '${pair.source}'`);
      report.actions.push({ kind: 'same-file', pair });
      return;
    }

    await this.materializer.prepareParent(pair.destination);
    await this.materializer.replace(pair, mode);
    report.actions.push({ kind: 'transfer', mode, pair });
  }
}
