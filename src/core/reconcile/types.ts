/**
 * Types shared by the reconciliation engine and its collaborators
 */

import type { HookCommand } from '../categories/definitions.js';

export type ReconcileOperation = 'install' | 'backup' | 'restore' | 'diff';

/** How a destination is produced from its source */
export type TransferMode = 'symlink' | 'copy';

/**
 * Which side a location is walked from and which way files move.
 * - to-system: repository -> OS (install, restore)
 * - to-repository: OS -> repository (backup)
 * - compare: repository vs OS, both sides walked (diff)
 */
export type PairDirection = 'to-system' | 'to-repository' | 'compare';

export interface PathPair {
  readonly source: string;
  readonly destination: string;
}

export type HookPhase = 'before' | 'after';

export type ReconcileAction =
  | { kind: 'hook'; phase: HookPhase; args: string[]; output?: string }
  | { kind: 'transfer'; mode: TransferMode; pair: PathPair }
  | { kind: 'same-file'; pair: PathPair }
  | { kind: 'missing-source'; pair: PathPair }
  | { kind: 'diff'; pair: PathPair; patch: string };

export interface CategoryReport {
  name: string;
  actions: ReconcileAction[];
}

export interface ReconcileReport {
  operation: ReconcileOperation;
  dryRun: boolean;
  categories: CategoryReport[];
}

/**
 * Runs a hook to completion and returns its combined stdout/stderr.
 * Rejects with HookExecutionError on a non-zero exit or unresolvable executable.
 */
export interface HookRunner {
  /** Absolute path of the executable, or undefined when it is not on PATH */
  resolve(command: HookCommand): Promise<string | undefined>;
  run(command: HookCommand): Promise<string>;
}

/**
 * Filesystem side of a transfer.
 */
export interface PairMaterializer {
  /** True when both paths exist and resolve to the same file */
  isSameFile(pair: PathPair): Promise<boolean>;
  /** Create the destination's missing parent directories (owner-only) */
  prepareParent(destination: string): Promise<void>;
  /** Atomically replace the destination with a symlink to, or a copy of, the source */
  replace(pair: PathPair, mode: TransferMode): Promise<void>;
}
