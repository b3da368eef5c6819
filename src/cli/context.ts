/**
 * CLI Context Factory
 *
 * Wires configuration, the built-in catalog and the CLI-specific output port
 * into a ReconciliationEngine. Command handlers use this instead of
 * constructing the engine themselves.
 */

import type { Command } from 'commander';
import type { DotkeeperConfig, OperatingSystem } from '../types/index.js';
import { loadConfig, getScratchDirectory } from '../core/config.js';
import { detectOperatingSystem } from '../core/platform.js';
import { buildDefaultCatalog } from '../core/categories/catalog.js';
import { CategoryRegistry } from '../core/categories/registry.js';
import { LocationResolver } from '../core/locations/location-resolver.js';
import { AtomicPairMaterializer } from '../core/reconcile/file-materializer.js';
import { ProcessHookRunner } from '../core/reconcile/hook-runner.js';
import { ReconciliationEngine } from '../core/reconcile/engine.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions {
  dryRun?: boolean;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

export interface CliContext {
  config: DotkeeperConfig;
  os: OperatingSystem;
  registry: CategoryRegistry;
  resolver: LocationResolver;
  output: OutputPort;
  engine: ReconciliationEngine;
}

/** Cached port for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return consoleOutput;
}

/**
 * Global options live on the root program; subcommands reach them via parent.
 */
function repositoryFlag(command: Command): string | undefined {
  const value: unknown = command.parent?.opts().repository;
  return typeof value === 'string' ? value : undefined;
}

export async function createCliContext(command: Command, options: CliContextOptions = {}): Promise<CliContext> {
  const config = await loadConfig({ flags: { repository: repositoryFlag(command) } });
  const os = detectOperatingSystem();
  const registry = new CategoryRegistry(buildDefaultCatalog(config.repository));
  const resolver = new LocationResolver({
    repositoryRoot: config.repository,
    os,
    undefinedVariables: config.undefinedVariables
  });
  const output = getCliOutput(detectInteractive(options.interactive));

  const engine = new ReconciliationEngine({
    registry,
    resolver,
    materializer: new AtomicPairMaterializer(getScratchDirectory(config)),
    hookRunner: new ProcessHookRunner(),
    output,
    dryRun: options.dryRun
  });

  return { config, os, registry, resolver, output, engine };
}
