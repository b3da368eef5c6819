/**
 * Declarative building blocks of the category table.
 *
 * Every value produced here is frozen: the table is built once at startup and
 * only read afterwards.
 */

import { isAbsolute } from 'path';
import type { OperatingSystem } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * A file or directory tracked in the repository, and where it lives on each OS.
 * Whether it is a file or a directory is decided by the filesystem when an
 * operation runs.
 */
export interface Location {
  /** Path relative to the repository root; never empty */
  readonly repoPath: string;
  readonly linux?: string;
  readonly darwin?: string;
  readonly windows?: string;
}

export type LocationTemplates = Partial<Record<OperatingSystem, string>>;

/**
 * A hook invocation. `args[0]` is a logical executable name looked up on PATH
 * when the hook runs.
 */
export interface HookCommand {
  readonly args: readonly [string, ...string[]];
}

export interface CategoryDescriptor<N extends string = string> {
  readonly prerequisites: readonly N[];
  readonly beforeInstall: readonly HookCommand[];
  readonly locations: readonly Location[];
  readonly afterInstall: readonly HookCommand[];
}

export interface CategoryDefinition<N extends string = string> {
  prerequisites?: readonly N[];
  beforeInstall?: readonly HookCommand[];
  locations?: readonly Location[];
  afterInstall?: readonly HookCommand[];
}

/**
 * The closed set of categories: keys are the (uppercase) category identifiers.
 */
export type CategoryCatalog<N extends string = string> = Readonly<Record<N, CategoryDescriptor<N>>>;

export function defineLocation(repoPath: string, templates: LocationTemplates = {}): Location {
  if (!repoPath) {
    throw new ValidationError('location repoPath must not be empty');
  }
  if (isAbsolute(repoPath)) {
    throw new ValidationError(`location repoPath must be relative to the repository: ${repoPath}`, { repoPath });
  }
  return Object.freeze({ repoPath, ...templates });
}

export function defineCommand(...args: string[]): HookCommand {
  const [executable, ...rest] = args;
  if (!executable) {
    throw new ValidationError('hook command needs at least an executable name');
  }
  const commandArgs: [string, ...string[]] = [executable, ...rest];
  Object.freeze(commandArgs);
  return Object.freeze({ args: commandArgs });
}

export function defineCategory<N extends string>(definition: CategoryDefinition<N> = {}): CategoryDescriptor<N> {
  return Object.freeze({
    prerequisites: Object.freeze([...(definition.prerequisites ?? [])]),
    beforeInstall: Object.freeze([...(definition.beforeInstall ?? [])]),
    locations: Object.freeze([...(definition.locations ?? [])]),
    afterInstall: Object.freeze([...(definition.afterInstall ?? [])])
  });
}

/**
 * A category has nothing to do on an OS when none of its locations declares a
 * path for it.
 */
export function isCategoryDisabled(descriptor: CategoryDescriptor, os: OperatingSystem): boolean {
  return descriptor.locations.every((location) => !location[os]);
}
