import { normalize, resolve, sep } from 'path';
import type { OperatingSystem, UndefinedVariablePolicy } from '../../types/index.js';
import type { CategoryDescriptor, Location } from '../categories/definitions.js';
import { isCategoryDisabled } from '../categories/definitions.js';
import { expandEnvironmentVariables, type Environment } from '../../utils/env-expansion.js';

export interface LocationResolverOptions {
  /** Absolute path of the dotfiles repository */
  repositoryRoot: string;
  os: OperatingSystem;
  /**
   * Supplies the environment for template expansion. Called on every
   * resolution; defaults to the live process environment.
   */
  environment?: () => Environment;
  undefinedVariables?: UndefinedVariablePolicy;
}

/**
 * Turns declared locations into absolute paths. Pure path computation: the
 * filesystem is never consulted.
 */
export class LocationResolver {
  readonly repositoryRoot: string;
  readonly os: OperatingSystem;
  private readonly environment: () => Environment;
  private readonly undefinedVariables: UndefinedVariablePolicy;

  constructor(options: LocationResolverOptions) {
    this.repositoryRoot = resolve(options.repositoryRoot);
    this.os = options.os;
    this.environment = options.environment ?? (() => process.env);
    this.undefinedVariables = options.undefinedVariables ?? 'empty';
  }

  resolveRepositorySide(location: Location): string {
    return resolve(this.repositoryRoot, location.repoPath);
  }

  /**
   * Absolute OS-side path, or undefined when the location has no path for this OS.
   */
  resolveSystemSide(location: Location): string | undefined {
    const template = location[this.os];
    if (!template) {
      return undefined;
    }
    const expanded = expandEnvironmentVariables(template, this.environment(), {
      undefinedVariables: this.undefinedVariables,
      percentVariables: this.os === 'windows'
    });
    return stripTrailingSeparator(normalize(expanded));
  }

  isDisabled(descriptor: CategoryDescriptor): boolean {
    return isCategoryDisabled(descriptor, this.os);
  }
}

function stripTrailingSeparator(path: string): string {
  let result = path;
  while (result.length > 1 && (result.endsWith(sep) || result.endsWith('/'))) {
    result = result.slice(0, -1);
  }
  return result;
}
