import { Command } from 'commander';
import c from 'picocolors';

import type { CommandResult } from '../types/index.js';
import type { Category } from '../core/categories/registry.js';
import type { LocationResolver } from '../core/locations/location-resolver.js';
import { topologicalOrder } from '../core/categories/dependency-sorter.js';
import { createCliContext } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';
import { normalizePathWithTilde } from '../utils/home-directory.js';

export interface ListedLocation {
  repository: string;
  system: string | undefined;
}

export interface ListedCategory {
  name: string;
  prerequisites: string[];
  enabled: boolean;
  locations: ListedLocation[];
}

export function describeCategory(category: Category, resolver: LocationResolver): ListedCategory {
  return {
    name: category.name,
    prerequisites: [...category.descriptor.prerequisites],
    enabled: !resolver.isDisabled(category.descriptor),
    locations: category.descriptor.locations.map((location) => ({
      repository: resolver.resolveRepositorySide(location),
      system: resolver.resolveSystemSide(location)
    }))
  };
}

export function formatListedCategory(listed: ListedCategory): string {
  const header = listed.enabled ? c.bold(listed.name) : `${c.bold(listed.name)} ${c.dim('(disabled)')}`;
  const lines = [header];
  if (listed.prerequisites.length > 0) {
    lines.push(c.dim(`  requires ${listed.prerequisites.join(', ')}`));
  }
  for (const location of listed.locations) {
    const system = location.system === undefined ? c.dim('-') : normalizePathWithTilde(location.system);
    lines.push(`  ${normalizePathWithTilde(location.repository)} ${c.dim('->')} ${system}`);
  }
  return lines.join('\n');
}

async function listCommand(categories: string[], command: Command): Promise<CommandResult<ListedCategory[]>> {
  const { registry, resolver, output, os } = await createCliContext(command);

  const listed = topologicalOrder(registry, categories).map((category) => describeCategory(category, resolver));
  output.info(`Categories on ${os}, in install order:`);
  for (const entry of listed) {
    output.message(formatListedCategory(entry));
  }
  return { success: true, data: listed };
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List categories in install order with their prerequisites and resolved locations.')
    .argument('[categories...]', 'categories to list, with their prerequisites; all when omitted')
    .action(withErrorHandling(async (categories: string[], _options: object, command: Command) => {
      await listCommand(categories, command);
    }));
}
