import type { CategoryCatalog, CategoryDescriptor } from './definitions.js';
import { ConfigError, UnknownCategoryError } from '../../utils/errors.js';

export interface Category {
  /** Uppercase identifier */
  readonly name: string;
  /** Position in the catalog; used to break ordering ties */
  readonly index: number;
  readonly descriptor: CategoryDescriptor;
}

/**
 * Read-only view over a category catalog. Built once and handed to the sorter
 * and the reconciliation engine.
 */
export class CategoryRegistry {
  private readonly byName: ReadonlyMap<string, Category>;
  readonly categories: readonly Category[];

  constructor(catalog: CategoryCatalog) {
    const categories: Category[] = [];
    const byName = new Map<string, Category>();

    for (const [name, descriptor] of Object.entries<CategoryDescriptor>(catalog)) {
      if (!name || name !== name.toUpperCase()) {
        throw new ConfigError(`Category identifiers must be uppercase: '${name}'`, { name });
      }
      const category: Category = Object.freeze({ name, index: categories.length, descriptor });
      categories.push(category);
      byName.set(name, category);
    }

    for (const category of categories) {
      for (const prerequisite of category.descriptor.prerequisites) {
        if (!byName.has(prerequisite)) {
          throw new ConfigError(
            `Category '${category.name}' lists unknown prerequisite '${prerequisite}'`,
            { category: category.name, prerequisite }
          );
        }
      }
    }

    this.categories = Object.freeze(categories);
    this.byName = byName;
  }

  names(): string[] {
    return this.categories.map((category) => category.name);
  }

  /**
   * Case-insensitive lookup by identifier
   */
  lookup(name: string): Category {
    const category = this.byName.get(name.trim().toUpperCase());
    if (!category) {
      throw new UnknownCategoryError(name, this.names());
    }
    return category;
  }

  /**
   * Resolve requested names; an empty request means every category.
   * Duplicates collapse onto their first occurrence.
   */
  expand(names: readonly string[]): Category[] {
    if (names.length === 0) {
      return [...this.categories];
    }
    const seen = new Set<string>();
    const result: Category[] = [];
    for (const name of names) {
      const category = this.lookup(name);
      if (!seen.has(category.name)) {
        seen.add(category.name);
        result.push(category);
      }
    }
    return result;
  }

  prerequisitesOf(category: Category): Category[] {
    return category.descriptor.prerequisites.map((name) => this.lookup(name));
  }
}
