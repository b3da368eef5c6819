/**
 * Prerequisite ordering for categories.
 *
 * Two phases, kept apart so each can be exercised on its own:
 *   1. discoverPrerequisiteEdges: walk from the requested categories and collect
 *      every (prerequisite -> dependent) edge reachable from them.
 *   2. sortTopologically: order the collected nodes so each prerequisite comes
 *      before its dependents; ties go to catalog declaration order.
 */

import type { Category, CategoryRegistry } from './registry.js';
import { CyclicDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface PrerequisiteEdge {
  readonly prerequisite: Category;
  readonly dependent: Category;
}

export interface PrerequisiteGraph {
  /** Requested categories plus everything they transitively require, in visit order */
  readonly nodes: readonly Category[];
  readonly edges: readonly PrerequisiteEdge[];
}

export function discoverPrerequisiteEdges(
  registry: CategoryRegistry,
  requestedNames: readonly string[]
): PrerequisiteGraph {
  const visited = new Set<string>();
  const nodes: Category[] = [];
  const edges: PrerequisiteEdge[] = [];
  const toVisit = registry.expand(requestedNames).reverse();

  while (toVisit.length > 0) {
    const category = toVisit.pop();
    if (!category || visited.has(category.name)) {
      continue;
    }
    visited.add(category.name);
    nodes.push(category);

    const prerequisites = registry.prerequisitesOf(category);
    for (const prerequisite of prerequisites) {
      edges.push({ prerequisite, dependent: category });
    }
    // Reverse so the first declared prerequisite is explored first
    for (const prerequisite of [...prerequisites].reverse()) {
      if (!visited.has(prerequisite.name)) {
        toVisit.push(prerequisite);
      }
    }
  }

  return { nodes, edges };
}

/**
 * Kahn's algorithm. Throws CyclicDependencyError when the edges contain a cycle.
 */
export function sortTopologically(graph: PrerequisiteGraph): Category[] {
  const remainingPrerequisites = new Map<string, number>();
  const dependentsOf = new Map<string, Category[]>();

  for (const node of graph.nodes) {
    remainingPrerequisites.set(node.name, 0);
    dependentsOf.set(node.name, []);
  }

  const seenEdges = new Set<string>();
  for (const { prerequisite, dependent } of graph.edges) {
    const key = `${prerequisite.name}->${dependent.name}`;
    if (seenEdges.has(key)) continue;
    seenEdges.add(key);

    remainingPrerequisites.set(dependent.name, (remainingPrerequisites.get(dependent.name) ?? 0) + 1);
    if (!remainingPrerequisites.has(prerequisite.name)) {
      remainingPrerequisites.set(prerequisite.name, 0);
    }
    const dependents = dependentsOf.get(prerequisite.name) ?? [];
    dependents.push(dependent);
    dependentsOf.set(prerequisite.name, dependents);
  }

  const ready = graph.nodes.filter((node) => remainingPrerequisites.get(node.name) === 0);
  const order: Category[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => a.index - b.index);
    const next = ready.shift();
    if (!next) break;
    order.push(next);

    for (const dependent of dependentsOf.get(next.name) ?? []) {
      const count = (remainingPrerequisites.get(dependent.name) ?? 0) - 1;
      remainingPrerequisites.set(dependent.name, count);
      if (count === 0) {
        ready.push(dependent);
      }
    }
  }

  if (order.length < graph.nodes.length) {
    const blocked = graph.nodes.filter((node) => (remainingPrerequisites.get(node.name) ?? 0) > 0);
    throw new CyclicDependencyError(findCycle(blocked, graph.edges));
  }

  return order;
}

/**
 * Follow unresolved prerequisite edges from the first blocked node until a
 * node repeats. Every blocked node has at least one blocked prerequisite.
 */
function findCycle(blocked: readonly Category[], edges: readonly PrerequisiteEdge[]): string[] {
  const blockedNames = new Set(blocked.map((node) => node.name));
  const start = [...blocked].sort((a, b) => a.index - b.index)[0];
  if (!start) {
    return [];
  }

  const path: string[] = [];
  let current: string = start.name;
  while (!path.includes(current)) {
    path.push(current);
    const name = current;
    const prerequisite = edges
      .filter((edge) => edge.dependent.name === name && blockedNames.has(edge.prerequisite.name))
      .map((edge) => edge.prerequisite)
      .sort((a, b) => a.index - b.index)[0];
    if (!prerequisite) {
      return path;
    }
    current = prerequisite.name;
  }

  return [...path.slice(path.indexOf(current)), current];
}

/**
 * Requested categories plus their transitive prerequisites, prerequisites first
 */
export function topologicalOrder(registry: CategoryRegistry, requestedNames: readonly string[]): Category[] {
  const graph = discoverPrerequisiteEdges(registry, requestedNames);
  const order = sortTopologically(graph);
  logger.debug('Resolved category order', { requested: requestedNames, order: order.map((c) => c.name) });
  return order;
}
