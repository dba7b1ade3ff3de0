/**
 * Bounded enumeration of elementary cycles.
 *
 * For each start node (in identity order) a depth-first search follows only
 * nodes of the same strongly connected component that sort after the start,
 * so every cycle is found exactly once, rotated to begin at its lowest
 * identity. Cost per component is O(c * b^L) for c members, branching b and
 * length bound L.
 */
import { successors } from '../graph/builder.js';
import { compareIdentity, sortIdentities } from '../graph/order.js';
import type { DependencyGraph } from '../graph/types.js';
import { findStronglyConnectedComponents } from './detector.js';
import type { Cycle, ElementaryCycleOptions } from './types.js';

export const DEFAULT_MAX_CYCLE_LENGTH = 8;

export function enumerateElementaryCycles(
  graph: DependencyGraph,
  options: ElementaryCycleOptions = { maxLength: DEFAULT_MAX_CYCLE_LENGTH }
): Cycle[] {
  const maxLength = Math.max(1, Math.floor(options.maxLength));
  const componentOf = new Map<string, number>();
  findStronglyConnectedComponents(graph).forEach((component, i) => {
    for (const id of component) componentOf.set(id, i);
  });

  const cycles: Cycle[] = [];

  for (const start of sortIdentities(graph.nodes.map((n) => n.id))) {
    const component = componentOf.get(start);
    const path: string[] = [start];
    const onPath = new Set<string>([start]);

    const visit = (current: string): void => {
      for (const next of sortIdentities(successors(graph, current))) {
        if (next === start) {
          cycles.push([...path]);
          continue;
        }
        if (
          path.length >= maxLength ||
          compareIdentity(next, start) < 0 ||
          onPath.has(next) ||
          componentOf.get(next) !== component
        ) {
          continue;
        }
        path.push(next);
        onPath.add(next);
        visit(next);
        path.pop();
        onPath.delete(next);
      }
    };

    visit(start);
  }

  return cycles;
}
