/**
 * Architecture metrics over a registry and its dependency graph.
 */
import { findStronglyConnectedComponents } from '../cycles/detector.js';
import { successors } from '../graph/builder.js';
import type { DependencyGraph } from '../graph/types.js';
import type { ModuleRegistry } from '../registry/registry.js';
import type { ArchitectureMetrics } from './types.js';

/**
 * Longest path (edge count) through the DAG obtained by collapsing every
 * strongly connected component to one node. Edges inside a component are
 * ignored, which keeps the value finite on cyclic graphs.
 */
export function computeMaxDependencyDepth(graph: DependencyGraph): number {
  const components = findStronglyConnectedComponents(graph);
  const componentOf = new Map<string, number>();
  components.forEach((members, i) => {
    for (const id of members) componentOf.set(id, i);
  });

  const condensed = components.map((members, i) => {
    const targets = new Set<number>();
    for (const id of members) {
      for (const target of successors(graph, id)) {
        const c = componentOf.get(target);
        if (c !== undefined && c !== i) targets.add(c);
      }
    }
    return [...targets];
  });

  // Longest path ending at each component, relaxed in topological order.
  const indegree = new Array<number>(components.length).fill(0);
  for (const targets of condensed) {
    for (const t of targets) indegree[t]++;
  }
  const depth = new Array<number>(components.length).fill(0);
  const ready = indegree.flatMap((d, c) => (d === 0 ? [c] : []));

  let max = 0;
  for (let head = 0; head < ready.length; head++) {
    const c = ready[head];
    max = Math.max(max, depth[c]);
    for (const next of condensed[c]) {
      depth[next] = Math.max(depth[next], depth[c] + 1);
      indegree[next]--;
      if (indegree[next] === 0) ready.push(next);
    }
  }
  return max;
}

/**
 * Compute all metrics. Total: an empty project yields all zeros.
 */
export function computeMetrics(registry: ModuleRegistry, graph: DependencyGraph): ArchitectureMetrics {
  const totalModules = graph.nodes.length;
  const edgeCount = graph.edges.length;

  return {
    totalModules,
    coreModules: registry.countByKind('Core'),
    sharedModules: registry.countByKind('Shared'),
    featureModules: registry.countByKind('Feature'),
    unknownModules: registry.countByKind('Unknown'),
    totalDependencies: edgeCount,
    externalDependencies: graph.nodes.reduce((sum, n) => sum + n.externalDependencies.length, 0),
    averageDependenciesPerModule: totalModules > 0 ? edgeCount / totalModules : 0,
    maxDependencyDepth: computeMaxDependencyDepth(graph),
    couplingFactor: totalModules > 1 ? edgeCount / (totalModules * (totalModules - 1)) : 0,
  };
}
