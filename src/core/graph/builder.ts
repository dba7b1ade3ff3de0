/**
 * Builds the module dependency graph from a classified registry.
 */
import type { ModuleRegistry } from '../registry/registry.js';
import { defaultResolver } from '../registry/resolver.js';
import type { DependencyResolver } from '../registry/types.js';
import type { DependencyGraph, GraphEdge, GraphNode } from './types.js';

/**
 * Converts registry records into nodes and resolved edges.
 */
export class DependencyGraphBuilder {
  private registry: ModuleRegistry;
  private resolver: DependencyResolver;

  constructor(registry: ModuleRegistry, resolver: DependencyResolver = defaultResolver) {
    this.registry = registry;
    this.resolver = resolver;
  }

  /**
   * Build the graph. Unresolved identifiers become external dependencies of
   * their node; repeated (from, to) pairs collapse to one edge.
   */
  build(): DependencyGraph {
    const nodes: GraphNode[] = [];
    const edges: GraphEdge[] = [];
    const adjacency = new Map<string, readonly string[]>();

    for (const mod of this.registry.modules) {
      const targets: string[] = [];
      const seenTargets = new Set<string>();
      const external: string[] = [];
      const seenExternal = new Set<string>();

      for (const identifier of mod.declaredDependencies) {
        const resolved = this.resolver.resolve(identifier, this.registry);
        const target = resolved !== null ? this.registry.get(resolved) : undefined;

        if (!target) {
          if (!seenExternal.has(identifier)) {
            seenExternal.add(identifier);
            external.push(identifier);
          }
          continue;
        }

        if (seenTargets.has(target.identity)) continue;
        seenTargets.add(target.identity);
        targets.push(target.identity);

        edges.push(Object.freeze({
          from: mod.identity,
          to: target.identity,
          fromKind: mod.kind,
          toKind: target.kind,
        }));
      }

      nodes.push(Object.freeze({
        id: mod.identity,
        kind: mod.kind,
        originPath: mod.originPath,
        externalDependencies: Object.freeze(external),
      }));
      adjacency.set(mod.identity, Object.freeze(targets));
    }

    return Object.freeze({
      nodes: Object.freeze(nodes),
      edges: Object.freeze(edges),
      adjacency,
      resolver: this.resolver.name,
    });
  }
}

/**
 * Convenience wrapper around DependencyGraphBuilder.
 */
export function buildDependencyGraph(
  registry: ModuleRegistry,
  resolver: DependencyResolver = defaultResolver
): DependencyGraph {
  return new DependencyGraphBuilder(registry, resolver).build();
}

/**
 * Outgoing targets of a node (empty for unknown ids).
 */
export function successors(graph: DependencyGraph, id: string): readonly string[] {
  return graph.adjacency.get(id) ?? [];
}
