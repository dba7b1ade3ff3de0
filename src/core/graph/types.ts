import type { ModuleKind } from '../registry/schema.js';

/**
 * Node in the dependency graph, one per registered module.
 */
export interface GraphNode {
  /** Module identity */
  readonly id: string;
  readonly kind: ModuleKind;
  readonly originPath: string;
  /** Declared identifiers that matched no registered module */
  readonly externalDependencies: readonly string[];
}

/**
 * Directed edge from a module to a module it depends on.
 */
export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  readonly fromKind: ModuleKind;
  readonly toKind: ModuleKind;
}

/**
 * Immutable dependency graph. Nodes keep registry order; edges keep
 * discovery order and never repeat a (from, to) pair.
 */
export interface DependencyGraph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  /** Outgoing targets per node, in discovery order */
  readonly adjacency: ReadonlyMap<string, readonly string[]>;
  /** Name of the resolver strategy that produced the edges */
  readonly resolver: string;
}
