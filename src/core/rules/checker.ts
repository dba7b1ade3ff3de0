/**
 * Layering rule checker - evaluates every graph edge against the fixed
 * Core/Shared/Feature policy. Unknown modules are never matched.
 */
import type { DependencyGraph, GraphEdge } from '../graph/types.js';
import type { LayeringRule, Violation } from './types.js';

export const LAYERING_POLICY: readonly LayeringRule[] = [
  {
    from: 'Core',
    to: 'Feature',
    violation: 'CoreDependsOnFeature',
    description: 'Core module depends on Feature module',
  },
  {
    from: 'Shared',
    to: 'Feature',
    violation: 'SharedDependsOnFeature',
    description: 'Shared module depends on Feature module',
  },
  {
    from: 'Feature',
    to: 'Feature',
    violation: 'FeatureDependsOnFeature',
    description: 'Feature module depends on another Feature module',
  },
];

/**
 * Evaluate a single edge. Self-dependencies are left to cycle detection.
 */
export function evaluateEdge(edge: GraphEdge): Violation | null {
  if (edge.from === edge.to) {
    return null;
  }

  const rule = LAYERING_POLICY.find((r) => r.from === edge.fromKind && r.to === edge.toKind);
  if (!rule) {
    return null;
  }

  return {
    from: edge.from,
    to: edge.to,
    kind: rule.violation,
    description: rule.description,
  };
}

/**
 * Check every edge, in edge discovery order.
 */
export function checkLayering(graph: DependencyGraph): Violation[] {
  const violations: Violation[] = [];
  for (const edge of graph.edges) {
    const violation = evaluateEdge(edge);
    if (violation) {
      violations.push(violation);
    }
  }
  return violations;
}
