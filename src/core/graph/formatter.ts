/**
 * Graphviz DOT rendering of the dependency graph.
 */
import type { ModuleKind } from '../registry/schema.js';
import type { Violation } from '../rules/types.js';
import type { DependencyGraph } from './types.js';

const KIND_FILL: Record<ModuleKind, string> = {
  Core: 'lightblue',
  Shared: 'lightgreen',
  Feature: 'lightyellow',
  Unknown: 'lightgray',
};

function escapeDot(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Quote an identity for use as a DOT ID.
 */
function quote(value: string): string {
  return `"${escapeDot(value)}"`;
}

/**
 * Format the graph as DOT. Edges that break a layering rule are drawn red.
 */
export function formatDot(graph: DependencyGraph, violations: readonly Violation[] = []): string {
  const violating = new Set(violations.map((v) => `${v.from}\u0000${v.to}`));

  const lines: string[] = [
    'digraph Modules {',
    '    rankdir=TB;',
    '    node [shape=box, style=filled];',
    '',
  ];

  for (const node of graph.nodes) {
    const label = `"${escapeDot(node.id)}\\n(${node.kind})"`;
    lines.push(`    ${quote(node.id)} [label=${label}, fillcolor=${KIND_FILL[node.kind]}];`);
  }

  lines.push('');

  for (const edge of graph.edges) {
    const attrs = violating.has(`${edge.from}\u0000${edge.to}`) ? ' [color=red, penwidth=2]' : '';
    lines.push(`    ${quote(edge.from)} -> ${quote(edge.to)}${attrs};`);
  }

  lines.push('}');
  return lines.join('\n');
}
