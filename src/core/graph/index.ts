export { DependencyGraphBuilder, buildDependencyGraph, successors } from './builder.js';
export { formatDot } from './formatter.js';
export { compareIdentity, sortIdentities } from './order.js';
export type { DependencyGraph, GraphNode, GraphEdge } from './types.js';
