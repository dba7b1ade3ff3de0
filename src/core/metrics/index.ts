export { computeMetrics, computeMaxDependencyDepth } from './calculator.js';
export type { ArchitectureMetrics } from './types.js';
