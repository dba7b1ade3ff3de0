export { checkLayering, evaluateEdge, LAYERING_POLICY } from './checker.js';
export type { Violation, ViolationKind, LayeringRule } from './types.js';
