export { findCycles, findStronglyConnectedComponents, componentWalk } from './detector.js';
export { enumerateElementaryCycles, DEFAULT_MAX_CYCLE_LENGTH } from './elementary.js';
export type { Cycle, CycleMode, ElementaryCycleOptions } from './types.js';
