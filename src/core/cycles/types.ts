/**
 * Types for circular dependency detection.
 */

/**
 * Closed walk of module identities. The last element depends on the first;
 * the first is not repeated at the end. A single element is a self-dependency.
 */
export type Cycle = string[];

/**
 * How cycles are reported.
 * - `components`: one walk per strongly connected component, plus self-loops
 * - `elementary`: every elementary cycle up to a length bound
 */
export type CycleMode = 'components' | 'elementary';

export interface ElementaryCycleOptions {
  /** Longest cycle (in nodes) to enumerate */
  maxLength: number;
}
