/**
 * Types for layering rule checks.
 */
import type { ModuleKind } from '../registry/schema.js';

export type ViolationKind =
  | 'CoreDependsOnFeature'
  | 'SharedDependsOnFeature'
  | 'FeatureDependsOnFeature';

/**
 * One disallowed (source kind, target kind) pair.
 */
export interface LayeringRule {
  from: ModuleKind;
  to: ModuleKind;
  violation: ViolationKind;
  description: string;
}

/**
 * A dependency edge that breaks a layering rule.
 */
export interface Violation {
  from: string;
  to: string;
  kind: ViolationKind;
  description: string;
}
