/**
 * Types for the classified module registry.
 */
import type { ModuleKind, ModuleRecord } from './schema.js';

/**
 * Which classification rule decided a module's kind.
 */
export type ClassificationSource =
  | 'declared'
  | 'override'
  | 'path-segment'
  | 'name-suffix'
  | 'fallback';

/**
 * Result of classifying one record.
 */
export interface Classification {
  kind: ModuleKind;
  source: ClassificationSource;
}

/**
 * A module record with its kind resolved. Frozen once built.
 */
export interface ClassifiedModule extends Readonly<ModuleRecord> {
  readonly kind: ModuleKind;
  readonly classifiedBy: ClassificationSource;
}

/**
 * Strategy that maps a declared dependency identifier onto a registered module.
 * Returns the module identity, or null for external/unresolved identifiers.
 */
export interface DependencyResolver {
  readonly name: string;
  resolve(identifier: string, registry: ModuleLookup): string | null;
}

/**
 * Read-only lookups a resolver may use.
 */
export interface ModuleLookup {
  has(identity: string): boolean;
  findByNormalizedKey(key: string): readonly string[];
}
