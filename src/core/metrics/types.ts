/**
 * Aggregate architecture statistics, recomputed on every analysis.
 */
export interface ArchitectureMetrics {
  totalModules: number;
  coreModules: number;
  sharedModules: number;
  featureModules: number;
  unknownModules: number;
  /** Resolved edges, self-loops included */
  totalDependencies: number;
  /** Distinct unresolved identifiers summed over modules */
  externalDependencies: number;
  averageDependenciesPerModule: number;
  /** Longest path, in edges, through the component condensation */
  maxDependencyDepth: number;
  /** Edges over all possible ordered module pairs */
  couplingFactor: number;
}
