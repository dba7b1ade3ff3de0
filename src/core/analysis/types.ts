/**
 * Types for a full analysis run.
 */
import type { Classifier } from '../classify/classifier.js';
import type { Cycle, CycleMode } from '../cycles/types.js';
import type { ArchitectureMetrics } from '../metrics/types.js';
import type { ModuleKind } from '../registry/schema.js';
import type { ClassificationSource, DependencyResolver } from '../registry/types.js';
import type { Violation } from '../rules/types.js';

/**
 * One module as it appears in the report.
 */
export interface ReportModule {
  identity: string;
  originPath: string;
  kind: ModuleKind;
  classifiedBy: ClassificationSource;
  /** Identifiers exactly as the record declared them */
  declaredDependencies: string[];
  /** Resolved dependency identities, in declaration order */
  dependencies: string[];
  /** Identifiers that did not resolve to a known module */
  externalDependencies: string[];
  imports: string[];
  exports: string[];
  providers: string[];
  declarations: string[];
}

export interface AnalysisReport {
  modules: ReportModule[];
  dependencyViolations: Violation[];
  circularDependencies: Cycle[];
  metrics: ArchitectureMetrics;
}

export interface AnalyzeOptions {
  classifier?: Classifier;
  resolver?: DependencyResolver;
  /** Defaults to `components` */
  cycleMode?: CycleMode;
  /** Length bound for `elementary` mode */
  maxCycleLength?: number;
}
