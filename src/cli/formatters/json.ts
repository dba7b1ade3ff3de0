import type { AnalysisReport } from '../../core/analysis/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption. Field names are snake_case.
 */
export class JsonFormatter implements IFormatter {
  formatReport(report: AnalysisReport): string {
    const { metrics } = report;

    const output = {
      modules: report.modules.map((m) => ({
        name: m.identity,
        path: m.originPath,
        module_type: m.kind,
        declared_dependencies: m.declaredDependencies,
        dependencies: m.dependencies,
        external_dependencies: m.externalDependencies,
        imports: m.imports,
        exports: m.exports,
        providers: m.providers,
        declarations: m.declarations,
      })),
      dependency_violations: report.dependencyViolations.map((v) => ({
        from_module: v.from,
        to_module: v.to,
        violation_type: v.kind,
        description: v.description,
      })),
      circular_dependencies: report.circularDependencies,
      metrics: {
        total_modules: metrics.totalModules,
        core_modules: metrics.coreModules,
        shared_modules: metrics.sharedModules,
        feature_modules: metrics.featureModules,
        average_dependencies_per_module: metrics.averageDependenciesPerModule,
        max_dependency_depth: metrics.maxDependencyDepth,
        coupling_factor: metrics.couplingFactor,
      },
    };

    return JSON.stringify(output, null, 2);
  }
}

export function formatReportJson(report: AnalysisReport): string {
  return new JsonFormatter().formatReport(report);
}
