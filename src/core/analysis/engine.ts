/**
 * Analysis engine: registry, graph, then rules, cycles and metrics over the
 * same immutable graph.
 */
import { createClassifier } from '../classify/classifier.js';
import { findCycles } from '../cycles/detector.js';
import { DEFAULT_MAX_CYCLE_LENGTH, enumerateElementaryCycles } from '../cycles/elementary.js';
import type { Cycle } from '../cycles/types.js';
import { buildDependencyGraph, successors } from '../graph/builder.js';
import type { DependencyGraph } from '../graph/types.js';
import { computeMetrics } from '../metrics/calculator.js';
import { ModuleRegistry } from '../registry/registry.js';
import { defaultResolver } from '../registry/resolver.js';
import type { ModuleRecord } from '../registry/schema.js';
import { checkLayering } from '../rules/checker.js';
import { logger } from '../../utils/logger.js';
import type { AnalysisReport, AnalyzeOptions, ReportModule } from './types.js';

const log = logger.child('engine');

export interface AnalysisResult {
  report: AnalysisReport;
  graph: DependencyGraph;
}

function reportModules(registry: ModuleRegistry, graph: DependencyGraph): ReportModule[] {
  return graph.nodes.map((node) => {
    const mod = registry.get(node.id);
    return {
      identity: node.id,
      originPath: node.originPath,
      kind: node.kind,
      classifiedBy: mod?.classifiedBy ?? 'fallback',
      declaredDependencies: [...(mod?.declaredDependencies ?? [])],
      dependencies: [...successors(graph, node.id)],
      externalDependencies: [...node.externalDependencies],
      imports: [...(mod?.imports ?? [])],
      exports: [...(mod?.exports ?? [])],
      providers: [...(mod?.providers ?? [])],
      declarations: [...(mod?.declarations ?? [])],
    };
  });
}

/**
 * Run the full analysis over already-extracted records.
 * Throws only while building the registry (duplicate identities).
 */
export function analyzeModules(
  records: readonly ModuleRecord[],
  options: AnalyzeOptions = {}
): AnalysisResult {
  const registry = ModuleRegistry.build(records, options.classifier ?? createClassifier());
  log.debug(`Registered ${registry.size} module(s)`);

  const graph = buildDependencyGraph(registry, options.resolver ?? defaultResolver);
  log.debug(`Built graph with ${graph.edges.length} edge(s) using ${graph.resolver} resolution`);

  const dependencyViolations = checkLayering(graph);
  const circularDependencies: Cycle[] =
    options.cycleMode === 'elementary'
      ? enumerateElementaryCycles(graph, {
          maxLength: options.maxCycleLength ?? DEFAULT_MAX_CYCLE_LENGTH,
        })
      : findCycles(graph);
  const metrics = computeMetrics(registry, graph);
  log.debug(
    `Found ${dependencyViolations.length} violation(s) and ${circularDependencies.length} cycle(s)`
  );

  return {
    report: {
      modules: reportModules(registry, graph),
      dependencyViolations,
      circularDependencies,
      metrics,
    },
    graph,
  };
}
