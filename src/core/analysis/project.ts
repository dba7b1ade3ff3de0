/**
 * Project-level analysis: discovery and extraction driven by config, then the engine.
 */
import { createClassifier, type ClassifierOptions } from '../classify/classifier.js';
import type { Config } from '../config/schema.js';
import { collectModuleRecords } from '../discovery/collector.js';
import type { ModuleRecord } from '../registry/schema.js';
import { analyzeModules, type AnalysisResult } from './engine.js';
import type { AnalyzeOptions } from './types.js';

export function toClassifierOptions(config: Config): ClassifierOptions {
  const { classification } = config;
  return {
    coreSegments: classification.core_segments,
    sharedSegments: classification.shared_segments,
    featureSegments: classification.feature_segments,
    overrides: classification.overrides,
  };
}

/**
 * Engine options derived from config.
 */
export function toAnalyzeOptions(config: Config): AnalyzeOptions {
  return {
    classifier: createClassifier(toClassifierOptions(config)),
    cycleMode: config.cycles.mode,
    maxCycleLength: config.cycles.max_length,
  };
}

/**
 * Discover and extract every module under `projectRoot`.
 */
export async function collectProjectRecords(
  projectRoot: string,
  config: Config
): Promise<ModuleRecord[]> {
  return collectModuleRecords(
    projectRoot,
    {
      include: config.discovery.include,
      exclude: config.discovery.exclude,
      concurrency: config.discovery.concurrency,
    },
    {
      ignoreImportPrefixes: config.extraction.ignore_import_prefixes,
      includePackageImports: config.extraction.include_package_imports,
    }
  );
}

export async function analyzeProject(projectRoot: string, config: Config): Promise<AnalysisResult> {
  const records = await collectProjectRecords(projectRoot, config);
  return analyzeModules(records, toAnalyzeOptions(config));
}
