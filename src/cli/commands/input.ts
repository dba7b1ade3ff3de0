/**
 * Shared input handling for commands that run an analysis.
 */
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { collectProjectRecords } from '../../core/analysis/project.js';
import { loadModuleRecords } from '../../core/registry/loader.js';
import type { ModuleRecord } from '../../core/registry/schema.js';

export interface AnalysisInputOptions {
  path: string;
  config?: string;
  records?: string;
}

export interface ProjectSettings {
  projectRoot: string;
  config: Config;
}

/**
 * Resolve the project root and load its config. `--config` is relative to the cwd.
 */
export async function loadProjectSettings(options: AnalysisInputOptions): Promise<ProjectSettings> {
  const projectRoot = path.resolve(options.path);
  const config = await loadConfig(
    projectRoot,
    options.config ? path.resolve(options.config) : undefined
  );
  return { projectRoot, config };
}

/**
 * Records from `--records` (relative to the cwd) when given, otherwise from
 * scanning the project.
 */
export async function loadInputRecords(
  options: AnalysisInputOptions,
  settings: ProjectSettings
): Promise<ModuleRecord[]> {
  return options.records
    ? loadModuleRecords(path.resolve(options.records))
    : collectProjectRecords(settings.projectRoot, settings.config);
}
