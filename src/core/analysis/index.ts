export { analyzeModules } from './engine.js';
export type { AnalysisResult } from './engine.js';
export {
  analyzeProject,
  collectProjectRecords,
  toAnalyzeOptions,
  toClassifierOptions,
} from './project.js';
export type { AnalysisReport, AnalyzeOptions, ReportModule } from './types.js';
