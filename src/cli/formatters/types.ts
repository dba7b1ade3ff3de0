/**
 * Formatter type definitions.
 */
import type { AnalysisReport } from '../../core/analysis/types.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** List each module's external dependencies */
  verbose: boolean;
}

/**
 * Interface for report formatters.
 */
export interface IFormatter {
  formatReport(report: AnalysisReport): string;
}
