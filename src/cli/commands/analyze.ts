/**
 * CLI command that prints the architecture report.
 */
import { Command } from 'commander';
import { analyzeModules } from '../../core/analysis/engine.js';
import { toAnalyzeOptions } from '../../core/analysis/project.js';
import type { AnalysisReport } from '../../core/analysis/types.js';
import { getDefaultConfig } from '../../core/config/loader.js';
import { OutputFormatSchema, type Config, type OutputFormat } from '../../core/config/schema.js';
import { formatReportConsole } from '../formatters/human.js';
import { formatReportJson } from '../formatters/json.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { loadInputRecords, loadProjectSettings } from './input.js';

interface AnalyzeOptions {
  path: string;
  output?: string;
  config?: string;
  records?: string;
  verbose?: boolean;
}

/**
 * Exit code for a finished analysis, from `fail_on` and `exit_codes`.
 */
export function exitCodeFor(report: AnalysisReport, config: Config): number {
  const failing = config.fail_on.some((finding) =>
    finding === 'violations'
      ? report.dependencyViolations.length > 0
      : report.circularDependencies.length > 0
  );
  return failing ? config.exit_codes.violations : config.exit_codes.success;
}

/**
 * Validate a `--output` value. Throws ConfigError C002 for anything else.
 */
export function resolveOutputFormat(requested: string): OutputFormat {
  const format = OutputFormatSchema.safeParse(requested);
  if (!format.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_OUTPUT_FORMAT,
      `Invalid output format: ${requested}. Use: ${OutputFormatSchema.options.join(', ')}`,
      { format: requested }
    );
  }
  return format.data;
}

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Analyze module dependencies and check layering rules')
    .option('-p, --path <dir>', 'Project root to scan', '.')
    .option('-o, --output <format>', 'Output format (console, json)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--records <file>', 'Read module records from a JSON/YAML file instead of scanning')
    .option('--verbose', 'Show debug output')
    .action(async (options: AnalyzeOptions) => {
      const code = await runAnalyze(options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}

async function runAnalyze(options: AnalyzeOptions): Promise<number> {
  if (options.verbose) {
    logger.setLevel('debug');
  }

  let errorCode = getDefaultConfig().exit_codes.error;
  try {
    const settings = await loadProjectSettings(options);
    const { config } = settings;
    errorCode = config.exit_codes.error;
    const records = await loadInputRecords(options, settings);

    const format = resolveOutputFormat(options.output ?? config.output.format);

    const { report } = analyzeModules(records, toAnalyzeOptions(config));

    console.log(
      format === 'json'
        ? formatReportJson(report)
        : formatReportConsole(report, { verbose: options.verbose ?? false })
    );

    return exitCodeFor(report, config);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
    return errorCode;
  }
}
