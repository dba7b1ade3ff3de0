/**
 * CLI command that writes the dependency graph as Graphviz DOT.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { analyzeModules } from '../../core/analysis/engine.js';
import { toAnalyzeOptions } from '../../core/analysis/project.js';
import { getDefaultConfig } from '../../core/config/loader.js';
import { formatDot } from '../../core/graph/formatter.js';
import { writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { loadInputRecords, loadProjectSettings } from './input.js';

interface GraphOptions {
  path: string;
  output?: string;
  config?: string;
  records?: string;
  verbose?: boolean;
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Write the module dependency graph in Graphviz DOT format')
    .option('-p, --path <dir>', 'Project root to scan', '.')
    .option('-o, --output <file>', 'Output file (default: output.graph_file from config)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--records <file>', 'Read module records from a JSON/YAML file instead of scanning')
    .option('--verbose', 'Show debug output')
    .action(async (options: GraphOptions) => {
      const code = await runGraph(options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}

/**
 * Write the DOT file. Returns 0, or the configured error exit code.
 */
async function runGraph(options: GraphOptions): Promise<number> {
  if (options.verbose) {
    log.setLevel('debug');
  }

  let errorCode = getDefaultConfig().exit_codes.error;
  try {
    const settings = await loadProjectSettings(options);
    const { config } = settings;
    errorCode = config.exit_codes.error;
    const records = await loadInputRecords(options, settings);

    const { report, graph } = analyzeModules(records, toAnalyzeOptions(config));
    if (graph.nodes.length === 0) {
      log.warn('No modules found');
    }

    const outputFile = options.output ?? config.output.graph_file;
    await writeFile(path.resolve(outputFile), `${formatDot(graph, report.dependencyViolations)}\n`);

    console.log(`Dependency graph written to: ${outputFile}`);
    return 0;
  } catch (error) {
    log.error(error instanceof Error ? error.message : 'Unknown error');
    return errorCode;
  }
}
