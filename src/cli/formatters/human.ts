import chalk from 'chalk';
import type { AnalysisReport, ReportModule } from '../../core/analysis/types.js';
import { MODULE_KINDS } from '../../core/registry/schema.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'blue' | 'cyan' | 'yellow' | 'dim' | 'bold';

/**
 * Human-readable report formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatReport(report: AnalysisReport): string {
    const { metrics } = report;
    const lines: string[] = [];

    lines.push(this.colorize('=== Module Architecture Report ===', 'cyan'));
    lines.push('');

    lines.push(this.colorize('Architecture Metrics', 'green'));
    lines.push(`Total Modules: ${metrics.totalModules}`);
    lines.push(`Core Modules: ${metrics.coreModules}`);
    lines.push(`Shared Modules: ${metrics.sharedModules}`);
    lines.push(`Feature Modules: ${metrics.featureModules}`);
    lines.push(`Unknown Modules: ${metrics.unknownModules}`);
    lines.push(
      `Average Dependencies per Module: ${metrics.averageDependenciesPerModule.toFixed(2)}`
    );
    lines.push(`Max Dependency Depth: ${metrics.maxDependencyDepth}`);
    lines.push(`Coupling Factor: ${metrics.couplingFactor.toFixed(2)}`);
    lines.push('');

    if (report.dependencyViolations.length > 0) {
      lines.push(this.colorize(`Dependency Violations (${report.dependencyViolations.length})`, 'red'));
      for (const v of report.dependencyViolations) {
        lines.push(
          `  ${this.colorize(v.from, 'red')} -> ${this.colorize(v.to, 'red')}: ${v.description}`
        );
      }
      lines.push('');
    }

    if (report.circularDependencies.length > 0) {
      lines.push(this.colorize(`Circular Dependencies (${report.circularDependencies.length})`, 'yellow'));
      for (const cycle of report.circularDependencies) {
        lines.push(`  ${[...cycle, cycle[0]].join(' -> ')}`);
      }
      lines.push('');
    }

    lines.push(this.colorize('Modules by Type', 'blue'));
    for (const kind of MODULE_KINDS) {
      const modules = report.modules.filter((m) => m.kind === kind);
      if (modules.length === 0) continue;

      lines.push(`  ${this.colorize(kind, 'bold')}:`);
      for (const mod of modules) {
        lines.push(...this.formatModule(mod));
      }
      lines.push('');
    }

    if (report.dependencyViolations.length === 0) {
      lines.push(this.colorize('✓ No dependency violations found', 'green'));
    }
    if (report.circularDependencies.length === 0) {
      lines.push(this.colorize('✓ No circular dependencies found', 'green'));
    }

    return lines.join('\n');
  }

  private formatModule(mod: ReportModule): string[] {
    const count = mod.dependencies.length;
    const lines = [`    - ${mod.identity} (${count} ${count === 1 ? 'dependency' : 'dependencies'})`];
    if (this.options.verbose && mod.externalDependencies.length > 0) {
      lines.push(this.colorize(`        external: ${mod.externalDependencies.join(', ')}`, 'dim'));
    }
    return lines;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'blue':
        return chalk.blue.bold(text);
      case 'cyan':
        return chalk.cyan.bold(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}

export function formatReportConsole(
  report: AnalysisReport,
  options: Partial<FormatOptions> = {}
): string {
  return new HumanFormatter(options).formatReport(report);
}
