import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createGraphCommand } from './commands/graph.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('layerguard')
    .description('Dependency graph auditor for layered module architectures')
    .version(VERSION);
  [createAnalyzeCommand, createGraphCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
