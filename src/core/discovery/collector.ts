/**
 * Module file discovery and record collection for a project tree.
 */
import * as path from 'node:path';
import { globFiles, readFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import type { ModuleRecord } from '../registry/schema.js';
import { sortIdentities } from '../graph/order.js';
import {
  extractModuleRecord,
  DEFAULT_EXTRACTION_OPTIONS,
  type ExtractionOptions,
} from '../extraction/ngmodule.js';

export interface DiscoveryOptions {
  include: string[];
  exclude: string[];
  concurrency: number;
}

export const DEFAULT_DISCOVERY_OPTIONS: DiscoveryOptions = {
  include: ['**/*.module.ts'],
  exclude: ['**/node_modules/**', '**/dist/**', '**/*.spec.ts'],
  concurrency: 16,
};

/**
 * Run `processor` over `items`, at most `concurrency` at a time.
 */
async function processInBatches<T>(
  items: T[],
  concurrency: number,
  processor: (item: T) => Promise<void>
): Promise<void> {
  for (let i = 0; i < items.length; i += concurrency) {
    const batch = items.slice(i, i + concurrency);
    await Promise.all(batch.map(processor));
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Module files under `projectRoot`, as sorted POSIX paths relative to it.
 */
export async function discoverModuleFiles(
  projectRoot: string,
  options: DiscoveryOptions = DEFAULT_DISCOVERY_OPTIONS
): Promise<string[]> {
  const files = await globFiles(options.include, {
    cwd: projectRoot,
    ignore: options.exclude,
    absolute: false,
  });
  return sortIdentities(files.map(toPosix));
}

/**
 * Discover every module file and extract one record per file.
 * Records come back in file path order regardless of read completion order.
 */
export async function collectModuleRecords(
  projectRoot: string,
  discovery: DiscoveryOptions = DEFAULT_DISCOVERY_OPTIONS,
  extraction: ExtractionOptions = DEFAULT_EXTRACTION_OPTIONS
): Promise<ModuleRecord[]> {
  const files = await discoverModuleFiles(projectRoot, discovery);
  log.debug(`Found ${files.length} module file(s) under ${projectRoot}`);

  const records = new Map<string, ModuleRecord>();

  await processInBatches(files, discovery.concurrency, async (relativePath) => {
    const fullPath = path.resolve(projectRoot, relativePath);
    let content: string;
    try {
      content = await readFile(fullPath);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.FILE_READ_ERROR,
        `Failed to read ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: fullPath }
      );
    }
    records.set(relativePath, extractModuleRecord(relativePath, content, extraction));
  });

  return files.flatMap((file) => {
    const record = records.get(file);
    return record ? [record] : [];
  });
}
