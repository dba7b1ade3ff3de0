/**
 * Input boundary for externally produced module records.
 * Malformed input is rejected here, before the engine sees it.
 */
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { loadYaml, formatZodError } from '../../utils/yaml.js';
import { ModuleRecordsFileSchema, type ModuleRecord } from './schema.js';

/**
 * Validate raw records (a bare array or `{ modules: [...] }`).
 */
export function parseModuleRecords(input: unknown): ModuleRecord[] {
  const result = ModuleRecordsFileSchema.safeParse(input);
  if (!result.success) {
    throw new RegistryError(
      ErrorCodes.MALFORMED_RECORD,
      `Malformed module records: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }
  return Array.isArray(result.data) ? result.data : result.data.modules;
}

/**
 * Load records from a JSON or YAML file.
 */
export async function loadModuleRecords(filePath: string): Promise<ModuleRecord[]> {
  const raw = await loadYaml(filePath);
  try {
    return parseModuleRecords(raw);
  } catch (error) {
    if (error instanceof RegistryError) {
      throw new RegistryError(error.code, `${error.message} (file: ${filePath})`, {
        ...error.details,
        filePath,
      });
    }
    throw error;
  }
}
