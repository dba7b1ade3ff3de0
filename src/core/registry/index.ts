export { ModuleRegistry } from './registry.js';
export {
  exactResolver,
  normalizedResolver,
  chainResolvers,
  defaultResolver,
} from './resolver.js';
export { normalizeIdentifier } from './normalize.js';
export { parseModuleRecords, loadModuleRecords } from './loader.js';
export {
  ModuleKindSchema,
  ModuleRecordSchema,
  ModuleRecordsFileSchema,
  MODULE_KINDS,
} from './schema.js';
export type { ModuleKind, ModuleRecord } from './schema.js';
export type {
  ClassifiedModule,
  Classification,
  ClassificationSource,
  DependencyResolver,
  ModuleLookup,
} from './types.js';
