export {
  extractModuleRecord,
  readNgModuleMetadata,
  readPackageImports,
  readLayerTag,
  referenceName,
  withModuleSource,
  DEFAULT_EXTRACTION_OPTIONS,
} from './ngmodule.js';
export type { ExtractionOptions, NgModuleMetadata } from './ngmodule.js';
