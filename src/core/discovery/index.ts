export {
  discoverModuleFiles,
  collectModuleRecords,
  DEFAULT_DISCOVERY_OPTIONS,
} from './collector.js';
export type { DiscoveryOptions } from './collector.js';
