export { loadConfig, getDefaultConfig } from './loader.js';
export {
  ConfigSchema,
  DiscoverySettingsSchema,
  ExtractionSettingsSchema,
  ClassificationSettingsSchema,
  CycleSettingsSchema,
  OutputSettingsSchema,
  ExitCodesSchema,
  FailOnSchema,
} from './schema.js';
export type {
  Config,
  DiscoverySettings,
  ExtractionSettings,
  ClassificationSettings,
  CycleSettings,
  OutputFormat,
  FailOn,
} from './schema.js';
