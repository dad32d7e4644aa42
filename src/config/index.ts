/**
 * Configuration module exports
 */

export {
  applyEnvironmentOverrides,
  loadConfig,
  type LoadConfigOptions,
} from './loader.js';
export { AppConfigSchema, DEFAULT_CONFIG } from './schema.js';
export type {
  AccessConfig,
  AppConfig,
  AppConfigInput,
  BlueprintsConfig,
  ExtractionConfig,
  FirecrawlConfig,
  LLMConfig,
  LoggingConfig,
  ServerConfig,
  StoreConfig,
} from './schema.js';
