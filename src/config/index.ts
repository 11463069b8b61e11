// Barrel-файл модуля конфигурации.
export {
  ConfigSchema,
  RerankConfigSchema,
  OutputConfigSchema,
  LoggingConfigSchema,
} from './schema.js';

export type {
  Config,
  RerankConfig,
  OutputConfig,
  LoggingConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export { loadConfig, resolveConfigPath, resolveEnvVars, deepMerge } from './loader.js';
