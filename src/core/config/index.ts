export {
  DEFAULT_CONFIG_PATH,
  type EnvironmentTable,
  type LoadConfigOptions,
  loadConfig,
  loadEnvironmentTable,
  mergeConfig,
  parseEnvironmentTable,
  resolveEnvironmentConfig,
  validateSemantics,
} from './loader.js';
export {
  type ContainerResources,
  ContainerResourcesSchema,
  EnvironmentTableSchema,
  type RolloutConfig,
  RolloutConfigSchema,
} from './schema.js';
