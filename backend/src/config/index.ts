export { appPaths } from './appPaths';
export { APPLICABILITY, FIELD_TAGS, applies, applicableFields, type FieldTag } from './applicability';
export {
  getEnvironmentConfig,
  loadEnvironmentConfig,
  validateEnvironmentConfig,
  getConfigSummary,
  toLoggerSettings,
  ConfigValidationError,
  DEFAULT_TRACKER_FEED_URL,
  DEFAULT_TRACKER_PROVENANCE,
  type EnvironmentConfig,
  type CatalogConfig,
  type StorageConfig,
  type TrackerFeedConfig,
  type LoggingConfig
} from './environment';
