/**
 * Configuration loading
 *
 * @module config
 */

export {
  CONFIG_FILE_CANDIDATES,
  DEFAULT_PEAK_WINDOW,
  DEFAULT_THRESHOLD_DAYS,
  buildConfig,
  deepFreeze,
  loadConfig,
  maskUrl,
  parseBoolean,
  parseSeverity,
  redactConfig,
  thresholdFor,
  type BuildConfigOptions,
  type ConfigOverrides,
  type DeepReadonly,
  type FrozenConfig,
  type GovernanceConfig,
  type LoadConfigOptions,
  type LoggingConfig,
  type NotificationChannel,
  type NotificationsConfig,
  type PolicyConfig,
  type PolicyThresholds,
  type ScanConfig,
  type ServerConfig,
} from './config.js';

export { DOTENV_FILES, SECRET_ENV_VARS, loadEnvironment, type EnvSource, type LoadedEnvironment } from './credentials.js';
