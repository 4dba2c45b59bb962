/**
 * Retry settings: zod schemas, environment variables and YAML settings files
 */

export {
  RETRY_MODES,
  JITTER_MODES,
  DEFAULT_RETRY_OPTIONS,
  RetryOptionsSchema,
  CompleteRetryOptionsSchema,
  LoggingSettingsSchema,
  ClientSettingsSchema,
  type RetryMode,
  type JitterMode,
  type RetryOptions,
  type RetryOptionsInput,
  type CompleteRetryOptions,
  type LoggingSettingsConfig,
  type ClientSettings,
  type ClientSettingsInput,
} from './schemas.js';

export {
  ConfigValidationError,
  parseRetryOptions,
  parseCompleteRetryOptions,
  parseClientSettings,
} from './validation.js';

export { DEFAULT_ENV_PREFIX, ENV_VARIABLES, readRetryOptionsFromEnv } from './env.js';

export { loadSettingsFile, loadClientSettings, type LoadSettingsOptions } from './loader.js';

export { ConfigUtils, TIME, isTimeUnit, type TimeUnit, type Environment, type OptionalLayer } from './utils.js';
