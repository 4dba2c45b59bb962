import { promises as fs } from 'fs';

import { ConfigurationError } from '@retry-quota/errors';
import type { Logger } from '@retry-quota/logging';
import { load as yamlLoad } from 'js-yaml';

import { DEFAULT_ENV_PREFIX, readRetryOptionsFromEnv } from './env.js';
import type { ClientSettings, RetryOptions, RetryOptionsInput } from './schemas.js';
import { ConfigUtils, type Environment } from './utils.js';
import { parseClientSettings, parseRetryOptions } from './validation.js';

/**
 * Options for loading client retry settings
 */
export interface LoadSettingsOptions {
  /** YAML settings file with `retry`, `operations` and `logging` sections */
  file?: string;
  /** Environment to read; `false` skips environment variables */
  env?: Environment | false;
  envPrefix?: string;
  /** Highest-precedence options, e.g. passed to a client constructor */
  overrides?: {
    retry?: RetryOptionsInput;
    operations?: Record<string, RetryOptionsInput>;
  };
  logger?: Logger;
}

/**
 * Read and validate a YAML settings file, substituting `${VAR:-default}` placeholders
 */
export async function loadSettingsFile(
  filePath: string,
  env: Environment = process.env
): Promise<ClientSettings> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file: ${filePath}`, {
      code: 'CONFIG_FILE_UNREADABLE',
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = yamlLoad(content);
  } catch (error) {
    throw new ConfigurationError(`Settings file is not valid YAML: ${filePath}`, {
      code: 'CONFIG_FILE_INVALID',
      cause: error,
    });
  }

  return parseClientSettings(ConfigUtils.processEnvVars(document, env), filePath);
}

/**
 * Load client retry settings from file, environment and explicit overrides.
 *
 * Precedence, lowest first: file, environment, overrides. Defaults are not
 * applied here; the strategy resolver fills in whatever is still missing.
 */
export async function loadClientSettings(options: LoadSettingsOptions = {}): Promise<ClientSettings> {
  const env: Environment = options.env === false ? {} : (options.env ?? process.env);
  const logger = options.logger;

  const fromFile: ClientSettings = options.file
    ? await loadSettingsFile(options.file, env)
    : parseClientSettings({});

  if (options.file) {
    logger?.debug('Loaded retry settings file', {
      file: options.file,
      operations: Object.keys(fromFile.operations),
    });
  }

  const fromEnv: RetryOptions =
    options.env === false ? {} : readRetryOptionsFromEnv(env, options.envPrefix ?? DEFAULT_ENV_PREFIX);
  const explicit = parseRetryOptions(options.overrides?.retry, 'client options');

  const operations: Record<string, RetryOptions> = { ...fromFile.operations };
  for (const [name, override] of Object.entries(options.overrides?.operations ?? {})) {
    operations[name] = ConfigUtils.mergeConfigs<RetryOptions>(
      operations[name] ?? {},
      parseRetryOptions(override, `operation ${name}`)
    );
  }

  return {
    retry: ConfigUtils.mergeConfigs<RetryOptions>(fromFile.retry, fromEnv, explicit),
    operations,
    logging: fromFile.logging,
  };
}
