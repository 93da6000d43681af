/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@tseries/contracts';
import type { Logger } from '@tseries/logger';
import {
  selectTimeIndexCapability,
  type TwelveDataProviderOptions,
} from '@tseries/provider-twelvedata';
import { configSchema, envMapping, type Config } from './schema.js';

type ConfigTree = { [key: string]: unknown };

/**
 * Load configuration from environment and defaults
 *
 * Empty variables count as unset.
 *
 * @throws {ConfigurationError} Listing every invalid path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: ConfigTree = {};

  // Load from environment variables
  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  // Parse and validate
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      paths: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: ConfigTree, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isConfigTree(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath !== undefined,
    },
    provider: {
      baseUrl: config.provider.baseUrl,
      timeout: config.provider.timeout,
      fixtures: config.provider.fixturePath !== undefined,
      defaultTimezone: config.provider.defaultTimezone ?? 'host',
      timeIndex: config.provider.timeIndex,
      unsupportedFormat: config.provider.unsupportedFormat,
    },
  };
}

/**
 * Provider options for a loaded configuration
 */
export function toProviderOptions(config: Config, logger?: Logger): TwelveDataProviderOptions {
  return {
    baseUrl: config.provider.baseUrl,
    timeout: config.provider.timeout,
    configDir: config.provider.configDir,
    fixturePath: config.provider.fixturePath,
    defaultTimezone: config.provider.defaultTimezone,
    timeIndex: selectTimeIndexCapability(config.provider.timeIndex),
    unsupportedFormat: config.provider.unsupportedFormat,
    logger,
  };
}

// Re-export types
export type { Config } from './schema.js';
