/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, isKnownTimezone } from '@tseries/provider-twelvedata';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  provider: z
    .object({
      baseUrl: z.string().url().default(DEFAULT_BASE_URL),
      timeout: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
      configDir: z.string().min(1).optional(),
      fixturePath: z.string().min(1).optional(),
      defaultTimezone: z
        .string()
        .refine(isKnownTimezone, { message: 'Unknown IANA timezone' })
        .optional(),
      timeIndex: z.enum(['native', 'unavailable']).default('native'),
      unsupportedFormat: z.enum(['fallback', 'error']).default('fallback'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  TSERIES_LOG_LEVEL: 'logging.level',
  TSERIES_LOG_FORMAT: 'logging.format',
  TSERIES_LOG_FILE: 'logging.filePath',
  TSERIES_BASE_URL: 'provider.baseUrl',
  TSERIES_TIMEOUT: 'provider.timeout',
  TSERIES_CONFIG_DIR: 'provider.configDir',
  TSERIES_FIXTURES: 'provider.fixturePath',
  TSERIES_DEFAULT_TIMEZONE: 'provider.defaultTimezone',
  TSERIES_TIME_INDEX: 'provider.timeIndex',
  TSERIES_UNSUPPORTED_FORMAT: 'provider.unsupportedFormat',
};
