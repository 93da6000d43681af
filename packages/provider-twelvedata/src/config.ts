/**
 * @fileoverview API key resolution.
 *
 * The key is resolved once, when the provider is constructed, in the order
 * explicit option > key file > environment variable. A per-call `apikey`
 * parameter overrides the resolved key for that call only.
 *
 * @module @tseries/provider-twelvedata/config
 */

import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '@tseries/contracts';
import type { ResolvedApiKey } from './types.js';

/**
 * Environment variable holding the API key.
 */
export const API_KEY_ENV_VAR = 'TWELVEDATA_API_KEY';

/**
 * Name of the key file inside the config directory.
 */
export const API_KEY_FILE_NAME = 'apikey';

const APP_DIR_NAME = 'tseries';

/**
 * Per-user configuration directory: `$XDG_CONFIG_HOME/tseries`, or
 * `~/.config/tseries` when XDG_CONFIG_HOME is unset.
 */
export function defaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env['XDG_CONFIG_HOME'] || join(homedir(), '.config');
  return join(base, APP_DIR_NAME);
}

/**
 * Reads the key file, returning '' when it does not exist.
 *
 * @throws {ConfigurationError} If the file exists but cannot be read
 */
export function readApiKeyFile(configDir: string): string {
  const path = join(configDir, API_KEY_FILE_NAME);

  try {
    return readFileSync(path, 'utf-8').trim();
  } catch (error) {
    if (isMissingFileError(error)) {
      return '';
    }
    throw new ConfigurationError(`Unable to read API key file: ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Resolves the API key once: explicit > key file > environment.
 *
 * The returned key may be empty; emptiness is only an error when a request
 * is about to be built.
 *
 * @example
 * ```typescript
 * resolveApiKey({ apiKey: 'test-key' });            // { key: 'test-key', source: 'explicit' }
 * resolveApiKey({ env: { TWELVEDATA_API_KEY: 'k' } }); // { key: 'k', source: 'env' } when no key file exists
 * ```
 */
export function resolveApiKey(
  sources: { apiKey?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}
): ResolvedApiKey {
  const explicit = sources.apiKey?.trim() ?? '';
  if (explicit) {
    return { key: explicit, source: 'explicit' };
  }

  const env = sources.env ?? process.env;

  const fromFile = readApiKeyFile(sources.configDir ?? defaultConfigDir(env));
  if (fromFile) {
    return { key: fromFile, source: 'file' };
  }

  const fromEnv = env[API_KEY_ENV_VAR]?.trim() ?? '';
  if (fromEnv) {
    return { key: fromEnv, source: 'env' };
  }

  return { key: '', source: 'none' };
}

/**
 * Picks the key for one request: the per-call override, else the cached key.
 *
 * @throws {ConfigurationError} If both are empty
 */
export function selectApiKey(override: string | undefined, cached: string): string {
  const key = override?.trim() || cached;
  if (!key) {
    throw new ConfigurationError(
      `No API key available: pass apikey, write it to the key file, or set ${API_KEY_ENV_VAR}`,
      { envVar: API_KEY_ENV_VAR, fileName: API_KEY_FILE_NAME }
    );
  }
  return key;
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
