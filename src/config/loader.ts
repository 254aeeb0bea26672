/**
 * Loads configuration from cc-include-dirs.toml, the environment and defaults.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';

import { applyEnvOverrides, getDefaultEnv, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Conventional configuration file name.
 */
export const CONFIG_FILE_NAME = 'cc-include-dirs.toml';

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads and validates the configuration.
 *
 * A missing file yields the defaults; environment overrides are applied on
 * top of either.
 *
 * @param filePath - Path of the TOML file; omitted means defaults only.
 * @param env - Environment to read overrides from (defaults to process.env).
 * @throws ConfigParseError if the file cannot be read or parsed.
 * @throws EnvCoercionError if an override cannot be coerced.
 * @throws ConfigValidationError if the merged configuration is invalid.
 */
export async function loadConfig(
  filePath?: string,
  env: EnvRecord = getDefaultEnv()
): Promise<Config> {
  let base = getDefaultConfig();

  if (filePath !== undefined) {
    try {
      base = parseConfig(await readFile(filePath, 'utf8'));
    } catch (error) {
      if (error instanceof ConfigParseError) {
        throw error;
      }
      if (!isMissingFile(error)) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw new ConfigParseError(`Cannot read config file '${filePath}': ${cause.message}`, cause);
      }
    }
  }

  const config = applyEnvOverrides(base, env);
  assertConfigValid(config);
  return config;
}
