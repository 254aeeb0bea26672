/**
 * Configuration module for cc-include-dirs.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  DependenciesConfig,
  LoggingConfig,
  OutputConfig,
  PartialConfig,
  PathConfig,
  ProbeConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_DEPENDENCIES,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_PATHS,
  DEFAULT_PREFIX_ENV_VAR,
  DEFAULT_PROBE,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getDefaultEnv,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig, CONFIG_FILE_NAME } from './loader.js';
