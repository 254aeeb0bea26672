/**
 * Default configuration values for cc-include-dirs.toml.
 *
 * @packageDocumentation
 */

import type {
  Config,
  DependenciesConfig,
  LoggingConfig,
  OutputConfig,
  PathConfig,
  ProbeConfig,
} from './types.js';

/**
 * Default environment variable carrying dependency install prefixes.
 */
export const DEFAULT_PREFIX_ENV_VAR = 'CC_DEPENDENCY_PREFIXES';

/**
 * Default probe settings. C is probed before C++ so that C-only
 * directories keep their precedence.
 */
export const DEFAULT_PROBE: ProbeConfig = {
  timeout_ms: 30000,
  languages: ['c', 'c++'],
  flags: [],
};

/**
 * Default path configuration (no execution root).
 */
export const DEFAULT_PATHS: PathConfig = {};

export const DEFAULT_DEPENDENCIES: DependenciesConfig = {
  prefix_env_var: DEFAULT_PREFIX_ENV_VAR,
};

export const DEFAULT_OUTPUT: OutputConfig = {
  dedupe: true,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  probe: DEFAULT_PROBE,
  paths: DEFAULT_PATHS,
  dependencies: DEFAULT_DEPENDENCIES,
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};
