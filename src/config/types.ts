/**
 * Configuration types for cc-include-dirs.toml parsing.
 *
 * @packageDocumentation
 */

import type { ProbeLanguage } from '../probe/types.js';

/**
 * Compiler probing settings.
 */
export interface ProbeConfig {
  /** Upper bound for one compiler invocation in milliseconds (default: 30000). */
  timeout_ms: number;
  /** Languages probed, in order; their search lists are concatenated. */
  languages: ProbeLanguage[];
  /** Extra flags passed to every probe (e.g. `--sysroot=...`). */
  flags: string[];
}

/**
 * Path configuration.
 */
export interface PathConfig {
  /**
   * Absolute execution root. Directories beneath it are emitted root-relative.
   * Unset means paths are only normalized.
   */
  execution_root?: string;
}

/**
 * Dependency prefix injection settings.
 */
export interface DependenciesConfig {
  /** Environment variable holding the colon-separated prefix list. */
  prefix_env_var: string;
}

/**
 * Result shaping.
 */
export interface OutputConfig {
  /** Drop later duplicates of a directory (default: true). */
  dedupe: boolean;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level log entries. */
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  probe: ProbeConfig;
  paths: PathConfig;
  dependencies: DependenciesConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration as produced by environment overrides.
 */
export interface PartialConfig {
  probe?: Partial<ProbeConfig>;
  paths?: Partial<PathConfig>;
  dependencies?: Partial<DependenciesConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}
