/**
 * TOML configuration parser for cc-include-dirs.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';

import { isProbeLanguage, type ProbeLanguage } from '../probe/types.js';
import {
  DEFAULT_CONFIG,
  DEFAULT_DEPENDENCIES,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_PATHS,
  DEFAULT_PROBE,
} from './defaults.js';
import type {
  Config,
  DependenciesConfig,
  LoggingConfig,
  OutputConfig,
  PathConfig,
  ProbeConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'ConfigParseError';
  }
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the named section, or undefined when absent.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function section(raw: RawSection, name: string): RawSection | undefined {
  const value = raw[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof value}`);
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

function validateLanguages(value: unknown, fieldPath: string): ProbeLanguage[] {
  return validateStringArray(value, fieldPath).map((language) => {
    if (!isProbeLanguage(language)) {
      throw new ConfigParseError(
        `Invalid value for '${fieldPath}': unknown language '${language}'`
      );
    }
    return language;
  });
}

/**
 * Parses probe configuration from raw TOML data.
 */
function parseProbe(raw: RawSection | undefined): ProbeConfig {
  const result: ProbeConfig = {
    ...DEFAULT_PROBE,
    languages: [...DEFAULT_PROBE.languages],
    flags: [...DEFAULT_PROBE.flags],
  };
  if (raw === undefined) {
    return result;
  }

  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'probe.timeout_ms');
  }
  if ('languages' in raw) {
    result.languages = validateLanguages(raw.languages, 'probe.languages');
  }
  if ('flags' in raw) {
    result.flags = validateStringArray(raw.flags, 'probe.flags');
  }

  return result;
}

function parsePaths(raw: RawSection | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('execution_root' in raw) {
    result.execution_root = validateString(raw.execution_root, 'paths.execution_root');
  }

  return result;
}

function parseDependencies(raw: RawSection | undefined): DependenciesConfig {
  const result: DependenciesConfig = { ...DEFAULT_DEPENDENCIES };
  if (raw === undefined) {
    return result;
  }

  if ('prefix_env_var' in raw) {
    result.prefix_env_var = validateString(raw.prefix_env_var, 'dependencies.prefix_env_var');
  }

  return result;
}

function parseOutput(raw: RawSection | undefined): OutputConfig {
  const result: OutputConfig = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('dedupe' in raw) {
    result.dedupe = validateBoolean(raw.dedupe, 'output.dedupe');
  }

  return result;
}

function parseLogging(raw: RawSection | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [probe]
 * languages = ["c++"]
 * flags = ["--sysroot=/opt/sysroot"]
 * `);
 * console.log(config.probe.timeout_ms); // 30000
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawSection;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    probe: parseProbe(section(parsed, 'probe')),
    paths: parsePaths(section(parsed, 'paths')),
    dependencies: parseDependencies(section(parsed, 'dependencies')),
    output: parseOutput(section(parsed, 'output')),
    logging: parseLogging(section(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    probe: {
      ...DEFAULT_CONFIG.probe,
      languages: [...DEFAULT_CONFIG.probe.languages],
      flags: [...DEFAULT_CONFIG.probe.flags],
    },
    paths: { ...DEFAULT_CONFIG.paths },
    dependencies: { ...DEFAULT_CONFIG.dependencies },
    output: { ...DEFAULT_CONFIG.output },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
