/**
 * Environment variable overrides for configuration.
 *
 * Provides support for CC_INCLUDE_* environment variables to override
 * configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 */
export function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvVarMapping =
  | { type: 'string'; description: string; apply: (o: PartialConfig, v: string) => void }
  | { type: 'number'; description: string; apply: (o: PartialConfig, v: number) => void }
  | { type: 'boolean'; description: string; apply: (o: PartialConfig, v: boolean) => void }
  | { type: 'string-list'; description: string; apply: (o: PartialConfig, v: string[]) => void };

/**
 * Mapping from environment variable names to config fields.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  CC_INCLUDE_PROBE_TIMEOUT_MS: {
    type: 'number',
    description: 'Override the compiler probe timeout in milliseconds',
    apply: (o, v): void => {
      o.probe = { ...o.probe, timeout_ms: v };
    },
  },
  CC_INCLUDE_PROBE_FLAGS: {
    type: 'string-list',
    description: 'Override extra probe flags (whitespace-separated)',
    apply: (o, v): void => {
      o.probe = { ...o.probe, flags: v };
    },
  },
  CC_INCLUDE_EXECUTION_ROOT: {
    type: 'string',
    description: 'Override the execution root paths are made relative to',
    apply: (o, v): void => {
      o.paths = { ...o.paths, execution_root: v };
    },
  },
  CC_INCLUDE_PREFIX_ENV_VAR: {
    type: 'string',
    description: 'Override the name of the variable holding dependency prefixes',
    apply: (o, v): void => {
      o.dependencies = { ...o.dependencies, prefix_env_var: v };
    },
  },
  CC_INCLUDE_DEDUPE: {
    type: 'boolean',
    description: 'Enable or disable removal of duplicate directories (true/false)',
    apply: (o, v): void => {
      o.output = { ...o.output, dedupe: v };
    },
  },
  CC_INCLUDE_DEBUG: {
    type: 'boolean',
    description: 'Enable or disable debug logging (true/false)',
    apply: (o, v): void => {
      o.logging = { ...o.logging, debug: v };
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces `value` to the mapping's type and applies it.
 *
 * @throws EnvCoercionError if coercion fails.
 */
function applyMapping(
  overrides: PartialConfig,
  mapping: EnvVarMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(overrides, value);
      return;
    case 'number':
      mapping.apply(overrides, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(overrides, coerceToBoolean(value, envVar));
      return;
    case 'string-list':
      mapping.apply(overrides, value.split(/\s+/).filter((item) => item !== ''));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads CC_INCLUDE_* environment variables and returns configuration overrides.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ CC_INCLUDE_PROBE_TIMEOUT_MS: '5000' });
 * console.log(result.overrides.probe?.timeout_ms); // 5000
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    probe: { ...base.probe, ...partial.probe },
    paths: { ...base.paths, ...partial.paths },
    dependencies: { ...base.dependencies, ...partial.dependencies },
    output: { ...base.output, ...partial.output },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = getDefaultEnv()): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, { description, type }]) => [
      envVar,
      { description, type },
    ])
  );
}
