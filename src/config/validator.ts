/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond just type checking:
 * - The probe timeout is a finite positive number
 * - Probe languages are non-empty and unique
 * - The execution root, when set, is absolute
 * - The dependency prefix variable is a valid environment variable name
 *
 * @packageDocumentation
 */

import path from 'node:path';

import { isProbeLanguage } from '../probe/types.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

const ENV_VAR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function validateProbe(config: Config, errors: ValidationError[]): void {
  const { timeout_ms: timeoutMs, languages } = config.probe;

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    errors.push({
      field: 'probe.timeout_ms',
      value: timeoutMs,
      message: `'probe.timeout_ms' must be a finite positive number, got ${String(timeoutMs)}`,
    });
  }

  if (languages.length === 0) {
    errors.push({
      field: 'probe.languages',
      value: languages,
      message: `'probe.languages' must name at least one language`,
    });
  }

  const seen = new Set<string>();
  for (const language of languages) {
    if (!isProbeLanguage(language)) {
      errors.push({
        field: 'probe.languages',
        value: language,
        message: `Unknown probe language '${String(language)}'`,
      });
    }
    if (seen.has(language)) {
      errors.push({
        field: 'probe.languages',
        value: language,
        message: `Probe language '${language}' is listed more than once`,
      });
    }
    seen.add(language);
  }
}

function validatePaths(config: Config, errors: ValidationError[]): void {
  const root = config.paths.execution_root;
  if (root !== undefined && !path.posix.isAbsolute(root)) {
    errors.push({
      field: 'paths.execution_root',
      value: root,
      message: `'paths.execution_root' must be an absolute path, got '${root}'`,
    });
  }
}

function validateDependencies(config: Config, errors: ValidationError[]): void {
  const name = config.dependencies.prefix_env_var;
  if (!ENV_VAR_NAME.test(name)) {
    errors.push({
      field: 'dependencies.prefix_env_var',
      value: name,
      message: `'dependencies.prefix_env_var' is not a valid environment variable name: '${name}'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 *
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateProbe(config, errors);
  validatePaths(config, errors);
  validateDependencies(config, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
