/**
 * cc-include-dirs
 *
 * Resolves the include directories a C/C++ toolchain searches: the
 * compiler's own defaults followed by directories contributed by
 * dependency install prefixes.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export {
  resolveIncludeDirectories,
  dedupeDirectories,
  extract,
  hasSearchList,
  normalize,
  escapeLiteral,
  unescapeLiteral,
  inject,
  splitPrefixList,
  SEARCH_LIST_BEGIN,
  SEARCH_LIST_END,
  DelimiterNotFoundError,
  LiteralSyntaxError,
  type IncludeDirectory,
  type NormalizeOptions,
  type InjectOptions,
  type MissingDelimiter,
  type ResolveRequest,
  type ResolveDependencies,
} from './include-paths/index.js';

export {
  probe,
  execaRunner,
  buildProbeArgs,
  DEFAULT_PROBE_TIMEOUT_MS,
  PROBE_LOCALE_ENV,
  PROBE_LANGUAGES,
  isProbeLanguage,
  ToolchainProbeFailedError,
  CompilerNotFoundError,
  type ProbeLanguage,
  type ProbeOptions,
  type ProbeFailureReason,
  type CompilerDiagnosticOutput,
  type CompilerRunner,
  type RunOptions,
  type RunResult,
} from './probe/index.js';

export {
  loadConfig,
  parseConfig,
  getDefaultConfig,
  validateConfig,
  assertConfigValid,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  DEFAULT_PREFIX_ENV_VAR,
  type Config,
  type EnvRecord,
} from './config/index.js';

export { Logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
