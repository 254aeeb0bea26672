/**
 * Compiler probing.
 *
 * @packageDocumentation
 */

export {
  probe,
  execaRunner,
  buildProbeArgs,
  DEFAULT_PROBE_TIMEOUT_MS,
  PROBE_LOCALE_ENV,
} from './probe.js';
export {
  PROBE_LANGUAGES,
  isProbeLanguage,
  ToolchainProbeFailedError,
  CompilerNotFoundError,
} from './types.js';
export type {
  ProbeLanguage,
  ProbeOptions,
  ProbeFailureReason,
  CompilerDiagnosticOutput,
  CompilerRunner,
  RunOptions,
  RunResult,
} from './types.js';
