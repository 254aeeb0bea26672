/**
 * Types for probing a C/C++ compiler for its default include search path.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';

/**
 * Source languages a probe can preprocess as, passed as `-x <language>`.
 */
export const PROBE_LANGUAGES = ['c', 'c++', 'objective-c', 'objective-c++'] as const;

export type ProbeLanguage = (typeof PROBE_LANGUAGES)[number];

/**
 * Narrows an arbitrary string to a ProbeLanguage.
 */
export function isProbeLanguage(value: string): value is ProbeLanguage {
  return PROBE_LANGUAGES.some((language) => language === value);
}

/**
 * Options for a single process run.
 */
export interface RunOptions {
  /** Kill the process after this many milliseconds. */
  timeoutMs: number;
  /** Text written to the process's standard input. */
  input: string;
}

/**
 * Outcome of a process run that started and either exited or timed out.
 */
export interface RunResult {
  /** Exit code, or undefined when the process was killed. */
  exitCode: number | undefined;
  /** Standard output and standard error, interleaved. */
  output: string;
  /** Whether the process was killed for exceeding the timeout. */
  timedOut: boolean;
  /** Signal that terminated the process, e.g. `SIGSEGV`. */
  signal?: string | undefined;
}

/**
 * Capability to run an executable and capture its output.
 *
 * Rejects only when the process could not be started.
 */
export interface CompilerRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<RunResult>;
}

/**
 * Options for {@link probe}.
 */
export interface ProbeOptions {
  /** Language to preprocess the empty input as (default: `c++`). */
  language?: ProbeLanguage;
  /** Timeout in milliseconds (default: 30000). */
  timeoutMs?: number;
  /** Runner used to start the compiler (default: execa). */
  runner?: CompilerRunner;
  /** Logger for probe events. */
  logger?: Logger;
}

/**
 * Raw text captured from one probe invocation.
 */
export interface CompilerDiagnosticOutput {
  /** Interleaved standard output and standard error. */
  text: string;
  /** Exit code of the compiler. */
  exitCode: number;
  /** The command line that was run, for diagnostics. */
  command: string;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Longest excerpt of captured output placed into an error message.
 * The error objects keep the full text.
 */
const MESSAGE_EXCERPT_LENGTH = 500;

function excerpt(text: string): string {
  return text.length > MESSAGE_EXCERPT_LENGTH
    ? `${text.slice(0, MESSAGE_EXCERPT_LENGTH)}...`
    : text;
}

/**
 * Why a probe failed.
 */
export type ProbeFailureReason = 'exit' | 'timeout';

/**
 * Error thrown when the compiler probe itself failed.
 */
export class ToolchainProbeFailedError extends Error {
  /** The command line that was run. */
  public readonly command: string;
  /** Whether the compiler exited unsuccessfully or timed out. */
  public readonly reason: ProbeFailureReason;
  /** Exit code, if the process exited. */
  public readonly exitCode: number | undefined;
  /** Everything the compiler printed. */
  public readonly output: string;
  /** Signal that terminated the compiler, if any. */
  public readonly signal: string | undefined;

  constructor(
    command: string,
    reason: ProbeFailureReason,
    exitCode: number | undefined,
    output: string,
    details: { timeoutMs?: number; signal?: string | undefined } = {}
  ) {
    let summary: string;
    if (reason === 'timeout') {
      summary = `Compiler probe timed out after ${String(details.timeoutMs)}ms`;
    } else if (exitCode === undefined && details.signal !== undefined) {
      summary = `Compiler probe was killed by signal ${details.signal}`;
    } else {
      summary = `Compiler probe failed with exit code ${String(exitCode)}`;
    }
    super(`${summary}: '${command}'\n${excerpt(output)}`);
    this.name = 'ToolchainProbeFailedError';
    this.command = command;
    this.reason = reason;
    this.exitCode = exitCode;
    this.output = output;
    this.signal = details.signal;
  }
}

/**
 * Error thrown when the compiler executable does not exist.
 */
export class CompilerNotFoundError extends Error {
  /** The compiler path that was attempted. */
  public readonly compilerPath: string;

  constructor(compilerPath: string, cause: unknown) {
    super(`Compiler '${compilerPath}' was not found or is not in PATH`, { cause });
    this.name = 'CompilerNotFoundError';
    this.compilerPath = compilerPath;
  }
}
