/**
 * Compiler probe: runs the compiler on an empty translation unit so that it
 * reports its default include search path.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';

import { hasSearchList } from '../include-paths/parser.js';
import { logger as defaultLogger } from '../utils/logger.js';
import {
  CompilerNotFoundError,
  ToolchainProbeFailedError,
  type CompilerDiagnosticOutput,
  type CompilerRunner,
  type ProbeOptions,
  type RunResult,
} from './types.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 30000;

/**
 * Locale forced on the compiler. GCC translates the search-list markers
 * through gettext, so any other locale can hide them from the parser.
 */
export const PROBE_LOCALE_ENV: Readonly<Record<string, string>> = {
  LC_ALL: 'C',
  LC_MESSAGES: 'C',
  LANG: 'C',
};

/**
 * Raises the error behind a process that never started. A missing
 * executable becomes a CompilerNotFoundError; anything else propagates.
 */
function rethrowSpawnError(command: string, error: unknown): never {
  if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
    throw new CompilerNotFoundError(command, error);
  }
  throw error;
}

/**
 * Default runner backed by execa.
 */
export const execaRunner: CompilerRunner = {
  async run(command, args, options): Promise<RunResult> {
    const result = await execa(command, [...args], {
      input: options.input,
      timeout: options.timeoutMs,
      env: PROBE_LOCALE_ENV,
      all: true,
      reject: false,
    }).catch((error: unknown) => rethrowSpawnError(command, error));

    const output = typeof result.all === 'string' ? result.all : '';

    if (result.timedOut) {
      return { exitCode: undefined, output, timedOut: true };
    }

    if (result.exitCode === undefined && result instanceof Error && !result.isTerminated) {
      rethrowSpawnError(command, result);
    }

    return { exitCode: result.exitCode, output, timedOut: false, signal: result.signal };
  },
};

/**
 * Builds the probe command line: preprocess standard input as `language`
 * with verbose diagnostics.
 */
export function buildProbeArgs(language: string, baseFlags: readonly string[]): string[] {
  return ['-E', '-x', language, '-', '-v', ...baseFlags];
}

/**
 * Runs the compiler probe and returns its captured diagnostic text.
 *
 * A non-zero exit is accepted (with a warning) only when the output still
 * holds a complete search list; otherwise the probe failed.
 *
 * @param compilerPath - Compiler executable.
 * @param baseFlags - Flags appended to the probe command (e.g. `--sysroot=...`).
 * @param options - Language, timeout, runner and logger.
 * @throws ToolchainProbeFailedError on timeout or an unsuccessful exit.
 * @throws CompilerNotFoundError if the executable does not exist.
 */
export async function probe(
  compilerPath: string,
  baseFlags: readonly string[],
  options: ProbeOptions = {}
): Promise<CompilerDiagnosticOutput> {
  const {
    language = 'c++',
    timeoutMs = DEFAULT_PROBE_TIMEOUT_MS,
    runner = execaRunner,
    logger = defaultLogger,
  } = options;

  const args = buildProbeArgs(language, baseFlags);
  const command = [compilerPath, ...args].join(' ');

  logger.debug('probe_started', { command, timeoutMs });
  const result = await runner.run(compilerPath, args, { timeoutMs, input: '' });

  if (result.timedOut) {
    logger.error('probe_timed_out', { command, timeoutMs });
    throw new ToolchainProbeFailedError(command, 'timeout', undefined, result.output, {
      timeoutMs,
    });
  }

  if (result.exitCode === 0) {
    return { text: result.output, exitCode: 0, command };
  }

  if (result.exitCode !== undefined && hasSearchList(result.output)) {
    logger.warn('probe_nonzero_exit_ignored', { command, exitCode: result.exitCode });
    return { text: result.output, exitCode: result.exitCode, command };
  }

  logger.error('probe_failed', {
    command,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  });
  throw new ToolchainProbeFailedError(command, 'exit', result.exitCode, result.output, {
    signal: result.signal,
  });
}
