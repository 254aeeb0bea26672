/**
 * Include-directory resolution for one toolchain configuration pass:
 * probe → extract → normalize → dedupe → inject.
 *
 * @packageDocumentation
 */

import { getDefaultConfig, getDefaultEnv, type Config, type EnvRecord } from '../config/index.js';
import { probe } from '../probe/probe.js';
import type { CompilerRunner, ProbeLanguage } from '../probe/types.js';
import { Logger } from '../utils/logger.js';
import { inject } from './injector.js';
import { normalize } from './normalizer.js';
import { extract } from './parser.js';
import type { IncludeDirectory, NormalizeOptions } from './types.js';

/**
 * What to resolve include directories for.
 */
export interface ResolveRequest {
  /** Compiler executable to probe. */
  compilerPath: string;
  /** Flags appended after `config.probe.flags`. */
  flags?: readonly string[];
  /** Languages to probe; defaults to `config.probe.languages`. */
  languages?: readonly ProbeLanguage[];
  /** Configuration (defaults when omitted). */
  config?: Config;
  /** Environment holding the dependency prefix variable (defaults to process.env). */
  env?: EnvRecord;
}

/**
 * Collaborators, replaceable in tests.
 */
export interface ResolveDependencies {
  runner?: CompilerRunner;
  logger?: Logger;
}

/**
 * Drops later occurrences of a path, keeping the first.
 */
export function dedupeDirectories(dirs: readonly IncludeDirectory[]): IncludeDirectory[] {
  const seen = new Set<string>();
  return dirs.filter((dir) => {
    if (seen.has(dir.path)) {
      return false;
    }
    seen.add(dir.path);
    return true;
  });
}

/**
 * Resolves the ordered include directories for a compiler.
 *
 * Compiler defaults come first, per language in the order given and in the
 * order the compiler reported them; directories derived from the dependency
 * prefix variable follow in listed order.
 *
 * @throws ToolchainProbeFailedError, CompilerNotFoundError or
 *   DelimiterNotFoundError when a probe fails.
 *
 * @example
 * ```typescript
 * const dirs = await resolveIncludeDirectories({
 *   compilerPath: '/usr/bin/gcc',
 *   env: { CC_DEPENDENCY_PREFIXES: '/opt/zlib' },
 * });
 * const field = dirs.map((d) => `"${d.literal}"`).join(', ');
 * ```
 */
export async function resolveIncludeDirectories(
  request: ResolveRequest,
  deps: ResolveDependencies = {}
): Promise<IncludeDirectory[]> {
  const config = request.config ?? getDefaultConfig();
  const env = request.env ?? getDefaultEnv();
  const logger =
    deps.logger ?? new Logger({ component: 'IncludeResolver', debugMode: config.logging.debug });
  const probeLogger = logger.child('CompilerProbe');

  const languages = request.languages ?? config.probe.languages;
  const flags = [...config.probe.flags, ...(request.flags ?? [])];
  const normalizeOptions: NormalizeOptions = { executionRoot: config.paths.execution_root };

  const defaults: IncludeDirectory[] = [];
  for (const language of languages) {
    const startTime = Date.now();
    const output = await probe(request.compilerPath, flags, {
      language,
      timeoutMs: config.probe.timeout_ms,
      runner: deps.runner,
      logger: probeLogger,
    });

    const entries = extract(output.text);
    logger.debug('probe_completed', {
      language,
      entries: entries.length,
      durationMs: Date.now() - startTime,
    });
    defaults.push(...entries.map((entry) => normalize(entry, normalizeOptions)));
  }

  const prefixEnvVar = config.dependencies.prefix_env_var;
  const prefixes = env[prefixEnvVar];

  const compilerDirs = config.output.dedupe ? dedupeDirectories(defaults) : defaults;
  const combined = inject(compilerDirs, prefixes, { ...normalizeOptions, logger });
  const result = config.output.dedupe ? dedupeDirectories(combined) : combined;

  logger.info('include_directories_resolved', {
    compiler: request.compilerPath,
    languages: [...languages],
    compilerDefaults: compilerDirs.length,
    injected: combined.length - compilerDirs.length,
    total: result.length,
  });

  return result;
}
